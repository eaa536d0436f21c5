/** Uniform source in `[0, 1)`. */
export type Rng = () => number;

// xorshift32 stays at zero forever once seeded with it.
const ZERO_SEED_REPLACEMENT = 0x9e3779b9;

export const createRng = (seed: number): Rng => {
  let state = seed >>> 0 || ZERO_SEED_REPLACEMENT;
  return () => {
    state ^= state << 13;
    state ^= state >>> 17;
    state ^= state << 5;
    return (state >>> 0) / 0x100000000;
  };
};

export const pick = <T>(rng: Rng, values: readonly T[]): T => {
  return values[Math.floor(rng() * values.length)];
};
