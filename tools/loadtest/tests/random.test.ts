import { test } from 'node:test';
import assert from 'node:assert/strict';
import { createRng, pick } from '../src/random';

test('rng is deterministic for the same seed', () => {
  const rngA = createRng(123);
  const rngB = createRng(123);
  for (let i = 0; i < 5; i += 1) {
    assert.equal(rngA(), rngB());
  }
});

test('rng stays within [0, 1)', () => {
  const rng = createRng(7);
  for (let i = 0; i < 10_000; i += 1) {
    const value = rng();
    assert.ok(value >= 0 && value < 1);
  }
});

test('a zero seed still produces varying values', () => {
  const rng = createRng(0);
  const values = new Set([rng(), rng(), rng()]);
  assert.equal(values.size, 3);
});

test('pick maps the unit interval onto the list', () => {
  const repos = ['a', 'b', 'c', 'd'];
  assert.equal(pick(() => 0, repos), 'a');
  assert.equal(pick(() => 0.49, repos), 'b');
  assert.equal(pick(() => 0.999, repos), 'd');
});
