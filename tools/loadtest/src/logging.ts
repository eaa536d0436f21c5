type RedactionValue = Record<string, unknown> | unknown[] | string | number | boolean | null | undefined;

const REDACT_KEYS = new Set(['authorization', 'auth', 'cookie', 'token', 'secret', 'password']);

const URL_CREDENTIALS = /(\w+:\/\/)[^/@\s]+@/g;

const sanitize = (value: unknown, seen = new WeakSet<object>()): RedactionValue => {
  if (value === null || value === undefined) {
    return value;
  }
  if (typeof value === 'string') {
    return value.replace(URL_CREDENTIALS, '$1[REDACTED]@');
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value !== 'object') {
    return String(value);
  }
  if (value instanceof Error) {
    return { name: value.name, message: sanitize(value.message, seen) };
  }
  if (seen.has(value)) {
    return '[REDACTED]';
  }
  seen.add(value);
  if (Array.isArray(value)) {
    return value.map((entry) => sanitize(entry, seen));
  }
  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (REDACT_KEYS.has(key) || /token|secret|auth|password|cookie/i.test(key)) {
      result[key] = '[REDACTED]';
    } else {
      result[key] = sanitize(entry, seen);
    }
  }
  return result;
};

export const serialize = (value: unknown): string => {
  try {
    return JSON.stringify(sanitize(value));
  } catch {
    return '[unserializable]';
  }
};

export const logInfo = (message: string, meta?: unknown): void => {
  if (meta === undefined) {
    console.log(message);
    return;
  }
  console.log(message, serialize(meta));
};

export const logWarn = (message: string, meta?: unknown): void => {
  if (meta === undefined) {
    console.warn(message);
    return;
  }
  console.warn(message, serialize(meta));
};

export const logError = (message: string, meta?: unknown): void => {
  if (meta === undefined) {
    console.error(message);
    return;
  }
  console.error(message, serialize(meta));
};
