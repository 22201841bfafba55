/**
 * JSON-safe encoding for exercise values.
 *
 * Exercise values are JSON-like, but float outputs may legitimately be NaN,
 * +/-Infinity or -0, which JSON cannot carry. Those are written as
 * `{ "$float": "NaN" | "Infinity" | "-Infinity" | "-0" }`.
 *
 * A record that would itself read as a tag (its only key is `$float` or
 * `$literal`) is wrapped as `{ "$literal": { ... } }`.
 */

const FLOAT_TAG = '$float';
const LITERAL_TAG = '$literal';

type SpecialFloat = 'NaN' | 'Infinity' | '-Infinity' | '-0';

function specialFloatName(value: number): SpecialFloat | undefined {
  if (Number.isNaN(value)) return 'NaN';
  if (value === Infinity) return 'Infinity';
  if (value === -Infinity) return '-Infinity';
  if (Object.is(value, -0)) return '-0';
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** The single key of a one-key record */
function soleKey(value: Record<string, unknown>): string | undefined {
  const keys = Object.keys(value);
  return keys.length === 1 ? keys[0] : undefined;
}

function mapEntries(
  value: Record<string, unknown>,
  fn: (item: unknown) => unknown,
): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, item] of Object.entries(value)) {
    out[key] = fn(item);
  }
  return out;
}

export function encodeValue(value: unknown): unknown {
  if (typeof value === 'number') {
    const special = specialFloatName(value);
    return special ? { [FLOAT_TAG]: special } : value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => encodeValue(item));
  }
  if (isRecord(value)) {
    const out = mapEntries(value, encodeValue);
    const key = soleKey(value);
    return key === FLOAT_TAG || key === LITERAL_TAG ? { [LITERAL_TAG]: out } : out;
  }
  return value;
}

export function decodeValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => decodeValue(item));
  }
  if (isRecord(value)) {
    const key = soleKey(value);
    if (key === LITERAL_TAG) {
      const literal = value[LITERAL_TAG];
      if (isRecord(literal)) return mapEntries(literal, decodeValue);
    }
    if (key === FLOAT_TAG) {
      switch (value[FLOAT_TAG]) {
        case 'NaN':
          return NaN;
        case 'Infinity':
          return Infinity;
        case '-Infinity':
          return -Infinity;
        case '-0':
          return -0;
      }
    }
    return mapEntries(value, decodeValue);
  }
  return value;
}

/**
 * `JSON.stringify` over the encoded form.
 */
export function stringifyValue(value: unknown, indent?: number): string {
  return JSON.stringify(encodeValue(value), null, indent) ?? 'undefined';
}

/**
 * Compact single-line rendering for reports, cut at `maxChars`.
 */
export function formatValue(value: unknown, maxChars = 80): string {
  const text = value === undefined ? 'undefined' : stringifyValue(value);
  return text.length > maxChars ? `${text.slice(0, maxChars - 3)}...` : text;
}

/**
 * Recursively freezes plain objects and arrays. Typed arrays cannot be
 * frozen and are left as they are.
 */
export function deepFreeze<T>(value: T): T {
  if (
    typeof value === 'object' &&
    value !== null &&
    !ArrayBuffer.isView(value) &&
    !Object.isFrozen(value)
  ) {
    Object.freeze(value);
    for (const item of Object.values(value)) {
      deepFreeze(item);
    }
  }
  return value;
}
