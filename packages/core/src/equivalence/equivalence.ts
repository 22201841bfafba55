import { formatValue } from '@exval/shared';
import { isPlainObject, resolveRef } from '../schema/conformance';
import {
  DEFAULT_EQUIVALENCE,
  type Definitions,
  type EquivalenceOptions,
  type TypeSpec,
} from '../schema/types';

export interface Comparison {
  equivalent: boolean;
  /** Location of the first difference, e.g. `$.items[2]` */
  path?: string;
  reason?: string;
}

const EQUAL: Comparison = Object.freeze({ equivalent: true });

function differ(path: string, reason: string): Comparison {
  return { equivalent: false, path, reason };
}

/**
 * Floats are equal within `max(absoluteEpsilon, relativeEpsilon * max(|a|, |b|))`.
 * NaN equals NaN; an infinity equals only itself.
 */
export function floatsEqual(a: number, b: number, options: EquivalenceOptions): boolean {
  if (Number.isNaN(a) || Number.isNaN(b)) return Number.isNaN(a) && Number.isNaN(b);
  if (!Number.isFinite(a) || !Number.isFinite(b)) return a === b;
  const tolerance = Math.max(
    options.absoluteEpsilon,
    options.relativeEpsilon * Math.max(Math.abs(a), Math.abs(b)),
  );
  return Math.abs(a - b) <= tolerance;
}

/**
 * Output equivalence under an output type. Without one, and for values the
 * type leaves undescribed, the comparison is structural, with numbers
 * compared as floats.
 */
export function compareOutputs(
  expected: unknown,
  actual: unknown,
  spec?: TypeSpec,
  options: EquivalenceOptions = DEFAULT_EQUIVALENCE,
  definitions: Definitions = {},
): Comparison {
  return compareAt(expected, actual, spec, '$');

  function compareAt(e: unknown, a: unknown, raw: TypeSpec | undefined, at: string): Comparison {
    if (e === null || a === null) {
      return e === a ? EQUAL : differ(at, `expected ${formatValue(e)}, got ${formatValue(a)}`);
    }
    const spec = raw ? resolveRef(raw, definitions) : undefined;
    switch (spec?.type) {
      case 'integer':
      case 'string':
      case 'boolean':
        return e === a ? EQUAL : differ(at, `expected ${formatValue(e)}, got ${formatValue(a)}`);
      case 'float':
        return compareNumbers(e, a, at);
      case 'sequence':
        return spec.unordered
          ? compareUnordered(e, a, spec.items, at)
          : compareOrdered(e, a, spec.items, at);
      case 'mapping':
        return compareObjects(e, a, () => spec.values, 'exact', at);
      case 'record': {
        const fields = new Map(spec.fields.map((f) => [f.name, f.type]));
        return compareObjects(e, a, (key) => fields.get(key), spec.match, at);
      }
      default:
        return compareUntyped(e, a, at);
    }
  }

  function compareNumbers(e: unknown, a: unknown, at: string): Comparison {
    if (typeof e !== 'number' || typeof a !== 'number') {
      return differ(at, `expected ${formatValue(e)}, got ${formatValue(a)}`);
    }
    return floatsEqual(e, a, options)
      ? EQUAL
      : differ(at, `expected ${formatValue(e)}, got ${formatValue(a)} (outside tolerance)`);
  }

  function compareUntyped(e: unknown, a: unknown, at: string): Comparison {
    if (typeof e === 'number' && typeof a === 'number') return compareNumbers(e, a, at);
    if (Array.isArray(e)) return compareOrdered(e, a, undefined, at);
    if (isPlainObject(e)) return compareObjects(e, a, () => undefined, 'exact', at);
    return e === a ? EQUAL : differ(at, `expected ${formatValue(e)}, got ${formatValue(a)}`);
  }

  function compareOrdered(
    e: unknown,
    a: unknown,
    items: TypeSpec | undefined,
    at: string,
  ): Comparison {
    if (!Array.isArray(e) || !Array.isArray(a)) {
      return differ(at, `expected a sequence, got ${formatValue(a)}`);
    }
    if (e.length !== a.length) {
      return differ(at, `expected length ${e.length}, got ${a.length}`);
    }
    for (let i = 0; i < e.length; i++) {
      const result = compareAt(e[i], a[i], items, `${at}[${i}]`);
      if (!result.equivalent) return result;
    }
    return EQUAL;
  }

  /**
   * Multiset comparison: each expected element claims the first unclaimed
   * equivalent actual element.
   */
  function compareUnordered(
    e: unknown,
    a: unknown,
    items: TypeSpec | undefined,
    at: string,
  ): Comparison {
    if (!Array.isArray(e) || !Array.isArray(a)) {
      return differ(at, `expected a sequence, got ${formatValue(a)}`);
    }
    if (e.length !== a.length) {
      return differ(at, `expected length ${e.length}, got ${a.length}`);
    }
    // Tolerant matching is not transitive, so a greedy pairing can miss a valid one.
    const fits = e.map((expected) => a.map((candidate) => compareAt(expected, candidate, items, at).equivalent));
    const owner = new Array<number>(a.length).fill(-1);
    const claim = (i: number, visited: boolean[]): boolean => {
      for (let j = 0; j < a.length; j++) {
        if (visited[j] || !fits[i][j]) continue;
        visited[j] = true;
        if (owner[j] === -1 || claim(owner[j], visited)) {
          owner[j] = i;
          return true;
        }
      }
      return false;
    };
    for (let i = 0; i < e.length; i++) {
      if (!claim(i, new Array<boolean>(a.length).fill(false))) {
        return differ(`${at}[${i}]`, `no counterpart for ${formatValue(e[i])} in unordered output`);
      }
    }
    return EQUAL;
  }

  function compareObjects(
    e: unknown,
    a: unknown,
    fieldType: (key: string) => TypeSpec | undefined,
    match: 'exact' | 'subset',
    at: string,
  ): Comparison {
    if (!isPlainObject(e) || !isPlainObject(a)) {
      return differ(at, `expected an object, got ${formatValue(a)}`);
    }
    for (const key of Object.keys(e)) {
      if (!Object.prototype.hasOwnProperty.call(a, key)) {
        return differ(`${at}.${key}`, 'missing key');
      }
      const result = compareAt(e[key], a[key], fieldType(key), `${at}.${key}`);
      if (!result.equivalent) return result;
    }
    if (match === 'exact') {
      const extra = Object.keys(a).find((key) => !Object.prototype.hasOwnProperty.call(e, key));
      if (extra !== undefined) return differ(`${at}.${extra}`, 'unexpected key');
    }
    return EQUAL;
  }
}
