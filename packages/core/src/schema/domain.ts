import { hash } from 'ohash';
import { GenerationError, encodeValue } from '@exval/shared';
import { Prng } from '../random';
import { resolveRef } from './conformance';
import type {
  Definitions,
  FloatSpec,
  IntegerSpec,
  MappingSpec,
  RecordSpec,
  TypeSpec,
} from './types';

/** Width of the range drawn from when a numeric bound is missing */
export const DEFAULT_SPAN = 2_000;
export const DEFAULT_ALPHABET =
  'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
export const DEFAULT_KEY_ALPHABET = 'abcdefghijklmnopqrstuvwxyz';
export const DEFAULT_KEY_MAX_LENGTH = 6;
export const DEFAULT_MAX_DEPTH = 4;
export const MAX_BOUNDARY_VALUES = 64;

const FREE_LENGTH = 8;
const NESTED_FREE_LENGTH = 3;
const NULL_PROBABILITY = 0.2;

export type ValueClassification = 'valid' | 'out-of-domain';

export interface ClassifiedValue {
  value: unknown;
  classification: ValueClassification;
}

/**
 * Stable structural key for deduplication. Encoded first so NaN, -0 and the
 * infinities get keys distinct from null and 0.
 */
export function valueKey(value: unknown): string {
  return hash(encodeValue(value));
}

/**
 * Depth bookkeeping for one schema. Depth counts container levels: a scalar is
 * depth 0, `[1]` is depth 1, `[[1]]` depth 2. A definition that cannot bottom
 * out has an infinite minimum depth.
 */
export class DomainContext {
  private readonly definitionDepths = new Map<string, number>();

  constructor(
    readonly definitions: Definitions,
    readonly maxDepth: number = DEFAULT_MAX_DEPTH,
  ) {
    const names = Object.keys(definitions);
    for (const name of names) this.definitionDepths.set(name, Infinity);
    // fixpoint: every pass can only lower a depth, and settles within names.length + 1 passes
    for (let pass = 0; pass <= names.length; pass++) {
      let changed = false;
      for (const name of names) {
        const spec = definitions[name];
        if (!spec) continue;
        const depth = this.minDepthNonNull(spec);
        if (depth < (this.definitionDepths.get(name) ?? Infinity)) {
          this.definitionDepths.set(name, depth);
          changed = true;
        }
      }
      if (!changed) break;
    }
  }

  resolve(spec: TypeSpec): TypeSpec {
    return resolveRef(spec, this.definitions);
  }

  /** Smallest depth at which some value of `spec` exists, null included */
  minDepth(spec: TypeSpec): number {
    const nullable = spec.nullable || (spec.type === 'ref' && this.resolve(spec).nullable);
    return nullable ? 0 : this.minDepthNonNull(spec);
  }

  /** Smallest depth at which a non-null value of `spec` exists */
  minDepthNonNull(spec: TypeSpec): number {
    switch (spec.type) {
      case 'integer':
      case 'float':
      case 'boolean':
      case 'string':
        return 0;
      case 'sequence':
        return spec.minLength > 0 ? 1 + this.minDepth(spec.items) : 0;
      case 'mapping':
        return spec.minSize > 0 ? 1 + this.minDepth(spec.values) : 0;
      case 'record': {
        const required = spec.fields.filter((f) => !f.optional);
        if (required.length === 0) return 0;
        return 1 + Math.max(...required.map((f) => this.minDepth(f.type)));
      }
      case 'ref':
        return this.definitionDepths.get(spec.ref) ?? Infinity;
    }
  }

  /** True when a value (possibly null) fits within `budget` levels */
  fits(spec: TypeSpec, budget: number): boolean {
    return this.minDepth(spec) <= budget;
  }
}

export function numericRange(spec: IntegerSpec | FloatSpec): [number, number] {
  const { min, max } = spec;
  if (min !== undefined && max !== undefined) return [min, max];
  if (min !== undefined) return [min, min + DEFAULT_SPAN];
  if (max !== undefined) return [max - DEFAULT_SPAN, max];
  return [-DEFAULT_SPAN / 2, DEFAULT_SPAN / 2];
}

function lengthRange(
  min: number,
  max: number | undefined,
  ctx: DomainContext,
  budget: number,
): [number, number] {
  const free = budget >= ctx.maxDepth ? FREE_LENGTH : NESTED_FREE_LENGTH;
  return [min, max ?? min + free];
}

/** Value of the domain closest to zero */
function closestToZero(min: number | undefined, max: number | undefined): number {
  if (min !== undefined && min > 0) return min;
  if (max !== undefined && max < 0) return max;
  return 0;
}

/**
 * The `index`-th key over `alphabet`, in shortlex order: a, b, ..., z, aa, ab, ...
 */
export function keyAt(index: number, alphabet: string): string {
  const chars = [...alphabet];
  let n = index;
  let key = '';
  do {
    key = chars[n % chars.length] + key;
    n = Math.floor(n / chars.length) - 1;
  } while (n >= 0);
  return key;
}

function mappingKeys(spec: MappingSpec, count: number): string[] {
  const alphabet = spec.keyAlphabet ?? DEFAULT_KEY_ALPHABET;
  const maxLength = spec.keyMaxLength ?? DEFAULT_KEY_MAX_LENGTH;
  const keys: string[] = [];
  for (let i = 0; keys.length < count; i++) {
    const key = keyAt(i, alphabet);
    if ([...key].length > maxLength) break;
    keys.push(key);
  }
  return keys;
}

export function assertProducible(spec: TypeSpec, ctx: DomainContext, budget: number, at: string): void {
  if (!ctx.fits(spec, budget)) {
    const needed = ctx.minDepth(spec);
    throw new GenerationError(
      Number.isFinite(needed)
        ? `Domain of ${at} is empty within depth ${ctx.maxDepth} (needs ${needed} levels)`
        : `Domain of ${at} is empty: its recursion never terminates`,
      { details: { at, maxDepth: ctx.maxDepth } },
    );
  }
}

/**
 * Canonical representative: closest to zero, first enumeration member,
 * shortest collections. Nullable refs and values that do not fit the budget
 * become null.
 */
export function baselineValue(
  spec: TypeSpec,
  ctx: DomainContext,
  budget: number = ctx.maxDepth,
): unknown {
  const resolved = ctx.resolve(spec);
  if (resolved.nullable && (spec.type === 'ref' || ctx.minDepthNonNull(resolved) > budget)) {
    return null;
  }
  switch (resolved.type) {
    case 'integer':
    case 'float':
      return resolved.enum?.[0] ?? closestToZero(resolved.min, resolved.max);
    case 'boolean':
      return false;
    case 'string': {
      if (resolved.enum) return resolved.enum[0];
      const first = [...(resolved.alphabet ?? DEFAULT_ALPHABET)][0] ?? 'a';
      return first.repeat(resolved.minLength);
    }
    case 'sequence':
      return Array.from({ length: resolved.minLength }, () =>
        baselineValue(resolved.items, ctx, budget - 1),
      );
    case 'mapping':
      return Object.fromEntries(
        mappingKeys(resolved, resolved.minSize).map((key) => [
          key,
          baselineValue(resolved.values, ctx, budget - 1),
        ]),
      );
    case 'record':
      return baselineRecord(resolved, ctx, budget);
    case 'ref':
      return null;
  }
}

function baselineRecord(spec: RecordSpec, ctx: DomainContext, budget: number): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const field of spec.fields) {
    if (!field.optional) out[field.name] = baselineValue(field.type, ctx, budget - 1);
  }
  return out;
}

/**
 * Enumerable domains: enumerations and booleans, plus null when nullable.
 */
export function finiteDomain(spec: TypeSpec, ctx: DomainContext): unknown[] | undefined {
  const resolved = ctx.resolve(spec);
  const withNull = (values: readonly unknown[]): unknown[] =>
    resolved.nullable ? [...values, null] : [...values];
  switch (resolved.type) {
    case 'boolean':
      return withNull([false, true]);
    case 'integer':
    case 'float':
    case 'string':
      return resolved.enum ? withNull(resolved.enum) : undefined;
    default:
      return undefined;
  }
}

/**
 * Boundary values of one type: bounds and their inner neighbours, zero (with
 * its integer neighbours) or empty, every enumeration member, null. Out-of-domain neighbours only on request.
 */
export function boundaryValues(
  spec: TypeSpec,
  ctx: DomainContext,
  options: { includeOutOfDomain?: boolean } = {},
  budget: number = ctx.maxDepth,
): ClassifiedValue[] {
  const includeOutOfDomain = options.includeOutOfDomain ?? false;
  const resolved = ctx.resolve(spec);
  const values: ClassifiedValue[] = [];
  const seen = new Set<string>();
  const add = (value: unknown, classification: ValueClassification = 'valid'): void => {
    if (values.length >= MAX_BOUNDARY_VALUES) return;
    const key = valueKey(value);
    if (seen.has(key)) return;
    seen.add(key);
    values.push({ value, classification });
  };

  if (resolved.nullable) {
    add(null);
  }
  if (ctx.minDepthNonNull(resolved) > budget) {
    return values;
  }

  switch (resolved.type) {
    case 'integer':
    case 'float': {
      if (resolved.enum) {
        resolved.enum.forEach((member) => add(member));
        break;
      }
      const { min, max } = resolved;
      const step = resolved.type === 'integer' ? 1 : undefined;
      const inDomain = (n: number): boolean =>
        (min === undefined || n >= min) && (max === undefined || n <= max);
      const candidates: number[] = [];
      if (min !== undefined) candidates.push(min);
      if (min !== undefined && step !== undefined) candidates.push(min + step);
      if (step !== undefined) candidates.push(-step, 0, step);
      else candidates.push(0);
      if (max !== undefined && step !== undefined) candidates.push(max - step);
      if (max !== undefined) candidates.push(max);
      candidates.filter(inDomain).forEach((n) => add(n));
      if (includeOutOfDomain) {
        const outStep = step ?? 1;
        if (min !== undefined) add(min - outStep, 'out-of-domain');
        if (max !== undefined) add(max + outStep, 'out-of-domain');
      }
      break;
    }
    case 'boolean':
      add(false);
      add(true);
      break;
    case 'string': {
      if (resolved.enum) {
        resolved.enum.forEach((member) => add(member));
        break;
      }
      const first = [...(resolved.alphabet ?? DEFAULT_ALPHABET)][0] ?? 'a';
      const { minLength, maxLength } = resolved;
      for (const length of innerLengths(minLength, maxLength)) add(first.repeat(length));
      if (includeOutOfDomain) {
        if (minLength > 0) add(first.repeat(minLength - 1), 'out-of-domain');
        if (maxLength !== undefined) add(first.repeat(maxLength + 1), 'out-of-domain');
      }
      break;
    }
    case 'sequence': {
      const { minLength, maxLength } = resolved;
      const item = (): unknown => baselineValue(resolved.items, ctx, budget - 1);
      const itemsFit = ctx.fits(resolved.items, budget - 1);
      for (const length of innerLengths(minLength, maxLength)) {
        if (length > 0 && !itemsFit) continue;
        add(Array.from({ length }, item));
      }
      // single-element sequences carry the item's own boundaries
      if (itemsFit && minLength <= 1 && (maxLength === undefined || maxLength >= 1)) {
        for (const { value } of boundaryValues(resolved.items, ctx, {}, budget - 1)) {
          add([value]);
        }
      }
      if (includeOutOfDomain && itemsFit) {
        if (minLength > 0) add(Array.from({ length: minLength - 1 }, item), 'out-of-domain');
        if (maxLength !== undefined) add(Array.from({ length: maxLength + 1 }, item), 'out-of-domain');
      }
      break;
    }
    case 'mapping': {
      const { minSize, maxSize } = resolved;
      const valuesFit = ctx.fits(resolved.values, budget - 1);
      const build = (size: number): Record<string, unknown> =>
        Object.fromEntries(
          mappingKeys(resolved, size).map((key) => [key, baselineValue(resolved.values, ctx, budget - 1)]),
        );
      for (const size of innerLengths(minSize, maxSize)) {
        if (size > 0 && !valuesFit) continue;
        if (mappingKeys(resolved, size).length < size) continue;
        add(build(size));
      }
      if (includeOutOfDomain && valuesFit) {
        if (minSize > 0) add(build(minSize - 1), 'out-of-domain');
        if (maxSize !== undefined && mappingKeys(resolved, maxSize + 1).length > maxSize) {
          add(build(maxSize + 1), 'out-of-domain');
        }
      }
      break;
    }
    case 'record': {
      const base = baselineRecord(resolved, ctx, budget);
      add(base);
      for (const field of resolved.fields) {
        if (field.optional && ctx.fits(field.type, budget - 1)) {
          add({ ...base, [field.name]: baselineValue(field.type, ctx, budget - 1) });
        }
        for (const variant of boundaryValues(field.type, ctx, options, budget - 1)) {
          add({ ...base, [field.name]: variant.value }, variant.classification);
        }
      }
      break;
    }
    case 'ref':
      break;
  }
  return values;
}

/** min, min+1, max-1 and max of a length range, min alone when unbounded */
function innerLengths(min: number, max: number | undefined): number[] {
  if (max === undefined) return [min, min + 1];
  return [...new Set([min, Math.min(min + 1, max), Math.max(max - 1, min), max])];
}

/**
 * One seeded draw from the domain of `spec`.
 */
export function drawValue(
  spec: TypeSpec,
  rng: Prng,
  ctx: DomainContext,
  budget: number = ctx.maxDepth,
): unknown {
  const resolved = ctx.resolve(spec);
  if (resolved.nullable) {
    if (ctx.minDepthNonNull(resolved) > budget || rng.bool(NULL_PROBABILITY)) return null;
  }
  switch (resolved.type) {
    case 'integer': {
      if (resolved.enum) return rng.pick(resolved.enum);
      const [lo, hi] = numericRange(resolved);
      return rng.int(lo, hi);
    }
    case 'float': {
      if (resolved.enum) return rng.pick(resolved.enum);
      const [lo, hi] = numericRange(resolved);
      return rng.float(lo, hi);
    }
    case 'boolean':
      return rng.bool();
    case 'string': {
      if (resolved.enum) return rng.pick(resolved.enum);
      const [lo, hi] = lengthRange(resolved.minLength, resolved.maxLength, ctx, budget);
      const alphabet = [...(resolved.alphabet ?? DEFAULT_ALPHABET)];
      return Array.from({ length: rng.int(lo, hi) }, () => rng.pick(alphabet)).join('');
    }
    case 'sequence': {
      const [lo, hi] = lengthRange(resolved.minLength, resolved.maxLength, ctx, budget);
      const length = ctx.fits(resolved.items, budget - 1) ? rng.int(lo, hi) : lo;
      return Array.from({ length }, () => drawValue(resolved.items, rng, ctx, budget - 1));
    }
    case 'mapping':
      return drawMapping(resolved, rng, ctx, budget);
    case 'record': {
      const out: Record<string, unknown> = {};
      for (const field of resolved.fields) {
        if (field.optional && (!ctx.fits(field.type, budget - 1) || rng.bool())) continue;
        out[field.name] = drawValue(field.type, rng, ctx, budget - 1);
      }
      return out;
    }
    case 'ref':
      return null;
  }
}

function drawMapping(
  spec: MappingSpec,
  rng: Prng,
  ctx: DomainContext,
  budget: number,
): Record<string, unknown> {
  const [lo, hi] = lengthRange(spec.minSize, spec.maxSize, ctx, budget);
  const size = ctx.fits(spec.values, budget - 1) ? rng.int(lo, hi) : lo;
  const alphabet = [...(spec.keyAlphabet ?? DEFAULT_KEY_ALPHABET)];
  const maxKeyLength = spec.keyMaxLength ?? DEFAULT_KEY_MAX_LENGTH;
  const keys = new Set<string>();
  for (let attempt = 0; keys.size < size && attempt < size * 10; attempt++) {
    const length = rng.int(1, maxKeyLength);
    keys.add(Array.from({ length }, () => rng.pick(alphabet)).join(''));
  }
  // top up deterministically when random keys keep colliding
  for (const key of mappingKeys(spec, size * 2 + 1)) {
    if (keys.size >= size) break;
    keys.add(key);
  }
  const out: Record<string, unknown> = {};
  for (const key of keys) {
    out[key] = drawValue(spec.values, rng, ctx, budget - 1);
  }
  return out;
}

/**
 * A value nested as deeply as the budget allows, used to exercise recursion.
 */
export function deepValue(spec: TypeSpec, ctx: DomainContext, budget: number = ctx.maxDepth): unknown {
  const resolved = ctx.resolve(spec);
  if (ctx.minDepthNonNull(resolved) > budget) {
    return baselineValue(spec, ctx, budget);
  }
  const child = (inner: TypeSpec): unknown =>
    ctx.minDepthNonNull(ctx.resolve(inner)) <= budget - 1
      ? deepValue(inner, ctx, budget - 1)
      : baselineValue(inner, ctx, budget - 1);
  switch (resolved.type) {
    case 'sequence': {
      if (resolved.maxLength === 0 || !ctx.fits(resolved.items, budget - 1)) {
        return baselineValue(resolved, ctx, budget);
      }
      const length = Math.max(1, resolved.minLength);
      return Array.from({ length }, (_, index) =>
        index === 0 ? child(resolved.items) : baselineValue(resolved.items, ctx, budget - 1),
      );
    }
    case 'mapping': {
      if (resolved.maxSize === 0 || !ctx.fits(resolved.values, budget - 1)) {
        return baselineValue(resolved, ctx, budget);
      }
      const keys = mappingKeys(resolved, Math.max(1, resolved.minSize));
      return Object.fromEntries(
        keys.map((key, index) => [
          key,
          index === 0 ? child(resolved.values) : baselineValue(resolved.values, ctx, budget - 1),
        ]),
      );
    }
    case 'record': {
      if (budget < 1) return baselineValue(resolved, ctx, budget);
      const out: Record<string, unknown> = {};
      for (const field of resolved.fields) {
        if (field.optional && !ctx.fits(field.type, budget - 1)) continue;
        out[field.name] = child(field.type);
      }
      return out;
    }
    default:
      return baselineValue(resolved, ctx, budget);
  }
}

/**
 * True when `spec` reaches a `ref`, i.e. the parameter may recurse.
 */
export function usesDefinitions(spec: TypeSpec): boolean {
  switch (spec.type) {
    case 'ref':
      return true;
    case 'sequence':
      return usesDefinitions(spec.items);
    case 'mapping':
      return usesDefinitions(spec.values);
    case 'record':
      return spec.fields.some((f) => usesDefinitions(f.type));
    default:
      return false;
  }
}

/**
 * Lazy, seed-restartable sequence of valid values.
 */
export function* sampleValues(spec: TypeSpec, seed: number, ctx: DomainContext): Generator<unknown> {
  const finite = finiteDomain(spec, ctx);
  if (finite) {
    yield* finite;
    return;
  }
  const rng = new Prng(seed);
  while (true) {
    yield drawValue(spec, rng, ctx);
  }
}
