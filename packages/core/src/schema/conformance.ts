import type { SchemaIssue } from '@exval/shared';
import type { Definitions, TypeSpec } from './types';

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function resolveRef(spec: TypeSpec, definitions: Definitions): TypeSpec {
  let current = spec;
  const seen = new Set<string>();
  while (current.type === 'ref') {
    if (seen.has(current.ref)) {
      throw new Error(`Definition "${current.ref}" refers only to itself`);
    }
    seen.add(current.ref);
    const target = definitions[current.ref];
    if (!target) {
      throw new Error(`Unknown definition "${current.ref}"`);
    }
    // a nullable ref makes its target nullable too
    current = current.nullable && !target.nullable ? { ...target, nullable: true } : target;
  }
  return current;
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/**
 * Collects every conformance issue of `value` against `spec`.
 * Paths use `$` for the root, `$[i]` for positions and `$.name` for keys.
 */
export function checkValue(
  spec: TypeSpec,
  value: unknown,
  definitions: Definitions,
  path = '$',
): SchemaIssue[] {
  const issues: SchemaIssue[] = [];
  visit(spec, value, path);
  return issues;

  function fail(at: string, message: string): void {
    issues.push({ path: at, message });
  }

  function visit(raw: TypeSpec, current: unknown, at: string): void {
    const spec = resolveRef(raw, definitions);
    if (current === null) {
      if (!spec.nullable) fail(at, 'null is not allowed');
      return;
    }
    switch (spec.type) {
      case 'integer': {
        if (typeof current !== 'number' || !Number.isSafeInteger(current)) {
          fail(at, `expected integer, got ${describeType(current)}`);
          return;
        }
        checkNumber(current, spec.min, spec.max, spec.enum, at);
        return;
      }
      case 'float': {
        if (typeof current !== 'number') {
          fail(at, `expected float, got ${describeType(current)}`);
          return;
        }
        if (!Number.isFinite(current)) {
          if (!spec.allowNonFinite) fail(at, `${current} is not finite`);
          else if (spec.enum && !spec.enum.some((m) => Object.is(m, current))) {
            fail(at, `${current} is not one of the enumerated values`);
          }
          return;
        }
        checkNumber(current, spec.min, spec.max, spec.enum, at);
        return;
      }
      case 'boolean':
        if (typeof current !== 'boolean') fail(at, `expected boolean, got ${describeType(current)}`);
        return;
      case 'string': {
        if (typeof current !== 'string') {
          fail(at, `expected string, got ${describeType(current)}`);
          return;
        }
        if (spec.enum && !spec.enum.includes(current)) {
          fail(at, `"${current}" is not one of the enumerated values`);
        }
        const chars = [...current];
        checkLength(chars.length, spec.minLength, spec.maxLength, at, 'length');
        if (spec.alphabet) {
          const alphabet = spec.alphabet;
          const stray = chars.find((ch) => !alphabet.includes(ch));
          if (stray !== undefined) fail(at, `character "${stray}" is outside the alphabet`);
        }
        return;
      }
      case 'sequence': {
        if (!Array.isArray(current)) {
          fail(at, `expected sequence, got ${describeType(current)}`);
          return;
        }
        checkLength(current.length, spec.minLength, spec.maxLength, at, 'length');
        current.forEach((item, index) => visit(spec.items, item, `${at}[${index}]`));
        return;
      }
      case 'mapping': {
        if (!isPlainObject(current)) {
          fail(at, `expected mapping, got ${describeType(current)}`);
          return;
        }
        const entries = Object.entries(current);
        checkLength(entries.length, spec.minSize, spec.maxSize, at, 'size');
        for (const [key, item] of entries) {
          if (spec.keyMaxLength !== undefined && key.length > spec.keyMaxLength) {
            fail(`${at}.${key}`, `key is longer than ${spec.keyMaxLength}`);
          }
          if (spec.keyAlphabet) {
            const alphabet = spec.keyAlphabet;
            if ([...key].some((ch) => !alphabet.includes(ch))) {
              fail(`${at}.${key}`, 'key uses characters outside the key alphabet');
            }
          }
          visit(spec.values, item, `${at}.${key}`);
        }
        return;
      }
      case 'record': {
        if (!isPlainObject(current)) {
          fail(at, `expected record, got ${describeType(current)}`);
          return;
        }
        const known = new Set(spec.fields.map((f) => f.name));
        for (const field of spec.fields) {
          if (!Object.prototype.hasOwnProperty.call(current, field.name)) {
            if (!field.optional) fail(`${at}.${field.name}`, 'missing field');
            continue;
          }
          visit(field.type, current[field.name], `${at}.${field.name}`);
        }
        if (spec.match === 'exact') {
          for (const key of Object.keys(current)) {
            if (!known.has(key)) fail(`${at}.${key}`, 'unexpected field');
          }
        }
        return;
      }
      case 'ref':
        // resolveRef never returns a ref
        return;
    }
  }

  function checkNumber(
    current: number,
    min: number | undefined,
    max: number | undefined,
    members: readonly number[] | undefined,
    at: string,
  ): void {
    if (members && !members.includes(current)) {
      fail(at, `${current} is not one of the enumerated values`);
    }
    if (min !== undefined && current < min) fail(at, `${current} is below the minimum ${min}`);
    if (max !== undefined && current > max) fail(at, `${current} is above the maximum ${max}`);
  }

  function checkLength(
    length: number,
    min: number,
    max: number | undefined,
    at: string,
    label: string,
  ): void {
    if (length < min) fail(at, `${label} ${length} is below the minimum ${min}`);
    if (max !== undefined && length > max) fail(at, `${label} ${length} is above the maximum ${max}`);
  }
}
