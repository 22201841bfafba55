import { describe, it, expect } from 'vitest';
import { parseSchema } from '../schema/parser';
import type { TypeSpec } from '../schema/types';
import { compareOutputs, floatsEqual } from './equivalence';

const loose = { absoluteEpsilon: 1e-6, relativeEpsilon: 0 };
const strict = { absoluteEpsilon: 0, relativeEpsilon: 0 };

const float: TypeSpec = { type: 'float', nullable: false, allowNonFinite: true };
const integer: TypeSpec = { type: 'integer', nullable: false };
const seq = (items: TypeSpec, unordered = false): TypeSpec => ({
  type: 'sequence',
  nullable: false,
  minLength: 0,
  unordered,
  items,
});

describe('floatsEqual', () => {
  it('accepts differences within the absolute epsilon', () => {
    expect(floatsEqual(0.1 + 0.2, 0.3, loose)).toBe(true);
    expect(floatsEqual(0.1 + 0.2, 0.3, strict)).toBe(false);
  });

  it('scales the tolerance with the magnitude', () => {
    expect(floatsEqual(1e12, 1e12 + 100, { absoluteEpsilon: 1e-9, relativeEpsilon: 1e-9 })).toBe(true);
    expect(floatsEqual(1e12, 1e12 + 10_000, { absoluteEpsilon: 1e-9, relativeEpsilon: 1e-9 })).toBe(false);
  });

  it('treats NaN as equal to itself and infinities as exact', () => {
    expect(floatsEqual(NaN, NaN, loose)).toBe(true);
    expect(floatsEqual(NaN, 0, loose)).toBe(false);
    expect(floatsEqual(Infinity, Infinity, loose)).toBe(true);
    expect(floatsEqual(Infinity, -Infinity, loose)).toBe(false);
    expect(floatsEqual(Infinity, Number.MAX_VALUE, { absoluteEpsilon: 0, relativeEpsilon: 1 })).toBe(false);
  });
});

describe('compareOutputs', () => {
  it('matches a float computed differently within epsilon', () => {
    expect(compareOutputs(0.1 + 0.2, 0.3, float, loose)).toEqual({ equivalent: true });
  });

  it('reports float differences outside the tolerance', () => {
    expect(compareOutputs(0.1 + 0.2, 0.3, float, strict)).toEqual({
      equivalent: false,
      path: '$',
      reason: 'expected 0.30000000000000004, got 0.3 (outside tolerance)',
    });
  });

  it('compares integers exactly', () => {
    expect(compareOutputs(5, -1, integer)).toEqual({
      equivalent: false,
      path: '$',
      reason: 'expected 5, got -1',
    });
    expect(compareOutputs(5, 5.0000000001, integer).equivalent).toBe(false);
  });

  it('is order-sensitive by default', () => {
    expect(compareOutputs([1, 2, 3], [1, 3, 2], seq(integer))).toEqual({
      equivalent: false,
      path: '$[1]',
      reason: 'expected 2, got 3',
    });
  });

  it('compares unordered sequences as multisets', () => {
    expect(compareOutputs([1, 2, 2], [2, 1, 2], seq(integer, true)).equivalent).toBe(true);
    expect(compareOutputs([1, 2, 2], [1, 1, 2], seq(integer, true))).toEqual({
      equivalent: false,
      path: '$[2]',
      reason: 'no counterpart for 2 in unordered output',
    });
  });

  it('finds a pairing of tolerant matches that a first-fit pass would miss', () => {
    const expected = [0, 0.8e-6, 1.6e-6];
    const actual = [0.8e-6, 1.6e-6, 0];
    expect(compareOutputs(expected, actual, seq(float, true), loose)).toEqual({ equivalent: true });
    expect(compareOutputs([0, 0, 0], actual, seq(float, true), loose)).toEqual({
      equivalent: false,
      path: '$[2]',
      reason: 'no counterpart for 0 in unordered output',
    });
  });

  it('reports length differences', () => {
    expect(compareOutputs([1], [1, 2], seq(integer))).toEqual({
      equivalent: false,
      path: '$',
      reason: 'expected length 1, got 2',
    });
  });

  it('distinguishes exact and subset record matching', () => {
    const fields = [{ name: 'id', type: integer, optional: false }];
    const exact: TypeSpec = { type: 'record', nullable: false, match: 'exact', fields };
    const subset: TypeSpec = { type: 'record', nullable: false, match: 'subset', fields };

    expect(compareOutputs({ id: 1 }, { id: 1, extra: true }, exact)).toEqual({
      equivalent: false,
      path: '$.extra',
      reason: 'unexpected key',
    });
    expect(compareOutputs({ id: 1 }, { id: 1, extra: true }, subset)).toEqual({ equivalent: true });
    expect(compareOutputs({ id: 1 }, {}, subset)).toEqual({
      equivalent: false,
      path: '$.id',
      reason: 'missing key',
    });
  });

  it('compares mappings by key set and values', () => {
    const mapping: TypeSpec = { type: 'mapping', nullable: false, minSize: 0, values: integer };

    expect(compareOutputs({ a: 1, b: 2 }, { b: 2, a: 1 }, mapping).equivalent).toBe(true);
    expect(compareOutputs({ a: 1, b: 2 }, { a: 1 }, mapping)).toEqual({
      equivalent: false,
      path: '$.b',
      reason: 'missing key',
    });
  });

  it('only matches null with null', () => {
    expect(compareOutputs(null, null, integer).equivalent).toBe(true);
    expect(compareOutputs(null, 0, integer)).toEqual({
      equivalent: false,
      path: '$',
      reason: 'expected null, got 0',
    });
  });

  it('points at nested differences', () => {
    const spec: TypeSpec = {
      type: 'record',
      nullable: false,
      match: 'exact',
      fields: [{ name: 'items', type: seq(float), optional: false }],
    };

    expect(compareOutputs({ items: [1, 2] }, { items: [1, 2.5] }, spec)).toEqual({
      equivalent: false,
      path: '$.items[1]',
      reason: 'expected 2, got 2.5 (outside tolerance)',
    });
  });

  it('falls back to structural comparison without a type', () => {
    expect(compareOutputs({ a: [1.0000000001] }, { a: [1] }).equivalent).toBe(true);
    expect(compareOutputs('x', 'y')).toEqual({ equivalent: false, path: '$', reason: 'expected "x", got "y"' });
  });

  it('resolves refs through the schema definitions', () => {
    const schema = parseSchema({
      name: 'tree',
      parameters: [],
      output: { type: 'ref', ref: 'Node' },
      definitions: {
        Node: {
          type: 'record',
          fields: [
            { name: 'weight', type: 'float' },
            { name: 'children', type: 'sequence', items: { type: 'ref', ref: 'Node' }, unordered: true },
          ],
        },
      },
    });
    const a = { weight: 1, children: [{ weight: 2, children: [] }, { weight: 3, children: [] }] };
    const b = { weight: 1, children: [{ weight: 3, children: [] }, { weight: 2 + 1e-12, children: [] }] };

    expect(compareOutputs(a, b, schema.output, schema.equivalence, schema.definitions).equivalent).toBe(true);
  });

  it('is reflexive', () => {
    const samples: [unknown, TypeSpec | undefined][] = [
      [0.1 + 0.2, float],
      [NaN, float],
      [-Infinity, float],
      [[3, 1, 2], seq(integer, true)],
      [{ x: [1, { y: null }] }, undefined],
      ['text', { type: 'string', nullable: false, minLength: 0 }],
      [null, integer],
    ];
    for (const [value, spec] of samples) {
      expect(compareOutputs(value, value, spec, strict)).toEqual({ equivalent: true });
    }
  });
});
