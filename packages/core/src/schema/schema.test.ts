import { describe, it, expect } from 'vitest';
import { GenerationError, SchemaError } from '@exval/shared';
import { parseSchema } from './parser';

function take<T>(items: Iterable<T>, count: number): T[] {
  const out: T[] = [];
  for (const item of items) {
    if (out.length >= count) break;
    out.push(item);
  }
  return out;
}

const schema = parseSchema({
  name: 'histogram',
  parameters: [
    { name: 'a', type: 'integer', min: 0, max: 10 },
    { name: 's', type: 'string', maxLength: 3, alphabet: 'ab' },
    { name: 'mode', type: 'string', enum: ['fast', 'slow'] },
    { name: 'flag', type: 'boolean', nullable: true },
  ],
  output: { type: 'sequence', items: { type: 'float' }, unordered: true },
});

const treeSchema = parseSchema({
  name: 'tree-sum',
  parameters: [{ name: 'root', type: 'ref', ref: 'Node' }],
  output: { type: 'integer' },
  definitions: {
    Node: {
      type: 'record',
      fields: [
        { name: 'value', type: 'integer' },
        { name: 'children', type: 'sequence', items: { type: 'ref', ref: 'Node' } },
      ],
    },
  },
});

describe('ExerciseSchema', () => {
  describe('validate', () => {
    it('accepts conforming outputs', () => {
      expect(schema.validate([1.5, 2])).toBe(true);
      expect(schema.validate([])).toBe(true);
    });

    it('rejects outputs that break the declared shape', () => {
      expect(schema.validate([1, 'x'])).toBe(false);
      expect(schema.validate(null)).toBe(false);
      expect(schema.validate({ 0: 1 })).toBe(false);
    });

    it('explains failures with paths', () => {
      expect(schema.check([1, 'x'])).toEqual([{ path: '$[1]', message: 'expected float, got string' }]);
    });

    it('follows refs through recursive structures', () => {
      const tree = { value: 1, children: [{ value: 2, children: [] }] };
      expect(treeSchema.check(tree, treeSchema.parameter('root').type)).toEqual([]);
      expect(
        treeSchema.check({ value: 1, children: [{ value: 'two', children: [] }] }, treeSchema.parameter('root').type),
      ).toEqual([{ path: '$.children[0].value', message: 'expected integer, got string' }]);
    });
  });

  describe('checkInput', () => {
    const valid = { a: 3, s: 'ab', mode: 'fast', flag: null };

    it('accepts inputs with exactly the declared parameters', () => {
      expect(schema.validateInput(valid)).toBe(true);
    });

    it('reports range violations', () => {
      expect(schema.checkInput({ ...valid, a: 11 })).toEqual([
        { path: '$.a', message: '11 is above the maximum 10' },
      ]);
    });

    it('reports characters outside the alphabet', () => {
      expect(schema.checkInput({ ...valid, s: 'abc' })).toEqual([
        { path: '$.s', message: 'character "c" is outside the alphabet' },
      ]);
    });

    it('reports missing and unknown parameters', () => {
      expect(schema.checkInput({ a: 1, s: '', mode: 'slow', extra: 1 })).toEqual([
        { path: '$.flag', message: 'missing parameter' },
        { path: '$.extra', message: 'unknown parameter' },
      ]);
    });

    it('rejects non-record inputs', () => {
      expect(schema.validateInput([3, 'ab', 'fast', null])).toBe(false);
    });
  });

  it('orders arguments by parameter position', () => {
    expect(schema.argsFor({ flag: true, mode: 'slow', s: 'a', a: 2 })).toEqual([2, 'a', 'slow', true]);
  });

  it('throws SchemaError for unknown parameters', () => {
    expect(() => schema.parameter('zzz')).toThrow(SchemaError);
    expect(() => schema.sampleDomain('zzz')).toThrow(SchemaError);
  });

  describe('sampleDomain', () => {
    it('is finite for enumerations', () => {
      expect([...schema.sampleDomain('mode')]).toEqual(['fast', 'slow']);
    });

    it('is finite for booleans and includes null when nullable', () => {
      expect([...schema.sampleDomain('flag')]).toEqual([false, true, null]);
    });

    it('restarts from the same seed', () => {
      const first = take(schema.sampleDomain('a', 7), 20);
      const second = take(schema.sampleDomain('a', 7), 20);

      expect(first).toEqual(second);
      expect(first.every((n) => typeof n === 'number' && Number.isInteger(n) && n >= 0 && n <= 10)).toBe(true);
    });

    it('restarts the same iterable from the beginning', () => {
      const domain = schema.sampleDomain('s', 3);

      expect(take(domain, 5)).toEqual(take(domain, 5));
    });

    it('only yields conforming values', () => {
      const values = take(treeSchema.sampleDomain('root', 11), 30);
      const type = treeSchema.parameter('root').type;

      expect(values.every((v) => treeSchema.check(v, type).length === 0)).toBe(true);
    });

    it('fails with GenerationError when the domain is empty', () => {
      const endless = parseSchema({
        name: 'endless',
        parameters: [{ name: 'x', type: 'ref', ref: 'Loop' }],
        output: { type: 'integer' },
        definitions: {
          Loop: { type: 'record', fields: [{ name: 'next', type: 'ref', ref: 'Loop' }] },
        },
      });

      expect(() => endless.sampleDomain('x')).toThrow(GenerationError);
    });
  });

  it('serializes to its normalized description', () => {
    const json = JSON.parse(JSON.stringify(treeSchema));

    expect(json.name).toBe('tree-sum');
    expect(json.definitions.Node.fields[1].type.items).toEqual({ type: 'ref', ref: 'Node', nullable: false });
  });
});
