import { describe, it, expect } from 'vitest';
import { SchemaError } from '@exval/shared';
import { keySpaceSize, parseSchema } from './parser';

const addSchema = {
  name: 'add',
  parameters: [
    { name: 'a', type: 'integer' },
    { name: 'b', type: 'integer' },
  ],
  output: { type: 'integer' },
};

function issuesOf(raw: unknown): { path: string; message: string }[] {
  try {
    parseSchema(raw);
  } catch (error) {
    if (error instanceof SchemaError) return error.issues;
    throw error;
  }
  throw new Error('expected parseSchema to fail');
}

describe('parseSchema', () => {
  it('normalizes a minimal description', () => {
    const schema = parseSchema(addSchema);

    expect(schema.name).toBe('add');
    expect(schema.entry).toBe('solve');
    expect(schema.parameters.map((p) => p.name)).toEqual(['a', 'b']);
    expect(schema.parameters[0].type).toEqual({
      type: 'integer',
      nullable: false,
      description: undefined,
      min: undefined,
      max: undefined,
      enum: undefined,
    });
    expect(schema.equivalence).toEqual({ absoluteEpsilon: 1e-9, relativeEpsilon: 1e-9 });
  });

  it('keeps a custom entry and equivalence parameters', () => {
    const schema = parseSchema({
      ...addSchema,
      entry: 'add',
      equivalence: { absoluteEpsilon: 1e-6 },
    });

    expect(schema.entry).toBe('add');
    expect(schema.equivalence).toEqual({ absoluteEpsilon: 1e-6, relativeEpsilon: 1e-9 });
  });

  it('fills collection defaults', () => {
    const schema = parseSchema({
      name: 'sort',
      parameters: [{ name: 'xs', type: 'sequence', items: { type: 'float' } }],
      output: { type: 'sequence', items: { type: 'float' }, unordered: true },
    });

    expect(schema.output).toMatchObject({ type: 'sequence', minLength: 0, unordered: true });
    expect(schema.parameters[0].type).toMatchObject({ minLength: 0, unordered: false });
  });

  it('rejects a lower bound above the upper bound', () => {
    const issues = issuesOf({
      ...addSchema,
      parameters: [{ name: 'a', type: 'integer', min: 5, max: 1 }],
    });

    expect(issues).toEqual([{ path: 'parameters.0.min', message: 'min (5) must be <= max (1)' }]);
  });

  it('rejects empty enumerations', () => {
    const issues = issuesOf({
      ...addSchema,
      parameters: [{ name: 'a', type: 'string', enum: [] }],
    });

    expect(issues).toEqual([{ path: 'parameters.0.enum', message: 'enumeration must not be empty' }]);
  });

  it('rejects enumeration members that violate the other constraints', () => {
    const issues = issuesOf({
      ...addSchema,
      parameters: [{ name: 'a', type: 'integer', min: 0, max: 10, enum: [3, 11] }],
    });

    expect(issues).toEqual([{ path: 'parameters.0.enum.1', message: '11 lies outside [0, 10]' }]);
  });

  it('rejects duplicate parameter names', () => {
    const issues = issuesOf({
      ...addSchema,
      parameters: [
        { name: 'a', type: 'integer' },
        { name: 'a', type: 'float' },
      ],
    });

    expect(issues).toEqual([{ path: 'parameters.1.name', message: 'duplicate name "a"' }]);
  });

  it('rejects optional parameters', () => {
    const issues = issuesOf({
      ...addSchema,
      parameters: [{ name: 'a', type: 'integer', optional: true }],
    });

    expect(issues).toEqual([{ path: 'parameters.0.optional', message: 'parameters cannot be optional' }]);
  });

  it('rejects refs to unknown definitions', () => {
    const issues = issuesOf({ ...addSchema, output: { type: 'ref', ref: 'Node' } });

    expect(issues).toEqual([{ path: 'output.ref', message: 'unknown definition "Node"' }]);
  });

  it('rejects definitions that only refer to themselves', () => {
    const issues = issuesOf({
      ...addSchema,
      definitions: { A: { type: 'ref', ref: 'A' } },
    });

    expect(issues).toEqual([
      { path: 'definitions.A', message: 'definition only refers to itself (A -> A)' },
    ]);
  });

  it('collects every issue before failing', () => {
    const issues = issuesOf({
      ...addSchema,
      parameters: [
        { name: 'a', type: 'integer', min: 2, max: 1 },
        { name: 'a', type: 'string', minLength: -1 },
      ],
    });

    expect(issues.map((i) => i.path)).toEqual([
      'parameters.0.min',
      'parameters.1.name',
      'parameters.1.minLength',
    ]);
  });

  it('reports structural problems found by the shape check', () => {
    expect(() =>
      parseSchema({ name: 'x', parameters: [{ name: 'a', type: 'complex' }], output: { type: 'integer' } }),
    ).toThrow(SchemaError);
    expect(issuesOf({ parameters: [], output: { type: 'integer' } })).toContainEqual(
      expect.objectContaining({ path: 'name' }),
    );
  });

  it('rejects mappings whose key space is smaller than their minimum size', () => {
    const issues = issuesOf({
      ...addSchema,
      output: {
        type: 'mapping',
        values: { type: 'integer' },
        minSize: 5,
        keyAlphabet: 'ab',
        keyMaxLength: 1,
      },
    });

    expect(issues).toEqual([{ path: 'output.minSize', message: 'only 2 distinct keys exist' }]);
  });

  it('counts the default key alphabet when only the key length is given', () => {
    const output = { type: 'mapping', values: { type: 'integer' }, minSize: 30, keyMaxLength: 1 };

    expect(() => parseSchema({ ...addSchema, output })).toThrow(SchemaError);
    expect(issuesOf({ ...addSchema, output })).toEqual([
      { path: 'output.minSize', message: 'only 26 distinct keys exist' },
    ]);
    expect(() => parseSchema({ ...addSchema, output: { ...output, minSize: 26 } })).not.toThrow();
  });

  it('counts the default key length when only the alphabet is given', () => {
    const output = { type: 'mapping', values: { type: 'integer' }, minSize: 100, keyAlphabet: 'a' };

    expect(issuesOf({ ...addSchema, output })).toEqual([
      { path: 'output.minSize', message: 'only 6 distinct keys exist' },
    ]);
  });

  it('freezes the parsed schema', () => {
    const schema = parseSchema(addSchema);

    expect(Object.isFrozen(schema)).toBe(true);
    expect(Object.isFrozen(schema.parameters)).toBe(true);
    expect(Object.isFrozen(schema.parameters[0].type)).toBe(true);
  });

  it('does not share structure with the raw description', () => {
    const raw = {
      name: 'first',
      parameters: [{ name: 'xs', type: 'sequence', items: { type: 'integer' } }],
      output: { type: 'boolean' },
    };
    const schema = parseSchema(raw);
    raw.parameters[0].name = 'changed';

    expect(schema.parameters[0].name).toBe('xs');
  });
});

describe('keySpaceSize', () => {
  it('counts keys of every length up to the maximum', () => {
    expect(keySpaceSize(2, 2, 100)).toBe(6);
    expect(keySpaceSize(26, 6, 50)).toBe(50);
  });
});
