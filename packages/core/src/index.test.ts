import { describe, it, expect } from 'vitest';
import { name, parseSchema, generateCases, compareOutputs } from './index';

describe('core package', () => {
  it('exports name', () => {
    expect(name).toBe('@exval/core');
  });

  it('exposes the schema, generator and equivalence entry points', () => {
    expect(typeof parseSchema).toBe('function');
    expect(typeof generateCases).toBe('function');
    expect(typeof compareOutputs).toBe('function');
  });
});
