import { describe, it, expect } from 'vitest';
import { parseSchema, type TestCase } from '@exval/core';
import { EMPTY_DIAGNOSTICS, type ExecutionOutcome } from '@exval/shared';
import { judgeReference, summarize, type CaseVerdict } from './verdict';

const schema = parseSchema({
  name: 'pairs',
  parameters: [{ name: 'n', type: 'integer' }],
  output: {
    type: 'sequence',
    items: { type: 'record', fields: [{ name: 'id', type: 'integer' }] },
  },
});

const testCase = (expected?: unknown): TestCase => ({
  id: 'case-001',
  input: { n: 1 },
  provenance: 'manual',
  classification: 'valid',
  label: 'manual #1',
  ...(expected !== undefined ? { expected } : {}),
});

const ok = (value: unknown): ExecutionOutcome => ({ kind: 'success', value, diagnostics: EMPTY_DIAGNOSTICS });

describe('summarize', () => {
  const match: CaseVerdict = { kind: 'match', caseId: 'case-001' };
  const error: CaseVerdict = {
    kind: 'candidate-error',
    caseId: 'case-002',
    outcome: { kind: 'resource-limit-exceeded', resource: 'memory', diagnostics: EMPTY_DIAGNOSTICS },
  };

  it('passes when every verdict matches', () => {
    expect(summarize([match, match], true)).toEqual({
      status: 'pass',
      total: 2,
      matched: 2,
      mismatched: 0,
      candidateErrors: 0,
      referenceErrors: 0,
    });
  });

  it('fails on any non-matching verdict', () => {
    expect(summarize([match, error], true)).toMatchObject({ status: 'fail', matched: 1, candidateErrors: 1 });
  });

  it('is incomplete for a cancelled run regardless of verdicts', () => {
    expect(summarize([match], false).status).toBe('incomplete');
  });
});

describe('judgeReference', () => {
  it('trusts a successful, conforming output', () => {
    expect(judgeReference(schema, testCase(), ok([{ id: 1 }]))).toEqual({ trusted: true, value: [{ id: 1 }] });
  });

  it('freezes the trusted value', () => {
    const judgement = judgeReference(schema, testCase(), ok([{ id: 1 }]));

    expect(judgement.trusted && Object.isFrozen(judgement.value)).toBe(true);
    const first = judgement.trusted && Array.isArray(judgement.value) ? judgement.value[0] : undefined;
    expect(Object.isFrozen(first)).toBe(true);
  });

  it('rejects a failed execution', () => {
    const outcome: ExecutionOutcome = { kind: 'sandbox-violation', reason: 'network', diagnostics: EMPTY_DIAGNOSTICS };

    expect(judgeReference(schema, testCase(), outcome)).toEqual({
      trusted: false,
      reason: 'execution-failed',
      detail: 'sandbox violation (network)',
    });
  });

  it('rejects an output that contradicts the expected output', () => {
    expect(judgeReference(schema, testCase([{ id: 2 }]), ok([{ id: 1 }]))).toEqual({
      trusted: false,
      reason: 'expectation-mismatch',
      detail: '$[0].id: expected 2, got 1',
    });
  });

  it('rejects an output that breaks the output schema at the first offending path', () => {
    expect(judgeReference(schema, testCase(), ok([{ id: 1 }, { id: 'x' }]))).toEqual({
      trusted: false,
      reason: 'output-schema-violation',
      detail: '$[1].id: expected integer, got string',
    });
  });
});
