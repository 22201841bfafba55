import { describe, it, expect, vi, afterEach } from 'vitest';
import { EMPTY_DIAGNOSTICS } from '@exval/shared';
import { ReportRenderer, describeVerdict } from './renderer';
import type { ValidationReport } from './verdict';

const report: ValidationReport = {
  runId: 'run-1',
  exercise: 'add',
  referenceId: 'ref',
  complete: true,
  cases: ['case-001', 'case-002'],
  referenceOutcomes: {
    'case-001': { kind: 'success', value: 5, diagnostics: EMPTY_DIAGNOSTICS },
    'case-002': { kind: 'runtime-failure', message: 'Error: boom', diagnostics: EMPTY_DIAGNOSTICS },
  },
  verdicts: {
    good: [{ kind: 'match', caseId: 'case-001' }],
    bad: [
      { kind: 'mismatch', caseId: 'case-001', expected: 5, actual: -1, path: '$', reason: 'expected 5, got -1' },
      {
        kind: 'reference-error',
        caseId: 'case-002',
        reason: 'execution-failed',
        detail: 'runtime failure: Error: boom',
        outcome: { kind: 'runtime-failure', message: 'Error: boom', diagnostics: EMPTY_DIAGNOSTICS },
      },
    ],
  },
  summaries: {
    good: { status: 'pass', total: 1, matched: 1, mismatched: 0, candidateErrors: 0, referenceErrors: 0 },
    bad: { status: 'fail', total: 2, matched: 0, mismatched: 1, candidateErrors: 0, referenceErrors: 1 },
  },
};

describe('describeVerdict', () => {
  it('describes each verdict kind', () => {
    expect(describeVerdict({ kind: 'match', caseId: 'c' })).toBe('match');
    expect(
      describeVerdict({
        kind: 'candidate-error',
        caseId: 'c',
        outcome: { kind: 'timeout', timeoutMs: 1000, diagnostics: EMPTY_DIAGNOSTICS },
      }),
    ).toBe('candidate error: timed out after 1000ms');
    expect(describeVerdict(report.verdicts.bad[0])).toBe('mismatch at $: expected 5, got -1');
    expect(describeVerdict(report.verdicts.bad[1])).toBe(
      'reference error (execution-failed): runtime failure: Error: boom',
    );
  });
});

describe('ReportRenderer', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('renders failures, candidate lines and totals', () => {
    const lines = new ReportRenderer({ color: false }).render(report);

    expect(lines).toEqual([
      'Reference "ref" failed on 1 cases:',
      '  case-002: runtime failure: Error: boom',
      'PASS good 1/1 matched, 0 mismatched, 0 candidate errors, 0 reference errors',
      'FAIL bad 0/2 matched, 1 mismatched, 0 candidate errors, 1 reference errors',
      '  case-001: mismatch at $: expected 5, got -1\n    expected 5\n    actual   -1',
      '  case-002: reference error (execution-failed): runtime failure: Error: boom',
      '='.repeat(80),
      'Candidates: 2  Passed: 1  Failed: 1',
    ]);
  });

  it('lists matching cases when verbose', () => {
    const lines = new ReportRenderer({ color: false, verbose: true }).render(report);

    expect(lines[3]).toBe('  case-001: match');
  });

  it('notes an incomplete run', () => {
    const partial: ValidationReport = {
      ...report,
      complete: false,
      cases: ['case-001'],
      referenceOutcomes: { 'case-001': report.referenceOutcomes['case-001'] },
      verdicts: { good: report.verdicts.good },
      summaries: { good: { ...report.summaries.good, status: 'incomplete' } },
    };

    const lines = new ReportRenderer({ color: false }).render(partial);

    expect(lines[0]).toBe('INCOMPLETE good 1/1 matched, 0 mismatched, 0 candidate errors, 0 reference errors');
    expect(lines.at(-2)).toBe('Candidates: 1  Passed: 0  Failed: 1');
    expect(lines.at(-1)).toBe('Run cancelled after 1 cases; results are incomplete.');
  });

  it('colors output when asked to', () => {
    const [line] = new ReportRenderer({ color: true }).render({ ...report, referenceOutcomes: {} });

    expect(line).toContain('\u001b[');
  });

  it('prints the report through the console', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    new ReportRenderer({ color: false }).logReport(report);

    expect(log).toHaveBeenCalledTimes(8);
    expect(log).toHaveBeenLastCalledWith('Candidates: 2  Passed: 1  Failed: 1');
  });
});
