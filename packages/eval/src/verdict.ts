import { compareOutputs, type ExerciseSchema, type TestCase } from '@exval/core';
import { deepFreeze, describeOutcome, type ExecutionOutcome } from '@exval/shared';

/**
 * Why a case cannot judge candidates:
 * - `execution-failed`: the reference did not return a value
 * - `expectation-mismatch`: the reference disagrees with the case's declared expected output
 * - `output-schema-violation`: the reference output does not conform to the output schema
 */
export type ReferenceErrorReason = 'execution-failed' | 'expectation-mismatch' | 'output-schema-violation';

export interface MatchVerdict {
  kind: 'match';
  caseId: string;
}

export interface MismatchVerdict {
  kind: 'mismatch';
  caseId: string;
  /** The reference output */
  expected: unknown;
  actual: unknown;
  /** Location of the first difference */
  path: string;
  reason: string;
}

export interface CandidateErrorVerdict {
  kind: 'candidate-error';
  caseId: string;
  outcome: ExecutionOutcome;
}

export interface ReferenceErrorVerdict {
  kind: 'reference-error';
  caseId: string;
  reason: ReferenceErrorReason;
  detail: string;
  outcome: ExecutionOutcome;
  /** The case's declared expected output, when it had one */
  expected?: unknown;
}

export type CaseVerdict = MatchVerdict | MismatchVerdict | CandidateErrorVerdict | ReferenceErrorVerdict;

export type VerdictKind = CaseVerdict['kind'];

export type CandidateStatus = 'pass' | 'fail' | 'incomplete';

export interface CandidateSummary {
  status: CandidateStatus;
  total: number;
  matched: number;
  mismatched: number;
  candidateErrors: number;
  referenceErrors: number;
}

/**
 * Result of one differential validation run. Plain data: safe to serialize
 * with the value codec and hand to any presentation layer.
 */
export interface ValidationReport {
  runId: string;
  exercise: string;
  referenceId: string;
  /** False when the run was cancelled before every case was evaluated */
  complete: boolean;
  /** Ids of the evaluated cases, in case order; every verdict list follows it */
  cases: string[];
  verdicts: Record<string, CaseVerdict[]>;
  summaries: Record<string, CandidateSummary>;
  /** Reference outcome per evaluated case id */
  referenceOutcomes: Record<string, ExecutionOutcome>;
}

export function summarize(verdicts: readonly CaseVerdict[], complete: boolean): CandidateSummary {
  const count = (kind: VerdictKind) => verdicts.filter((v) => v.kind === kind).length;
  const matched = count('match');
  let status: CandidateStatus;
  if (!complete) {
    status = 'incomplete';
  } else {
    status = matched === verdicts.length ? 'pass' : 'fail';
  }
  return {
    status,
    total: verdicts.length,
    matched,
    mismatched: count('mismatch'),
    candidateErrors: count('candidate-error'),
    referenceErrors: count('reference-error'),
  };
}

export type ReferenceJudgement =
  | { trusted: true; value: unknown }
  | { trusted: false; reason: ReferenceErrorReason; detail: string };

/**
 * Decides whether the reference outcome for a case can serve as the expected
 * output for candidates.
 */
export function judgeReference(
  schema: ExerciseSchema,
  testCase: TestCase,
  outcome: ExecutionOutcome,
): ReferenceJudgement {
  if (outcome.kind !== 'success') {
    return { trusted: false, reason: 'execution-failed', detail: describeOutcome(outcome) };
  }
  if (testCase.expected !== undefined) {
    const comparison = compareOutputs(
      testCase.expected,
      outcome.value,
      schema.output,
      schema.equivalence,
      schema.definitions,
    );
    if (!comparison.equivalent) {
      return {
        trusted: false,
        reason: 'expectation-mismatch',
        detail: `${comparison.path}: ${comparison.reason}`,
      };
    }
  }
  const [issue] = schema.check(outcome.value);
  if (issue) {
    return { trusted: false, reason: 'output-schema-violation', detail: `${issue.path}: ${issue.message}` };
  }
  // one value backs every candidate's verdict for the case
  return { trusted: true, value: deepFreeze(outcome.value) };
}
