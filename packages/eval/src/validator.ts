import { randomUUID } from 'crypto';
import { compareOutputs, type ExerciseSchema, type TestCase } from '@exval/core';
import type { ExecuteOptions, LimitsOverride } from '@exval/exec';
import {
  CancelledError,
  NoopLogger,
  UsageError,
  eventMeta,
  type CaseValidated,
  type Candidate,
  type ExecutionOutcome,
  type Logger,
  type ValidationCancelled,
  type ValidationFinished,
  type ValidationStarted,
} from '@exval/shared';
import {
  judgeReference,
  summarize,
  type CandidateSummary,
  type CaseVerdict,
  type ValidationReport,
} from './verdict';

/**
 * What the validator needs from a sandbox. `SandboxExecutor` satisfies it.
 */
export interface CodeExecutor {
  execute(
    code: string,
    args: readonly unknown[],
    limits?: LimitsOverride,
    options?: ExecuteOptions,
  ): Promise<ExecutionOutcome>;
}

export interface DifferentialValidatorOptions {
  executor: CodeExecutor;
  logger?: Logger;
  runId?: string;
}

export interface ValidateOptions {
  signal?: AbortSignal;
  /** Overrides the executor's configured limits for every unit of this run */
  limits?: LimitsOverride;
}

interface CaseResult {
  caseId: string;
  referenceOutcome: ExecutionOutcome;
  verdicts: Map<string, CaseVerdict>;
}

function assertUniqueIds(candidates: readonly Candidate[]): void {
  const seen = new Set<string>();
  for (const candidate of candidates) {
    if (seen.has(candidate.id)) {
      throw new UsageError(`Duplicate candidate id "${candidate.id}"`, {
        details: { candidateId: candidate.id },
      });
    }
    seen.add(candidate.id);
  }
}

/**
 * Runs a reference and any number of candidates over the same cases and
 * judges every candidate output against the reference output.
 *
 * Cases run concurrently, bounded by the executor's pool; within a case the
 * reference always runs first. Every case is evaluated; nothing stops early
 * on a failing candidate.
 */
export class DifferentialValidator {
  private readonly executor: CodeExecutor;
  private readonly logger: Logger;
  private readonly runId: string;

  constructor(
    private readonly schema: ExerciseSchema,
    options: DifferentialValidatorOptions,
  ) {
    this.executor = options.executor;
    this.logger = options.logger ?? new NoopLogger();
    this.runId = options.runId ?? randomUUID();
  }

  /**
   * Validates `candidates` against `reference` on `cases`.
   *
   * When `options.signal` aborts, running units are terminated, verdicts of
   * the cases that already finished are kept and the report is marked
   * incomplete. Throws UsageError for duplicate candidate ids.
   */
  async validate(
    reference: Candidate,
    candidates: readonly Candidate[],
    cases: readonly TestCase[],
    options: ValidateOptions = {},
  ): Promise<ValidationReport> {
    assertUniqueIds(candidates);

    const startedAt = Date.now();
    const started: ValidationStarted = {
      ...eventMeta(this.runId),
      type: 'ValidationStarted',
      payload: {
        exercise: this.schema.name,
        referenceId: reference.id,
        candidateIds: candidates.map((c) => c.id),
        caseCount: cases.length,
      },
    };
    await this.logger.log(started);

    const results = await Promise.all(
      cases.map((testCase) =>
        this.validateCase(reference, candidates, testCase, options).catch((error: unknown) => {
          if (error instanceof CancelledError) return undefined;
          throw error;
        }),
      ),
    );

    const completed = results.filter((r): r is CaseResult => r !== undefined);
    const complete = completed.length === cases.length;

    const verdicts: Record<string, CaseVerdict[]> = {};
    const summaries: Record<string, CandidateSummary> = {};
    for (const candidate of candidates) {
      const list = completed.flatMap((r) => {
        const verdict = r.verdicts.get(candidate.id);
        return verdict ? [verdict] : [];
      });
      verdicts[candidate.id] = list;
      summaries[candidate.id] = summarize(list, complete);
    }

    const referenceOutcomes: Record<string, ExecutionOutcome> = {};
    for (const result of completed) {
      referenceOutcomes[result.caseId] = result.referenceOutcome;
    }

    if (complete) {
      const finished: ValidationFinished = {
        ...eventMeta(this.runId),
        type: 'ValidationFinished',
        payload: {
          durationMs: Date.now() - startedAt,
          passed: candidates.filter((c) => summaries[c.id].status === 'pass').map((c) => c.id),
          failed: candidates.filter((c) => summaries[c.id].status === 'fail').map((c) => c.id),
        },
      };
      await this.logger.log(finished);
    } else {
      const cancelled: ValidationCancelled = {
        ...eventMeta(this.runId),
        type: 'ValidationCancelled',
        payload: { completedCases: completed.length, totalCases: cases.length },
      };
      await this.logger.log(cancelled);
    }

    return {
      runId: this.runId,
      exercise: this.schema.name,
      referenceId: reference.id,
      complete,
      cases: completed.map((r) => r.caseId),
      verdicts,
      summaries,
      referenceOutcomes,
    };
  }

  private async validateCase(
    reference: Candidate,
    candidates: readonly Candidate[],
    testCase: TestCase,
    options: ValidateOptions,
  ): Promise<CaseResult> {
    const args = this.schema.argsFor(testCase.input);
    const run = (code: string) =>
      this.executor.execute(code, args, options.limits, {
        entry: this.schema.entry,
        signal: options.signal,
      });

    const referenceOutcome = await run(reference.code);
    const judgement = judgeReference(this.schema, testCase, referenceOutcome);
    const verdicts = new Map<string, CaseVerdict>();

    if (!judgement.trusted) {
      for (const candidate of candidates) {
        verdicts.set(candidate.id, {
          kind: 'reference-error',
          caseId: testCase.id,
          reason: judgement.reason,
          detail: judgement.detail,
          outcome: referenceOutcome,
          ...(testCase.expected !== undefined ? { expected: testCase.expected } : {}),
        });
      }
    } else {
      const outcomes = await Promise.all(candidates.map((candidate) => run(candidate.code)));
      candidates.forEach((candidate, i) => {
        verdicts.set(candidate.id, this.classify(testCase.id, judgement.value, outcomes[i]));
      });
    }

    const validated: CaseValidated = {
      ...eventMeta(this.runId),
      type: 'CaseValidated',
      payload: {
        caseId: testCase.id,
        referenceOutcome: referenceOutcome.kind,
        verdicts: Object.fromEntries([...verdicts].map(([id, verdict]) => [id, verdict.kind])),
      },
    };
    await this.logger.log(validated);

    return { caseId: testCase.id, referenceOutcome, verdicts };
  }

  private classify(caseId: string, expected: unknown, outcome: ExecutionOutcome): CaseVerdict {
    if (outcome.kind !== 'success') {
      return { kind: 'candidate-error', caseId, outcome };
    }
    const comparison = compareOutputs(
      expected,
      outcome.value,
      this.schema.output,
      this.schema.equivalence,
      this.schema.definitions,
    );
    if (comparison.equivalent) {
      return { kind: 'match', caseId };
    }
    return {
      kind: 'mismatch',
      caseId,
      expected,
      actual: outcome.value,
      path: comparison.path ?? '$',
      reason: comparison.reason ?? 'outputs differ',
    };
  }
}
