/**
 * Capabilities an executed code unit may be granted. All are denied by default.
 */
export type Capability = 'network' | 'filesystem' | 'subprocess';

export const CAPABILITIES: readonly Capability[] = ['network', 'filesystem', 'subprocess'];

export type CapabilitySet = Record<Capability, boolean>;

/**
 * Limits enforced around a single execution.
 */
export interface ExecutionLimits {
  /** Hard wall-clock cutoff in milliseconds */
  timeoutMs: number;
  /** V8 heap ceiling in megabytes */
  memoryMb: number;
  /** Combined stdout + stderr budget; exceeding it terminates the unit */
  maxOutputBytes: number;
  capabilities: CapabilitySet;
}

/**
 * Text captured from the executed unit. Side effects other than this and the
 * returned value are discarded.
 */
export interface Diagnostics {
  stdout: string;
  stderr: string;
  truncated: boolean;
}

export type ResourceKind = 'memory' | 'output';

export interface SuccessOutcome {
  kind: 'success';
  value: unknown;
  diagnostics: Diagnostics;
}

export interface RuntimeFailureOutcome {
  kind: 'runtime-failure';
  message: string;
  diagnostics: Diagnostics;
}

export interface TimeoutOutcome {
  kind: 'timeout';
  timeoutMs: number;
  diagnostics: Diagnostics;
}

export interface ResourceLimitOutcome {
  kind: 'resource-limit-exceeded';
  resource: ResourceKind;
  diagnostics: Diagnostics;
}

export interface SandboxViolationOutcome {
  kind: 'sandbox-violation';
  reason: Capability;
  diagnostics: Diagnostics;
}

/**
 * Tagged result of running one code unit on one input.
 * Produced once per (code, case) pair and never mutated.
 */
export type ExecutionOutcome =
  | SuccessOutcome
  | RuntimeFailureOutcome
  | TimeoutOutcome
  | ResourceLimitOutcome
  | SandboxViolationOutcome;

export type OutcomeKind = ExecutionOutcome['kind'];

/**
 * A unit of code under evaluation (or the reference) plus its identifier.
 */
export interface Candidate {
  id: string;
  code: string;
  /** Free-form provenance, e.g. "llm:model-a" or "submission" */
  label?: string;
}

export const EMPTY_DIAGNOSTICS: Diagnostics = Object.freeze({
  stdout: '',
  stderr: '',
  truncated: false,
});

/**
 * Short human-readable description of an outcome, used in reports and logs.
 */
export function describeOutcome(outcome: ExecutionOutcome): string {
  switch (outcome.kind) {
    case 'success':
      return 'success';
    case 'runtime-failure':
      return `runtime failure: ${outcome.message}`;
    case 'timeout':
      return `timed out after ${outcome.timeoutMs}ms`;
    case 'resource-limit-exceeded':
      return `${outcome.resource} limit exceeded`;
    case 'sandbox-violation':
      return `sandbox violation (${outcome.reason})`;
  }
}
