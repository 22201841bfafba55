import type { OutcomeKind } from './execution';

/**
 * Base interface for all engine events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Unique identifier for the validation run */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/** Emitted once the case generator has produced the case list */
export interface CasesGenerated extends BaseEvent {
  type: 'CasesGenerated';
  payload: {
    exercise: string;
    seed: number;
    total: number;
    byProvenance: Record<string, number>;
  };
}

/** Emitted when an execution unit has been admitted to a sandbox slot */
export interface ExecutionStarted extends BaseEvent {
  type: 'ExecutionStarted';
  payload: {
    executionId: string;
    timeoutMs: number;
    memoryMb: number;
  };
}

/** Emitted when an execution unit has finished and its resources are reclaimed */
export interface ExecutionFinished extends BaseEvent {
  type: 'ExecutionFinished';
  payload: {
    executionId: string;
    outcome: OutcomeKind;
    durationMs: number;
    exitCode: number | null;
    signal: string | null;
  };
}

/** Emitted when a differential validation run starts */
export interface ValidationStarted extends BaseEvent {
  type: 'ValidationStarted';
  payload: {
    exercise: string;
    referenceId: string;
    candidateIds: string[];
    caseCount: number;
  };
}

/** Emitted when every candidate has a verdict for one case */
export interface CaseValidated extends BaseEvent {
  type: 'CaseValidated';
  payload: {
    caseId: string;
    referenceOutcome: OutcomeKind;
    verdicts: Record<string, string>;
  };
}

/** Emitted when a validation run completes */
export interface ValidationFinished extends BaseEvent {
  type: 'ValidationFinished';
  payload: {
    durationMs: number;
    passed: string[];
    failed: string[];
  };
}

/** Emitted when a validation run is cancelled before all cases completed */
export interface ValidationCancelled extends BaseEvent {
  type: 'ValidationCancelled';
  payload: {
    completedCases: number;
    totalCases: number;
  };
}

/** Emitted when a test artifact is persisted */
export interface ArtifactWritten extends BaseEvent {
  type: 'ArtifactWritten';
  payload: {
    path: string;
    format: string;
    caseCount: number;
  };
}

export type ExvalEvent =
  | CasesGenerated
  | ExecutionStarted
  | ExecutionFinished
  | ValidationStarted
  | CaseValidated
  | ValidationFinished
  | ValidationCancelled
  | ArtifactWritten;

export type ExvalEventType = ExvalEvent['type'];

export const EVENT_SCHEMA_VERSION = 1;

/**
 * Common metadata for an event emitted now.
 */
export function eventMeta(runId: string): Pick<BaseEvent, 'schemaVersion' | 'timestamp' | 'runId'> {
  return { schemaVersion: EVENT_SCHEMA_VERSION, timestamp: new Date().toISOString(), runId };
}

