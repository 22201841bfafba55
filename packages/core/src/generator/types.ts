import type { z } from 'zod';
import type { GenerationConfigSchema } from '@exval/shared';
import type { ValueClassification } from '../schema/domain';

export type Provenance = 'boundary' | 'random' | 'adversarial' | 'manual';

export const PROVENANCES: readonly Provenance[] = ['manual', 'boundary', 'random', 'adversarial'];

/**
 * One test input plus what is known about it. Frozen once created.
 */
export interface TestCase {
  readonly id: string;
  /** Keyed by parameter name */
  readonly input: Readonly<Record<string, unknown>>;
  /** Known-correct output, when supplied by hand */
  readonly expected?: unknown;
  readonly provenance: Provenance;
  readonly classification: ValueClassification;
  readonly label: string;
}

/** A hand-written case, before validation */
export interface ManualCase {
  input: Record<string, unknown>;
  expected?: unknown;
  label?: string;
}

/** A case proposed by a strategy, before deduplication and numbering */
export interface CaseProposal {
  input: Record<string, unknown>;
  expected?: unknown;
  provenance: Provenance;
  classification: ValueClassification;
  label: string;
}

export type GenerationOptions = NonNullable<z.input<typeof GenerationConfigSchema>> & {
  manualCases?: readonly ManualCase[];
};
