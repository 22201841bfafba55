import {
  ConfigError,
  GenerationError,
  GenerationConfigSchema,
  deepFreeze,
  type GenerationConfig,
  type Strategy,
} from '@exval/shared';
import { assertProducible, valueKey } from '../schema/domain';
import type { ExerciseSchema } from '../schema/schema';
import {
  adversarialCases,
  boundaryCases,
  randomCases,
  type StrategyContext,
} from './strategies';
import type {
  CaseProposal,
  GenerationOptions,
  ManualCase,
  Provenance,
  TestCase,
} from './types';

const STRATEGIES: Record<Strategy, (ctx: StrategyContext) => CaseProposal[]> = {
  boundary: boundaryCases,
  random: randomCases,
  adversarial: adversarialCases,
};

export function parseGenerationConfig(options: GenerationOptions = {}): GenerationConfig {
  const { manualCases: _manual, ...config } = options;
  const result = GenerationConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `- ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new ConfigError(`Invalid generation options:\n${issues}`);
  }
  return result.data;
}

function manualProposals(schema: ExerciseSchema, manual: readonly ManualCase[]): CaseProposal[] {
  return manual.map((item, index) => {
    const issues = schema.checkInput(item.input);
    if (issues.length > 0) {
      throw new GenerationError(
        `Manual case ${index + 1} does not match the input schema:\n${issues
          .map((i) => `- ${i.path}: ${i.message}`)
          .join('\n')}`,
        { details: { index, issues } },
      );
    }
    if (item.expected !== undefined) {
      const outputIssues = schema.check(item.expected);
      if (outputIssues.length > 0) {
        throw new GenerationError(
          `Expected output of manual case ${index + 1} does not match the output schema`,
          { details: { index, issues: outputIssues } },
        );
      }
    }
    return {
      input: item.input,
      expected: item.expected,
      provenance: 'manual' as const,
      classification: 'valid' as const,
      label: item.label ?? `manual #${index + 1}`,
    };
  });
}

export function caseId(index: number): string {
  return `case-${String(index + 1).padStart(3, '0')}`;
}

/**
 * Produces the ordered, duplicate-free case list for a schema. Manual cases
 * come first, then each configured strategy in order. Deterministic in
 * (schema, options).
 *
 * @throws {GenerationError} when a parameter's domain is empty or a manual case is invalid
 */
export function generateCases(
  schema: ExerciseSchema,
  options: GenerationOptions = {},
): readonly TestCase[] {
  const config = parseGenerationConfig(options);
  const domain = schema.domainContext(config.maxDepth);
  for (const param of schema.parameters) {
    assertProducible(param.type, domain, config.maxDepth, `parameter "${param.name}"`);
  }

  const proposals: CaseProposal[] = manualProposals(schema, options.manualCases ?? []);
  const ctx: StrategyContext = { schema, domain, config };
  for (const strategy of config.strategies) {
    proposals.push(...STRATEGIES[strategy](ctx));
  }

  const seen = new Set<string>();
  const cases: TestCase[] = [];
  for (const proposal of proposals) {
    if (cases.length >= config.maxCases) break;
    // parameter order fixes key order so structurally equal inputs hash equally
    const key = valueKey(schema.argsFor(proposal.input));
    if (seen.has(key)) continue;
    seen.add(key);
    const input: Record<string, unknown> = {};
    for (const param of schema.parameters) input[param.name] = proposal.input[param.name];
    const testCase: TestCase = {
      id: caseId(cases.length),
      input,
      provenance: proposal.provenance,
      classification: proposal.classification,
      label: proposal.label,
      ...(proposal.expected !== undefined ? { expected: proposal.expected } : {}),
    };
    cases.push(deepFreeze(structuredClone(testCase)));
  }
  return Object.freeze(cases);
}

export function countByProvenance(cases: readonly TestCase[]): Record<Provenance, number> {
  const counts: Record<Provenance, number> = { manual: 0, boundary: 0, random: 0, adversarial: 0 };
  for (const c of cases) counts[c.provenance] += 1;
  return counts;
}
