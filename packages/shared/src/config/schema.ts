import { z } from 'zod';

export const CapabilitySetSchema = z
  .object({
    network: z.boolean().default(false),
    filesystem: z.boolean().default(false),
    subprocess: z.boolean().default(false),
  })
  .default({ network: false, filesystem: false, subprocess: false });

/**
 * Per-execution limits. Every capability is denied unless granted here.
 */
export const LimitsConfigSchema = z
  .object({
    timeoutMs: z.number().int().min(10).default(5_000).describe('Hard wall-clock cutoff'),
    memoryMb: z.number().int().min(16).default(256).describe('Memory ceiling of one execution unit'),
    maxOutputBytes: z
      .number()
      .int()
      .min(1024)
      .default(65_536)
      .describe('Combined stdout/stderr budget before the unit is killed'),
    capabilities: CapabilitySetSchema,
  })
  .default({});

/**
 * Docker sandbox provider settings.
 */
export const DockerSandboxConfigSchema = z
  .object({
    image: z.string().default('node:20-slim'),
    cpuLimit: z.number().positive().default(1),
    tmpfsSize: z.string().default('64m'),
    seccompProfile: z.enum(['default', 'unconfined']).default('default'),
  })
  .default({});

export const SandboxConfigSchema = z
  .object({
    mode: z.enum(['process', 'docker']).default('process'),
    /** Parent of the per-call scoped directories; defaults to the OS temp dir */
    rootDir: z.string().optional(),
    maxConcurrency: z.number().int().min(1).default(4),
    /** Node binary used for the child; defaults to the running one */
    nodePath: z.string().optional(),
    /** Adds Node's permission model flags on top of the harness guards */
    permissionModel: z.boolean().default(false),
    /** Grace between SIGTERM and SIGKILL when a unit is cancelled */
    killGraceMs: z.number().int().min(0).default(250),
    /** Truncation window for captured stdout/stderr */
    diagnosticsHeadChars: z.number().int().positive().default(2_000),
    diagnosticsTailChars: z.number().int().positive().default(2_000),
    docker: DockerSandboxConfigSchema,
  })
  .default({});

export const StrategySchema = z.enum(['boundary', 'random', 'adversarial']);
export type Strategy = z.infer<typeof StrategySchema>;

export const GenerationConfigSchema = z
  .object({
    strategies: z.array(StrategySchema).min(1).default(['boundary', 'random', 'adversarial']),
    seed: z.number().int().default(42),
    randomCount: z.number().int().min(0).default(20),
    maxCases: z.number().int().min(1).default(200),
    maxDepth: z.number().int().min(1).max(32).default(4),
    includeOutOfDomain: z.boolean().default(false),
  })
  .default({});

export const ArtifactConfigSchema = z
  .object({
    format: z.enum(['vitest', 'node-test']).default('vitest'),
    solutionEnv: z.string().default('EXVAL_SOLUTION'),
  })
  .default({});

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const LoggingConfigSchema = z
  .object({
    level: LogLevelSchema.default('info'),
    /** When set, structured events are appended to this JSONL file */
    jsonlPath: z.string().optional(),
  })
  .default({});

export const EngineConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  sandbox: SandboxConfigSchema,
  limits: LimitsConfigSchema,
  generation: GenerationConfigSchema,
  artifact: ArtifactConfigSchema,
  logging: LoggingConfigSchema,
});

export type CapabilitySetConfig = z.infer<typeof CapabilitySetSchema>;
export type LimitsConfig = z.infer<typeof LimitsConfigSchema>;
export type DockerSandboxConfig = z.infer<typeof DockerSandboxConfigSchema>;
export type SandboxConfig = z.infer<typeof SandboxConfigSchema>;
export type GenerationConfig = z.infer<typeof GenerationConfigSchema>;
export type ArtifactConfig = z.infer<typeof ArtifactConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type EngineConfig = z.infer<typeof EngineConfigSchema>;

/** Input shape accepted before defaults are applied */
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

/**
 * Fully defaulted configuration.
 */
export function defaultEngineConfig(): EngineConfig {
  return EngineConfigSchema.parse({});
}
