import { randomUUID } from 'crypto';
import { Command } from 'commander';
import {
  ConfigLoader,
  countByProvenance,
  generateCases,
  type TestCase,
} from '@exval/core';
import { SandboxExecutor } from '@exval/exec';
import {
  UsageError,
  createLogger,
  eventMeta,
  type CasesGenerated,
  type EngineConfig,
  type Logger,
} from '@exval/shared';
import { loadExercise, type Exercise } from './exercise';
import { OutputRenderer } from './output/renderer';

export interface GlobalOptions {
  json?: boolean;
  config?: string;
  verbose?: boolean;
}

/**
 * What one CLI invocation works with: the exercise, the effective
 * configuration and the logger built from it.
 */
export interface Session {
  runId: string;
  exercise: Exercise;
  config: EngineConfig;
  logger: Logger;
  renderer: OutputRenderer;
  verbose: boolean;
}

export function globalOptions(program: Command): GlobalOptions {
  const opts = program.opts();
  return {
    json: opts.json === true,
    verbose: opts.verbose === true,
    config: typeof opts.config === 'string' ? opts.config : undefined,
  };
}

export function parseIntegerFlag(value: string): number {
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed)) {
    throw new UsageError(`Expected an integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Loads the exercise and the configuration. Exercise-file generation
 * settings take precedence over config files; `flags` over both.
 */
export function openSession(
  exerciseFile: string,
  global: GlobalOptions,
  flags: Record<string, unknown> = {},
): Session {
  const exercise = loadExercise(exerciseFile);
  const config = ConfigLoader.load({
    configPath: global.config,
    flags: ConfigLoader.mergeConfigs({ generation: exercise.generation }, flags),
  });
  const logger = createLogger(
    global.verbose ? { ...config.logging, level: 'debug' } : config.logging,
  );
  return {
    runId: randomUUID(),
    exercise,
    config,
    logger,
    renderer: new OutputRenderer(global.json === true),
    verbose: global.verbose === true,
  };
}

export async function generateSessionCases(session: Session): Promise<readonly TestCase[]> {
  const { exercise, config, logger } = session;
  const cases = generateCases(exercise.schema, {
    ...config.generation,
    manualCases: exercise.manualCases,
  });
  const event: CasesGenerated = {
    ...eventMeta(session.runId),
    type: 'CasesGenerated',
    payload: {
      exercise: exercise.schema.name,
      seed: config.generation.seed,
      total: cases.length,
      byProvenance: countByProvenance(cases),
    },
  };
  await logger.log(event);
  return cases;
}

/**
 * Builds the executor and checks that the sandbox can run at all.
 *
 * @throws {SandboxError} when the sandbox root is unwritable or the runtime is missing
 */
export async function createExecutor(session: Session): Promise<SandboxExecutor> {
  const executor = new SandboxExecutor({
    sandbox: session.config.sandbox,
    limits: session.config.limits,
    logger: session.logger,
    runId: session.runId,
  });
  await executor.preflight();
  return executor;
}

/**
 * An abort signal tied to Ctrl-C for the duration of `task`.
 */
export async function withInterrupt<T>(task: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once('SIGINT', onInterrupt);
  try {
    return await task(controller.signal);
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}
