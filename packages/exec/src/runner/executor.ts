import { spawn } from 'child_process';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { randomUUID } from 'crypto';
import { fileURLToPath } from 'url';
import { deserialize, serialize } from 'v8';
import { copy, ensureDir, pathExists, remove } from 'fs-extra';
import {
  CAPABILITIES,
  CancelledError,
  LimitsConfigSchema,
  NoopLogger,
  SandboxConfigSchema,
  SandboxError,
  eventMeta,
  truncateMiddle,
  type Capability,
  type CapabilitySet,
  type Diagnostics,
  type ExecutionFinished,
  type ExecutionLimits,
  type ExecutionOutcome,
  type ExecutionStarted,
  type LimitsConfig,
  type Logger,
  type SandboxConfig,
} from '@exval/shared';
import { createSandboxProvider, type SandboxLaunch, type SandboxProvider } from '../sandbox';
import { ExecutionPool } from './pool';
import { killProcessTree, readRssBytes } from './process';

export const DEFAULT_ENTRY = 'solve';

const HARNESS_SOURCE = fileURLToPath(new URL('./harness.cjs', import.meta.url));
const HARNESS_FILE = 'harness.cjs';
const CANDIDATE_FILE = 'candidate.cjs';

const HEAP_EXHAUSTED = /JavaScript heap out of memory|Reached heap limit/;
const MEMORY_POLL_MS = 50;

/**
 * Per-call overrides; capabilities merge over the configured ones.
 */
export type LimitsOverride = Partial<Omit<ExecutionLimits, 'capabilities'>> & {
  capabilities?: Partial<CapabilitySet>;
};

export interface ExecuteOptions {
  /** Name of the function to call; defaults to `solve` */
  entry?: string;
  signal?: AbortSignal;
  /** Correlates the ExecutionStarted/Finished events; random when omitted */
  executionId?: string;
}

export interface SandboxExecutorOptions {
  sandbox?: SandboxConfig;
  limits?: LimitsConfig;
  logger?: Logger;
  provider?: SandboxProvider;
  pool?: ExecutionPool;
  runId?: string;
}

type HarnessResult =
  | { status: 'ok'; value: unknown }
  | { status: 'error'; message: string }
  | { status: 'violation'; capability: Capability; detail: string }
  | { status: 'limit'; resource: 'memory' };

interface RawRun {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: Buffer;
  stderr: Buffer;
  timedOut: boolean;
  outputExceeded: boolean;
  memoryExceeded: boolean;
  cancelled: boolean;
  spawnError?: Error;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toHarnessResult(raw: unknown): HarnessResult | undefined {
  if (!isRecord(raw)) return undefined;
  switch (raw.status) {
    case 'ok':
      return { status: 'ok', value: raw.value };
    case 'error':
      return typeof raw.message === 'string' ? { status: 'error', message: raw.message } : undefined;
    case 'violation': {
      const capability = CAPABILITIES.find((c) => c === raw.capability);
      if (!capability) return undefined;
      return { status: 'violation', capability, detail: String(raw.detail) };
    }
    case 'limit':
      return raw.resource === 'memory' ? { status: 'limit', resource: 'memory' } : undefined;
    default:
      return undefined;
  }
}

function describeExit(run: RawRun): string {
  if (run.signal) {
    return `Process was terminated by ${run.signal} before returning a result`;
  }
  return `Process exited with code ${run.exitCode ?? 'unknown'} before returning a result`;
}

/**
 * Runs untrusted code units in isolated child processes.
 *
 * Every call gets a fresh scoped directory and a fresh `node` process; nothing
 * survives between calls. Failures of the executed code are reported as
 * {@link ExecutionOutcome} values. `execute` only rejects when the caller
 * cancels, with a {@link CancelledError}.
 */
export class SandboxExecutor {
  readonly pool: ExecutionPool;
  private readonly sandbox: SandboxConfig;
  private readonly limits: LimitsConfig;
  private readonly provider: SandboxProvider;
  private readonly logger: Logger;
  private readonly runId: string;

  constructor(options: SandboxExecutorOptions = {}) {
    this.sandbox = options.sandbox ?? SandboxConfigSchema.parse(undefined);
    this.limits = options.limits ?? LimitsConfigSchema.parse(undefined);
    this.provider = options.provider ?? createSandboxProvider(this.sandbox);
    this.pool = options.pool ?? new ExecutionPool(this.sandbox.maxConcurrency);
    this.logger = options.logger ?? new NoopLogger();
    this.runId = options.runId ?? randomUUID();
  }

  get rootDir(): string {
    return this.sandbox.rootDir ?? os.tmpdir();
  }

  /**
   * Verifies the sandbox can run at all: the root directory is writable and
   * the provider is usable. Throws SandboxError otherwise.
   */
  async preflight(): Promise<void> {
    try {
      await ensureDir(this.rootDir);
      const check = await fs.mkdtemp(path.join(this.rootDir, 'exval-check-'));
      await remove(check);
    } catch (error) {
      throw new SandboxError(`Sandbox root is not writable: ${this.rootDir}`, {
        cause: error,
        details: { rootDir: this.rootDir },
      });
    }
    await this.provider.check();
  }

  resolveLimits(override: LimitsOverride = {}): ExecutionLimits {
    return {
      timeoutMs: override.timeoutMs ?? this.limits.timeoutMs,
      memoryMb: override.memoryMb ?? this.limits.memoryMb,
      maxOutputBytes: override.maxOutputBytes ?? this.limits.maxOutputBytes,
      capabilities: { ...this.limits.capabilities, ...override.capabilities },
    };
  }

  async execute(
    code: string,
    args: readonly unknown[],
    limits?: LimitsOverride,
    options: ExecuteOptions = {},
  ): Promise<ExecutionOutcome> {
    if (options.signal?.aborted) {
      throw new CancelledError('Execution cancelled before it started');
    }
    const effective = this.resolveLimits(limits);
    return this.pool.run(() => this.runUnit(code, args, effective, options), options.signal);
  }

  private async runUnit(
    code: string,
    args: readonly unknown[],
    limits: ExecutionLimits,
    options: ExecuteOptions,
  ): Promise<ExecutionOutcome> {
    const executionId = options.executionId ?? randomUUID();
    const resultFile = `result-${randomUUID()}.bin`;

    let request: Buffer;
    try {
      request = serialize({
        entry: options.entry ?? DEFAULT_ENTRY,
        args: [...args],
        capabilities: limits.capabilities,
        memoryMb: limits.memoryMb,
        candidateFile: CANDIDATE_FILE,
        resultFile,
      });
    } catch (error) {
      return this.failure(`Arguments cannot be transferred to the sandbox: ${errorMessage(error)}`);
    }

    let scopedDir: string;
    try {
      scopedDir = await this.createScopedDir(code);
    } catch (error) {
      return this.failure(`Sandbox setup failed: ${errorMessage(error)}`);
    }

    const started: ExecutionStarted = {
      ...eventMeta(this.runId),
      type: 'ExecutionStarted',
      payload: { executionId, timeoutMs: limits.timeoutMs, memoryMb: limits.memoryMb },
    };
    await this.logger.log(started);
    const startTime = Date.now();

    let run: RawRun;
    let outcome: ExecutionOutcome;
    try {
      let launch: SandboxLaunch;
      try {
        launch = await this.provider.prepare({
          executionId,
          scopedDir,
          harnessFile: HARNESS_FILE,
          memoryMb: limits.memoryMb,
          capabilities: limits.capabilities,
        });
      } catch (error) {
        return this.failure(`Sandbox setup failed: ${errorMessage(error)}`);
      }

      try {
        run = await this.spawnUnit(launch, request, limits, options.signal);
      } finally {
        await launch.cleanup?.();
      }
      outcome = await this.interpret(run, path.join(scopedDir, resultFile), limits);
    } finally {
      await this.removeScopedDir(scopedDir);
    }

    const finished: ExecutionFinished = {
      ...eventMeta(this.runId),
      type: 'ExecutionFinished',
      payload: {
        executionId,
        outcome: outcome.kind,
        durationMs: Date.now() - startTime,
        exitCode: run.exitCode,
        signal: run.signal,
      },
    };
    await this.logger.log(finished);

    if (run.cancelled) {
      throw new CancelledError('Execution cancelled');
    }
    return outcome;
  }

  private async createScopedDir(code: string): Promise<string> {
    await ensureDir(this.rootDir);
    const scopedDir = await fs.mkdtemp(path.join(this.rootDir, 'exval-'));
    await fs.writeFile(path.join(scopedDir, CANDIDATE_FILE), code, 'utf8');
    await copy(HARNESS_SOURCE, path.join(scopedDir, HARNESS_FILE));
    return scopedDir;
  }

  private async removeScopedDir(scopedDir: string): Promise<void> {
    try {
      await remove(scopedDir);
    } catch (error) {
      await this.logger.warn(`Failed to remove sandbox directory ${scopedDir}: ${errorMessage(error)}`);
    }
  }

  private spawnUnit(
    launch: SandboxLaunch,
    request: Buffer,
    limits: ExecutionLimits,
    signal?: AbortSignal,
  ): Promise<RawRun> {
    return new Promise<RawRun>((resolve) => {
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let outputBytes = 0;
      let timedOut = false;
      let outputExceeded = false;
      let memoryExceeded = false;
      let cancelled = false;
      let spawnError: Error | undefined;
      let settled = false;
      let graceTimer: NodeJS.Timeout | undefined;

      const child = spawn(launch.command, launch.args, {
        cwd: launch.cwd,
        env: launch.env,
        stdio: ['pipe', 'pipe', 'pipe'],
        detached: true,
      });

      const stop = (killSignal: NodeJS.Signals) => {
        if (child.pid !== undefined && child.exitCode === null && child.signalCode === null) {
          killProcessTree(child.pid, killSignal);
        }
      };

      const timeoutTimer = setTimeout(() => {
        timedOut = true;
        stop('SIGKILL');
      }, limits.timeoutMs);

      // Backstop for units that allocate outside the V8 heap without ever
      // yielding to the harness's own memory check.
      const checkMemory = async (pid: number, ceiling: number) => {
        const rss = await readRssBytes(pid);
        if (rss !== undefined && rss > ceiling && !settled) {
          memoryExceeded = true;
          stop('SIGKILL');
        }
      };
      const { pid } = child;
      const memoryWatchBytes = launch.memoryWatchBytes;
      const memoryTimer =
        memoryWatchBytes !== undefined && pid !== undefined
          ? setInterval(() => void checkMemory(pid, memoryWatchBytes), MEMORY_POLL_MS)
          : undefined;

      const onAbort = () => {
        cancelled = true;
        stop('SIGTERM');
        graceTimer = setTimeout(() => stop('SIGKILL'), this.sandbox.killGraceMs);
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      const settle = (exitCode: number | null, exitSignal: NodeJS.Signals | null) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutTimer);
        clearTimeout(graceTimer);
        clearInterval(memoryTimer);
        signal?.removeEventListener('abort', onAbort);
        resolve({
          exitCode,
          signal: exitSignal,
          stdout: Buffer.concat(stdout),
          stderr: Buffer.concat(stderr),
          timedOut,
          outputExceeded,
          memoryExceeded,
          cancelled,
          spawnError,
        });
      };

      const collect = (sink: Buffer[]) => (chunk: Buffer) => {
        if (outputExceeded) return;
        const room = limits.maxOutputBytes - outputBytes;
        outputBytes += chunk.length;
        if (chunk.length > room) {
          sink.push(chunk.subarray(0, Math.max(0, room)));
          outputExceeded = true;
          stop('SIGKILL');
          return;
        }
        sink.push(chunk);
      };

      child.stdout.on('data', collect(stdout));
      child.stderr.on('data', collect(stderr));

      child.stdin.on('error', (error: NodeJS.ErrnoException) => {
        // EPIPE: the child exited before reading its request.
        if (error.code !== 'EPIPE') {
          spawnError ??= error;
        }
      });
      child.stdin.end(request);

      child.on('error', (error) => {
        spawnError = error;
        if (child.pid === undefined) {
          settle(null, null);
        }
      });

      child.on('close', (code, closeSignal) => {
        settle(code, closeSignal);
      });
    });
  }

  private async interpret(run: RawRun, resultPath: string, limits: ExecutionLimits): Promise<ExecutionOutcome> {
    const stderrText = run.stderr.toString('utf8');
    const diagnostics = this.diagnostics(run.stdout.toString('utf8'), stderrText, run.outputExceeded);

    if (run.spawnError) {
      return {
        kind: 'runtime-failure',
        message: `Failed to start sandbox process: ${run.spawnError.message}`,
        diagnostics,
      };
    }
    if (run.timedOut) {
      return { kind: 'timeout', timeoutMs: limits.timeoutMs, diagnostics };
    }
    if (run.outputExceeded) {
      return { kind: 'resource-limit-exceeded', resource: 'output', diagnostics };
    }
    if (run.memoryExceeded) {
      return { kind: 'resource-limit-exceeded', resource: 'memory', diagnostics };
    }

    const result = await this.readResult(resultPath);
    if (result) {
      switch (result.status) {
        case 'ok':
          return { kind: 'success', value: result.value, diagnostics };
        case 'error':
          return { kind: 'runtime-failure', message: result.message, diagnostics };
        case 'violation':
          return { kind: 'sandbox-violation', reason: result.capability, diagnostics };
        case 'limit':
          return { kind: 'resource-limit-exceeded', resource: result.resource, diagnostics };
      }
    }

    if (HEAP_EXHAUSTED.test(stderrText)) {
      return { kind: 'resource-limit-exceeded', resource: 'memory', diagnostics };
    }
    return { kind: 'runtime-failure', message: describeExit(run), diagnostics };
  }

  private async readResult(resultPath: string): Promise<HarnessResult | undefined> {
    if (!(await pathExists(resultPath))) {
      return undefined;
    }
    try {
      return toHarnessResult(deserialize(await fs.readFile(resultPath)));
    } catch (error) {
      await this.logger.debug(`Unreadable sandbox result ${resultPath}: ${errorMessage(error)}`);
      return undefined;
    }
  }

  private diagnostics(stdout: string, stderr: string, outputExceeded: boolean): Diagnostics {
    const head = this.sandbox.diagnosticsHeadChars;
    const tail = this.sandbox.diagnosticsTailChars;
    const out = truncateMiddle(stdout, head, tail);
    const err = truncateMiddle(stderr, head, tail);
    return {
      stdout: out.text,
      stderr: err.text,
      truncated: outputExceeded || out.truncated || err.truncated,
    };
  }

  private failure(message: string): ExecutionOutcome {
    return {
      kind: 'runtime-failure',
      message,
      diagnostics: { stdout: '', stderr: '', truncated: false },
    };
  }
}
