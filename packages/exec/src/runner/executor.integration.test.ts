import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { CancelledError, NoopLogger, SandboxConfigSchema, SandboxError } from '@exval/shared';
import { SandboxExecutor } from './executor';
import { ProcessSandboxProvider } from '../sandbox';

describe('SandboxExecutor Integration', () => {
  let rootDir: string;
  let executor: SandboxExecutor;

  beforeAll(() => {
    rootDir = fs.mkdtempSync(path.join(os.tmpdir(), 'exval-exec-test-'));
    executor = new SandboxExecutor({ sandbox: SandboxConfigSchema.parse({ rootDir }) });
  });

  afterAll(() => {
    fs.rmSync(rootDir, { recursive: true, force: true });
  });

  describe('results', () => {
    it('returns the value of an exported entry function', async () => {
      const outcome = await executor.execute('exports.solve = (a, b) => a + b;', [2, 3]);

      expect(outcome).toEqual({
        kind: 'success',
        value: 5,
        diagnostics: { stdout: '', stderr: '', truncated: false },
      });
    });

    it('finds a top-level function declaration', async () => {
      const outcome = await executor.execute('function solve(a, b) { return a * b; }', [2, 3]);

      expect(outcome).toMatchObject({ kind: 'success', value: 6 });
    });

    it('awaits async entry functions', async () => {
      const code = 'exports.solve = async (xs) => xs.map((x) => x * 2);';
      const outcome = await executor.execute(code, [[1, 2, 3]]);

      expect(outcome).toMatchObject({ kind: 'success', value: [2, 4, 6] });
    });

    it('calls the configured entry', async () => {
      const code = 'module.exports = { reverse: (s) => [...s].reverse().join("") };';
      const outcome = await executor.execute(code, ['abc'], undefined, { entry: 'reverse' });

      expect(outcome).toMatchObject({ kind: 'success', value: 'cba' });
    });

    it('carries non-JSON floats both ways', async () => {
      const code = 'exports.solve = (x) => [x, -0, Infinity];';
      const outcome = await executor.execute(code, [NaN]);

      expect(outcome.kind).toBe('success');
      if (outcome.kind !== 'success' || !Array.isArray(outcome.value)) {
        throw new Error('expected an array result');
      }
      const [nan, negativeZero, infinity] = outcome.value;
      expect(Number.isNaN(nan)).toBe(true);
      expect(Object.is(negativeZero, -0)).toBe(true);
      expect(infinity).toBe(Infinity);
    });

    it('captures stdout as diagnostics', async () => {
      const code = 'exports.solve = () => { console.log("hello"); return 1; };';
      const outcome = await executor.execute(code, []);

      expect(outcome.diagnostics.stdout).toBe('hello\n');
    });
  });

  describe('failures', () => {
    it('reports a thrown error', async () => {
      const code = 'exports.solve = () => { throw new RangeError("bad input"); };';
      const outcome = await executor.execute(code, []);

      expect(outcome).toMatchObject({ kind: 'runtime-failure', message: 'RangeError: bad input' });
      expect(outcome.diagnostics.stderr).toContain('RangeError: bad input');
    });

    it('reports syntax errors at load time', async () => {
      const outcome = await executor.execute('exports.solve = (', []);

      expect(outcome.kind).toBe('runtime-failure');
      if (outcome.kind === 'runtime-failure') {
        expect(outcome.message).toMatch(/^SyntaxError: /);
      }
    });

    it('reports a missing entry function', async () => {
      const outcome = await executor.execute('exports.other = () => 1;', []);

      expect(outcome).toMatchObject({
        kind: 'runtime-failure',
        message: 'Error: Entry function "solve" is not defined',
      });
    });

    it('reports return values that cannot leave the sandbox', async () => {
      const outcome = await executor.execute('exports.solve = () => () => 1;', []);

      expect(outcome.kind).toBe('runtime-failure');
      if (outcome.kind === 'runtime-failure') {
        expect(outcome.message).toMatch(/^Return value cannot be transferred: /);
      }
    });

    it('reports arguments that cannot enter the sandbox', async () => {
      const outcome = await executor.execute('exports.solve = (f) => f();', [() => 1]);

      expect(outcome.kind).toBe('runtime-failure');
      if (outcome.kind === 'runtime-failure') {
        expect(outcome.message).toMatch(/^Arguments cannot be transferred to the sandbox: /);
      }
    });

    it('reports an early exit', async () => {
      const outcome = await executor.execute('exports.solve = () => process.exit(3);', []);

      expect(outcome).toMatchObject({
        kind: 'runtime-failure',
        message: 'Process exited with code 3 before returning a result',
      });
    });
  });

  describe('limits', () => {
    it('kills an infinite loop at the timeout', async () => {
      const started = Date.now();
      const outcome = await executor.execute('exports.solve = () => { for (;;) {} };', [], {
        timeoutMs: 1000,
      });

      expect(outcome).toMatchObject({ kind: 'timeout', timeoutMs: 1000 });
      expect(Date.now() - started).toBeLessThan(10_000);
    });

    it('stops a unit that writes too much output', async () => {
      const code = [
        'exports.solve = () => {',
        '  const line = "x".repeat(1023) + "\\n";',
        '  for (let i = 0; i < 200; i++) process.stdout.write(line);',
        '  return 1;',
        '};',
      ].join('\n');
      const outcome = await executor.execute(code, [], { maxOutputBytes: 4096 });

      expect(outcome).toMatchObject({ kind: 'resource-limit-exceeded', resource: 'output' });
      expect(outcome.diagnostics.truncated).toBe(true);
    });

    it('reports heap exhaustion as a memory limit', async () => {
      const code = [
        'exports.solve = () => {',
        '  const chunks = [];',
        '  for (;;) chunks.push(new Array(100000).fill(chunks.length));',
        '};',
      ].join('\n');
      const outcome = await executor.execute(code, [], { memoryMb: 32, timeoutMs: 15_000 });

      expect(outcome).toMatchObject({ kind: 'resource-limit-exceeded', resource: 'memory' });
    });

    it('counts buffers outside the V8 heap against the memory ceiling', async () => {
      const code = [
        'exports.solve = () => {',
        '  const chunks = [];',
        '  for (let i = 0; i < 300; i++) chunks.push(Buffer.alloc(1024 * 1024, 1));',
        '  return chunks.length;',
        '};',
      ].join('\n');
      const outcome = await executor.execute(code, [], { memoryMb: 64, timeoutMs: 15_000 });

      expect(outcome).toMatchObject({ kind: 'resource-limit-exceeded', resource: 'memory' });
    });

    it.runIf(process.platform === 'linux')('kills a unit that allocates buffers without ever returning', async () => {
      const code = [
        'exports.solve = () => {',
        '  const chunks = [];',
        '  for (;;) chunks.push(Buffer.alloc(1024 * 1024, 1));',
        '};',
      ].join('\n');
      const outcome = await executor.execute(code, [], { memoryMb: 64, timeoutMs: 15_000 });

      expect(outcome).toMatchObject({ kind: 'resource-limit-exceeded', resource: 'memory' });
    });
  });

  describe('capabilities', () => {
    it('denies writes outside the scoped directory', async () => {
      const code = 'exports.solve = () => { require("fs").writeFileSync("../escaped.txt", "x"); return 1; };';
      const outcome = await executor.execute(code, []);

      expect(outcome.kind).toBe('sandbox-violation');
      if (outcome.kind === 'sandbox-violation') {
        expect(outcome.reason).toBe('filesystem');
      }
      expect(fs.existsSync(path.join(rootDir, 'escaped.txt'))).toBe(false);
    });

    it('denies reads of absolute host paths', async () => {
      const hostFile = path.join(rootDir, '..', 'exval-host-secret.txt');
      const code = `exports.solve = () => require("fs").promises.readFile(${JSON.stringify(hostFile)}, "utf8");`;
      const outcome = await executor.execute(code, []);

      expect(outcome).toMatchObject({ kind: 'sandbox-violation', reason: 'filesystem' });
    });

    it('allows files inside the scoped directory', async () => {
      const code = [
        'const fs = require("fs");',
        'exports.solve = () => {',
        '  fs.writeFileSync("scratch.txt", "kept");',
        '  return fs.readFileSync("scratch.txt", "utf8");',
        '};',
      ].join('\n');
      const outcome = await executor.execute(code, []);

      expect(outcome).toMatchObject({ kind: 'success', value: 'kept' });
    });

    it('records a denied attempt even when the candidate catches it', async () => {
      const code = [
        'exports.solve = () => {',
        '  try { require("http"); } catch (e) { /* ignored */ }',
        '  return 1;',
        '};',
      ].join('\n');
      const outcome = await executor.execute(code, []);

      expect(outcome).toMatchObject({ kind: 'sandbox-violation', reason: 'network' });
    });

    it('denies the internal http and tls modules', async () => {
      const code = [
        'exports.solve = () => {',
        '  const { ClientRequest } = require("_http_client");',
        '  new ClientRequest("http://127.0.0.1:9/");',
        '  return "connected";',
        '};',
      ].join('\n');
      const outcome = await executor.execute(code, []);

      expect(outcome).toMatchObject({ kind: 'sandbox-violation', reason: 'network' });
    });

    it('records a caught attempt on an internal tls module', async () => {
      const code = [
        'exports.solve = () => {',
        '  try { require("node:_tls_wrap"); } catch (e) { /* ignored */ }',
        '  return 1;',
        '};',
      ].join('\n');
      const outcome = await executor.execute(code, []);

      expect(outcome).toMatchObject({ kind: 'sandbox-violation', reason: 'network' });
    });

    it('denies diagnostic reports written outside the scoped directory', async () => {
      const target = path.join(rootDir, 'report-escape.json');
      const code = `exports.solve = () => { process.report.writeReport(${JSON.stringify(target)}); return 1; };`;
      const outcome = await executor.execute(code, []);

      expect(outcome).toMatchObject({ kind: 'sandbox-violation', reason: 'filesystem' });
      expect(fs.existsSync(target)).toBe(false);
    });

    it('denies moving the report directory out of scope', async () => {
      const code = `exports.solve = () => { process.report.directory = ${JSON.stringify(rootDir)}; return 1; };`;
      const outcome = await executor.execute(code, []);

      expect(outcome).toMatchObject({ kind: 'sandbox-violation', reason: 'filesystem' });
    });

    it('denies heap snapshots outside the scoped directory', async () => {
      const target = path.join(rootDir, 'snapshot-escape.heapsnapshot');
      const code = `exports.solve = () => require("v8").writeHeapSnapshot(${JSON.stringify(target)});`;
      const outcome = await executor.execute(code, []);

      expect(outcome).toMatchObject({ kind: 'sandbox-violation', reason: 'filesystem' });
      expect(fs.existsSync(target)).toBe(false);
    });

    it('checks paths with the prototypes it started with', async () => {
      const code = [
        'const fs = require("fs");',
        'exports.solve = () => {',
        '  String.prototype.startsWith = () => true;',
        '  Array.prototype[Symbol.iterator] = function* () {};',
        '  fs.writeFileSync("../patched-escape.txt", "x");',
        '  return 1;',
        '};',
      ].join('\n');
      const outcome = await executor.execute(code, []);

      expect(outcome).toMatchObject({ kind: 'sandbox-violation', reason: 'filesystem' });
      expect(fs.existsSync(path.join(rootDir, 'patched-escape.txt'))).toBe(false);
    });

    it('denies path arguments given as byte arrays', async () => {
      const code = [
        'exports.solve = () => {',
        '  const target = new TextEncoder().encode("../bytes-escape.txt");',
        '  require("fs").writeFileSync(target, "x");',
        '  return 1;',
        '};',
      ].join('\n');
      const outcome = await executor.execute(code, []);

      expect(outcome).toMatchObject({ kind: 'sandbox-violation', reason: 'filesystem' });
      expect(fs.existsSync(path.join(rootDir, 'bytes-escape.txt'))).toBe(false);
    });

    it('keeps a recorded violation when the candidate replaces the serializer', async () => {
      const code = [
        'const v8 = require("v8");',
        'exports.solve = () => {',
        '  try { require("fs").writeFileSync("../denied.txt", "x"); } catch (e) { /* ignored */ }',
        '  const real = v8.serialize;',
        '  v8.serialize = () => real({ status: "ok", value: 42 });',
        '  return 42;',
        '};',
      ].join('\n');
      const outcome = await executor.execute(code, []);

      expect(outcome).toMatchObject({ kind: 'sandbox-violation', reason: 'filesystem' });
    });

    it('gives exit listeners no chance to rewrite the result', async () => {
      const code = [
        'const fs = require("fs");',
        'const v8 = require("v8");',
        'exports.solve = () => {',
        '  try { require("http"); } catch (e) { /* ignored */ }',
        '  process.on("exit", () => {',
        '    for (const file of fs.readdirSync(".")) {',
        '      if (file.startsWith("result-")) fs.writeFileSync(file, v8.serialize({ status: "ok", value: 42 }));',
        '    }',
        '  });',
        '  return 42;',
        '};',
      ].join('\n');
      const outcome = await executor.execute(code, []);

      expect(outcome).toMatchObject({ kind: 'sandbox-violation', reason: 'network' });
    });

    it('gives modules the candidate writes no dynamic import', async () => {
      const code = [
        'const fs = require("fs");',
        'exports.solve = async () => {',
        '  fs.writeFileSync("helper.cjs", "module.exports = () => import(\'node:http\');");',
        '  const http = await require("./helper.cjs")();',
        '  return typeof http.request;',
        '};',
      ].join('\n');
      const outcome = await executor.execute(code, []);

      expect(outcome.kind).toBe('runtime-failure');
    });

    it('denies signals to other processes', async () => {
      const outcome = await executor.execute('exports.solve = () => process.kill(process.ppid, 0);', []);

      expect(outcome).toMatchObject({ kind: 'sandbox-violation', reason: 'subprocess' });
    });

    it('denies fetch', async () => {
      const code = 'exports.solve = async () => (await fetch("http://127.0.0.1:9")).status;';
      const outcome = await executor.execute(code, []);

      expect(outcome).toMatchObject({ kind: 'sandbox-violation', reason: 'network' });
    });

    it('denies child processes', async () => {
      const code = 'exports.solve = () => require("node:child_process").execSync("echo hi").toString();';
      const outcome = await executor.execute(code, []);

      expect(outcome).toMatchObject({ kind: 'sandbox-violation', reason: 'subprocess' });
    });

    it('allows what has been granted', async () => {
      const code = 'exports.solve = () => typeof require("child_process").spawn;';
      const outcome = await executor.execute(code, [], { capabilities: { subprocess: true } });

      expect(outcome).toMatchObject({ kind: 'success', value: 'function' });
    });

    it('hands the unit a stripped environment', async () => {
      const code = 'exports.solve = () => [process.env.EXVAL_SANDBOX, process.env.PATH === undefined];';
      const outcome = await executor.execute(code, []);

      expect(outcome).toMatchObject({ kind: 'success', value: ['process', true] });
    });
  });

  describe('isolation', () => {
    it('shares no state between calls and removes scoped directories', async () => {
      const code = [
        'const fs = require("fs");',
        'exports.solve = () => {',
        '  globalThis.calls = (globalThis.calls || 0) + 1;',
        '  const seen = fs.existsSync("marker");',
        '  fs.writeFileSync("marker", "");',
        '  return [globalThis.calls, seen];',
        '};',
      ].join('\n');
      const isolatedRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'exval-isolation-'));
      const isolated = new SandboxExecutor({ sandbox: SandboxConfigSchema.parse({ rootDir: isolatedRoot }) });

      try {
        const first = await isolated.execute(code, []);
        const second = await isolated.execute(code, []);

        expect(first).toMatchObject({ kind: 'success', value: [1, false] });
        expect(second).toMatchObject({ kind: 'success', value: [1, false] });
        expect(fs.readdirSync(isolatedRoot)).toEqual([]);
      } finally {
        fs.rmSync(isolatedRoot, { recursive: true, force: true });
      }
    });

    it('runs up to maxConcurrency units at once', async () => {
      const concurrent = new SandboxExecutor({
        sandbox: SandboxConfigSchema.parse({ rootDir, maxConcurrency: 2 }),
      });
      const code = 'exports.solve = (n) => new Promise((r) => setTimeout(() => r(n), 50));';

      const outcomes = await Promise.all([1, 2, 3, 4].map((n) => concurrent.execute(code, [n])));

      expect(outcomes.map((o) => (o.kind === 'success' ? o.value : o.kind))).toEqual([1, 2, 3, 4]);
      expect(concurrent.pool.activeCount).toBe(0);
    });
  });

  describe('cancellation', () => {
    it('rejects with CancelledError when aborted mid-run', async () => {
      const controller = new AbortController();
      const pending = executor.execute('exports.solve = () => { for (;;) {} };', [], undefined, {
        signal: controller.signal,
      });
      setTimeout(() => controller.abort(), 200);

      await expect(pending).rejects.toBeInstanceOf(CancelledError);
    });

    it('rejects before spawning when already aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        executor.execute('exports.solve = () => 1;', [], undefined, { signal: controller.signal }),
      ).rejects.toBeInstanceOf(CancelledError);
    });
  });

  describe('events', () => {
    it('logs the start and finish of every execution', async () => {
      const logger = new NoopLogger();
      const log = vi.spyOn(logger, 'log');
      const observed = new SandboxExecutor({
        sandbox: SandboxConfigSchema.parse({ rootDir }),
        logger,
        runId: 'run-1',
      });

      await observed.execute('exports.solve = () => 1;', [], undefined, { executionId: 'exec-1' });

      expect(log).toHaveBeenCalledTimes(2);
      expect(log).toHaveBeenNthCalledWith(
        1,
        expect.objectContaining({
          type: 'ExecutionStarted',
          runId: 'run-1',
          payload: { executionId: 'exec-1', timeoutMs: 5000, memoryMb: 256 },
        }),
      );
      expect(log).toHaveBeenNthCalledWith(
        2,
        expect.objectContaining({
          type: 'ExecutionFinished',
          payload: expect.objectContaining({ executionId: 'exec-1', outcome: 'success', exitCode: 0 }),
        }),
      );
    });
  });

  describe('preflight', () => {
    it('accepts a writable root', async () => {
      await expect(executor.preflight()).resolves.toBeUndefined();
    });

    it('rejects an unusable node binary', async () => {
      const broken = new SandboxExecutor({
        sandbox: SandboxConfigSchema.parse({ rootDir }),
        provider: new ProcessSandboxProvider(path.join(rootDir, 'no-such-node')),
      });

      await expect(broken.preflight()).rejects.toBeInstanceOf(SandboxError);
    });

    it('turns a spawn failure into a runtime failure', async () => {
      const broken = new SandboxExecutor({
        sandbox: SandboxConfigSchema.parse({ rootDir }),
        provider: new ProcessSandboxProvider(path.join(rootDir, 'no-such-node')),
      });

      const outcome = await broken.execute('exports.solve = () => 1;', []);

      expect(outcome.kind).toBe('runtime-failure');
      if (outcome.kind === 'runtime-failure') {
        expect(outcome.message).toMatch(/^Failed to start sandbox process: /);
      }
    });
  });
});
