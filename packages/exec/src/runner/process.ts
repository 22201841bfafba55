import { spawnSync } from 'child_process';
import { promises as fs } from 'fs';

/**
 * Signals a child and everything it started. The child must have been
 * spawned detached so that it leads its own process group.
 */
export function killProcessTree(pid: number, signal: NodeJS.Signals = 'SIGTERM'): void {
  if (process.platform === 'win32') {
    // process.kill does not reach grandchildren on Windows.
    spawnSync('taskkill', ['/PID', String(pid), '/T', '/F']);
    return;
  }
  try {
    process.kill(-pid, signal);
  } catch (error) {
    // ESRCH: the group has already exited.
    if (!isErrno(error, 'ESRCH')) {
      throw error;
    }
  }
}

/**
 * Resident set size of a process, read from procfs. Undefined where there is
 * no procfs or the process is gone.
 */
export async function readRssBytes(pid: number): Promise<number | undefined> {
  let status: string;
  try {
    status = await fs.readFile(`/proc/${pid}/status`, 'utf8');
  } catch {
    return undefined;
  }
  const match = /^VmRSS:\s+(\d+)\s+kB$/m.exec(status);
  return match ? Number(match[1]) * 1024 : undefined;
}

function isErrno(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

// Variables a Node child may read without learning anything about the host.
const SANDBOX_ENV_KEYS = ['LANG', 'LC_ALL', 'LC_CTYPE', 'TZ'];

// What the docker CLI itself needs to reach the daemon.
const DOCKER_CLI_ENV_KEYS = [
  'PATH',
  'HOME',
  'DOCKER_HOST',
  'DOCKER_CONFIG',
  'DOCKER_CONTEXT',
  'DOCKER_CERT_PATH',
  'DOCKER_TLS_VERIFY',
  'XDG_RUNTIME_DIR',
  // Windows
  'SYSTEMROOT',
  'USERPROFILE',
  'APPDATA',
];

function pickEnv(keys: readonly string[], baseEnv: NodeJS.ProcessEnv): Record<string, string> {
  const env: Record<string, string> = {};
  for (const key of keys) {
    const value = baseEnv[key];
    if (value === undefined) continue;
    env[key] = value;
  }
  return env;
}

/**
 * Environment handed to an executed unit: locale settings and a marker, never
 * the host's PATH, credentials or tokens.
 */
export function sandboxEnv(mode: string, baseEnv: NodeJS.ProcessEnv = process.env): Record<string, string> {
  return { ...pickEnv(SANDBOX_ENV_KEYS, baseEnv), EXVAL_SANDBOX: mode };
}

export function dockerCliEnv(baseEnv: NodeJS.ProcessEnv = process.env): Record<string, string> {
  return pickEnv(DOCKER_CLI_ENV_KEYS, baseEnv);
}
