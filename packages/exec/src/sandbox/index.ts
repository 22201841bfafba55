import { spawnSync } from 'child_process';
import path from 'path';
import type { CapabilitySet, DockerSandboxConfig, SandboxConfig } from '@exval/shared';
import { SandboxError } from '@exval/shared';
import { dockerCliEnv, sandboxEnv } from '../runner/process';

export type SandboxMode = SandboxConfig['mode'];

/**
 * What a provider needs to know to start one execution unit.
 */
export interface LaunchRequest {
  executionId: string;
  /** Host path of the scoped directory holding the harness and candidate */
  scopedDir: string;
  /** File name of the harness inside the scoped directory */
  harnessFile: string;
  memoryMb: number;
  capabilities: CapabilitySet;
}

/**
 * Sandbox preparation result
 */
export interface SandboxLaunch {
  command: string;
  args: string[];
  cwd: string;
  env: Record<string, string>;
  /** Resident size at which the executor kills the process; unset where the provider enforces memory itself */
  memoryWatchBytes?: number;
  cleanup?: () => Promise<void>;
}

export interface SandboxProvider {
  readonly mode: SandboxMode;
  /** Throws SandboxError when the provider cannot run anything on this host */
  check(): Promise<void>;
  prepare(request: LaunchRequest): Promise<SandboxLaunch>;
}

export interface NodeArgsOptions {
  memoryMb: number;
  capabilities: CapabilitySet;
  permissionModel: boolean;
}

/**
 * Flags for the child `node`: the heap ceiling and, when enabled, Node's
 * permission model scoped to `workDir`. Memory outside the heap is checked by
 * the harness and, per provider, by the executor or the container.
 */
export function buildNodeArgs(workDir: string, harnessFile: string, options: NodeArgsOptions): string[] {
  const args = [`--max-old-space-size=${options.memoryMb}`];

  if (options.permissionModel) {
    args.push('--experimental-permission');
    if (options.capabilities.filesystem) {
      args.push('--allow-fs-read=*', '--allow-fs-write=*');
    } else {
      args.push(`--allow-fs-read=${workDir}`, `--allow-fs-write=${workDir}`);
    }
    if (options.capabilities.subprocess) {
      args.push('--allow-child-process', '--allow-worker');
    }
  }

  args.push(harnessFile);
  return args;
}

// Resident memory allowed above the ceiling: the node runtime itself, before
// the unit allocates anything.
const PROCESS_MEMORY_HEADROOM_MB = 64;

/**
 * Runs the harness in a plain child process of the host's node.
 */
export class ProcessSandboxProvider implements SandboxProvider {
  readonly mode = 'process';

  constructor(
    private readonly nodePath: string = process.execPath,
    private readonly permissionModel = false,
  ) {}

  async check(): Promise<void> {
    const result = spawnSync(this.nodePath, ['--version'], { stdio: 'ignore' });
    if (result.error || result.status !== 0) {
      throw new SandboxError(`Node binary is not runnable: ${this.nodePath}`, {
        cause: result.error,
      });
    }
  }

  async prepare(request: LaunchRequest): Promise<SandboxLaunch> {
    return {
      command: this.nodePath,
      args: buildNodeArgs(request.scopedDir, path.join(request.scopedDir, request.harnessFile), {
        memoryMb: request.memoryMb,
        capabilities: request.capabilities,
        permissionModel: this.permissionModel,
      }),
      cwd: request.scopedDir,
      env: sandboxEnv(this.mode),
      memoryWatchBytes: (request.memoryMb + PROCESS_MEMORY_HEADROOM_MB) * 1024 * 1024,
    };
  }
}

// Mount point of the scoped directory inside the container.
const CONTAINER_DIR = '/sandbox';

// Container memory above the V8 heap, so heap exhaustion is reported by V8
// before the kernel OOM killer steps in.
const CONTAINER_MEMORY_HEADROOM_MB = 64;

/**
 * Docker-based sandbox provider for isolated command execution
 */
export class DockerSandboxProvider implements SandboxProvider {
  readonly mode = 'docker';
  private readonly config: DockerSandboxConfig;

  constructor(
    config: Partial<DockerSandboxConfig> = {},
    private readonly permissionModel = false,
  ) {
    this.config = {
      image: config.image ?? 'node:20-slim',
      cpuLimit: config.cpuLimit ?? 1,
      tmpfsSize: config.tmpfsSize ?? '64m',
      seccompProfile: config.seccompProfile ?? 'default',
    };
  }

  async check(): Promise<void> {
    const result = spawnSync('docker', ['version', '--format', '{{.Server.Version}}'], {
      stdio: 'ignore',
      env: dockerCliEnv(),
    });
    if (result.error || result.status !== 0) {
      throw new SandboxError('Docker is not available. Please install Docker to use sandbox mode.', {
        cause: result.error,
      });
    }
  }

  async prepare(request: LaunchRequest): Promise<SandboxLaunch> {
    const containerName = `exval-sandbox-${request.executionId}`;
    const env = dockerCliEnv();

    return {
      command: 'docker',
      args: ['run', ...this.buildDockerArgs(request, containerName)],
      cwd: request.scopedDir,
      env,
      cleanup: async () => {
        // --rm covers normal exits; a killed CLI can leave the container behind.
        spawnSync('docker', ['rm', '-f', containerName], { stdio: 'ignore', env });
      },
    };
  }

  buildDockerArgs(request: LaunchRequest, containerName: string): string[] {
    const args: string[] = [
      '--rm',
      '-i',
      '--name',
      containerName,
      '--network',
      request.capabilities.network ? 'bridge' : 'none',
      '--memory',
      `${request.memoryMb + CONTAINER_MEMORY_HEADROOM_MB}m`,
      '--cpus',
      String(this.config.cpuLimit),
      '-v',
      `${request.scopedDir}:${CONTAINER_DIR}:rw`,
      '-w',
      CONTAINER_DIR,
      '--read-only',
      '--tmpfs',
      `/tmp:size=${this.config.tmpfsSize}`,
    ];

    for (const [key, value] of Object.entries(sandboxEnv(this.mode, {}))) {
      args.push('-e', `${key}=${value}`);
    }

    if (this.config.seccompProfile === 'unconfined') {
      args.push('--security-opt', 'seccomp=unconfined');
    }

    // Drop all capabilities and prevent privilege escalation
    args.push('--cap-drop', 'ALL');
    args.push('--security-opt', 'no-new-privileges');

    args.push(this.config.image);
    args.push(
      'node',
      ...buildNodeArgs(CONTAINER_DIR, request.harnessFile, {
        memoryMb: request.memoryMb,
        capabilities: request.capabilities,
        permissionModel: this.permissionModel,
      }),
    );

    return args;
  }
}

/**
 * Factory function to create sandbox provider based on configuration
 */
export function createSandboxProvider(config: SandboxConfig): SandboxProvider {
  switch (config.mode) {
    case 'process':
      return new ProcessSandboxProvider(config.nodePath, config.permissionModel);
    case 'docker':
      return new DockerSandboxProvider(config.docker, config.permissionModel);
  }
}
