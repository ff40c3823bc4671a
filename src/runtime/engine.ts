/**
 * Execution Engine
 *
 * One-shot isolated execution of Python source inside a throwaway container.
 * The container has no network, a read-only root filesystem, dropped
 * capabilities, an unprivileged user and resource limits; only the session
 * workspace is mounted writable.
 *
 * Run outcomes (non-zero exit, timeout, truncated output) are results.
 * The returned promise rejects only when a container could not be set up.
 */

import { randomBytes } from 'crypto';
import * as nodePath from 'path';
import type { SandboxConfig } from '../config/index.js';
import { createLogger, type Logger } from '../logging/logger.js';
import { ExecutionSetupError, RuntimeUnavailableError } from '../sandbox/errors.js';
import { DAEMON_UNREACHABLE_PATTERN, type DockerClient } from './docker.js';
import { CappedOutput } from './output.js';
import { waitForExit } from './process.js';

export const TIMEOUT_EXIT_CODE = 124;

export const TIMEOUT_MESSAGE =
  'Execution timed out. If this was the first run, the Docker image may still be pulling. ' +
  'Try pre-pulling or increasing the timeout.';

/** Mount point of the session workspace inside containers */
export const WORKSPACE_MOUNT = '/workspace';

export interface ResourceLimits {
  memory: string;
  cpus: string;
  pidsLimit: number;
  tmpfsSize: string;
  runAsUser: string;
}

export interface ExecutionRequest {
  source: string;
  /** Host directory mounted at /workspace */
  mountDir: string;
  /** Working directory relative to the mount; "." for the mount root */
  workdir?: string;
  timeoutSeconds?: number;
  limits?: Partial<ResourceLimits>;
  env?: Record<string, string>;
  /** Ensure (and pull if needed) the image before running */
  ensureImage?: boolean;
}

export interface ExecutionResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  truncated: boolean;
}

export type EngineConfig = Pick<
  SandboxConfig,
  | 'image'
  | 'execTimeoutSeconds'
  | 'imagePullTimeoutSeconds'
  | 'memory'
  | 'cpus'
  | 'pidsLimit'
  | 'tmpfsSize'
  | 'runAsUser'
  | 'maxOutputBytes'
>;

export interface ExecutionEngineOptions {
  docker: DockerClient;
  logger?: Logger;
  /** Container name generator (default: sbx-run-<12 hex>) */
  containerName?: () => string;
}

const ENV_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Container path of a workspace subdirectory.
 */
export function containerWorkdir(subpath = '.'): string {
  const relative = subpath.trim().replace(/\\/g, '/').replace(/^\/+/, '');
  if (relative === '' || relative === '.') {
    return WORKSPACE_MOUNT;
  }
  return nodePath.posix.join(WORKSPACE_MOUNT, relative);
}

/**
 * Flags shared by executions and installs: privileges, user, resources,
 * and the workspace mount.
 */
export function confinementArgs(mountDir: string, workdir: string, limits: ResourceLimits): string[] {
  return [
    '--cap-drop',
    'ALL',
    '--security-opt',
    'no-new-privileges',
    '--user',
    limits.runAsUser,
    '--cpus',
    limits.cpus,
    '--memory',
    limits.memory,
    '--pids-limit',
    String(limits.pidsLimit),
    '-v',
    `${mountDir}:${WORKSPACE_MOUNT}:rw`,
    '-w',
    workdir,
  ];
}

export function envArgs(env: Record<string, string>): string[] {
  const args: string[] = [];
  for (const [name, value] of Object.entries(env)) {
    if (!ENV_NAME.test(name)) {
      throw new ExecutionSetupError(`Invalid environment variable name: ${name}`);
    }
    args.push('-e', `${name}=${value}`);
  }
  return args;
}

export interface RunArgsOptions {
  containerName: string;
  image: string;
  mountDir: string;
  workdir?: string;
  limits: ResourceLimits;
  env?: Record<string, string>;
}

/**
 * Arguments of `docker run` for one execution. The source is fed to
 * `python -` on stdin.
 */
export function buildRunArgs(options: RunArgsOptions): string[] {
  return [
    'run',
    '--rm',
    '--name',
    options.containerName,
    '-i',
    '--network',
    'none',
    '--read-only',
    '--tmpfs',
    `/tmp:rw,noexec,nosuid,size=${options.limits.tmpfsSize}`,
    ...confinementArgs(options.mountDir, containerWorkdir(options.workdir), options.limits),
    ...envArgs({ PYTHONDONTWRITEBYTECODE: '1', PYTHONUNBUFFERED: '1', ...options.env }),
    options.image,
    'python',
    '-',
  ];
}

export function randomContainerName(prefix: string): string {
  return `${prefix}-${randomBytes(6).toString('hex')}`;
}

export class ExecutionEngine {
  private readonly docker: DockerClient;
  private readonly logger: Logger;
  private readonly nextName: () => string;

  constructor(
    private readonly config: EngineConfig,
    options: ExecutionEngineOptions
  ) {
    this.docker = options.docker;
    this.logger = options.logger ?? createLogger('engine');
    this.nextName = options.containerName ?? (() => randomContainerName('sbx-run'));
  }

  get limits(): ResourceLimits {
    return {
      memory: this.config.memory,
      cpus: this.config.cpus,
      pidsLimit: this.config.pidsLimit,
      tmpfsSize: this.config.tmpfsSize,
      runAsUser: this.config.runAsUser,
    };
  }

  async run(request: ExecutionRequest): Promise<ExecutionResult> {
    if (request.ensureImage) {
      await this.docker.ensureImage(this.config.image, {
        pull: true,
        pullTimeoutSeconds: this.config.imagePullTimeoutSeconds,
      });
    }

    const containerName = this.nextName();
    const args = buildRunArgs({
      containerName,
      image: this.config.image,
      mountDir: request.mountDir,
      workdir: request.workdir,
      limits: { ...this.limits, ...request.limits },
      env: request.env,
    });
    const timeoutMs = (request.timeoutSeconds ?? this.config.execTimeoutSeconds) * 1000;

    try {
      const result = await this.execute(args, request.source, timeoutMs);
      this.logger.debug('Execution finished', {
        containerName,
        exitCode: result.exitCode,
        timedOut: result.timedOut,
        truncated: result.truncated,
      });
      return result;
    } finally {
      await this.docker.forceRemove(containerName);
    }
  }

  private async execute(args: string[], source: string, timeoutMs: number): Promise<ExecutionResult> {
    const child = this.docker.start(args);
    const stdout = new CappedOutput(this.config.maxOutputBytes);
    const stderr = new CappedOutput(this.config.maxOutputBytes);

    child.stdout.on('data', (chunk: Buffer | string) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer | string) => stderr.push(chunk));
    // The container may exit before reading all of stdin
    child.stdin.on('error', (error: Error) => {
      this.logger.debug('stdin closed early', { error: error.message });
    });
    child.stdin.end(source, 'utf-8');

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), timeoutMs);
    });

    try {
      const outcome = await Promise.race([waitForExit(child), deadline]);

      if (outcome === 'timeout') {
        child.kill('SIGKILL');
        this.logger.warn('Execution timed out', { timeoutMs });
        return { exitCode: TIMEOUT_EXIT_CODE, stdout: '', stderr: TIMEOUT_MESSAGE, timedOut: true, truncated: false };
      }
      if ('error' in outcome) {
        throw this.docker.toSetupError(outcome.error);
      }

      const errorText = stderr.text();
      if (outcome.code === 125 && DAEMON_UNREACHABLE_PATTERN.test(errorText)) {
        throw new RuntimeUnavailableError(`Cannot reach the Docker daemon: ${errorText.trim()}`);
      }

      return {
        exitCode: outcome.code,
        stdout: stdout.text(),
        stderr: errorText,
        timedOut: false,
        truncated: stdout.truncated || stderr.truncated,
      };
    } finally {
      clearTimeout(timer);
    }
  }
}
