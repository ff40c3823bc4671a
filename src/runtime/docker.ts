/**
 * Docker CLI client
 *
 * Everything the service asks of the container runtime goes through the
 * docker binary: image inspect and pull, forced removal, and the spawned
 * `docker run` processes of executions and installs.
 */

import { join as shellJoin } from 'shlex';
import { createLogger, type Logger } from '../logging/logger.js';
import {
  ExecutionSetupError,
  ImageUnavailableError,
  RuntimeUnavailableError,
  errnoCode,
  isSandboxError,
} from '../sandbox/errors.js';
import { defaultSpawn, runCommand, type CommandOutput, type SpawnedProcess, type SpawnProcess } from './process.js';

/**
 * stderr of a docker CLI that could not reach its daemon.
 */
export const DAEMON_UNREACHABLE_PATTERN =
  /Cannot connect to the Docker daemon|error during connect|Is the docker daemon running/i;

/** Limit for short bookkeeping commands (inspect, rm) */
export const DOCKER_COMMAND_TIMEOUT_MS = 30_000;

export interface DockerClientOptions {
  binary?: string;
  spawnProcess?: SpawnProcess;
  logger?: Logger;
  /** Deadline for `docker image inspect` (default: 30 s) */
  inspectTimeoutMs?: number;
}

export interface EnsureImageOptions {
  /** Pull when the image is not present locally */
  pull: boolean;
  pullTimeoutSeconds?: number;
}

export type HealthStatus = { ok: true; image: string } | { ok: false; reason: string };

export class DockerClient {
  readonly binary: string;
  private readonly spawnProcess: SpawnProcess;
  private readonly logger: Logger;
  private readonly inspectTimeoutMs: number;

  constructor(options: DockerClientOptions = {}) {
    this.binary = options.binary ?? 'docker';
    this.spawnProcess = options.spawnProcess ?? defaultSpawn;
    this.logger = options.logger ?? createLogger('docker');
    this.inspectTimeoutMs = options.inspectTimeoutMs ?? DOCKER_COMMAND_TIMEOUT_MS;
  }

  /**
   * Start a long-running docker command with piped stdio.
   *
   * @throws RuntimeUnavailableError or ExecutionSetupError if spawning throws
   */
  start(args: readonly string[]): SpawnedProcess {
    this.logger.debug('Starting docker', { command: shellJoin([this.binary, ...args]) });
    try {
      return this.spawnProcess(this.binary, args);
    } catch (error) {
      throw this.toSetupError(error);
    }
  }

  /**
   * Map a spawn failure onto the sandbox error taxonomy.
   */
  toSetupError(error: unknown): Error {
    if (isSandboxError(error)) {
      return error;
    }
    if (errnoCode(error) === 'ENOENT') {
      return new RuntimeUnavailableError(
        `Docker binary '${this.binary}' not found. Install Docker and ensure it's on PATH.`
      );
    }
    const detail = error instanceof Error ? error.message : String(error);
    return new ExecutionSetupError(`Failed to start Docker: ${detail}`);
  }

  /**
   * Run a short docker command to completion.
   */
  async invoke(args: readonly string[], timeoutMs?: number): Promise<CommandOutput> {
    try {
      return await runCommand(this.spawnProcess, this.binary, args, { timeoutMs });
    } catch (error) {
      throw this.toSetupError(error);
    }
  }

  /**
   * @throws RuntimeUnavailableError if the daemon cannot be reached
   */
  async imageExists(image: string): Promise<boolean> {
    const result = await this.invoke(['image', 'inspect', image], this.inspectTimeoutMs);
    if (result.timedOut) {
      throw new RuntimeUnavailableError(`Docker did not answer an image inspect for '${image}' in time.`);
    }
    if (result.exitCode === 0) {
      return true;
    }
    if (DAEMON_UNREACHABLE_PATTERN.test(result.stderr)) {
      throw new RuntimeUnavailableError(`Cannot reach the Docker daemon: ${firstLine(result.stderr)}`);
    }
    return false;
  }

  async pullImage(image: string, timeoutSeconds = 300): Promise<void> {
    this.logger.info('Pulling image', { image });
    const result = await this.logger.timed(`pull ${image}`, () =>
      this.invoke(['pull', image], timeoutSeconds * 1000)
    );

    if (result.timedOut) {
      throw new ImageUnavailableError(image, `Timed out pulling Docker image '${image}'. Try pulling manually.`);
    }
    if (result.exitCode !== 0) {
      if (DAEMON_UNREACHABLE_PATTERN.test(result.stderr)) {
        throw new RuntimeUnavailableError(`Cannot reach the Docker daemon: ${firstLine(result.stderr)}`);
      }
      throw new ImageUnavailableError(image, `Docker failed to pull image '${image}'. Check Docker connectivity.`);
    }
  }

  /**
   * Make sure `image` is available locally, pulling it if allowed.
   *
   * @throws ImageUnavailableError if it is missing and cannot be pulled
   * @throws RuntimeUnavailableError if docker is missing or unreachable
   */
  async ensureImage(image: string, options: EnsureImageOptions): Promise<void> {
    if (await this.imageExists(image)) {
      return;
    }
    if (!options.pull) {
      throw new ImageUnavailableError(image, `Docker image '${image}' not found locally and pulling is disabled.`);
    }
    await this.pullImage(image, options.pullTimeoutSeconds);
  }

  /**
   * `docker rm -f`, ignoring every failure. Used for cleanup only.
   */
  async forceRemove(containerName: string): Promise<void> {
    try {
      await this.invoke(['rm', '-f', containerName], DOCKER_COMMAND_TIMEOUT_MS);
    } catch (error) {
      this.logger.debug('Forced removal failed', { containerName, error: String(error) });
    }
  }

  /**
   * Inspect-only readiness check; never pulls.
   */
  async health(image: string): Promise<HealthStatus> {
    try {
      await this.ensureImage(image, { pull: false });
      return { ok: true, image };
    } catch (error) {
      if (isSandboxError(error)) {
        return { ok: false, reason: error.message };
      }
      throw error;
    }
  }
}

function firstLine(text: string): string {
  return text.trim().split('\n')[0] ?? '';
}
