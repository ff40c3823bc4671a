/**
 * Sandbox Commands
 *
 * The caller-facing verbs. Each verb checks for a live session, does its
 * work and answers with a short plain-text reply. Sandbox errors become
 * their user message; anything else propagates.
 */

import * as nodePath from 'path';
import { split as shellSplit } from 'shlex';
import type { SandboxConfig } from '../config/index.js';
import { EchoRewriter } from '../echo/rewriter.js';
import { getLogger, type Logger } from '../logging/logger.js';
import { DockerClient } from '../runtime/docker.js';
import { ExecutionEngine } from '../runtime/engine.js';
import { InstallJobRunner, SITE_PACKAGES_PATH, throttleInstallStatus, type InstallStatus } from '../runtime/install.js';
import type { SpawnProcess } from '../runtime/process.js';
import { InvalidPackageError, SessionNotFoundError, isSandboxError } from '../sandbox/errors.js';
import { SessionStore } from '../sandbox/session-store.js';
import type { CreateOutcome } from '../sandbox/types.js';
import { WorkspaceFiles } from '../sandbox/workspace.js';
import { extractCodeBlock, formatExecutionResult, listingLines, renderPage } from './format.js';

const CREATE_REPLIES: Record<CreateOutcome, string> = {
  created: 'Sandbox created. Use look to browse and py to run code.',
  'already-exists': 'You already have a sandbox.',
  failed: 'Failed to create sandbox. Try again.',
};

export interface SandboxCommandsOptions {
  /** Process spawner for docker (default: child_process.spawn) */
  spawnProcess?: SpawnProcess;
  /** Clock in epoch milliseconds (default: Date.now) */
  now?: () => number;
  logger?: Logger;
}

export interface LookOptions {
  /** Directory to change into first */
  path?: string;
  /** Zero-based page of the listing */
  page?: number;
}

export class SandboxCommands {
  readonly sessions: SessionStore;
  readonly files: WorkspaceFiles;
  readonly docker: DockerClient;
  readonly engine: ExecutionEngine;
  readonly installer: InstallJobRunner;
  readonly echo: EchoRewriter;
  private readonly logger: Logger;

  constructor(
    private readonly config: SandboxConfig,
    options: SandboxCommandsOptions = {}
  ) {
    const base = options.logger ?? getLogger();
    this.logger = base.child({ component: 'commands' });
    this.sessions = new SessionStore(config, { now: options.now, logger: base.child({ component: 'session-store' }) });
    this.files = new WorkspaceFiles(this.sessions);
    this.docker = new DockerClient({
      binary: config.dockerBinary,
      spawnProcess: options.spawnProcess,
      logger: base.child({ component: 'docker' }),
    });
    this.engine = new ExecutionEngine(config, { docker: this.docker, logger: base.child({ component: 'engine' }) });
    this.installer = new InstallJobRunner({
      docker: this.docker,
      image: config.image,
      logger: base.child({ component: 'install' }),
    });
    this.echo = new EchoRewriter({ enabled: config.echoLastExpression, logger: base.child({ component: 'echo' }) });
  }

  /**
   * Ensure the image once when configured to pull on startup. A failure is
   * logged; executions will report it when they run.
   *
   * @returns whether the image is ready
   */
  async prepareRuntime(): Promise<boolean> {
    if (!this.config.pullOnStartup) {
      return false;
    }
    try {
      await this.docker.ensureImage(this.config.image, {
        pull: true,
        pullTimeoutSeconds: this.config.imagePullTimeoutSeconds,
      });
      this.logger.info('Docker image ready', { image: this.config.image });
      return true;
    } catch (error) {
      if (!isSandboxError(error)) throw error;
      this.logger.warn('Unable to ensure Docker image', { image: this.config.image, error: error.message });
      return false;
    }
  }

  async create(ownerId: string): Promise<string> {
    return this.reply(async () => {
      const outcome = await this.sessions.create(ownerId);
      return CREATE_REPLIES[outcome];
    });
  }

  async run(ownerId: string, code: string): Promise<string> {
    return this.reply(async () => {
      await this.requireSession(ownerId);

      const source = this.echo.rewrite(extractCodeBlock(code));
      const result = await this.engine.run({
        source,
        mountDir: this.sessions.rootOf(ownerId),
        workdir: await this.sessions.currentCwd(ownerId),
        env: { PYTHONPATH: SITE_PACKAGES_PATH },
        ensureImage: !this.config.pullOnStartup,
      });

      await this.sessions.touch(ownerId);
      this.logger.info('Code executed', { ownerId, exitCode: result.exitCode, timedOut: result.timedOut });
      return formatExecutionResult(result);
    });
  }

  async look(ownerId: string, options: LookOptions = {}): Promise<string> {
    return this.reply(async () => {
      await this.requireSession(ownerId);

      if (options.path) {
        const moved = await this.sessions.setCwd(ownerId, options.path);
        if (!moved.ok) {
          return 'Invalid path. Stay in current directory.';
        }
      }

      const listing = await this.files.listDirectory(ownerId);
      await this.sessions.touch(ownerId);
      return renderPage(listingLines(listing), options.page);
    });
  }

  async write(ownerId: string, name: string, content: string): Promise<string> {
    return this.reply(async () => {
      await this.requireSession(ownerId);
      const written = await this.files.writeFile(ownerId, name, content);
      await this.sessions.touch(ownerId);
      return `Wrote ${nodePath.posix.basename(written.path)} (${written.bytes} bytes).`;
    });
  }

  async rm(ownerId: string, name: string, recursive = false): Promise<string> {
    return this.reply(async () => {
      await this.requireSession(ownerId);
      await this.files.removePath(ownerId, name, { recursive });
      await this.sessions.touch(ownerId);
      return 'Removed.';
    });
  }

  /**
   * Install packages into the session, yielding progress replies: a
   * starting line, throttled log tails, and a final summary.
   */
  async *install(ownerId: string, packages: string): AsyncGenerator<string> {
    try {
      await this.requireSession(ownerId);

      const names = splitPackages(packages);
      if (names.length === 0) {
        yield 'Provide at least one package name.';
        return;
      }

      if (!this.config.pullOnStartup) {
        await this.docker.ensureImage(this.config.image, {
          pull: true,
          pullTimeoutSeconds: this.config.imagePullTimeoutSeconds,
        });
      }

      const invocation = this.installer.buildInvocation(this.sessions.rootOf(ownerId), names, this.engine.limits);
      this.logger.info('Installing packages', { ownerId, packages: names });
      yield 'Starting pip install...';

      const statuses = throttleInstallStatus(
        this.installer.stream(invocation, { timeoutSeconds: this.config.installTimeoutSeconds }),
        { intervalMs: this.config.statusIntervalSeconds * 1000, tailChars: this.config.statusTailChars }
      );
      try {
        for await (const status of statuses) {
          yield renderInstallStatus(status);
        }
      } finally {
        await this.sessions.touch(ownerId);
      }
    } catch (error) {
      if (!isSandboxError(error)) throw error;
      yield error.toUserMessage();
    }
  }

  async delete(ownerId: string): Promise<string> {
    return this.reply(async () => {
      if (!(await this.sessions.ensure(ownerId))) {
        return 'No sandbox to delete.';
      }
      return (await this.sessions.delete(ownerId)) ? 'Sandbox deleted.' : 'Failed to delete sandbox. Try again.';
    });
  }

  async health(): Promise<string> {
    const status = await this.docker.health(this.config.image);
    return status.ok ? `Docker reachable. Image present: ${status.image}` : `Sandbox not ready: ${status.reason}`;
  }

  private async requireSession(ownerId: string): Promise<void> {
    if (!(await this.sessions.ensure(ownerId))) {
      throw new SessionNotFoundError(ownerId);
    }
  }

  private async reply(action: () => Promise<string>): Promise<string> {
    try {
      return await action();
    } catch (error) {
      if (!isSandboxError(error)) throw error;
      this.logger.debug('Command failed', { code: error.code, error: error.message });
      return error.toUserMessage();
    }
  }
}

/**
 * @throws InvalidPackageError when quoting is unbalanced
 */
function splitPackages(packages: string): string[] {
  try {
    return shellSplit(packages).filter((name) => name.trim() !== '');
  } catch {
    throw new InvalidPackageError(packages);
  }
}

export function renderInstallStatus(status: InstallStatus): string {
  if (!status.final) {
    return status.text;
  }

  let summary: string;
  if (status.timedOut) {
    summary = 'Install timed out.';
  } else if (status.exitCode === 0) {
    summary = 'Install finished.';
  } else {
    summary = `Install failed (exit code ${status.exitCode ?? 'unknown'}).`;
  }
  return status.text ? `${status.text}\n\n${summary}` : summary;
}
