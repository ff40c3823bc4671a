/**
 * Install Jobs
 *
 * Package installation into the session's `.site-packages` directory. Unlike
 * executions, install containers have network access and a writable root
 * filesystem, and their combined output is streamed line by line.
 */

import { PassThrough } from 'stream';
import { createInterface } from 'readline';
import { createLogger, type Logger } from '../logging/logger.js';
import { InvalidPackageError } from '../sandbox/errors.js';
import { SITE_PACKAGES_DIR } from '../sandbox/types.js';
import type { DockerClient } from './docker.js';
import {
  TIMEOUT_EXIT_CODE,
  WORKSPACE_MOUNT,
  confinementArgs,
  envArgs,
  randomContainerName,
  type ResourceLimits,
} from './engine.js';
import { waitForExit, type ProcessExit } from './process.js';

/** Install target inside the container, also the PYTHONPATH of executions */
export const SITE_PACKAGES_PATH = `${WORKSPACE_MOUNT}/${SITE_PACKAGES_DIR}`;

export interface InstallInvocation {
  command: string;
  args: string[];
  containerName: string;
}

export type InstallEvent =
  | { kind: 'log'; text: string }
  | { kind: 'exit'; exitCode: number; log: string; timedOut: boolean };

export interface InstallStatus {
  /** Tail of the log so far */
  text: string;
  final: boolean;
  exitCode?: number;
  timedOut?: boolean;
}

export interface InstallJobRunnerOptions {
  docker: DockerClient;
  image: string;
  logger?: Logger;
  containerName?: () => string;
}

const UNSAFE_PACKAGE = /[\s\u0000-\u001f\u007f]/;

export function validatePackage(spec: string): string {
  if (spec === '' || spec.startsWith('-') || UNSAFE_PACKAGE.test(spec)) {
    throw new InvalidPackageError(spec);
  }
  return spec;
}

export class InstallJobRunner {
  private readonly docker: DockerClient;
  private readonly image: string;
  private readonly logger: Logger;
  private readonly nextName: () => string;

  constructor(options: InstallJobRunnerOptions) {
    this.docker = options.docker;
    this.image = options.image;
    this.logger = options.logger ?? createLogger('install');
    this.nextName = options.containerName ?? (() => randomContainerName('sbx-pip'));
  }

  /**
   * Build the `docker run` invocation for a pip install into the workspace.
   *
   * @throws InvalidPackageError for an empty list or an unacceptable name
   */
  buildInvocation(mountDir: string, packages: readonly string[], limits: ResourceLimits): InstallInvocation {
    if (packages.length === 0) {
      throw new InvalidPackageError('');
    }
    const containerName = this.nextName();
    return {
      command: this.docker.binary,
      containerName,
      args: [
        'run',
        '--rm',
        '--name',
        containerName,
        ...confinementArgs(mountDir, WORKSPACE_MOUNT, limits),
        ...envArgs({ PYTHONDONTWRITEBYTECODE: '1', PYTHONUNBUFFERED: '1' }),
        this.image,
        'python',
        '-m',
        'pip',
        'install',
        '--no-cache-dir',
        '-U',
        '-t',
        SITE_PACKAGES_PATH,
        ...packages.map(validatePackage),
      ],
    };
  }

  /**
   * Run an install and stream its combined output.
   *
   * Yields one `log` event per output line, then exactly one `exit` event.
   * Stopping the iteration early kills the job and removes its container.
   */
  async *stream(invocation: InstallInvocation, options: { timeoutSeconds?: number } = {}): AsyncGenerator<InstallEvent> {
    const child = this.docker.start(invocation.args);
    child.stdin.end();

    const merged = new PassThrough();
    const sources = [child.stdout, child.stderr];
    let openStreams = sources.length;
    const endMerged = () => {
      if (merged.writableEnded) return;
      for (const source of sources) source.unpipe(merged);
      merged.end();
    };
    for (const source of sources) {
      source.pipe(merged, { end: false });
      source.once('end', () => {
        openStreams -= 1;
        if (openStreams === 0) endMerged();
      });
    }

    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;
    const exited = new Promise<ProcessExit>((resolve) => {
      void waitForExit(child).then((exit) => {
        if ('error' in exit) endMerged();
        resolve(exit);
      });
      if (options.timeoutSeconds !== undefined) {
        timer = setTimeout(() => {
          timedOut = true;
          child.kill('SIGKILL');
          endMerged();
          resolve({ code: TIMEOUT_EXIT_CODE });
        }, options.timeoutSeconds * 1000);
      }
    });

    const lines = createInterface({ input: merged, crlfDelay: Infinity });
    const log: string[] = [];
    let completed = false;

    try {
      for await (const line of lines) {
        log.push(line);
        yield { kind: 'log', text: line };
      }

      const exit = await exited;
      if ('error' in exit) {
        throw this.docker.toSetupError(exit.error);
      }
      completed = true;
      this.logger.info('Install finished', { containerName: invocation.containerName, exitCode: exit.code, timedOut });
      yield { kind: 'exit', exitCode: exit.code, log: log.join('\n'), timedOut };
    } finally {
      clearTimeout(timer);
      lines.close();
      if (!completed) {
        child.kill('SIGKILL');
      }
      await this.docker.forceRemove(invocation.containerName);
    }
  }
}

function tail(text: string, chars: number): string {
  return text.length > chars ? text.slice(-chars) : text;
}

export interface ThrottleOptions {
  intervalMs: number;
  tailChars: number;
  /** Clock in milliseconds (default: Date.now) */
  now?: () => number;
}

/**
 * Turn install events into status snapshots: at most one partial snapshot
 * per interval, then one final snapshot when the job exits.
 */
export async function* throttleInstallStatus(
  events: AsyncIterable<InstallEvent>,
  options: ThrottleOptions
): AsyncGenerator<InstallStatus> {
  const now = options.now ?? Date.now;
  const log: string[] = [];
  let lastUpdate = now();

  for await (const event of events) {
    if (event.kind === 'log') {
      log.push(event.text);
      const current = now();
      if (current - lastUpdate >= options.intervalMs) {
        lastUpdate = current;
        yield { text: tail(log.join('\n'), options.tailChars), final: false };
      }
      continue;
    }

    yield {
      text: tail(event.log, options.tailChars),
      final: true,
      exitCode: event.exitCode,
      timedOut: event.timedOut,
    };
    return;
  }
}
