/**
 * Process plumbing
 *
 * Container runs go through a SpawnProcess function so that tests can
 * substitute in-process fakes for the docker client.
 */

import { spawn } from 'child_process';
import type { EventEmitter } from 'events';
import type { Readable, Writable } from 'stream';
import { CappedOutput } from './output.js';

/**
 * The subset of ChildProcess the runtime relies on.
 */
export interface SpawnedProcess extends EventEmitter {
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnProcess = (command: string, args: readonly string[]) => SpawnedProcess;

export const defaultSpawn: SpawnProcess = (command, args) => spawn(command, [...args], { stdio: 'pipe' });

/**
 * How a spawned process ended: an exit code, or the error that kept it
 * from running.
 */
export type ProcessExit = { code: number } | { error: Error };

/**
 * Resolve once the process has exited and both output streams have ended,
 * or as soon as it fails to start. Never rejects.
 */
export function waitForExit(child: SpawnedProcess): Promise<ProcessExit> {
  return new Promise((resolve) => {
    let openStreams = 2;
    let exitCode: number | null = null;

    const maybeResolve = () => {
      if (openStreams === 0 && exitCode !== null) {
        resolve({ code: exitCode });
      }
    };

    const onStreamEnd = () => {
      openStreams -= 1;
      maybeResolve();
    };

    child.stdout.once('end', onStreamEnd);
    child.stderr.once('end', onStreamEnd);
    child.once('error', (error: Error) => resolve({ error }));
    child.once('close', (code: number | null) => {
      exitCode = code ?? 1;
      maybeResolve();
    });
  });
}

export interface CommandOutput {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface RunCommandOptions {
  timeoutMs?: number;
  /** Cap per stream (default: 64 KiB) */
  maxOutputBytes?: number;
}

/**
 * Run a short command to completion and capture its output.
 *
 * @throws the spawn error if the process could not be started
 */
export async function runCommand(
  spawnProcess: SpawnProcess,
  command: string,
  args: readonly string[],
  options: RunCommandOptions = {}
): Promise<CommandOutput> {
  const child = spawnProcess(command, args);
  const stdout = new CappedOutput(options.maxOutputBytes ?? 64 * 1024);
  const stderr = new CappedOutput(options.maxOutputBytes ?? 64 * 1024);

  child.stdout.on('data', (chunk: Buffer | string) => stdout.push(chunk));
  child.stderr.on('data', (chunk: Buffer | string) => stderr.push(chunk));
  child.stdin.end();

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<'timeout'>((resolve) => {
    if (options.timeoutMs !== undefined) {
      timer = setTimeout(() => resolve('timeout'), options.timeoutMs);
    }
  });

  try {
    const outcome = await Promise.race([waitForExit(child), timeout]);
    if (outcome === 'timeout') {
      child.kill('SIGKILL');
      return { exitCode: 124, stdout: stdout.text(), stderr: stderr.text(), timedOut: true };
    }
    if ('error' in outcome) {
      throw outcome.error;
    }
    return { exitCode: outcome.code, stdout: stdout.text(), stderr: stderr.text(), timedOut: false };
  } finally {
    clearTimeout(timer);
  }
}
