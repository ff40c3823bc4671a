import { describe, it, expect, beforeEach } from 'vitest';
import { Logger } from '../logging/logger.js';
import { InvalidPackageError, RuntimeUnavailableError } from '../sandbox/errors.js';
import { FakeDocker } from '../testing/index.js';
import { DockerClient } from './docker.js';
import type { ResourceLimits } from './engine.js';
import {
  InstallJobRunner,
  SITE_PACKAGES_PATH,
  throttleInstallStatus,
  validatePackage,
  type InstallEvent,
  type InstallStatus,
} from './install.js';

const silent = Logger.create({ level: 'silent' });

const LIMITS: ResourceLimits = {
  memory: '256m',
  cpus: '1.0',
  pidsLimit: 64,
  tmpfsSize: '64m',
  runAsUser: '1000:1000',
};

async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

async function* fromArray<T>(items: T[]): AsyncGenerator<T> {
  for (const item of items) {
    yield item;
  }
}

describe('validatePackage', () => {
  it('accepts ordinary requirement specifiers', () => {
    expect(validatePackage('requests')).toBe('requests');
    expect(validatePackage('numpy==1.26.4')).toBe('numpy==1.26.4');
    expect(validatePackage('rich>=13')).toBe('rich>=13');
  });

  it('rejects options and whitespace', () => {
    expect(() => validatePackage('--index-url=http://evil')).toThrow(InvalidPackageError);
    expect(() => validatePackage('a b')).toThrow(InvalidPackageError);
    expect(() => validatePackage('a\u0000')).toThrow(InvalidPackageError);
    expect(() => validatePackage('')).toThrow(InvalidPackageError);
  });
});

describe('InstallJobRunner', () => {
  let fake: FakeDocker;
  let runner: InstallJobRunner;

  beforeEach(() => {
    fake = new FakeDocker();
    runner = new InstallJobRunner({
      docker: new DockerClient({ spawnProcess: fake.spawn, logger: silent }),
      image: 'python:3.11-alpine',
      logger: silent,
      containerName: () => 'sbx-pip-test',
    });
  });

  describe('buildInvocation', () => {
    it('installs into the workspace site-packages with network allowed', () => {
      const invocation = runner.buildInvocation('/srv/sandboxes/alice', ['requests', 'rich'], LIMITS);

      expect(invocation.command).toBe('docker');
      expect(invocation.containerName).toBe('sbx-pip-test');
      expect(invocation.args).toEqual([
        'run',
        '--rm',
        '--name',
        'sbx-pip-test',
        '--cap-drop',
        'ALL',
        '--security-opt',
        'no-new-privileges',
        '--user',
        '1000:1000',
        '--cpus',
        '1.0',
        '--memory',
        '256m',
        '--pids-limit',
        '64',
        '-v',
        '/srv/sandboxes/alice:/workspace:rw',
        '-w',
        '/workspace',
        '-e',
        'PYTHONDONTWRITEBYTECODE=1',
        '-e',
        'PYTHONUNBUFFERED=1',
        'python:3.11-alpine',
        'python',
        '-m',
        'pip',
        'install',
        '--no-cache-dir',
        '-U',
        '-t',
        SITE_PACKAGES_PATH,
        'requests',
        'rich',
      ]);
      expect(invocation.args).not.toContain('--network');
      expect(invocation.args).not.toContain('--read-only');
    });

    it('rejects an empty package list', () => {
      expect(() => runner.buildInvocation('/m', [], LIMITS)).toThrow(InvalidPackageError);
    });
  });

  describe('stream', () => {
    it('yields combined output lines then the exit', async () => {
      fake.on('run', (proc) =>
        proc.finish({
          stdout: 'Collecting requests\nInstalling collected packages: requests\n',
          stderr: 'WARNING: something\n',
          code: 0,
        })
      );
      const invocation = runner.buildInvocation('/m', ['requests'], LIMITS);

      const events = await collect(runner.stream(invocation));

      const logLines = events.flatMap((event) => (event.kind === 'log' ? [event.text] : []));
      expect([...logLines].sort()).toEqual(
        ['Collecting requests', 'Installing collected packages: requests', 'WARNING: something'].sort()
      );
      const last = events[events.length - 1];
      expect(last).toEqual({ kind: 'exit', exitCode: 0, log: logLines.join('\n'), timedOut: false });
      expect(events.filter((event) => event.kind === 'exit')).toHaveLength(1);
    });

    it('flushes a final line without a newline', async () => {
      fake.on('run', (proc) => proc.finish({ stdout: 'one\ntwo', code: 1 }));

      const events = await collect(runner.stream(runner.buildInvocation('/m', ['x'], LIMITS)));

      expect(events).toEqual([
        { kind: 'log', text: 'one' },
        { kind: 'log', text: 'two' },
        { kind: 'exit', exitCode: 1, log: 'one\ntwo', timedOut: false },
      ]);
    });

    it('decodes invalid UTF-8 with replacement characters', async () => {
      fake.on('run', (proc) => proc.finish({ stdout: Buffer.from([0x6f, 0x6b, 0xff, 0x0a]) }));

      const events = await collect(runner.stream(runner.buildInvocation('/m', ['x'], LIMITS)));

      expect(events[0]).toEqual({ kind: 'log', text: 'ok\ufffd' });
    });

    it('stops at the deadline and removes the container', async () => {
      fake.on('run', (proc) => {
        proc.stdout.write('Collecting slowpkg\n');
      });

      const events = await collect(
        runner.stream(runner.buildInvocation('/m', ['slowpkg'], LIMITS), { timeoutSeconds: 0.05 })
      );

      expect(events).toEqual([
        { kind: 'log', text: 'Collecting slowpkg' },
        { kind: 'exit', exitCode: 124, log: 'Collecting slowpkg', timedOut: true },
      ]);
      expect(fake.calls('run')[0]?.killSignals).toContain('SIGKILL');
      expect(fake.calls('rm').map((proc) => proc.args)).toEqual([['rm', '-f', 'sbx-pip-test']]);
    });

    it('kills the job when the consumer stops early', async () => {
      fake.on('run', (proc) => {
        proc.stdout.write('first\n');
      });

      for await (const event of runner.stream(runner.buildInvocation('/m', ['x'], LIMITS))) {
        expect(event).toEqual({ kind: 'log', text: 'first' });
        break;
      }

      expect(fake.calls('run')[0]?.killed).toBe(true);
      expect(fake.calls('rm')).toHaveLength(1);
    });

    it('reports a missing docker binary', async () => {
      fake.withoutBinary();

      await expect(collect(runner.stream(runner.buildInvocation('/m', ['x'], LIMITS)))).rejects.toThrow(
        RuntimeUnavailableError
      );
    });
  });
});

describe('throttleInstallStatus', () => {
  const log = (text: string): InstallEvent => ({ kind: 'log', text });

  it('emits at most one partial update per interval plus a final one', async () => {
    const times = [0, 1000, 2000, 3500, 4000, 6000];
    let call = 0;
    const now = () => times[Math.min(call++, times.length - 1)] ?? 0;

    const statuses = await collect(
      throttleInstallStatus(
        fromArray<InstallEvent>([
          log('a'),
          log('b'),
          log('c'),
          log('d'),
          log('e'),
          { kind: 'exit', exitCode: 0, log: 'a\nb\nc\nd\ne', timedOut: false },
        ]),
        { intervalMs: 3000, tailChars: 1800, now }
      )
    );

    expect(statuses).toEqual<InstallStatus[]>([
      { text: 'a\nb\nc', final: false },
      { text: 'a\nb\nc\nd\ne', final: true, exitCode: 0, timedOut: false },
    ]);
  });

  it('shows only the tail of a long log', async () => {
    const statuses = await collect(
      throttleInstallStatus(
        fromArray<InstallEvent>([{ kind: 'exit', exitCode: 1, log: 'x'.repeat(50) + 'END', timedOut: false }]),
        { intervalMs: 3000, tailChars: 5, now: () => 0 }
      )
    );

    expect(statuses).toEqual([{ text: 'xxEND', final: true, exitCode: 1, timedOut: false }]);
  });
});
