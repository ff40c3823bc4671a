import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { resolveConfig, type SandboxConfigInput } from '../config/index.js';
import { Logger } from '../logging/logger.js';
import { TIMEOUT_MESSAGE } from '../runtime/engine.js';
import { FakeDocker } from '../testing/index.js';
import { SandboxCommands, renderInstallStatus } from './service.js';

const IMAGE = 'python:3.11-alpine';
const NO_SESSION = 'No sandbox found or it expired. Use create first.';

async function collect(replies: AsyncIterable<string>): Promise<string[]> {
  const items: string[] = [];
  for await (const reply of replies) {
    items.push(reply);
  }
  return items;
}

describe('SandboxCommands', () => {
  let baseDir: string;
  let fake: FakeDocker;
  let clock: number;
  let commands: SandboxCommands;

  function build(overrides: Partial<SandboxConfigInput> = {}): SandboxCommands {
    const config = resolveConfig({ baseDir, image: IMAGE, pullOnStartup: false, retentionSeconds: 3600, ...overrides });
    return new SandboxCommands(config, {
      spawnProcess: fake.spawn,
      now: () => clock,
      logger: Logger.create({ level: 'silent' }),
    });
  }

  beforeEach(async () => {
    baseDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'commands-test-')));
    fake = new FakeDocker();
    clock = 1_000_000;
    commands = build();
  });

  afterEach(async () => {
    await fs.rm(baseDir, { recursive: true, force: true });
  });

  describe('create', () => {
    it('creates once and then reports the existing sandbox', async () => {
      expect(await commands.create('alice')).toBe('Sandbox created. Use look to browse and py to run code.');
      expect(await commands.create('alice')).toBe('You already have a sandbox.');
    });

    it('rejects an owner id that cannot name a directory', async () => {
      expect(await commands.create('../etc')).toBe('Invalid owner id: "../etc"');
    });
  });

  describe('run', () => {
    beforeEach(async () => {
      await commands.create('alice');
    });

    it('echoes a trailing expression and formats the output', async () => {
      fake.on('run', async (proc) => {
        const source = await proc.input;
        proc.finish({ stdout: source === '6*7\nprint(repr((6*7)))' ? '42\n' : 'unexpected\n' });
      });

      expect(await commands.run('alice', '```python\n6*7\n```')).toBe('42\n');
    });

    it('mounts the session and puts installed packages on the path', async () => {
      fake.on('run', (proc) => proc.finish());

      expect(await commands.run('alice', 'pass')).toBe('(no output, exit code 0)');

      const args = fake.calls('run')[0]?.args ?? [];
      expect(args).toContain(`${commands.sessions.rootOf('alice')}:/workspace:rw`);
      expect(args).toContain('PYTHONPATH=/workspace/.site-packages');
    });

    it('runs in the current directory', async () => {
      await fs.mkdir(path.join(commands.sessions.rootOf('alice'), 'src'));
      await commands.sessions.setCwd('alice', 'src');
      fake.on('run', (proc) => proc.finish());

      await commands.run('alice', 'pass');

      const args = fake.calls('run')[0]?.args ?? [];
      expect(args[args.indexOf('-w') + 1]).toBe('/workspace/src');
    });

    it('runs at the root when the stored cwd climbs out of it', async () => {
      const root = commands.sessions.rootOf('alice');
      await fs.writeFile(
        path.join(root, '.meta.json'),
        JSON.stringify({ createdAt: clock, lastUsedAt: clock, cwd: '../../../etc' })
      );
      fake.on('run', (proc) => proc.finish());

      await commands.run('alice', 'pass');

      const args = fake.calls('run')[0]?.args ?? [];
      expect(args[args.indexOf('-w') + 1]).toBe('/workspace');
    });

    it('checks the image before running when not pulled at startup', async () => {
      fake.on('run', (proc) => proc.finish());

      await commands.run('alice', 'pass');

      expect(fake.processes.map((proc) => proc.args[0])).toEqual(['image', 'run', 'rm']);
    });

    it('skips the image check when pulled at startup', async () => {
      commands = build({ pullOnStartup: true });
      fake.on('run', (proc) => proc.finish());

      await commands.run('alice', 'pass');

      expect(fake.calls('image inspect')).toHaveLength(0);
    });

    it('shows stderr of a failing run', async () => {
      fake.on('run', (proc) => proc.finish({ stderr: 'NameError: name x is not defined\n', code: 1 }));

      expect(await commands.run('alice', 'x')).toBe('NameError: name x is not defined\n');
    });

    it('reports a timeout as output', async () => {
      commands = build({ execTimeoutSeconds: 0.05 });
      fake.on('run', () => {
        // never finishes
      });

      expect(await commands.run('alice', 'while True: pass')).toBe(TIMEOUT_MESSAGE);
    });

    it('reports a missing docker binary', async () => {
      fake.withoutBinary();

      expect(await commands.run('alice', '1')).toBe(
        "Sandbox error: Docker binary 'docker' not found. Install Docker and ensure it's on PATH."
      );
    });

    it('refreshes the session', async () => {
      fake.on('run', (proc) => proc.finish());
      clock += 1000;

      await commands.run('alice', 'pass');

      expect((await commands.sessions.get('alice'))?.lastUsedAt).toBe(clock);
    });
  });

  it('requires a session for every verb but create and delete', async () => {
    expect(await commands.run('bob', '1')).toBe(NO_SESSION);
    expect(await commands.look('bob')).toBe(NO_SESSION);
    expect(await commands.write('bob', 'a.txt', 'x')).toBe(NO_SESSION);
    expect(await commands.rm('bob', 'a.txt')).toBe(NO_SESSION);
    expect(await collect(commands.install('bob', 'rich'))).toEqual([NO_SESSION]);
    expect(fake.processes).toHaveLength(0);
  });

  it('treats an idle session as expired', async () => {
    await commands.create('alice');
    clock += 3600 * 1000 + 1;

    expect(await commands.look('alice')).toBe(NO_SESSION);
    expect(await commands.create('alice')).toBe('Sandbox created. Use look to browse and py to run code.');
  });

  describe('files', () => {
    beforeEach(async () => {
      await commands.create('alice');
    });

    it('writes files and lists them', async () => {
      expect(await commands.write('alice', 'main.py', 'print(1)')).toBe('Wrote main.py (8 bytes).');
      expect(await commands.write('alice', 'lib/util.py', '')).toBe('Wrote util.py (0 bytes).');

      expect(await commands.look('alice')).toBe('Page 1/1\n\ncwd: /\nlib/\nmain.py (8 B)');
    });

    it('changes directory when looking at a path', async () => {
      await commands.write('alice', 'lib/util.py', 'x = 1');

      expect(await commands.look('alice', { path: 'lib' })).toBe('Page 1/1\n\ncwd: /lib\nutil.py (5 B)');
      expect(await commands.sessions.currentCwd('alice')).toBe('lib');
    });

    it('stays put on an invalid path', async () => {
      expect(await commands.look('alice', { path: '../..' })).toBe('Invalid path. Stay in current directory.');
      expect(await commands.look('alice', { path: 'missing' })).toBe('Invalid path. Stay in current directory.');
      expect(await commands.sessions.currentCwd('alice')).toBe('.');
    });

    it('pages long listings', async () => {
      for (let i = 0; i < 25; i++) {
        await commands.write('alice', `f${String(i).padStart(2, '0')}.txt`, '');
      }

      const second = await commands.look('alice', { page: 1 });

      expect(second.split('\n').slice(0, 3)).toEqual(['Page 2/2', '', 'f19.txt (0 B)']);
    });

    it('refuses to write outside the sandbox', async () => {
      expect(await commands.write('alice', '../escape.txt', 'x')).toBe('Invalid path.');
    });

    it('removes files and directories', async () => {
      await commands.write('alice', 'a.txt', 'x');
      await commands.write('alice', 'pkg/b.txt', 'y');

      expect(await commands.rm('alice', 'a.txt')).toBe('Removed.');
      expect(await commands.rm('alice', 'pkg')).toBe('Use recursive to remove directories.');
      expect(await commands.rm('alice', 'pkg', true)).toBe('Removed.');
      expect(await commands.rm('alice', 'a.txt')).toBe('Path not found.');
      expect(await commands.look('alice')).toBe('Page 1/1\n\ncwd: /');
    });
  });

  describe('install', () => {
    beforeEach(async () => {
      await commands.create('alice');
    });

    it('streams a start line and a final summary', async () => {
      fake.on('run', (proc) => proc.finish({ stdout: 'Successfully installed rich-13.7.1\n' }));

      const replies = await collect(commands.install('alice', 'rich'));

      expect(replies).toEqual(['Starting pip install...', 'Successfully installed rich-13.7.1\n\nInstall finished.']);
      const args = fake.calls('run')[0]?.args ?? [];
      expect(args.slice(-2)).toEqual(['/workspace/.site-packages', 'rich']);
    });

    it('reports a failed install with its exit code', async () => {
      fake.on('run', (proc) =>
        proc.finish({ stderr: 'ERROR: No matching distribution found for nosuchpkg\n', code: 1 })
      );

      const replies = await collect(commands.install('alice', 'nosuchpkg'));

      expect(replies[replies.length - 1]).toBe(
        'ERROR: No matching distribution found for nosuchpkg\n\nInstall failed (exit code 1).'
      );
    });

    it('splits quoted package lists', async () => {
      fake.on('run', (proc) => proc.finish());

      await collect(commands.install('alice', `requests "rich>=13"`));

      const args = fake.calls('run')[0]?.args ?? [];
      expect(args.slice(-2)).toEqual(['requests', 'rich>=13']);
    });

    it('asks for a package when none is given', async () => {
      expect(await collect(commands.install('alice', '   '))).toEqual(['Provide at least one package name.']);
    });

    it('rejects option-like package names', async () => {
      expect(await collect(commands.install('alice', '--index-url'))).toEqual([
        'Invalid package name: "--index-url"',
      ]);
      expect(fake.calls('run')).toHaveLength(0);
    });

    it('reports a missing image', async () => {
      fake.on('image inspect', (proc) => proc.finish({ code: 1 }));
      fake.on('pull', (proc) => proc.finish({ code: 1 }));

      expect(await collect(commands.install('alice', 'rich'))).toEqual([
        `Sandbox error: Docker failed to pull image '${IMAGE}'. Check Docker connectivity.`,
      ]);
    });
  });

  describe('delete', () => {
    it('deletes an existing sandbox', async () => {
      await commands.create('alice');

      expect(await commands.delete('alice')).toBe('Sandbox deleted.');
      expect(await commands.delete('alice')).toBe('No sandbox to delete.');
    });
  });

  describe('health', () => {
    it('reports a ready runtime', async () => {
      expect(await commands.health()).toBe(`Docker reachable. Image present: ${IMAGE}`);
    });

    it('reports why the runtime is not ready', async () => {
      fake.withoutBinary();

      expect(await commands.health()).toBe(
        "Sandbox not ready: Docker binary 'docker' not found. Install Docker and ensure it's on PATH."
      );
    });
  });

  describe('prepareRuntime', () => {
    it('does nothing unless pulling at startup', async () => {
      expect(await commands.prepareRuntime()).toBe(false);
      expect(fake.processes).toHaveLength(0);
    });

    it('pulls a missing image at startup', async () => {
      commands = build({ pullOnStartup: true });
      fake.on('image inspect', (proc) => proc.finish({ code: 1 }));

      expect(await commands.prepareRuntime()).toBe(true);
      expect(fake.calls('pull')).toHaveLength(1);
    });

    it('logs and carries on when the image cannot be pulled', async () => {
      commands = build({ pullOnStartup: true });
      fake.on('image inspect', (proc) => proc.finish({ code: 1 }));
      fake.on('pull', (proc) => proc.finish({ code: 1 }));

      expect(await commands.prepareRuntime()).toBe(false);
    });
  });
});

describe('renderInstallStatus', () => {
  it('shows partial output as is', () => {
    expect(renderInstallStatus({ text: 'Collecting rich', final: false })).toBe('Collecting rich');
  });

  it('summarizes the outcome', () => {
    expect(renderInstallStatus({ text: '', final: true, exitCode: 0, timedOut: false })).toBe('Install finished.');
    expect(renderInstallStatus({ text: 'log', final: true, exitCode: 124, timedOut: true })).toBe(
      'log\n\nInstall timed out.'
    );
  });
});
