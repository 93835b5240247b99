import { writeFile } from 'node:fs/promises';
import path from 'node:path';

import chalk from 'chalk';
import {
  afterEach,
  beforeEach,
  describe,
  expect,
  it,
  type Mock,
  vi,
} from 'vitest';

import { LaunchError } from '@/runner/errors';
import type { LaunchSpec } from '@/runner/startup';
import { makeTempDir, removeDir, stripClock } from '@/test/helpers';

import { normalizeArgv } from './cli-utils';
import type { CliDeps } from './context';
import { makeCli } from './index';

describe('player-addon CLI', () => {
  let dir: string;
  let optionsPath: string;
  let logs: string[];
  let printed: string[];
  let exitCodes: number[];
  let launch: Mock<(spec: LaunchSpec) => Promise<number>>;

  const cli = (extra: Partial<CliDeps> = {}) =>
    makeCli({
      env: {
        ADDON_OPTIONS_PATH: optionsPath,
        S6_CONTAINER_ENV_DIR: path.join(dir, 'no-contenv'),
      },
      log: (l) => logs.push(l),
      print: (t) => printed.push(t),
      setExitCode: (c) => exitCodes.push(c),
      stdout: { isTTY: false },
      launch,
      ...extra,
    });

  beforeEach(async () => {
    dir = await makeTempDir('player-cli-');
    optionsPath = path.join(dir, 'options.json');
    await writeFile(
      optionsPath,
      JSON.stringify({
        music_directory: '/media/music',
        port: 8080,
        title: 'Kitchen',
      }),
      'utf8',
    );
    logs = [];
    printed = [];
    exitCodes = [];
    launch = vi.fn(async (_spec: LaunchSpec) => 0);
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('runs the startup sequence by default', async () => {
    launch.mockResolvedValue(5);
    await cli().run([]);
    expect(stripClock(logs)).toEqual([
      'INFO: Starting local music player...',
      'INFO: Music directory: /media/music',
      'INFO: Port: 8080',
      'INFO: Title: Kitchen',
    ]);
    expect(launch).toHaveBeenCalledTimes(1);
    const spec = launch.mock.calls[0]?.[0];
    expect(spec?.command).toEqual(['python', 'music_server.py']);
    expect(spec?.env).toMatchObject({
      MUSIC_DIRECTORY: '/media/music',
      SERVER_PORT: '8080',
      APP_TITLE: 'Kitchen',
    });
    expect(exitCodes).toEqual([5]);
  });

  it('accepts a server command, working directory and options file', async () => {
    const alt = path.join(dir, 'dev.yaml');
    await writeFile(alt, 'title: Dev Box\n', 'utf8');
    await cli().run([
      'node',
      'player-addon',
      'run',
      '--options',
      alt,
      '--command',
      'node',
      'server.js',
      '--cwd',
      dir,
    ]);
    const spec = launch.mock.calls[0]?.[0];
    expect(spec?.command).toEqual(['node', 'server.js']);
    expect(spec?.cwd).toBe(path.resolve(dir));
    expect(spec?.env).toMatchObject({
      MUSIC_DIRECTORY: '',
      SERVER_PORT: '',
      APP_TITLE: 'Dev Box',
    });
    expect(exitCodes).toEqual([0]);
  });

  it('takes a server command with dashed arguments after "--"', async () => {
    await cli().run([
      'run',
      '--dry-run',
      '--',
      'python',
      '-u',
      'music_server.py',
    ]);
    expect(stripClock(logs).at(-1)).toBe(
      `NOTICE: dry run: would launch python -u music_server.py in ${process.cwd()}`,
    );

    await cli().run(['run', 'python', '-u', 'music_server.py']);
    expect(launch.mock.calls[0]?.[0].command).toEqual([
      'python',
      '-u',
      'music_server.py',
    ]);
    expect(exitCodes).toEqual([0, 0]);
  });

  it('does not launch on --dry-run', async () => {
    await cli().run(['run', '--dry-run']);
    expect(launch).not.toHaveBeenCalled();
    expect(stripClock(logs).at(-1)).toBe(
      `NOTICE: dry run: would launch python music_server.py in ${process.cwd()}`,
    );
    expect(exitCodes).toEqual([0]);
  });

  it('logs debug detail with --debug', async () => {
    await cli().run(['--debug', 'run', '--dry-run']);
    expect(stripClock(logs)).toContain(
      `DEBUG: reading options from options file ${optionsPath}`,
    );
  });

  it('prints single options with "config"', async () => {
    await cli().run(['config', 'port']);
    await cli().run(['config', 'missing', 'fallback']);
    await cli().run(['config', 'missing']);
    expect(printed).toEqual(['8080', 'fallback', '']);
    expect(logs).toEqual([]);
    expect(exitCodes).toEqual([0, 0, 0]);
  });

  it('prints shell assignments with "env"', async () => {
    await cli().run(['env']);
    expect(printed).toEqual([
      "MUSIC_DIRECTORY='/media/music'",
      "SERVER_PORT='8080'",
      "APP_TITLE='Kitchen'",
    ]);
  });

  describe('color', () => {
    const level = chalk.level;
    const ESC = '\u001b';
    const unclocked = (line: string | undefined) =>
      line?.replace(/\[\d{2}:\d{2}:\d{2}\] /, '');

    beforeEach(() => {
      chalk.level = 1;
    });

    afterEach(() => {
      chalk.level = level;
    });

    it('paints log lines on a terminal', async () => {
      await cli({ stdout: { isTTY: true } }).run(['run', '--dry-run']);
      expect(unclocked(logs[1])).toBe(
        `${ESC}[32mINFO: Music directory: /media/music${ESC}[39m`,
      );
    });

    it('writes plain lines with --boring or -b', async () => {
      await cli({ stdout: { isTTY: true } }).run([
        '--boring',
        'run',
        '--dry-run',
      ]);
      await cli({ stdout: { isTTY: true } }).run(['-b', 'run', '--dry-run']);
      const plain = stripClock(logs);
      expect(plain[1]).toBe('INFO: Music directory: /media/music');
      expect(logs.every((l) => !l.includes(ESC))).toBe(true);
    });

    it('writes plain lines when NO_COLOR is set', async () => {
      await cli({
        stdout: { isTTY: true },
        env: {
          ADDON_OPTIONS_PATH: optionsPath,
          S6_CONTAINER_ENV_DIR: path.join(dir, 'no-contenv'),
          NO_COLOR: '1',
        },
      }).run(['run', '--dry-run']);
      expect(stripClock(logs)[0]).toBe('INFO: Starting local music player...');
    });
  });

  it('reads options from the Supervisor when a token is present', async () => {
    const fetchStub: typeof fetch = async () =>
      new Response(
        JSON.stringify({ result: 'ok', data: { port: 8123 } }),
        { status: 200 },
      );
    await cli({
      env: { SUPERVISOR_TOKEN: 'test-token', S6_CONTAINER_ENV_DIR: dir },
      fetch: fetchStub,
    }).run(['config', 'port']);
    expect(printed).toEqual(['8123']);
  });

  it('reports an unreadable options file at fatal level with status 1', async () => {
    const missing = path.join(dir, 'gone.json');
    await cli({
      env: {
        ADDON_OPTIONS_PATH: missing,
        S6_CONTAINER_ENV_DIR: path.join(dir, 'no-contenv'),
      },
    }).run(['run']);
    expect(launch).not.toHaveBeenCalled();
    expect(stripClock(logs)).toEqual([
      `FATAL: options file ${missing}: not found`,
    ]);
    expect(exitCodes).toEqual([1]);
  });

  it('exits 127 when the server binary is missing', async () => {
    launch.mockRejectedValue(
      new LaunchError('python music_server.py', 'ENOENT'),
    );
    await cli().run([]);
    expect(stripClock(logs).at(-1)).toBe(
      'FATAL: failed to launch "python music_server.py" (ENOENT)',
    );
    expect(exitCodes).toEqual([127]);
  });

  it('reports invalid launcher settings', async () => {
    await cli({
      env: { ADDON_OPTIONS_PATH: optionsPath, PLAYER_KILL_GRACE_MS: '-1' },
    }).run([]);
    expect(launch).not.toHaveBeenCalled();
    expect(stripClock(logs)).toEqual([
      'FATAL: invalid launcher settings\nPLAYER_KILL_GRACE_MS: Number must be greater than or equal to 0',
    ]);
    expect(exitCodes).toEqual([1]);
  });
});

describe('normalizeArgv', () => {
  it('drops the node/player-addon prefix used in tests', () => {
    expect(normalizeArgv(['node', 'player-addon', 'env'])).toEqual(['env']);
    expect(normalizeArgv(['config', 'port'])).toEqual(['config', 'port']);
  });
});
