/* src/runner/startup/launch.ts
 * Run the server as a supervised child and stand in for it: signals are
 * relayed, and the launcher ends with the child's status.
 */
import { spawn } from 'node:child_process';
import { constants } from 'node:os';

import treeKill from 'tree-kill';

import { LaunchError } from '@/runner/errors';
import type { Logger } from '@/runner/log/logger';

import {
  attachSignalForwarding,
  FORWARDED_SIGNALS,
  type SignalTarget,
} from './signals';

export type LaunchSpec = {
  /** Executable and arguments, e.g. ["python", "music_server.py"]. */
  command: readonly string[];
  cwd: string;
  env: NodeJS.ProcessEnv;
  /** Grace after the first relayed signal before SIGKILL; 0 disables it. */
  killGraceMs: number;
};

export type KillTree = (pid: number, signal: NodeJS.Signals) => Promise<void>;

export type LaunchOptions = {
  logger: Logger;
  signals?: readonly NodeJS.Signals[];
  signalTarget?: SignalTarget;
  killTree?: KillTree;
};

const treeKillAsync: KillTree = (pid, signal) =>
  new Promise<void>((resolveP, rejectP) => {
    treeKill(pid, signal, (err) => (err ? rejectP(err) : resolveP()));
  });

/** Shell-style status: exit code, or 128 + signal number. */
export const toExitStatus = (
  code: number | null,
  signal: NodeJS.Signals | null,
): number => {
  if (typeof code === 'number') return code;
  const num = signal
    ? Object.entries(constants.signals).find(([name]) => name === signal)?.[1]
    : undefined;
  return typeof num === 'number' ? 128 + num : 1;
};

export const formatCommand = (command: readonly string[]): string =>
  command.join(' ');

/**
 * Spawn the server with inherited stdio and wait for it to exit.
 *
 * @returns The child's exit status.
 * @throws LaunchError when the process cannot be spawned.
 */
export const launchServer = (
  spec: LaunchSpec,
  opts: LaunchOptions,
): Promise<number> => {
  const { logger } = opts;
  const killTree = opts.killTree ?? treeKillAsync;
  const [file, ...args] = spec.command;
  if (file === undefined || file.length === 0) {
    return Promise.reject(new LaunchError('(empty command)', undefined));
  }
  const label = formatCommand(spec.command);

  return new Promise<number>((resolveP, rejectP) => {
    let settled = false;
    let killTimer: NodeJS.Timeout | undefined;

    const child = spawn(file, args, {
      cwd: spec.cwd,
      env: spec.env,
      stdio: 'inherit',
      windowsHide: true,
    });
    logger.debug(`launched ${label} (pid ${child.pid ?? '?'})`);

    const escalate = (): void => {
      const pid = child.pid;
      if (typeof pid !== 'number') return;
      if (child.exitCode !== null || child.signalCode !== null) return;
      logger.warning(
        `${label} still running ${spec.killGraceMs}ms after signal; sending SIGKILL`,
      );
      void killTree(pid, 'SIGKILL').catch((e: unknown) => {
        logger.debug(`tree kill failed (${String(e)}); killing child only`);
        child.kill('SIGKILL');
      });
    };

    const detach = attachSignalForwarding(
      (signal) => {
        logger.debug(`relaying ${signal} to ${label}`);
        child.kill(signal);
        if (!killTimer && spec.killGraceMs > 0) {
          killTimer = setTimeout(escalate, spec.killGraceMs);
        }
      },
      opts.signals ?? FORWARDED_SIGNALS,
      opts.signalTarget,
    );

    const finish = (): void => {
      settled = true;
      detach();
      if (killTimer) clearTimeout(killTimer);
    };

    child.once('error', (err: NodeJS.ErrnoException) => {
      if (settled) return;
      finish();
      rejectP(new LaunchError(label, err.code, { cause: err }));
    });
    child.once('exit', (code, signal) => {
      if (settled) return;
      finish();
      const status = toExitStatus(code, signal);
      logger.debug(`${label} exited with status ${status}`);
      resolveP(status);
    });
  });
};
