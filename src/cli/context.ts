/* src/cli/context.ts
 * Per-invocation runtime for CLI actions: settings, logger, failure reporting.
 */
import { getErrorMessage, LaunchError } from '@/runner/errors';
import { createLogger, type Logger, moreVerbose } from '@/runner/log/logger';
import type { StartupDeps } from '@/runner/startup';
import { loadSettings } from '@/runner/settings/load';
import type { LauncherSettings } from '@/runner/settings/schema';
import { type ColorStream, isBoring } from '@/runner/util/color';

/** Injection points for makeCli (tests substitute sinks and the launcher). */
export type CliDeps = {
  env?: NodeJS.ProcessEnv;
  /** Log line sink; defaults to stdout. */
  log?: (line: string) => void;
  /** Plain command output (config/env); defaults to stdout. */
  print?: (text: string) => void;
  setExitCode?: (code: number) => void;
  /** Stream checked for TTY color support; defaults to stdout. */
  stdout?: ColorStream;
  fetch?: typeof fetch;
  launch?: StartupDeps['launch'];
};

export type CliContext = {
  env: NodeJS.ProcessEnv;
  log?: (line: string) => void;
  print: (text: string) => void;
  setExitCode: (code: number) => void;
  stdout: ColorStream;
  fetch?: typeof fetch;
  launch?: StartupDeps['launch'];
};

export type GlobalFlags = { debug?: boolean; boring?: boolean };

export type Runtime = { settings: LauncherSettings; logger: Logger };

export const toContext = (deps: CliDeps = {}): CliContext => ({
  env: deps.env ?? process.env,
  log: deps.log,
  print:
    deps.print ?? ((text: string) => void process.stdout.write(`${text}\n`)),
  setExitCode:
    deps.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    }),
  stdout: deps.stdout ?? process.stdout,
  fetch: deps.fetch,
  launch: deps.launch,
});

const makeLogger = (
  ctx: CliContext,
  flags: GlobalFlags,
  level: LauncherSettings['logLevel'],
): Logger =>
  createLogger({
    level: flags.debug ? moreVerbose(level, 'debug') : level,
    write: ctx.log,
    boring: Boolean(flags.boring) || isBoring(ctx.stdout, ctx.env),
  });

/** Exit status for a failed run: 127 for a missing server binary, as in sh. */
export const failureStatus = (e: unknown): number =>
  e instanceof LaunchError && e.code === 'ENOENT' ? 127 : 1;

/**
 * Build the runtime and run fn; any failure is logged once at fatal level and
 * turned into an exit code.
 */
export const withRuntime = async (
  ctx: CliContext,
  flags: GlobalFlags,
  fn: (rt: Runtime) => Promise<number>,
): Promise<void> => {
  let logger = makeLogger(ctx, flags, 'info');
  try {
    const settings = loadSettings(ctx.env);
    logger = makeLogger(ctx, flags, settings.logLevel);
    ctx.setExitCode(await fn({ settings, logger }));
  } catch (e) {
    logger.fatal(getErrorMessage(e));
    ctx.setExitCode(failureStatus(e));
  }
};
