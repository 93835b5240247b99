/* src/runner/startup/index.ts
 * The add-on startup sequence:
 * container env -> options -> announce -> export -> hand over to the server.
 * Option values never short-circuit the sequence; the launch is always last.
 */
import { loadContainerEnv } from '@/runner/contenv';
import type { Logger } from '@/runner/log/logger';
import { createConfigAccessor } from '@/runner/options/accessor';
import type { OptionsSource } from '@/runner/options/source';
import type { LauncherSettings } from '@/runner/settings/schema';

import {
  formatCommand,
  launchServer,
  type LaunchOptions,
  type LaunchSpec,
} from './launch';
import {
  buildChildEnv,
  logStartup,
  renderExports,
  resolveStartupValues,
  type StartupValues,
} from './values';

export const DEFAULT_SERVER_COMMAND: readonly string[] = [
  'python',
  'music_server.py',
];

export type StartupDeps = {
  settings: LauncherSettings;
  logger: Logger;
  source: OptionsSource;
  /** Server command; defaults to DEFAULT_SERVER_COMMAND. */
  command?: readonly string[];
  cwd?: string;
  parentEnv?: NodeJS.ProcessEnv;
  /** Announce and describe the launch, but do not spawn. */
  dryRun?: boolean;
  /** Launch override (tests); defaults to launchServer. */
  launch?: (spec: LaunchSpec, opts: LaunchOptions) => Promise<number>;
};

export type StartupPlan = {
  values: StartupValues;
  spec: LaunchSpec;
};

/** Everything up to (not including) the launch. */
export const prepareStartup = async (
  deps: StartupDeps,
): Promise<StartupPlan> => {
  const { settings, logger, source } = deps;
  const containerEnv = await loadContainerEnv(settings.containerEnvDir);
  logger.trace(
    `container environment: ${Object.keys(containerEnv).length} entries from ` +
      settings.containerEnvDir,
  );
  logger.debug(`reading options from ${source.description}`);
  const values = await resolveStartupValues(createConfigAccessor(source));
  logStartup(logger, values);
  const env = buildChildEnv(
    deps.parentEnv ?? process.env,
    containerEnv,
    values,
  );
  return {
    values,
    spec: {
      command: deps.command ?? DEFAULT_SERVER_COMMAND,
      cwd: deps.cwd ?? process.cwd(),
      env,
      killGraceMs: settings.killGraceMs,
    },
  };
};

/**
 * Run the startup sequence and supervise the server.
 *
 * @returns The server's exit status (0 for a dry run).
 */
export const startAddon = async (deps: StartupDeps): Promise<number> => {
  const { logger } = deps;
  const { values, spec } = await prepareStartup(deps);
  if (deps.dryRun) {
    for (const line of renderExports(values)) logger.notice(`export ${line}`);
    logger.notice(
      `dry run: would launch ${formatCommand(spec.command)} in ${spec.cwd}`,
    );
    return 0;
  }
  const launch = deps.launch ?? launchServer;
  return launch(spec, { logger });
};

export type { LaunchOptions, LaunchSpec } from './launch';
export type { StartupValues } from './values';
