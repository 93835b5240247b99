/* REQUIREMENTS (current):
 * - Export makeCli(): root CLI factory for "player-addon".
 * - Register subcommands: run (default), config, env.
 * - Global -d/--debug and -b/--boring, given before the subcommand.
 * - run takes the server command after "--" (or via --command).
 * - Never call process.exit; Commander exits become exit codes (see parseCli).
 */
import { Command } from 'commander';

import { installExitOverride, parseCli } from './cli-utils';
import { registerConfig } from './config';
import { type CliDeps, toContext } from './context';
import { registerEnv } from './env';
import { registerRun } from './run';

export type PlayerCli = {
  command: Command;
  /** Parse argv (user-level or ["node","player-addon",...]) and run it. */
  run: (argv?: readonly string[]) => Promise<void>;
};

/**
 * Build the root CLI without side effects (safe for tests).
 *
 * @param deps - Optional sinks, environment and launcher overrides.
 */
export const makeCli = (deps: CliDeps = {}): PlayerCli => {
  const ctx = toContext(deps);
  const cli = new Command();

  cli
    .name('player-addon')
    .description(
      'Start the local music player add-on: read its options, export them and run the music server.',
    )
    .option('-d, --debug', 'enable debug logging')
    .option('-b, --boring', 'disable all color and styling')
    // Global flags go before the subcommand; run passes the rest to the server.
    .enablePositionalOptions();

  // Before subcommands so they inherit it.
  installExitOverride(cli);

  registerRun(cli, ctx);
  registerConfig(cli, ctx);
  registerEnv(cli, ctx);

  return {
    command: cli,
    run: (argv) => parseCli(cli, argv, ctx.setExitCode),
  };
};
