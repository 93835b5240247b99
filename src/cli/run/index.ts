/** src/cli/run/index.ts
 * "player-addon run" (also the default command): start the add-on.
 */
import path from 'node:path';

import type { Command } from 'commander';

import { selectOptionsSource } from '@/runner/options/source';
import { DEFAULT_SERVER_COMMAND, startAddon } from '@/runner/startup';

import { type CliContext, type GlobalFlags, withRuntime } from '../context';

type RunFlags = {
  options?: string;
  cwd?: string;
  command?: string[];
  dryRun?: boolean;
};

/** Trailing server words win over --command; neither means the default. */
const pickCommand = (
  server: string[],
  option: string[] | undefined,
): string[] | undefined => {
  if (server.length > 0) return server;
  return option?.length ? option : undefined;
};

export function registerRun(cli: Command, ctx: CliContext): Command {
  return cli
    .command('run', { isDefault: true })
    .description(
      'read the add-on options, export them and hand over to the music server',
    )
    .option('-o, --options <file>', 'options file to read (JSON or YAML)')
    .argument('[server...]', 'server command and its arguments, after "--"')
    .option('-C, --cwd <dir>', 'working directory for the server')
    .option(
      '-c, --command <cmd...>',
      `server command (default: ${DEFAULT_SERVER_COMMAND.join(' ')}); ` +
        'when an argument starts with "-", give the command after "--" instead',
    )
    .option('-n, --dry-run', 'announce and show the launch without starting it')
    // Everything after the first server word belongs to the server.
    .passThroughOptions()
    .action(async (server: string[], flags: RunFlags) => {
      const globals = cli.opts<GlobalFlags>();
      await withRuntime(ctx, globals, ({ settings, logger }) =>
        startAddon({
          settings,
          logger,
          source: selectOptionsSource(settings, flags.options, ctx.fetch),
          command: pickCommand(server, flags.command),
          cwd: flags.cwd ? path.resolve(flags.cwd) : undefined,
          parentEnv: ctx.env,
          dryRun: Boolean(flags.dryRun),
          launch: ctx.launch,
        }),
      );
    });
}
