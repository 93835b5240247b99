/** src/cli/env/index.ts
 * "player-addon env": print the server exports as shell assignments.
 */
import type { Command } from 'commander';

import { createConfigAccessor } from '@/runner/options/accessor';
import { selectOptionsSource } from '@/runner/options/source';
import { renderExports, resolveStartupValues } from '@/runner/startup/values';

import { type CliContext, type GlobalFlags, withRuntime } from '../context';

export function registerEnv(cli: Command, ctx: CliContext): Command {
  return cli
    .command('env')
    .description(
      'print MUSIC_DIRECTORY, SERVER_PORT and APP_TITLE as shell assignments',
    )
    .option('-o, --options <file>', 'options file to read (JSON or YAML)')
    .action(async (flags: { options?: string }) => {
      const globals = cli.opts<GlobalFlags>();
      await withRuntime(ctx, globals, async ({ settings }) => {
        const values = await resolveStartupValues(
          createConfigAccessor(
            selectOptionsSource(settings, flags.options, ctx.fetch),
          ),
        );
        for (const line of renderExports(values)) ctx.print(line);
        return 0;
      });
    });
}
