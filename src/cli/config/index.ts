/** src/cli/config/index.ts
 * "player-addon config <key> [default]": print one option for shell scripts.
 */
import type { Command } from 'commander';

import { createConfigAccessor } from '@/runner/options/accessor';
import { selectOptionsSource } from '@/runner/options/source';

import { type CliContext, type GlobalFlags, withRuntime } from '../context';

export function registerConfig(cli: Command, ctx: CliContext): Command {
  return cli
    .command('config')
    .description('print the value of one add-on option')
    .argument('<key>', 'option key (dotted keys reach nested options)')
    .argument('[default]', 'printed when the option is missing, null or empty')
    .option('-o, --options <file>', 'options file to read (JSON or YAML)')
    .action(
      async (
        key: string,
        defaultValue: string | undefined,
        flags: { options?: string },
      ) => {
        const globals = cli.opts<GlobalFlags>();
        await withRuntime(ctx, globals, async ({ settings }) => {
          const accessor = createConfigAccessor(
            selectOptionsSource(settings, flags.options, ctx.fetch),
          );
          ctx.print(await accessor.get(key, defaultValue));
          return 0;
        });
      },
    );
}
