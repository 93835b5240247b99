/** Shared Commander helpers for the player-addon CLI.
 * DRY the exitOverride + argv normalization across the root and subcommands.
 */
import { type Command, CommanderError } from 'commander';

const isStringArray = (v: unknown): v is readonly string[] =>
  Array.isArray(v) && v.every((t) => typeof t === 'string');

/** Normalize argv from unit tests like ["node","player-addon", ...] -> [...] */
export const normalizeArgv = (argv?: readonly string[]): readonly string[] => {
  if (!isStringArray(argv)) return process.argv.slice(2);
  if (argv.length >= 2 && argv[0] === 'node' && argv[1] === 'player-addon') {
    return argv.slice(2);
  }
  return argv;
};

/** Commander exits that mean "done" rather than "failed". */
const BENIGN_EXITS = new Set<string>([
  'commander.helpDisplayed',
  'commander.help',
  'commander.version',
]);

/**
 * Make Commander throw instead of calling process.exit. Subcommands created
 * afterwards inherit the override.
 */
export const installExitOverride = (cmd: Command): void => {
  cmd.exitOverride((err) => {
    throw err;
  });
};

/**
 * Parse user-level argv and translate Commander exits into an exit code.
 * Commander has already printed its own message (unknown option, missing
 * argument, help) by the time it throws.
 */
export const parseCli = async (
  cli: Command,
  argv: readonly string[] | undefined,
  setExitCode: (code: number) => void,
): Promise<void> => {
  try {
    await cli.parseAsync(normalizeArgv(argv), { from: 'user' });
  } catch (e) {
    if (!(e instanceof CommanderError)) throw e;
    setExitCode(BENIGN_EXITS.has(e.code) ? 0 : e.exitCode);
  }
};
