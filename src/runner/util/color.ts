/* src/runner/util/color.ts
 * Meaning-based color helpers that respect PLAYER_BORING/NO_COLOR/FORCE_COLOR.
 * BORING or non‑TTY => return unstyled strings.
 */
import chalk from 'chalk';

/** Output stream as far as color detection cares. */
export type ColorStream = { isTTY?: boolean };

export function isBoring(
  stream: ColorStream = process.stdout,
  env: NodeJS.ProcessEnv = process.env,
): boolean {
  if (env.PLAYER_BORING === '1' || env.NO_COLOR === '1') return true;
  if (env.FORCE_COLOR === '0') return true;
  // Any other FORCE_COLOR value forces color, even off a TTY.
  if (env.FORCE_COLOR !== undefined && env.FORCE_COLOR !== '') return false;
  // Compute TTY dynamically so tests and callers can toggle isTTY/env reliably.
  return !stream.isTTY;
}

/** Semantic aliases (callers decide boring vs styled via isBoring). */
export const ok = (s: string): string => chalk.green(s);
export const alert = (s: string): string => chalk.cyan(s);
export const warn = (s: string): string => chalk.yellow(s);
export const error = (s: string): string => chalk.magenta(s);
export const fatal = (s: string): string => chalk.red(s);
export const dim = (s: string): string => chalk.gray(s);
