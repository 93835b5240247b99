/* src/runner/errors.ts
 * Error types raised by the launcher. The CLI reports them once at fatal level.
 */

/** The add-on options could not be read (file, Supervisor or bad shape). */
export class OptionsSourceError extends Error {
  override readonly name = 'OptionsSourceError';
  constructor(
    readonly source: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${source}: ${message}`, options);
  }
}

/** Launcher settings from the environment failed validation. */
export class SettingsError extends Error {
  override readonly name = 'SettingsError';
}

/** The server process could not be spawned. */
export class LaunchError extends Error {
  override readonly name = 'LaunchError';
  constructor(
    readonly command: string,
    /** errno code from spawn (e.g. ENOENT), when available. */
    readonly code: string | undefined,
    options?: { cause?: unknown },
  ) {
    super(
      `failed to launch "${command}"${code ? ` (${code})` : ''}`,
      options,
    );
  }
}

export const getErrorMessage = (e: unknown): string =>
  e instanceof Error ? e.message : String(e);
