/* src/runner/settings/load.ts
 * Resolve launcher settings from an environment block.
 */
import { ZodError } from 'zod';

import { SettingsError } from '@/runner/errors';

import { type LauncherSettings, settingsSchema } from './schema';

/** Settings field -> environment variable it is read from. */
export const SETTINGS_ENV_VARS = {
  supervisorToken: 'SUPERVISOR_TOKEN',
  supervisorApi: 'SUPERVISOR_API',
  optionsPath: 'ADDON_OPTIONS_PATH',
  containerEnvDir: 'S6_CONTAINER_ENV_DIR',
  logLevel: 'LOG_LEVEL',
  killGraceMs: 'PLAYER_KILL_GRACE_MS',
} as const;

const label = (key: string | number): string =>
  Object.entries(SETTINGS_ENV_VARS).find(([k]) => k === key)?.[1] ??
  String(key);

const formatZodError = (e: unknown): string =>
  e instanceof ZodError
    ? e.issues
        .map((i) => {
          const head = i.path[0];
          return `${head === undefined ? '(root)' : label(head)}: ${i.message}`;
        })
        .join('\n')
    : String(e);

/** Empty variables count as unset (docker/compose often pass VAR=). */
const pick = (env: NodeJS.ProcessEnv, name: string): string | undefined => {
  const v = env[name];
  return typeof v === 'string' && v.length > 0 ? v : undefined;
};

/**
 * Read and validate launcher settings.
 *
 * @throws SettingsError listing each failing variable.
 */
export const loadSettings = (
  env: NodeJS.ProcessEnv = process.env,
): LauncherSettings => {
  const raw = {
    supervisorToken: pick(env, SETTINGS_ENV_VARS.supervisorToken),
    supervisorApi: pick(env, SETTINGS_ENV_VARS.supervisorApi),
    optionsPath: pick(env, SETTINGS_ENV_VARS.optionsPath),
    containerEnvDir: pick(env, SETTINGS_ENV_VARS.containerEnvDir),
    logLevel: pick(env, SETTINGS_ENV_VARS.logLevel),
    killGraceMs: pick(env, SETTINGS_ENV_VARS.killGraceMs),
  };
  const parsed = settingsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SettingsError(
      `invalid launcher settings\n${formatZodError(parsed.error)}`,
    );
  }
  return parsed.data;
};
