/* src/runner/settings/schema.ts
 * Zod schema for the launcher's own settings (read from the environment).
 */
import { z } from 'zod';

import { type LogThreshold, parseLogLevel } from '@/runner/log/logger';

export const DEFAULT_SUPERVISOR_API = 'http://supervisor';
export const DEFAULT_OPTIONS_PATH = '/data/options.json';
export const DEFAULT_CONTAINER_ENV_DIR = '/var/run/s6/container_environment';
export const DEFAULT_KILL_GRACE_MS = 10_000;

export const settingsSchema = z.object({
  supervisorToken: z.string().min(1).optional(),
  supervisorApi: z.string().url().default(DEFAULT_SUPERVISOR_API),
  optionsPath: z.string().min(1).default(DEFAULT_OPTIONS_PATH),
  containerEnvDir: z.string().min(1).default(DEFAULT_CONTAINER_ENV_DIR),
  logLevel: z
    .string()
    .optional()
    .transform((v): LogThreshold => parseLogLevel(v) ?? 'info'),
  /** 0 disables SIGKILL escalation. */
  killGraceMs: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(DEFAULT_KILL_GRACE_MS),
});

export type LauncherSettings = z.output<typeof settingsSchema>;
