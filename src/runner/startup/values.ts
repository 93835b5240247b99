/* src/runner/startup/values.ts
 * The three player options, how they are announced and how they reach the
 * server's environment.
 */
import type { ContainerEnv } from '@/runner/contenv';
import type { Logger } from '@/runner/log/logger';
import type { ConfigAccessor } from '@/runner/options/accessor';

export type StartupValues = {
  musicDirectory: string;
  port: string;
  title: string;
};

export type ExportName = 'MUSIC_DIRECTORY' | 'SERVER_PORT' | 'APP_TITLE';

type OptionBinding = {
  option: string;
  field: keyof StartupValues;
  env: ExportName;
  label: string;
};

/** Option key -> exported variable, in announcement order. */
export const OPTION_ENV_MAP = [
  {
    option: 'music_directory',
    field: 'musicDirectory',
    env: 'MUSIC_DIRECTORY',
    label: 'Music directory',
  },
  { option: 'port', field: 'port', env: 'SERVER_PORT', label: 'Port' },
  { option: 'title', field: 'title', env: 'APP_TITLE', label: 'Title' },
] as const satisfies readonly OptionBinding[];

export const STARTUP_BANNER = 'Starting local music player...';

/** Read the three options in map order; values pass through unvalidated. */
export const resolveStartupValues = async (
  accessor: ConfigAccessor,
): Promise<StartupValues> => {
  const values: StartupValues = { musicDirectory: '', port: '', title: '' };
  for (const b of OPTION_ENV_MAP) {
    values[b.field] = await accessor.get(b.option);
  }
  return values;
};

export const logStartup = (logger: Logger, values: StartupValues): void => {
  logger.info(STARTUP_BANNER);
  for (const b of OPTION_ENV_MAP) logger.info(`${b.label}: ${values[b.field]}`);
};

export const toExports = (
  values: StartupValues,
): Record<ExportName, string> => {
  const out: Record<ExportName, string> = {
    MUSIC_DIRECTORY: '',
    SERVER_PORT: '',
    APP_TITLE: '',
  };
  for (const b of OPTION_ENV_MAP) out[b.env] = values[b.field];
  return out;
};

/**
 * Child environment: parent, then the container environment over it (unset
 * entries remove the variable), then the option exports over both.
 */
export const buildChildEnv = (
  parentEnv: NodeJS.ProcessEnv,
  containerEnv: ContainerEnv,
  values: StartupValues,
): NodeJS.ProcessEnv => {
  const env: NodeJS.ProcessEnv = { ...parentEnv };
  for (const [name, value] of Object.entries(containerEnv)) {
    if (value === null) delete env[name];
    else env[name] = value;
  }
  return { ...env, ...toExports(values) };
};

/** Quote a value for a POSIX shell (single quotes, ' escaped). */
export const shellQuote = (v: string): string =>
  `'${v.replace(/'/g, `'\\''`)}'`;

/** NAME='value' lines, one per export, for `eval` in a shell. */
export const renderExports = (values: StartupValues): string[] => {
  const exportsMap = toExports(values);
  return OPTION_ENV_MAP.map((b) => `${b.env}=${shellQuote(exportsMap[b.env])}`);
};
