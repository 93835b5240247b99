/* src/runner/log/logger.ts
 * Leveled add-on logger. Lines look like "[14:03:05] INFO: message" and go to
 * stdout, which the host collects as the add-on log.
 */
import {
  alert,
  dim,
  error,
  fatal,
  isBoring,
  ok,
  warn,
} from '@/runner/util/color';

export const LOG_LEVELS = [
  'trace',
  'debug',
  'info',
  'notice',
  'warning',
  'error',
  'fatal',
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Minimum level to emit; "off" silences the logger. */
export type LogThreshold = LogLevel | 'off';

export type Logger = {
  readonly level: LogThreshold;
} & Record<LogLevel, (message: string) => void>;

export type LoggerOptions = {
  level?: LogThreshold;
  /** Line sink, without trailing newline (defaults to stdout). */
  write?: (line: string) => void;
  /** Clock used for the timestamp prefix. */
  now?: () => Date;
  /** Force plain output; defaults to the stdout TTY/env check. */
  boring?: boolean;
};

const PAINT: Record<LogLevel, (s: string) => string> = {
  trace: dim,
  debug: dim,
  info: ok,
  notice: alert,
  warning: warn,
  error: error,
  fatal: fatal,
};

/**
 * Parse a level name as accepted in LOG_LEVEL and the add-on options.
 * "all" is an alias of trace, "warn" of warning.
 *
 * @returns The threshold, or undefined for unknown input.
 */
export const parseLogLevel = (
  raw: string | undefined,
): LogThreshold | undefined => {
  if (typeof raw !== 'string') return undefined;
  const v = raw.trim().toLowerCase();
  if (v === 'all') return 'trace';
  if (v === 'warn') return 'warning';
  if (v === 'off') return 'off';
  return LOG_LEVELS.find((l) => l === v);
};

const rank = (level: LogThreshold): number =>
  level === 'off' ? LOG_LEVELS.length : LOG_LEVELS.indexOf(level);

/** The more verbose of two thresholds. */
export const moreVerbose = (a: LogThreshold, b: LogThreshold): LogThreshold =>
  rank(a) <= rank(b) ? a : b;

/** HH:MM:SS in local time. */
export const formatClock = (d: Date): string => {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
};

export const createLogger = (opts: LoggerOptions = {}): Logger => {
  const level = opts.level ?? 'info';
  const write =
    opts.write ?? ((line: string) => void process.stdout.write(`${line}\n`));
  const now = opts.now ?? (() => new Date());
  const boring = opts.boring ?? isBoring();

  const emit = (l: LogLevel, message: string): void => {
    if (rank(l) < rank(level)) return;
    const line = `[${formatClock(now())}] ${l.toUpperCase()}: ${message}`;
    write(boring ? line : PAINT[l](line));
  };

  return {
    level,
    trace: (m) => emit('trace', m),
    debug: (m) => emit('debug', m),
    info: (m) => emit('info', m),
    notice: (m) => emit('notice', m),
    warning: (m) => emit('warning', m),
    error: (m) => emit('error', m),
    fatal: (m) => emit('fatal', m),
  };
};

/** Logger that drops everything (tests). */
export const createNoOpLogger = (): Logger => createLogger({ level: 'off' });
