/* src/test/helpers.ts
 * Shared test helpers: temp dirs, captured loggers, stub option sources.
 */
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import {
  createLogger,
  type Logger,
  type LogThreshold,
} from '@/runner/log/logger';
import type { OptionsDocument, OptionsSource } from '@/runner/options/source';

export const makeTempDir = (prefix = 'player-addon-'): Promise<string> =>
  mkdtemp(path.join(os.tmpdir(), prefix));

export const removeDir = (dir: string): Promise<void> =>
  rm(dir, { recursive: true, force: true });

/** Fixed clock: 2024-01-02 03:04:05 local time. */
export const FIXED_NOW = (): Date => new Date(2024, 0, 2, 3, 4, 5);

export const captureLogger = (
  level: LogThreshold = 'info',
): { logger: Logger; lines: string[] } => {
  const lines: string[] = [];
  const logger = createLogger({
    level,
    write: (l) => lines.push(l),
    now: FIXED_NOW,
    boring: true,
  });
  return { logger, lines };
};

/** Drop the "[HH:MM:SS] " prefix from captured log lines. */
export const stripClock = (lines: readonly string[]): string[] =>
  lines.map((l) => l.replace(/^\[\d{2}:\d{2}:\d{2}\] /, ''));

export type StubSource = OptionsSource & { loads: number };

export const stubSource = (doc: OptionsDocument): StubSource => {
  const s: StubSource = {
    description: 'stub options',
    loads: 0,
    load: async () => {
      s.loads += 1;
      return doc;
    },
  };
  return s;
};

/** Poll until a file exists and return its content. */
export const waitForFile = async (
  p: string,
  timeoutMs = 5000,
): Promise<string> => {
  const started = Date.now();
  for (;;) {
    try {
      return await readFile(p, 'utf8');
    } catch {
      if (Date.now() - started > timeoutMs) {
        throw new Error(`timed out waiting for ${p}`);
      }
      await new Promise((r) => setTimeout(r, 25));
    }
  }
};
