/* src/runner/contenv/index.ts
 * Container environment as s6-overlay stores it: one file per variable under
 * /var/run/s6/container_environment, file name = name, content = value.
 */
import type { Dirent } from 'node:fs';
import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';

/** Variable name -> value; null means the variable is unset for the child. */
export type ContainerEnv = Record<string, string | null>;

const isMissing = (e: unknown): boolean =>
  e instanceof Error &&
  'code' in e &&
  (e.code === 'ENOENT' || e.code === 'ENOTDIR');

/**
 * Load the container environment from dir, the way s6-envdir reads it in
 * verbatim mode:
 * - content is kept as is, with NUL bytes turned into newlines;
 * - an empty file unsets the variable (null);
 * - dot-files and names containing "=" are skipped.
 *
 * A missing directory yields an empty environment.
 */
export const loadContainerEnv = async (dir: string): Promise<ContainerEnv> => {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (e) {
    if (isMissing(e)) return {};
    throw e;
  }
  const names = entries
    .filter(
      (d) => d.isFile() && !d.name.startsWith('.') && !d.name.includes('='),
    )
    .map((d) => d.name)
    .sort();
  const out: ContainerEnv = {};
  for (const name of names) {
    const raw = await readFile(path.join(dir, name), 'utf8');
    out[name] = raw.length === 0 ? null : raw.replace(/\0/g, '\n');
  }
  return out;
};
