// src/common/config/parse.ts
import YAML from 'yaml';

/**
 * Parse an options document by file extension: JSON for ".json" (what the
 * Supervisor writes to /data/options.json), YAML for anything else so a
 * hand-written options.yaml works during local development.
 */
export const parseOptionsText = (p: string, text: string): unknown =>
  p.toLowerCase().endsWith('.json')
    ? (JSON.parse(text) as unknown)
    : (YAML.parse(text) as unknown);

export const isPlainObject = (v: unknown): v is Record<string, unknown> =>
  typeof v === 'object' && v !== null && !Array.isArray(v);
