/* src/runner/options/accessor.ts
 * Read single options by key and render them as strings for env/stdout use.
 * No value is validated: a missing, null or empty option gives the default,
 * or the empty string.
 */
import { isPlainObject } from '@/common/config/parse';

import type { OptionsDocument, OptionsSource } from './source';

export type ConfigAccessor = {
  /** Rendered value for key (dotted keys walk nested objects). */
  get: (key: string, defaultValue?: string) => Promise<string>;
  /** True when the key is present and not null. */
  has: (key: string) => Promise<boolean>;
  readonly source: OptionsSource;
};

const lookup = (doc: OptionsDocument, key: string): unknown => {
  if (Object.prototype.hasOwnProperty.call(doc, key)) return doc[key];
  let cur: unknown = doc;
  for (const part of key.split('.')) {
    if (!isPlainObject(cur)) return undefined;
    if (!Object.prototype.hasOwnProperty.call(cur, part)) return undefined;
    cur = cur[part];
  }
  return cur;
};

/**
 * Render an option value as text.
 * - strings as-is; numbers/booleans via String()
 * - arrays one item per line (null items render empty)
 * - objects as compact JSON
 * - null/undefined =\> undefined (caller substitutes the default)
 */
export const renderOptionValue = (v: unknown): string | undefined => {
  if (v === null || v === undefined) return undefined;
  if (typeof v === 'string') return v;
  if (typeof v === 'number' || typeof v === 'boolean') return String(v);
  if (Array.isArray(v)) {
    return v.map((item: unknown) => renderOptionValue(item) ?? '').join('\n');
  }
  return JSON.stringify(v);
};

export const createConfigAccessor = (source: OptionsSource): ConfigAccessor => {
  // Loaded once per launch; every key reads the same snapshot.
  let doc: Promise<OptionsDocument> | undefined;
  const load = (): Promise<OptionsDocument> => (doc ??= source.load());

  return {
    source,
    get: async (key, defaultValue) => {
      const value = renderOptionValue(lookup(await load(), key));
      return value === undefined || value === ''
        ? (defaultValue ?? '')
        : value;
    },
    has: async (key) => {
      const value = lookup(await load(), key);
      return value !== null && value !== undefined;
    },
  };
};
