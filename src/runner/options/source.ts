/* src/runner/options/source.ts
 * Where the add-on options come from: the Supervisor API when the add-on has a
 * token, otherwise the options file the Supervisor writes into /data.
 */
import { readFile } from 'node:fs/promises';

import { z } from 'zod';

import { isPlainObject, parseOptionsText } from '@/common/config/parse';
import { getErrorMessage, OptionsSourceError } from '@/runner/errors';
import type { LauncherSettings } from '@/runner/settings/schema';

export type OptionsDocument = Record<string, unknown>;

export interface OptionsSource {
  /** Short label used in logs and errors. */
  readonly description: string;
  load(): Promise<OptionsDocument>;
}

export class FileOptionsSource implements OptionsSource {
  readonly description: string;

  constructor(readonly path: string) {
    this.description = `options file ${path}`;
  }

  async load(): Promise<OptionsDocument> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf8');
    } catch (e) {
      const code =
        e instanceof Error && 'code' in e && typeof e.code === 'string'
          ? e.code
          : undefined;
      throw new OptionsSourceError(
        this.description,
        code === 'ENOENT' ? 'not found' : getErrorMessage(e),
        { cause: e },
      );
    }
    let doc: unknown;
    try {
      doc = parseOptionsText(this.path, text);
    } catch (e) {
      throw new OptionsSourceError(
        this.description,
        `unparsable: ${getErrorMessage(e)}`,
        { cause: e },
      );
    }
    // An empty YAML file parses to null; treat it as "no options set".
    if (doc === null || doc === undefined) return {};
    if (!isPlainObject(doc)) {
      throw new OptionsSourceError(
        this.description,
        'expected an object of options',
      );
    }
    return doc;
  }
}

const supervisorEnvelope = z.object({
  result: z.string(),
  message: z.string().optional(),
  data: z.record(z.unknown()).optional(),
});

export type SupervisorOptionsSourceInit = {
  baseUrl: string;
  token: string;
  fetch?: typeof fetch;
};

export class SupervisorOptionsSource implements OptionsSource {
  readonly description: string;
  private readonly url: string;
  private readonly token: string;
  private readonly fetchImpl: typeof fetch;

  constructor(init: SupervisorOptionsSourceInit) {
    this.url = `${init.baseUrl.replace(/\/+$/, '')}/addons/self/options/config`;
    this.token = init.token;
    this.fetchImpl = init.fetch ?? globalThis.fetch;
    this.description = `supervisor ${this.url}`;
  }

  async load(): Promise<OptionsDocument> {
    let res: Response;
    try {
      res = await this.fetchImpl(this.url, {
        headers: {
          Authorization: `Bearer ${this.token}`,
          Accept: 'application/json',
        },
      });
    } catch (e) {
      throw new OptionsSourceError(this.description, getErrorMessage(e), {
        cause: e,
      });
    }
    if (!res.ok) {
      throw new OptionsSourceError(
        this.description,
        `HTTP ${res.status} ${res.statusText}`.trim(),
      );
    }
    let body: unknown;
    try {
      body = await res.json();
    } catch (e) {
      throw new OptionsSourceError(
        this.description,
        `invalid JSON: ${getErrorMessage(e)}`,
        { cause: e },
      );
    }
    const parsed = supervisorEnvelope.safeParse(body);
    if (!parsed.success) {
      throw new OptionsSourceError(this.description, 'unexpected response');
    }
    const { result, message, data } = parsed.data;
    if (result !== 'ok') {
      throw new OptionsSourceError(
        this.description,
        `${result}${message ? `: ${message}` : ''}`,
      );
    }
    if (!data) {
      throw new OptionsSourceError(this.description, 'response has no data');
    }
    return data;
  }
}

/**
 * Pick the options source:
 * explicit file \> Supervisor API (token present) \> default options file.
 */
export const selectOptionsSource = (
  settings: LauncherSettings,
  explicitPath?: string,
  fetchImpl?: typeof fetch,
): OptionsSource => {
  if (explicitPath) return new FileOptionsSource(explicitPath);
  if (settings.supervisorToken) {
    return new SupervisorOptionsSource({
      baseUrl: settings.supervisorApi,
      token: settings.supervisorToken,
      fetch: fetchImpl,
    });
  }
  return new FileOptionsSource(settings.optionsPath);
};
