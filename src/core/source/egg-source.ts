/**
 * Egg source loading
 *
 * An egg comes from an http(s) URL or a local file. GitHub `blob` page URLs
 * are rewritten to their raw content URL before fetching.
 */

import { readFile, stat } from 'node:fs/promises';
import * as path from 'node:path';
import { FetchError } from '../errors.js';
import { DEFAULT_RUNTIME_SETTINGS } from '../config/index.js';
import { getComponentLogger } from '../logging/index.js';

const logger = getComponentLogger('egg-source');

export interface EggSource {
  /** Parsed JSON document; its shape is checked by the parser */
  data: unknown;
  /** Source as given */
  source: string;
  /** URL actually fetched, or the resolved file path */
  resolvedSource: string;
}

export interface LoadEggOptions {
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

const GITHUB_HOSTS = new Set(['github.com', 'www.github.com']);

export function isUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * `https://github.com/<org>/<repo>/blob/<ref>/<path>` becomes
 * `https://raw.githubusercontent.com/<org>/<repo>/<ref>/<path>`; any other URL
 * is returned unchanged.
 */
export function githubBlobToRaw(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return url;
  }
  if (!GITHUB_HOSTS.has(parsed.hostname)) {
    return url;
  }
  const [org, repo, marker, ref, ...rest] = parsed.pathname.replace(/^\/+/, '').split('/');
  if (!org || !repo || marker !== 'blob' || !ref || rest.length === 0) {
    return url;
  }
  return `https://raw.githubusercontent.com/${org}/${repo}/${ref}/${rest.join('/')}`;
}

function parseJson(text: string, source: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw FetchError.invalidJson(source, error);
  }
}

async function loadRemote(source: string, options: LoadEggOptions): Promise<EggSource> {
  const resolved = githubBlobToRaw(source);
  const fetchImpl = options.fetchImpl ?? fetch;
  const timeoutMs = options.timeoutMs ?? DEFAULT_RUNTIME_SETTINGS.fetchTimeoutMs;

  logger.debug('Fetching egg', { source, resolved, timeoutMs });

  let response: Response;
  try {
    response = await fetchImpl(resolved, { signal: AbortSignal.timeout(timeoutMs) });
  } catch (error) {
    throw FetchError.network(resolved, error);
  }
  if (!response.ok) {
    throw FetchError.httpStatus(resolved, response.status, response.statusText);
  }

  let body: string;
  try {
    body = await response.text();
  } catch (error) {
    throw FetchError.network(resolved, error);
  }
  return { data: parseJson(body, `Response from ${resolved}`), source, resolvedSource: resolved };
}

async function loadLocal(source: string): Promise<EggSource> {
  const resolvedPath = path.resolve(process.cwd(), source);

  try {
    const stats = await stat(resolvedPath);
    if (!stats.isFile()) {
      throw FetchError.unreadable(source, new Error('not a regular file'));
    }
  } catch (error) {
    if (error instanceof FetchError) {
      throw error;
    }
    throw FetchError.fileNotFound(source);
  }

  let text: string;
  try {
    text = await readFile(resolvedPath, 'utf-8');
  } catch (error) {
    throw FetchError.unreadable(source, error);
  }
  return { data: parseJson(text, `File ${source}`), source, resolvedSource: resolvedPath };
}

/**
 * Load the egg JSON document named by `source`
 *
 * @throws {FetchError} when the document cannot be obtained or is not JSON
 */
export async function loadEggJson(source: string, options: LoadEggOptions = {}): Promise<EggSource> {
  return isUrl(source) ? loadRemote(source, options) : loadLocal(source);
}
