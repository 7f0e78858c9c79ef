/**
 * Runtime settings read from the environment
 */

import { type } from 'arktype';
import { formatArktypeErrors, ValidationError } from '../errors.js';

export interface RuntimeSettings {
  /** Interface the HTTP facade binds to */
  apiHost: string;
  apiPort: number;
  /** Timeout applied to remote egg downloads */
  fetchTimeoutMs: number;
}

export const DEFAULT_RUNTIME_SETTINGS: Readonly<RuntimeSettings> = Object.freeze({
  apiHost: '0.0.0.0',
  apiPort: 8000,
  fetchTimeoutMs: 20_000,
});

const runtimeSettingsSchema = type({
  apiHost: 'string > 0',
  apiPort: '1 <= number.integer <= 65535',
  fetchTimeoutMs: 'number.integer > 0',
});

function numberFromEnv(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  return Number(value.trim());
}

/**
 * Build runtime settings from environment variables.
 *
 * - `KUBEEGG_API_HOST`
 * - `KUBEEGG_API_PORT`
 * - `KUBEEGG_FETCH_TIMEOUT_MS`
 *
 * @throws {ValidationError} when a variable is set to an unusable value
 */
export function getRuntimeSettings(env: NodeJS.ProcessEnv = process.env): RuntimeSettings {
  const candidate = {
    apiHost: env.KUBEEGG_API_HOST?.trim() || DEFAULT_RUNTIME_SETTINGS.apiHost,
    apiPort: numberFromEnv(env.KUBEEGG_API_PORT, DEFAULT_RUNTIME_SETTINGS.apiPort),
    fetchTimeoutMs: numberFromEnv(env.KUBEEGG_FETCH_TIMEOUT_MS, DEFAULT_RUNTIME_SETTINGS.fetchTimeoutMs),
  };

  const result = runtimeSettingsSchema(candidate);
  if (result instanceof type.errors) {
    throw ValidationError.fromProblems('runtime settings', formatArktypeErrors(result));
  }
  return result;
}
