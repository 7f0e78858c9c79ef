import { RESERVED_ENV_KEYS } from '../render/index.js';
import type { EnvSelection } from '../types/index.js';
import { STARTUP_BUILTIN_VARS, extractStartupVars, isValidPort, sortPorts } from '../../utils/index.js';

/** Always stored in the Secret */
export const FORCE_SECRET_VARS: ReadonlySet<string> = new Set(['FTP_USERNAME', 'FTP_PASSWORD']);

const SENSITIVE_TOKENS = ['PASS', 'SECRET', 'TOKEN', 'KEY'] as const;

export function isForcedSecret(key: string): boolean {
  return FORCE_SECRET_VARS.has(key.toUpperCase());
}

/**
 * Suggested sensitivity for a variable, from its name alone
 */
export function isSensitiveDefault(key: string): boolean {
  const upper = key.toUpperCase();
  return SENSITIVE_TOKENS.some((token) => upper.includes(token));
}

export interface EnvPorts {
  ports: number[];
  /** First env key that declared each port */
  names: Map<number, string>;
}

/**
 * Ports declared by env vars whose key contains `_PORT` or is `PORT`
 */
export function portsFromEnv(env: readonly EnvSelection[]): EnvPorts {
  const names = new Map<number, string>();
  for (const item of env) {
    const key = item.key.toUpperCase();
    if (!key.includes('_PORT') && key !== 'PORT') continue;

    const value = item.value.trim();
    if (!/^\d+$/.test(value)) continue;

    const port = Number.parseInt(value, 10);
    if (isValidPort(port) && !names.has(port)) {
      names.set(port, item.key);
    }
  }
  return { ports: sortPorts(names.keys()), names };
}

/**
 * Startup placeholders with no configured variable, sorted; built-in and
 * reserved names are never reported
 */
export function missingStartupVars(startup: string, env: readonly EnvSelection[]): string[] {
  const configured = new Set(env.map((item) => item.key));
  return [...extractStartupVars(startup)]
    .filter(
      (name) => !configured.has(name) && !STARTUP_BUILTIN_VARS.has(name) && !RESERVED_ENV_KEYS.has(name)
    )
    .sort();
}
