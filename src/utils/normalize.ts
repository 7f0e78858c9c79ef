/**
 * Name sanitizers
 *
 * Free-form text from eggs and operators becomes Kubernetes resource names,
 * port names and environment-variable identifiers here. Every function is
 * idempotent: feeding an output back in returns it unchanged.
 */

export const MAX_RESOURCE_NAME_LENGTH = 63;

const RESOURCE_NAME_INVALID = /[^a-z0-9-]+/g;
const ENV_VAR_INVALID = /[^A-Z0-9_]+/g;

/**
 * Lowercase DNS-label style name: `[a-z0-9-]`, alphanumeric at both ends,
 * at most `maxLength` characters. Falls back to `app`.
 */
export function normalizeResourceName(
  value: string,
  maxLength: number = MAX_RESOURCE_NAME_LENGTH
): string {
  let name = value
    .trim()
    .toLowerCase()
    .replace(RESOURCE_NAME_INVALID, '-')
    .replace(/-+/g, '-')
    .replace(/^-+|-+$/g, '');

  if (!name) {
    return 'app';
  }
  if (name.length > maxLength) {
    name = name.slice(0, maxLength).replace(/-+$/, '');
  }
  if (!name) {
    return 'app';
  }
  if (!/^[a-z0-9]/.test(name)) {
    name = `a-${name}`;
  }
  return name;
}

/**
 * Resource name that additionally never starts with a digit, as required for
 * named container and service ports.
 */
export function normalizePortName(value: string): string {
  const name = normalizeResourceName(value);
  if (/^[0-9]/.test(name)) {
    return normalizeResourceName(`p-${name}`);
  }
  return name;
}

/**
 * Uppercase shell identifier: `[A-Z0-9_]`, never leading with a digit.
 * Falls back to `VAR`.
 */
export function normalizeEnvVar(value: string): string {
  const name = value
    .trim()
    .toUpperCase()
    .replace(ENV_VAR_INVALID, '_')
    .replace(/_+/g, '_')
    .replace(/^_+|_+$/g, '');

  if (!name) {
    return 'VAR';
  }
  if (/^[0-9]/.test(name)) {
    return `VAR_${name}`;
  }
  return name;
}

export const RESOURCE_NAME_PATTERN = /^[a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?$/;
export const ENV_VAR_PATTERN = /^[A-Z_][A-Z0-9_]*$/;

export function isValidResourceName(value: string): boolean {
  return RESOURCE_NAME_PATTERN.test(value);
}

export function isValidEnvVar(value: string): boolean {
  return ENV_VAR_PATTERN.test(value);
}
