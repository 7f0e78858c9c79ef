import { createHash } from 'node:crypto';

export const VERSION_HASH_LENGTH = 8;

/**
 * Short content fingerprint of an install script.
 *
 * Identical scripts always produce the same value, so re-rendering with an
 * unchanged script yields the same installer Job name and the cluster treats
 * the Job as already applied. This is an idempotency key, not a security
 * primitive.
 */
export function versionHash(script: string): string {
  return createHash('sha256').update(script, 'utf8').digest('hex').slice(0, VERSION_HASH_LENGTH);
}
