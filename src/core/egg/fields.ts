/**
 * Candidate-key lookups for egg documents
 *
 * Eggs come from many authors and panel versions, so most fields have several
 * spellings. Each field is described by an ordered list of candidate keys;
 * the first key that is present AND holds an acceptable value wins. Values of
 * the wrong type are skipped rather than reported.
 */

import { hasOwn, isJsonObject, isNonEmptyString, isScalar, type JsonObject } from '../../utils/index.js';

/**
 * Ordered candidate keys for each egg field
 */
export const EGG_FIELD_KEYS = {
  name: ['name', 'title'],
  description: ['description'],
  startup: ['startup'],
  images: ['docker_images', 'dockerImages'],
  defaultImage: ['docker_image', 'dockerImage', 'image'],
  variables: ['variables'],
  environment: ['environment'],
  configPorts: ['ports', 'port'],
  ports: ['ports'],
} as const;

/**
 * Ordered candidate keys inside one variable entry
 */
export const VARIABLE_FIELD_KEYS = {
  name: ['name', 'env_variable', 'envVariable'],
  envVariable: ['env_variable', 'envVariable'],
  description: ['description'],
  defaultValue: ['default_value', 'default'],
  required: ['required', 'is_required'],
} as const;

export type Accept<T> = (value: unknown) => T | undefined;

/**
 * Return the first candidate value that `accept` maps to something defined
 */
export function readFirst<T>(
  source: JsonObject,
  keys: readonly string[],
  accept: Accept<T>
): T | undefined {
  for (const key of keys) {
    if (!hasOwn(source, key)) continue;
    const accepted = accept(source[key]);
    if (accepted !== undefined) {
      return accepted;
    }
  }
  return undefined;
}

/**
 * Return the value of the first candidate key that is present at all,
 * whatever its type.
 */
export function readFirstPresent(
  source: JsonObject,
  keys: readonly string[]
): { found: true; value: unknown } | { found: false } {
  for (const key of keys) {
    if (hasOwn(source, key)) {
      return { found: true, value: source[key] };
    }
  }
  return { found: false };
}

/** Scalars as text, including the empty string */
export const asText: Accept<string> = (value) => (isScalar(value) ? String(value) : undefined);

/** Scalars as text, skipping the empty string */
export const asNonEmptyText: Accept<string> = (value) => {
  const text = asText(value);
  return text ? text : undefined;
};

export const asNonEmptyString: Accept<string> = (value) =>
  isNonEmptyString(value) ? value : undefined;

export const asNonEmptyObject: Accept<JsonObject> = (value) =>
  isJsonObject(value) && Object.keys(value).length > 0 ? value : undefined;

export const asNonEmptyArray: Accept<unknown[]> = (value) =>
  Array.isArray(value) && value.length > 0 ? value : undefined;

export const asObject: Accept<JsonObject> = (value) => (isJsonObject(value) ? value : undefined);

export const asArray: Accept<unknown[]> = (value) => (Array.isArray(value) ? value : undefined);

const TRUTHY_STRINGS = new Set(['true', 'yes', '1']);

/**
 * Loose boolean coercion used for `required` flags
 */
export function coerceBoolean(value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') return TRUTHY_STRINGS.has(value.trim().toLowerCase());
  if (typeof value === 'number') return value !== 0 && !Number.isNaN(value);
  return false;
}
