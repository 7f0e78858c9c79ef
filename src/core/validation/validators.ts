/**
 * Field validators
 *
 * Each validator takes raw operator text and either returns the normalized
 * value or a ValidationError. None of them loop or prompt; retrying belongs to
 * the caller.
 */

import type { PortProtocol } from '../types/index.js';
import {
  isValidPort,
  MAX_RESOURCE_NAME_LENGTH,
  normalizeEnvVar,
  normalizeResourceName,
} from '../../utils/index.js';
import { fail, ok, type ValidationResult } from './result.js';

export const DEFAULT_PVC_SIZE = '10Gi';

const DECIMAL = /^(\d+\.?\d*|\.\d+)$/;

/** Kubernetes quantity: number with an optional decimal or binary suffix */
export const QUANTITY_PATTERN = /^(\d+\.?\d*|\.\d+)(m|k|Ki|M|Mi|G|Gi|T|Ti|P|Pi|E|Ei)?$/;

export function isValidQuantity(value: string): boolean {
  return QUANTITY_PATTERN.test(value);
}

export function validateResourceName(
  input: string,
  field: string = 'name',
  maxLength: number = MAX_RESOURCE_NAME_LENGTH
): ValidationResult<string> {
  if (!input.trim()) {
    return fail(field, 'Name cannot be empty');
  }
  return ok(normalizeResourceName(input, maxLength));
}

export function validateEnvKey(input: string): ValidationResult<string> {
  if (!input.trim()) {
    return fail('env.key', 'Variable name cannot be empty');
  }
  return ok(normalizeEnvVar(input));
}

export function validateImage(input: string): ValidationResult<string> {
  const image = input.trim();
  if (!image) {
    return fail('image', 'Image cannot be empty.');
  }
  if (/\s/.test(image)) {
    return fail('image', `Image reference may not contain whitespace: ${image}`);
  }
  return ok(image);
}

export function validateRequiredValue(input: string, field: string): ValidationResult<string> {
  return input ? ok(input) : fail(field, `${field} is required`);
}

export function validatePort(input: string, field: string = 'port'): ValidationResult<number> {
  const text = input.trim();
  const port = /^\d+$/.test(text) ? Number.parseInt(text, 10) : Number.NaN;
  if (!isValidPort(port)) {
    return fail(field, 'Port must be between 1 and 65535');
  }
  return ok(port);
}

export function validateProtocol(input: string): ValidationResult<PortProtocol> {
  const protocol = input.trim().toUpperCase() || 'TCP';
  if (protocol === 'TCP' || protocol === 'UDP') {
    return ok(protocol);
  }
  return fail('protocol', `Protocol must be TCP or UDP, got ${input.trim()}`);
}

/**
 * PVC size in GiB: `10`, `10g`, `10gb` and `10gi` become `10Gi`; any other
 * valid quantity passes through; blank means the default.
 */
export function normalizePvcSize(input: string): ValidationResult<string> {
  const size = input.trim();
  if (!size) {
    return ok(DEFAULT_PVC_SIZE);
  }
  const lower = size.toLowerCase();
  if (lower.endsWith('gi')) {
    const amount = lower.slice(0, -2).trim();
    return DECIMAL.test(amount) ? ok(`${amount}Gi`) : fail('pvc.size', `Invalid size: ${size}`);
  }
  if (lower.endsWith('g') || lower.endsWith('gb')) {
    const amount = lower.replace(/[bg]+$/, '').trim();
    return DECIMAL.test(amount)
      ? ok(`${amount}Gi`)
      : fail('pvc.size', `Invalid size: ${size}`);
  }
  if (DECIMAL.test(lower)) {
    return ok(`${size}Gi`);
  }
  return isValidQuantity(size) ? ok(size) : fail('pvc.size', `Invalid size: ${size}`);
}

/**
 * CPU in millicores: `500` or `500m` become `500m`; blank means unset.
 */
export function normalizeCpu(input: string): ValidationResult<string | undefined> {
  let raw = input.trim().toLowerCase();
  if (!raw) {
    return ok(undefined);
  }
  if (raw.endsWith('m')) {
    raw = raw.slice(0, -1);
  }
  if (!DECIMAL.test(raw)) {
    return fail('resources.cpu', 'Enter CPU in millicores (m), e.g. 500 or 250m.');
  }
  return ok(`${raw.replace(/\.$/, '')}m`);
}

/**
 * Memory in GiB: `2`, `2g`, `2gb` or `2gi` become `2Gi`; blank means unset.
 */
export function normalizeMemory(input: string): ValidationResult<string | undefined> {
  let raw = input.trim().toLowerCase();
  if (!raw) {
    return ok(undefined);
  }
  for (const suffix of ['gb', 'g', 'gi']) {
    if (raw.endsWith(suffix)) {
      raw = raw.slice(0, -suffix.length).trim();
      break;
    }
  }
  if (!DECIMAL.test(raw)) {
    return fail('resources.memory', 'Enter memory in GB, e.g. 2 or 0.5.');
  }
  return ok(`${raw.replace(/\.$/, '')}Gi`);
}
