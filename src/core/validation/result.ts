import { ValidationError } from '../errors.js';

/**
 * Outcome of validating one operator answer
 */
export type ValidationResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: ValidationError };

export function ok<T>(value: T): ValidationResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(field: string, message: string): ValidationResult<T> {
  return { ok: false, error: new ValidationError(message, field) };
}

