/**
 * Error types for kubeegg
 *
 * Every error carries a stable `code` and a context record so the CLI and the
 * HTTP facade can map failures without inspecting messages.
 */

import type { ArkErrors } from 'arktype';

export class KubeEggError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'KubeEggError';
  }
}

/**
 * The egg could not be obtained: unreachable, missing, or not JSON.
 */
export class FetchError extends KubeEggError {
  constructor(
    message: string,
    public readonly source: string,
    public readonly suggestions?: string[],
    options?: { cause?: unknown }
  ) {
    super(message, 'FETCH_ERROR', { source, suggestions });
    this.name = 'FetchError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }

  static fileNotFound(path: string): FetchError {
    return new FetchError(`File not found: ${path}`, path, [
      'Check that the path is correct and the file exists',
      'Relative paths resolve against the current working directory',
    ]);
  }

  static unreadable(path: string, cause: unknown): FetchError {
    return new FetchError(`Unable to read file: ${path}`, path, [
      'Ensure the file has read permissions',
    ], { cause });
  }

  static httpStatus(url: string, status: number, statusText: string): FetchError {
    return new FetchError(
      `Failed to fetch egg JSON from ${url}: HTTP ${status}${statusText ? ` ${statusText}` : ''}`,
      url,
      ['Check that the URL is correct and publicly reachable']
    );
  }

  static network(url: string, cause: unknown): FetchError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new FetchError(`Failed to fetch egg JSON from ${url}: ${reason}`, url, [
      'Check network connectivity',
      'Try downloading the file and passing a local path instead',
    ], { cause });
  }

  static invalidJson(source: string, cause: unknown): FetchError {
    return new FetchError(`${source} is not valid JSON`, source, [
      'Eggs are exported from the panel as JSON documents',
    ], { cause });
  }
}

/**
 * The egg document is JSON but not an object at the top level.
 */
export class FormatError extends KubeEggError {
  constructor(
    message: string,
    public readonly actualType: string
  ) {
    super(message, 'FORMAT_ERROR', { actualType });
    this.name = 'FormatError';
  }

  static notAnObject(value: unknown): FormatError {
    const actualType = describeJsonType(value);
    return new FormatError(
      `Egg JSON must be an object at the top level; got ${actualType}`,
      actualType
    );
  }
}

export interface ValidationProblem {
  field: string;
  message: string;
}

/**
 * A configuration value (or a single operator answer) violates its invariants.
 */
export class ValidationError extends KubeEggError {
  constructor(
    message: string,
    public readonly field: string,
    public readonly problems: ValidationProblem[] = [{ field, message }],
    public readonly suggestions?: string[]
  ) {
    super(message, 'VALIDATION_ERROR', { field, problems, suggestions });
    this.name = 'ValidationError';
  }

  static fromProblems(subject: string, problems: ValidationProblem[]): ValidationError {
    const [first] = problems;
    if (!first) {
      return new ValidationError(`Invalid ${subject}`, 'root', []);
    }
    let message = `Invalid ${subject} at field '${first.field}': ${first.message}`;
    if (problems.length > 1) {
      message += '\n\nAdditional validation errors:';
      problems.slice(1).forEach((problem, index) => {
        message += `\n  ${index + 2}. ${problem.field}: ${problem.message}`;
      });
    }
    return new ValidationError(message, first.field, problems);
  }
}

/**
 * The CLI could not write (or was told not to write) the manifest bundle.
 */
export class OutputError extends KubeEggError {
  constructor(
    message: string,
    public readonly outputDir: string
  ) {
    super(message, 'OUTPUT_ERROR', { outputDir });
    this.name = 'OutputError';
  }

  static missingDirectory(outputDir: string): OutputError {
    return new OutputError('Output directory does not exist. Create it first.', outputDir);
  }

  static notADirectory(outputDir: string): OutputError {
    return new OutputError('Output path must be a directory.', outputDir);
  }

  static aborted(outputDir: string): OutputError {
    return new OutputError('Aborted: existing files were left untouched.', outputDir);
  }
}

/**
 * Convert arktype validation errors into problems keyed by dotted field path
 */
export function formatArktypeErrors(errors: ArkErrors): ValidationProblem[] {
  return Array.from(errors, (error) => ({
    field: error.path.length > 0 ? Array.from(error.path, String).join('.') : 'root',
    message: error.message,
  }));
}

export function describeJsonType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

export function isKubeEggError(error: unknown): error is KubeEggError {
  return error instanceof KubeEggError;
}

/**
 * Render an error for terminal output, including any suggestions it carries
 */
export function formatErrorForDisplay(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  const suggestions =
    error instanceof FetchError || error instanceof ValidationError ? error.suggestions : undefined;
  if (!suggestions || suggestions.length === 0) {
    return error.message;
  }
  return [error.message, ...suggestions.map((s) => `  - ${s}`)].join('\n');
}
