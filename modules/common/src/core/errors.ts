/**
 * modules/common/src/core/errors.ts
 *
 * @file Error taxonomy shared by the geometry model, the resolver and the dispatch pipeline. Every error carries a
 * stable `code` so callers and log output can branch on it without instanceof chains across module boundaries.
 */

export type TilewrightErrorCode =
  | 'SourceUnavailable'
  | 'InvalidGrid'
  | 'DegenerateGeometry'
  | 'OutOfBounds'
  | 'StaleReference'
  | 'ConfigError'
  | 'KeyChordError';

/**
 * Base class for all errors raised by the engine.
 */
export abstract class TilewrightError extends Error {
  abstract readonly code: TilewrightErrorCode;

  constructor(message: string, options?: {cause?: unknown}) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The external window source could not be reached or did not answer in time. Aborts the current dispatch.
 */
export class SourceUnavailableError extends TilewrightError {
  readonly code = 'SourceUnavailable';
}

/**
 * A grid specification or cell coordinate is unusable (non-positive dimensions, cell outside the grid).
 */
export class InvalidGridError extends TilewrightError {
  readonly code = 'InvalidGrid';
}

/**
 * A computed rectangle would have a non-positive width or height.
 */
export class DegenerateGeometryError extends TilewrightError {
  readonly code = 'DegenerateGeometry';
}

/**
 * A computed rectangle would leave the workarea completely.
 */
export class OutOfBoundsError extends TilewrightError {
  readonly code = 'OutOfBounds';
}

/**
 * A command targets a window that no longer exists. Treated as a normal race, never surfaced to the user.
 */
export class StaleReferenceError extends TilewrightError {
  readonly code = 'StaleReference';
}

/**
 * The configuration file is missing, unreadable or invalid. `issues` lists one line per validation problem.
 */
export class ConfigError extends TilewrightError {
  readonly code = 'ConfigError';
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = [], options?: {cause?: unknown}) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message, options);
    this.issues = issues;
  }
}

/**
 * A key chord string could not be parsed.
 */
export class KeyChordError extends TilewrightError {
  readonly code = 'KeyChordError';
}

/**
 * Check whether a value is an engine error with the given code.
 *
 * @param error - Any caught value.
 * @param code - The expected error code.
 * @returns True if the value is a TilewrightError carrying that code.
 */
export function hasErrorCode(error: unknown, code: TilewrightErrorCode): error is TilewrightError {
  return error instanceof TilewrightError && error.code === code;
}

/**
 * Render any caught value as a single-line message for log output.
 *
 * @param error - Any caught value.
 * @returns The error message, or the value converted to a string.
 */
export function describeError(error: unknown): string {
  if (error instanceof TilewrightError) {
    return `${error.code}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
