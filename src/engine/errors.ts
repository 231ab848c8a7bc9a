/**
 * Validation errors produced while building params.
 *
 * Data errors are values, not exceptions: the builder collects every one of
 * them and only then throws a single {@link AggregatedValidationError}.
 *
 * @packageDocumentation
 */

import { formatPath, type FieldPath } from './path.js';
import { renderReport } from './reporter.js';

interface ValidationErrorBase {
  /** Location of the offending value. */
  readonly path: FieldPath;
  /** Short type name of what was expected at `path`. */
  readonly expected: string;
  /** The raw value found at `path` (`undefined` when absent). */
  readonly actual: unknown;
  /** Human-readable description of the failure. */
  readonly message: string;
}

/**
 * A required field is absent from the raw mapping.
 */
export interface MissingFieldError extends ValidationErrorBase {
  readonly code: 'missing_field';
}

/**
 * The raw value's shape does not satisfy the descriptor.
 */
export interface TypeMismatchError extends ValidationErrorBase {
  readonly code: 'type_mismatch';
  /** For unions: how each alternative rejected the value, in declared order. */
  readonly alternatives?: readonly UnionAlternativeFailure[];
}

/**
 * The raw mapping has a key its schema does not declare
 * (only reported when unknown keys are rejected).
 */
export interface UnknownFieldError extends ValidationErrorBase {
  readonly code: 'unknown_field';
}

/**
 * Two raw mapping keys coerce to the same key.
 */
export interface DuplicateKeyError extends ValidationErrorBase {
  readonly code: 'duplicate_key';
}

/**
 * The raw tree nests deeper than the configured maximum.
 */
export interface DepthLimitError extends ValidationErrorBase {
  readonly code: 'depth_exceeded';
}

/**
 * One rejected union alternative.
 */
export interface UnionAlternativeFailure {
  /** Short type name of the alternative. */
  readonly expected: string;
  /** Errors the alternative produced. */
  readonly errors: readonly ValidationError[];
}

/**
 * Any error attributable to params data.
 */
export type ValidationError =
  | MissingFieldError
  | TypeMismatchError
  | UnknownFieldError
  | DuplicateKeyError
  | DepthLimitError;

export type ValidationErrorCode = ValidationError['code'];

/**
 * Error thrown when params data does not satisfy its schema.
 *
 * Carries every independent failure found in one build, in discovery order.
 * The message is the rendered report.
 *
 * @example
 * ```typescript
 * try {
 *   construct(Params, raw);
 * } catch (error) {
 *   if (error instanceof AggregatedValidationError) {
 *     console.error(error.paths); // ['ROW_NAMES.TOTAL_ROW', 'YEAR']
 *   }
 * }
 * ```
 */
export class AggregatedValidationError extends Error {
  /** Name of the schema type that was being built. */
  public readonly schemaName: string;
  /** Every validation error, in discovery order. */
  public readonly errors: readonly ValidationError[];

  /**
   * Creates a new AggregatedValidationError.
   *
   * @param schemaName - Name of the schema type being built.
   * @param errors - The collected errors; must not be empty.
   */
  constructor(schemaName: string, errors: readonly ValidationError[]) {
    super(renderReport(schemaName, errors));
    this.name = 'AggregatedValidationError';
    this.schemaName = schemaName;
    this.errors = errors;
  }

  /** Rendered path of each top-level error. */
  get paths(): string[] {
    return this.errors.map((error) => formatPath(error.path));
  }
}
