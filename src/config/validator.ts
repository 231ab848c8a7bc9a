/**
 * Validation of engine options.
 *
 * Options usually come from code, but they may also come from environment
 * variables or from callers without static types, so every value is checked
 * before a build uses it.
 *
 * @packageDocumentation
 */

import { DEFAULT_ENGINE_OPTIONS } from './defaults.js';
import {
  PRIMITIVE_MODES,
  UNKNOWN_KEY_POLICIES,
  type EngineOptions,
  type PartialEngineOptions,
} from './types.js';

/**
 * Largest accepted `maxDepth`.
 */
export const MAX_DEPTH_LIMIT = 10000;

/**
 * Error class for invalid engine options.
 */
export class OptionsValidationError extends Error {
  /** Array of validation failure details. */
  public readonly errors: OptionIssue[];

  /**
   * Creates a new OptionsValidationError.
   *
   * @param message - Summary error message.
   * @param errors - Array of specific validation errors.
   */
  constructor(message: string, errors: OptionIssue[]) {
    super(message);
    this.name = 'OptionsValidationError';
    this.errors = errors;
  }
}

/**
 * Individual option validation failure.
 */
export interface OptionIssue {
  /** The option that failed validation. */
  field: keyof EngineOptions;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of validating engine options.
 */
export interface OptionsValidationResult {
  /** Whether validation passed. */
  valid: boolean;
  /** Array of validation errors (empty if valid). */
  errors: OptionIssue[];
}

function validateMaxDepth(value: number, errors: OptionIssue[]): void {
  if (!Number.isInteger(value) || value < 1) {
    errors.push({
      field: 'maxDepth',
      value,
      message: `'maxDepth' must be a positive integer, got ${String(value)}`,
    });
    return;
  }

  if (value > MAX_DEPTH_LIMIT) {
    errors.push({
      field: 'maxDepth',
      value,
      message: `'maxDepth' exceeds reasonable maximum of ${String(MAX_DEPTH_LIMIT)}`,
    });
  }
}

function validateOneOf<T extends string>(
  field: keyof EngineOptions,
  value: T,
  allowed: readonly T[],
  errors: OptionIssue[]
): void {
  if (!allowed.includes(value)) {
    errors.push({
      field,
      value,
      message: `'${field}' must be one of ${allowed.map((a) => `'${a}'`).join(', ')}, got '${String(value)}'`,
    });
  }
}

/**
 * Validates engine options.
 *
 * @param options - The options to validate.
 * @returns Validation result with any errors.
 *
 * @example
 * ```typescript
 * const result = validateEngineOptions({ ...DEFAULT_ENGINE_OPTIONS, maxDepth: 0 });
 * result.valid; // false
 * ```
 */
export function validateEngineOptions(options: EngineOptions): OptionsValidationResult {
  const errors: OptionIssue[] = [];

  validateMaxDepth(options.maxDepth, errors);
  validateOneOf('primitives', options.primitives, PRIMITIVE_MODES, errors);
  validateOneOf('unknownKeys', options.unknownKeys, UNKNOWN_KEY_POLICIES, errors);

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Validates engine options and throws if invalid.
 *
 * @param options - The options to validate.
 * @throws OptionsValidationError if validation fails.
 */
export function assertEngineOptionsValid(options: EngineOptions): void {
  const result = validateEngineOptions(options);

  if (!result.valid) {
    const errorMessages = result.errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new OptionsValidationError(
      `Engine options validation failed with ${String(result.errors.length)} error(s):\n${errorMessages}`,
      result.errors
    );
  }
}

/**
 * Merges partial options over the defaults and validates the result.
 *
 * @param options - Options to apply; omitted fields take their defaults.
 * @returns Complete, frozen engine options.
 * @throws OptionsValidationError if a supplied option is invalid.
 *
 * @example
 * ```typescript
 * resolveEngineOptions({ primitives: 'coerce' });
 * // { maxDepth: 64, primitives: 'coerce', unknownKeys: 'ignore' }
 * ```
 */
export function resolveEngineOptions(options: PartialEngineOptions = {}): EngineOptions {
  const resolved: EngineOptions = {
    maxDepth: options.maxDepth ?? DEFAULT_ENGINE_OPTIONS.maxDepth,
    primitives: options.primitives ?? DEFAULT_ENGINE_OPTIONS.primitives,
    unknownKeys: options.unknownKeys ?? DEFAULT_ENGINE_OPTIONS.unknownKeys,
  };

  assertEngineOptionsValid(resolved);
  Object.freeze(resolved);
  return resolved;
}
