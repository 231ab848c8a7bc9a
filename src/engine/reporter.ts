/**
 * Collection and rendering of validation errors.
 *
 * @packageDocumentation
 */

import { describeDescriptor } from '../schema/describe.js';
import type { TypeDescriptor } from '../schema/types.js';
import type { UnionAlternativeFailure, ValidationError } from './errors.js';
import { formatPath, type FieldPath } from './path.js';

const PREVIEW_LIMIT = 60;

/**
 * Outcome of matching one raw value against one descriptor.
 */
export type MatchResult =
  | { readonly ok: true; readonly value: unknown }
  | { readonly ok: false; readonly errors: readonly ValidationError[] };

/**
 * Accumulates validation errors for one build step in discovery order.
 *
 * Each recursion level owns a reporter; child results are merged into the
 * parent, so the root reporter ends up holding every error of the build.
 */
export class ErrorReporter {
  private readonly collected: ValidationError[] = [];

  /** Whether no error has been recorded. */
  get isEmpty(): boolean {
    return this.collected.length === 0;
  }

  /** Number of recorded errors. */
  get count(): number {
    return this.collected.length;
  }

  /** Snapshot of the recorded errors. */
  get errors(): readonly ValidationError[] {
    return [...this.collected];
  }

  add(error: ValidationError): void {
    this.collected.push(error);
  }

  merge(errors: readonly ValidationError[]): void {
    this.collected.push(...errors);
  }

  missingField(path: FieldPath, descriptor: TypeDescriptor): void {
    const expected = describeDescriptor(descriptor);
    this.add({
      code: 'missing_field',
      path,
      expected,
      actual: undefined,
      message: `missing required field (expected ${expected})`,
    });
  }

  typeMismatch(path: FieldPath, expected: string, actual: unknown): void {
    this.add({
      code: 'type_mismatch',
      path,
      expected,
      actual,
      message: `expected ${expected}, got ${describeActual(actual)}`,
    });
  }

  unionMismatch(
    path: FieldPath,
    expected: string,
    actual: unknown,
    alternatives: readonly UnionAlternativeFailure[]
  ): void {
    this.add({
      code: 'type_mismatch',
      path,
      expected,
      actual,
      alternatives,
      message: `no alternative of ${expected} matched, got ${describeActual(actual)}`,
    });
  }

  unknownField(path: FieldPath, schemaName: string, actual: unknown): void {
    this.add({
      code: 'unknown_field',
      path,
      expected: 'absent',
      actual,
      message: `field is not declared by schema ${schemaName}`,
    });
  }

  duplicateKey(path: FieldPath, key: string, keyDescriptor: TypeDescriptor, actual: unknown): void {
    this.add({
      code: 'duplicate_key',
      path,
      expected: describeDescriptor(keyDescriptor),
      actual,
      message: `key coerces to '${key}', which an earlier key already produced`,
    });
  }

  depthExceeded(path: FieldPath, maxDepth: number, descriptor: TypeDescriptor, actual: unknown): void {
    this.add({
      code: 'depth_exceeded',
      path,
      expected: describeDescriptor(descriptor),
      actual,
      message: `maximum nesting depth of ${String(maxDepth)} exceeded`,
    });
  }

  /** Failed match result carrying the recorded errors. */
  failure(): MatchResult {
    return { ok: false, errors: this.errors };
  }
}

/**
 * Runtime type name of a raw value as reported in errors.
 *
 * @returns `null`, `array`, `object`, or the value's `typeof`.
 */
export function runtimeType(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  return typeof value;
}

/**
 * Short JSON preview of a raw value, truncated for reports.
 */
export function previewValue(value: unknown): string {
  if (value === undefined) {
    return 'undefined';
  }

  if (typeof value === 'number' && !Number.isFinite(value)) {
    return String(value);
  }

  let preview: string | undefined;
  try {
    preview = JSON.stringify(value);
  } catch {
    preview = undefined;
  }
  preview ??= fallbackPreview(value);

  return preview.length > PREVIEW_LIMIT ? `${preview.slice(0, PREVIEW_LIMIT - 3)}...` : preview;
}

function fallbackPreview(value: unknown): string {
  try {
    return String(value);
  } catch {
    // Too deep to stringify, or a throwing toString.
    return Object.prototype.toString.call(value);
  }
}

function describeActual(value: unknown): string {
  if (value === undefined) {
    return 'undefined';
  }
  return `${runtimeType(value)} ${previewValue(value)}`;
}

function renderLines(errors: readonly ValidationError[], indent: string): string[] {
  const lines: string[] = [];
  for (const error of errors) {
    lines.push(`${indent}- ${formatPath(error.path)}: ${error.message}`);
    if (error.code === 'type_mismatch' && error.alternatives !== undefined) {
      error.alternatives.forEach((alternative, index) => {
        lines.push(`${indent}  alternative ${String(index + 1)} (${alternative.expected}):`);
        lines.push(...renderLines(alternative.errors, `${indent}    `));
      });
    }
  }
  return lines;
}

/**
 * Renders a complete report for a failed build.
 *
 * @param schemaName - Name of the schema type being built.
 * @param errors - Errors in discovery order.
 * @returns Multi-line report, one line per error.
 *
 * @example
 * ```text
 * Failed to construct Params: 2 validation error(s)
 *   - ROW_NAMES.TOTAL_ROW: expected string, got number 42
 *   - YEAR: missing required field (expected integer)
 * ```
 */
export function renderReport(schemaName: string, errors: readonly ValidationError[]): string {
  const header = `Failed to construct ${schemaName}: ${String(errors.length)} validation error(s)`;
  return [header, ...renderLines(errors, '  ')].join('\n');
}
