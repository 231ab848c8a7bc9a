/**
 * Recursive builder: constructs typed params instances from raw mappings.
 *
 * @packageDocumentation
 */

import { resolveEngineOptions } from '../config/validator.js';
import type { PartialEngineOptions } from '../config/types.js';
import { ConfigurationError } from '../schema/errors.js';
import { fieldEntries, isOptionalDescriptor } from '../schema/introspect.js';
import type { InstanceOf, SchemaType } from '../schema/types.js';
import { AggregatedValidationError, type ValidationError } from './errors.js';
import { isInstanceOf, registerInstance } from './instance.js';
import { coerce, isRawMapping, type MatchContext } from './matcher.js';
import { appendPath, type FieldPath } from './path.js';
import { ErrorReporter, type MatchResult } from './reporter.js';

/**
 * Result of validating raw params against a schema type.
 */
export type ParamsValidationResult<T> =
  | { readonly valid: true; readonly value: T; readonly errors: readonly [] }
  | { readonly valid: false; readonly errors: readonly ValidationError[] };

/**
 * Builds one schema instance from a raw mapping.
 *
 * Declared fields are visited in declaration order and every failure is
 * collected; the instance is created only when no field failed.
 *
 * @param schema - Schema type to build.
 * @param raw - Raw value expected to be a mapping.
 * @param path - Location of `raw` within the whole build.
 * @param context - Options of the current build.
 * @returns The frozen instance, or every error found.
 */
export function buildSchema(
  schema: SchemaType,
  raw: unknown,
  path: FieldPath,
  context: MatchContext
): MatchResult {
  const fields = fieldEntries(schema);
  const reporter = new ErrorReporter();

  if (!isRawMapping(raw)) {
    reporter.typeMismatch(path, schema.name, raw);
    return reporter.failure();
  }

  const values: [string, unknown][] = [];
  for (const [name, descriptor] of fields) {
    const fieldPath = appendPath(path, name);
    const present = Object.hasOwn(raw, name);

    if (!present && !isOptionalDescriptor(descriptor)) {
      reporter.missingField(fieldPath, descriptor);
      continue;
    }

    const result = coerce(descriptor, present ? raw[name] : undefined, fieldPath, context);
    if (!result.ok) {
      reporter.merge(result.errors);
      continue;
    }
    if (result.value !== undefined) {
      values.push([name, result.value]);
    }
  }

  if (context.options.unknownKeys === 'reject') {
    const declared = new Set(fields.map(([name]) => name));
    for (const [key, value] of Object.entries(raw)) {
      if (!declared.has(key)) {
        reporter.unknownField(appendPath(path, key), schema.name, value);
      }
    }
  }

  if (!reporter.isEmpty) {
    return reporter.failure();
  }

  const instance = Object.freeze(Object.fromEntries(values));
  registerInstance(instance, schema);
  return { ok: true, value: instance };
}

/**
 * Validates raw params against a schema type without throwing for data errors.
 *
 * @param schema - Schema type to build.
 * @param raw - Raw params, typically parsed JSON or TOML.
 * @param options - Engine options; omitted fields take their defaults.
 * @returns The instance, or every validation error in discovery order.
 * @throws ConfigurationError if the schema declaration is malformed.
 * @throws OptionsValidationError if the options are invalid.
 *
 * @example
 * ```typescript
 * const result = validateParams(Params, raw);
 * if (!result.valid) {
 *   for (const error of result.errors) {
 *     console.error(`${formatPath(error.path)}: ${error.message}`);
 *   }
 * }
 * ```
 */
export function validateParams<S extends SchemaType>(
  schema: S,
  raw: unknown,
  options: PartialEngineOptions = {}
): ParamsValidationResult<InstanceOf<S>> {
  const context: MatchContext = { options: resolveEngineOptions(options) };
  const result = buildSchema(schema, raw, [], context);

  if (!result.ok) {
    return { valid: false, errors: result.errors };
  }
  if (!isInstanceOf(schema, result.value)) {
    throw new ConfigurationError(`Schema ${schema.name} did not produce an instance`, schema.name);
  }
  return { valid: true, value: result.value, errors: [] };
}

/**
 * Constructs a typed params instance from raw params.
 *
 * @param schema - Schema type to build.
 * @param raw - Raw params, typically parsed JSON or TOML.
 * @param options - Engine options; omitted fields take their defaults.
 * @returns The frozen, fully typed instance.
 * @throws AggregatedValidationError carrying every validation error if the data does not fit.
 * @throws ConfigurationError if the schema declaration is malformed.
 *
 * @example
 * ```typescript
 * const params = construct(Params, {
 *   ROW_NAMES: { TOTAL_ROW: 'total_row_name', QUESTION_ROW: 'question_row_name' },
 * });
 * params.ROW_NAMES.TOTAL_ROW; // 'total_row_name'
 * ```
 */
export function construct<S extends SchemaType>(
  schema: S,
  raw: unknown,
  options: PartialEngineOptions = {}
): InstanceOf<S> {
  const result = validateParams(schema, raw, options);

  if (!result.valid) {
    throw new AggregatedValidationError(schema.name, result.errors);
  }
  return result.value;
}
