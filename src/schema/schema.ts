/**
 * Schema registration.
 *
 * @packageDocumentation
 */

import { fieldEntries } from './introspect.js';
import type { FieldMap, SchemaType } from './types.js';

/**
 * Declares a named schema type.
 *
 * The field map is copied and frozen, and the declaration is validated
 * immediately, so a malformed schema fails where it is declared rather than
 * the first time params are built with it.
 *
 * @param name - Schema type name, used in error reports.
 * @param fields - Field names and their type descriptors, in order.
 * @returns The registered schema type.
 * @throws ConfigurationError if a field has no resolvable descriptor or no fields are declared.
 * @throws UnsupportedTypeError if a descriptor variant is not recognized.
 *
 * @example
 * ```typescript
 * const RowNames = defineSchema('RowNames', {
 *   TOTAL_ROW: t.string(),
 *   QUESTION_ROW: t.string(),
 * });
 * const Params = defineSchema('Params', { ROW_NAMES: t.schema(RowNames) });
 * ```
 */
export function defineSchema<F extends FieldMap>(name: string, fields: F): SchemaType<F> {
  const ownFields = { ...fields };
  Object.freeze(ownFields);
  const schema: SchemaType<F> = { kind: 'schema-type', name, fields: ownFields };
  Object.freeze(schema);
  fieldEntries(schema);
  return schema;
}
