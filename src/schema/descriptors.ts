/**
 * Descriptor combinators.
 *
 * @example
 * ```typescript
 * const Params = defineSchema('Params', {
 *   YEAR: t.integer(),
 *   ROW_NAMES: t.object('RowNames', { TOTAL_ROW: t.string() }),
 *   PUBLICATION_ROW_ORDER: t.array(t.string()),
 *   THRESHOLDS: t.record(t.number()),
 *   FOOTNOTE: t.optional(t.string()),
 *   SUPPRESSION: t.union(t.integer(), t.string()),
 * });
 * ```
 *
 * @packageDocumentation
 */

import { defineSchema } from './schema.js';
import type {
  FieldMap,
  MappingDescriptor,
  NestedSchemaDescriptor,
  OptionalDescriptor,
  PrimitiveDescriptor,
  PrimitiveKind,
  SchemaType,
  SequenceDescriptor,
  TypeDescriptor,
  UnionDescriptor,
} from './types.js';

function frozen<D extends TypeDescriptor>(descriptor: D): D {
  Object.freeze(descriptor);
  return descriptor;
}

function primitive<K extends PrimitiveKind>(kind: K): PrimitiveDescriptor<K> {
  return frozen({ kind: 'primitive', primitive: kind });
}

function schema<S extends SchemaType>(schemaType: S): NestedSchemaDescriptor<S> {
  return frozen({ kind: 'schema', schema: schemaType });
}

function mapping<K extends TypeDescriptor, V extends TypeDescriptor>(
  key: K,
  value: V
): MappingDescriptor<K, V> {
  return frozen({ kind: 'mapping', key, value });
}

export const t = {
  string: (): PrimitiveDescriptor<'string'> => primitive('string'),
  number: (): PrimitiveDescriptor<'number'> => primitive('number'),
  integer: (): PrimitiveDescriptor<'integer'> => primitive('integer'),
  boolean: (): PrimitiveDescriptor<'boolean'> => primitive('boolean'),
  null: (): PrimitiveDescriptor<'null'> => primitive('null'),
  /** Any present value, deep-copied into the instance without checks. */
  unknown: (): PrimitiveDescriptor<'unknown'> => primitive('unknown'),

  schema,

  /** Declares a nested schema type inline and references it. */
  object: <F extends FieldMap>(name: string, fields: F): NestedSchemaDescriptor<SchemaType<F>> =>
    schema(defineSchema(name, fields)),

  array: <E extends TypeDescriptor>(element: E): SequenceDescriptor<E> =>
    frozen({ kind: 'sequence', element }),

  mapping,

  /** Mapping with plain string keys. */
  record: <V extends TypeDescriptor>(value: V): MappingDescriptor<PrimitiveDescriptor<'string'>, V> =>
    mapping(primitive('string'), value),

  optional: <I extends TypeDescriptor>(inner: I): OptionalDescriptor<I> =>
    frozen({ kind: 'optional', inner }),

  /** Alternatives are tried in the order given; the first match wins. */
  union: <A extends readonly [TypeDescriptor, ...TypeDescriptor[]]>(
    ...alternatives: A
  ): UnionDescriptor<A> => frozen({ kind: 'union', alternatives }),
} as const;
