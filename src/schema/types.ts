/**
 * Type descriptors and schema types for typed params.
 *
 * A schema type is a named, immutable set of fields. Each field carries a
 * {@link TypeDescriptor}, a closed tagged variant describing the shape the
 * raw value must have. The generic parameters exist only so that
 * {@link Infer} can compute the static type of a built value.
 *
 * @packageDocumentation
 */

/**
 * Primitive kinds understood by the type matcher.
 *
 * - `string`, `boolean`, `null`: the JSON scalar of the same name
 * - `number`: any finite number
 * - `integer`: a finite number with no fractional part
 * - `unknown`: any present value, copied through unchanged
 */
export type PrimitiveKind = 'string' | 'number' | 'integer' | 'boolean' | 'null' | 'unknown';

/**
 * All primitive kinds, in declaration order.
 */
export const PRIMITIVE_KINDS: readonly PrimitiveKind[] = [
  'string',
  'number',
  'integer',
  'boolean',
  'null',
  'unknown',
];

/**
 * Static value type for each primitive kind.
 */
export interface PrimitiveValueMap {
  string: string;
  number: number;
  integer: number;
  boolean: boolean;
  null: null;
  unknown: unknown;
}

/**
 * A scalar of the given primitive kind.
 */
export interface PrimitiveDescriptor<K extends PrimitiveKind = PrimitiveKind> {
  readonly kind: 'primitive';
  readonly primitive: K;
}

/**
 * A nested schema type. The raw value must be a mapping.
 */
export interface NestedSchemaDescriptor<S extends SchemaType = SchemaType> {
  readonly kind: 'schema';
  readonly schema: S;
}

/**
 * An ordered sequence whose elements all match `element`.
 */
export interface SequenceDescriptor<E extends TypeDescriptor = TypeDescriptor> {
  readonly kind: 'sequence';
  readonly element: E;
}

/**
 * A string-keyed mapping. Raw keys are matched against `key`,
 * values against `value`.
 */
export interface MappingDescriptor<
  K extends TypeDescriptor = TypeDescriptor,
  V extends TypeDescriptor = TypeDescriptor,
> {
  readonly kind: 'mapping';
  readonly key: K;
  readonly value: V;
}

/**
 * A value that may be absent or null.
 */
export interface OptionalDescriptor<I extends TypeDescriptor = TypeDescriptor> {
  readonly kind: 'optional';
  readonly inner: I;
}

/**
 * A value matching one of several alternatives, tried in declared order.
 */
export interface UnionDescriptor<
  A extends readonly TypeDescriptor[] = readonly TypeDescriptor[],
> {
  readonly kind: 'union';
  readonly alternatives: A;
}

/**
 * Closed tagged variant describing the expected shape of one value.
 */
export type TypeDescriptor =
  | PrimitiveDescriptor
  | NestedSchemaDescriptor
  | SequenceDescriptor
  | MappingDescriptor
  | OptionalDescriptor
  | UnionDescriptor;

/**
 * Discriminant values of {@link TypeDescriptor}.
 */
export type DescriptorKind = TypeDescriptor['kind'];

/**
 * Ordered field declarations of a schema type.
 */
export type FieldMap = Readonly<Record<string, TypeDescriptor>>;

/**
 * An immutable, named declaration of fields.
 *
 * Create schema types with `defineSchema`, which validates the declaration
 * up front. Field order is the object's insertion order and determines the
 * order in which fields are built and errors are reported.
 */
export interface SchemaType<F extends FieldMap = FieldMap> {
  readonly kind: 'schema-type';
  readonly name: string;
  readonly fields: F;
}

/**
 * A generic, already-parsed value tree equivalent to a JSON document.
 */
export type RawValue = string | number | boolean | null | readonly RawValue[] | RawMapping;

/**
 * A string-keyed raw mapping.
 */
export interface RawMapping {
  readonly [key: string]: RawValue;
}

type Simplify<T> = { [K in keyof T]: T[K] } & {};

type OptionalKeys<F extends FieldMap> = {
  [K in keyof F]: F[K] extends OptionalDescriptor ? K : never;
}[keyof F];

type RequiredKeys<F extends FieldMap> = Exclude<keyof F, OptionalKeys<F>>;

/**
 * Static type of a value built against descriptor `D`.
 */
export type Infer<D> =
  D extends PrimitiveDescriptor<infer K extends PrimitiveKind>
    ? PrimitiveValueMap[K]
    : D extends NestedSchemaDescriptor<infer S>
      ? InstanceOf<S>
      : D extends SequenceDescriptor<infer E>
        ? readonly Infer<E>[]
        : D extends MappingDescriptor<TypeDescriptor, infer V>
          ? Readonly<Record<string, Infer<V>>>
          : D extends OptionalDescriptor<infer I>
            ? Infer<I> | undefined
            : D extends UnionDescriptor<infer A>
              ? Infer<A[number]>
              : never;

/**
 * Static type of an instance built from a field map.
 * Fields declared `Optional` become optional properties.
 */
export type Instance<F extends FieldMap> = Simplify<
  { readonly [K in RequiredKeys<F>]: Infer<F[K]> } & {
    readonly [K in OptionalKeys<F>]?: Infer<F[K]>;
  }
>;

/**
 * Static type of an instance built from schema type `S`.
 *
 * @example
 * ```typescript
 * const Params = defineSchema('Params', { YEAR: t.integer() });
 * type Params = InstanceOf<typeof Params>; // { readonly YEAR: number }
 * ```
 */
export type InstanceOf<S> = S extends SchemaType<infer F> ? Instance<F> : never;
