/**
 * Schema introspection.
 *
 * Extracts the ordered (field name, descriptor) pairs of a schema type and
 * validates the whole declaration, including every nested schema type and
 * every union alternative, the first time the schema is seen. Results are
 * cached per schema type; schema types are immutable so the cache never
 * goes stale.
 *
 * @packageDocumentation
 */

import { TypedMap } from '../utils/typed-map.js';
import { ConfigurationError, UnsupportedTypeError, describeUnknownDescriptor } from './errors.js';
import { PRIMITIVE_KINDS, type SchemaType, type TypeDescriptor } from './types.js';

/**
 * One declared field of a schema type.
 */
export type FieldEntry = readonly [name: string, descriptor: TypeDescriptor];

const fieldCache = new WeakMap<SchemaType, readonly FieldEntry[]>();

/**
 * Where a descriptor was declared, for error messages.
 */
interface DeclarationSite {
  readonly schema: SchemaType;
  readonly field: string;
  /** Schema types currently being introspected, outermost first. */
  readonly chain: readonly SchemaType[];
}

/**
 * Returns the declared fields of a schema type, in declaration order.
 *
 * @param schema - The schema type to introspect.
 * @returns A fresh map from field name to type descriptor.
 * @throws ConfigurationError if the declaration is malformed.
 * @throws UnsupportedTypeError if a descriptor variant is not recognized.
 *
 * @example
 * ```typescript
 * const fields = declaredFields(Params);
 * [...fields.keys()]; // ['ROW_NAMES', 'PUBLICATION_ROW_ORDER']
 * ```
 */
export function declaredFields(schema: SchemaType): TypedMap<string, TypeDescriptor> {
  const entries: [string, TypeDescriptor][] = fieldEntries(schema).map(([name, descriptor]) => [
    name,
    descriptor,
  ]);
  return TypedMap.fromEntries(entries);
}

/**
 * Returns the cached, validated field entries of a schema type.
 *
 * @param schema - The schema type to introspect.
 * @returns Field entries in declaration order.
 * @throws ConfigurationError if the declaration is malformed.
 */
export function fieldEntries(schema: SchemaType): readonly FieldEntry[] {
  return introspect(schema, []);
}

function introspect(schema: SchemaType, chain: readonly SchemaType[]): readonly FieldEntry[] {
  assertSchemaType(schema);

  const cached = fieldCache.get(schema);
  if (cached !== undefined) {
    return cached;
  }

  if (chain.includes(schema)) {
    const cycle = [...chain.slice(chain.indexOf(schema)), schema].map((s) => s.name).join(' -> ');
    throw new ConfigurationError(
      `Schema ${schema.name} contains itself through nested fields: ${cycle}`,
      schema.name
    );
  }

  const entries = Object.entries(schema.fields);
  if (entries.length === 0) {
    throw new ConfigurationError(
      `Schema definition for ${schema.name} does not contain any fields`,
      schema.name
    );
  }

  const nextChain = [...chain, schema];
  const result: FieldEntry[] = [];
  for (const [field, descriptor] of entries) {
    checkDescriptor(descriptor, { schema, field, chain: nextChain });
    result.push([field, descriptor]);
  }

  const frozen = Object.freeze(result);
  fieldCache.set(schema, frozen);
  return frozen;
}

function assertSchemaType(schema: SchemaType): void {
  if (
    typeof schema !== 'object' ||
    schema === null ||
    schema.kind !== 'schema-type' ||
    typeof schema.name !== 'string' ||
    typeof schema.fields !== 'object' ||
    schema.fields === null
  ) {
    throw new ConfigurationError(
      `Expected a schema type declared with defineSchema, got ${describeUnknownDescriptor(schema)}`,
      '<unknown>'
    );
  }
}

function checkDescriptor(descriptor: TypeDescriptor | undefined, site: DeclarationSite): void {
  const location = `${site.schema.name}.${site.field}`;

  if (typeof descriptor !== 'object' || descriptor === null) {
    throw new ConfigurationError(
      `Field '${location}' does not have a resolvable type descriptor`,
      site.schema.name,
      site.field
    );
  }

  switch (descriptor.kind) {
    case 'primitive':
      if (!PRIMITIVE_KINDS.includes(descriptor.primitive)) {
        const kind = String(descriptor.primitive);
        throw new UnsupportedTypeError(
          `Field '${location}' uses unsupported primitive kind '${kind}'`,
          kind,
          site.schema.name,
          site.field
        );
      }
      return;
    case 'schema':
      introspect(descriptor.schema, site.chain);
      return;
    case 'sequence':
      checkDescriptor(descriptor.element, site);
      return;
    case 'mapping':
      checkDescriptor(descriptor.key, site);
      checkDescriptor(descriptor.value, site);
      return;
    case 'optional':
      checkDescriptor(descriptor.inner, site);
      return;
    case 'union':
      if (!Array.isArray(descriptor.alternatives) || descriptor.alternatives.length === 0) {
        throw new ConfigurationError(
          `Field '${location}' declares a union without alternatives`,
          site.schema.name,
          site.field
        );
      }
      for (const alternative of descriptor.alternatives) {
        checkDescriptor(alternative, site);
      }
      return;
    default:
      unsupportedDescriptor(descriptor, site);
  }
}

function unsupportedDescriptor(descriptor: never, site: DeclarationSite): never {
  const kind = describeUnknownDescriptor(descriptor);
  throw new UnsupportedTypeError(
    `Field '${site.schema.name}.${site.field}' uses unsupported type descriptor '${kind}'`,
    kind,
    site.schema.name,
    site.field
  );
}

/**
 * Whether a declared field may be absent from the raw mapping.
 *
 * A field is optional when its descriptor is `Optional`, or a union with an
 * optional alternative.
 */
export function isOptionalDescriptor(descriptor: TypeDescriptor): boolean {
  if (descriptor.kind === 'optional') {
    return true;
  }
  if (descriptor.kind === 'union') {
    return descriptor.alternatives.some(isOptionalDescriptor);
  }
  return false;
}
