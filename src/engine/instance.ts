/**
 * Utilities for built params instances.
 *
 * Every instance the builder creates is registered against the schema type
 * that built it, so instances can be compared by schema identity as well as
 * by value.
 *
 * @packageDocumentation
 */

import { isDeepStrictEqual } from 'node:util';
import type { InstanceOf, RawValue, SchemaType } from '../schema/types.js';

const instanceSchemas = new WeakMap<object, SchemaType>();

/**
 * Records which schema type built an instance.
 *
 * @internal
 */
export function registerInstance(instance: object, schema: SchemaType): void {
  instanceSchemas.set(instance, schema);
}

/**
 * Returns the schema type that built a value, if it is a params instance.
 */
export function schemaOf(value: unknown): SchemaType | undefined {
  if (typeof value !== 'object' || value === null) {
    return undefined;
  }
  return instanceSchemas.get(value);
}

/**
 * Whether a value is an instance built from exactly this schema type.
 *
 * Two schema types with identical fields are still distinct.
 */
export function isInstanceOf<S extends SchemaType>(schema: S, value: unknown): value is InstanceOf<S> {
  return schemaOf(value) === schema;
}

/**
 * Converts a built value back into the generic raw value model.
 *
 * The result is plain, mutable data: arrays become arrays, instances and
 * mappings become plain objects, and fields without a value are dropped.
 * Constructing the same schema type from the result yields an equal instance.
 *
 * @param value - A built instance or any part of one.
 * @returns An unfrozen deep copy in raw form.
 */
export function toRawValue(value: unknown): RawValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return value;
  }
  if (Array.isArray(value)) {
    const elements: readonly unknown[] = value;
    return elements.map(toRawValue);
  }
  if (typeof value === 'object') {
    const entries: [string, RawValue][] = [];
    for (const [key, child] of Object.entries(value)) {
      if (child !== undefined) {
        entries.push([key, toRawValue(child)]);
      }
    }
    return Object.fromEntries(entries);
  }
  return null;
}

/**
 * Whether two params instances are equal.
 *
 * Instances are equal when the same schema type built them and their raw
 * forms are deeply equal.
 *
 * @example
 * ```typescript
 * paramsEqual(construct(Params, raw), construct(Params, raw)); // true
 * paramsEqual(construct(Params, raw), construct(SameFieldsParams, raw)); // false
 * ```
 */
export function paramsEqual(a: unknown, b: unknown): boolean {
  const schema = schemaOf(a);
  if (schema === undefined || schema !== schemaOf(b)) {
    return false;
  }
  return isDeepStrictEqual(toRawValue(a), toRawValue(b));
}
