/**
 * Schema declaration: descriptors, schema types and introspection.
 *
 * @packageDocumentation
 */

export { t } from './descriptors.js';
export { defineSchema } from './schema.js';
export { declaredFields, fieldEntries, isOptionalDescriptor } from './introspect.js';
export type { FieldEntry } from './introspect.js';
export { describeDescriptor, describeSchema } from './describe.js';
export { ConfigurationError, UnsupportedTypeError } from './errors.js';
export { PRIMITIVE_KINDS } from './types.js';
export type {
  DescriptorKind,
  FieldMap,
  Infer,
  Instance,
  InstanceOf,
  MappingDescriptor,
  NestedSchemaDescriptor,
  OptionalDescriptor,
  PrimitiveDescriptor,
  PrimitiveKind,
  PrimitiveValueMap,
  RawMapping,
  RawValue,
  SchemaType,
  SequenceDescriptor,
  TypeDescriptor,
  UnionDescriptor,
} from './types.js';
