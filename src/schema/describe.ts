/**
 * Short, human-readable renderings of descriptors and schema types.
 *
 * @packageDocumentation
 */

import { UnsupportedTypeError, describeUnknownDescriptor } from './errors.js';
import type { SchemaType, TypeDescriptor } from './types.js';

/**
 * Renders a descriptor as a short type name.
 *
 * @param descriptor - The descriptor to render.
 * @returns e.g. `string`, `RowNames`, `Array<string>`, `Record<string, integer>`,
 * `Optional<boolean>`, `string | integer`.
 *
 * @example
 * ```typescript
 * describeDescriptor(t.array(t.union(t.string(), t.integer())));
 * // "Array<string | integer>"
 * ```
 */
export function describeDescriptor(descriptor: TypeDescriptor): string {
  switch (descriptor.kind) {
    case 'primitive':
      return descriptor.primitive;
    case 'schema':
      return descriptor.schema.name;
    case 'sequence':
      return `Array<${describeDescriptor(descriptor.element)}>`;
    case 'mapping':
      return `Record<${describeDescriptor(descriptor.key)}, ${describeDescriptor(descriptor.value)}>`;
    case 'optional':
      return `Optional<${describeDescriptor(descriptor.inner)}>`;
    case 'union':
      return descriptor.alternatives.map(describeDescriptor).join(' | ');
    default:
      return unsupported(descriptor);
  }
}

function unsupported(descriptor: never): never {
  const kind = describeUnknownDescriptor(descriptor);
  throw new UnsupportedTypeError(`Unsupported type descriptor '${kind}'`, kind, '<unknown>');
}

/**
 * Renders a schema type with its top-level fields.
 *
 * @example
 * ```typescript
 * describeSchema(RowNames); // "RowNames { TOTAL_ROW: string, QUESTION_ROW: string }"
 * ```
 */
export function describeSchema(schema: SchemaType): string {
  const fields = Object.entries(schema.fields).map(
    ([name, descriptor]) => `${name}: ${describeDescriptor(descriptor)}`
  );
  return `${schema.name} { ${fields.join(', ')} }`;
}
