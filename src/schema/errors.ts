/**
 * Errors raised for malformed schema declarations.
 *
 * These are authoring defects, detected independently of any params data,
 * and are always thrown immediately rather than aggregated.
 *
 * @packageDocumentation
 */

/**
 * Error thrown when a schema declaration is malformed.
 */
export class ConfigurationError extends Error {
  /** Name of the schema type being declared or introspected. */
  public readonly schemaName: string;
  /** Declared field at fault, if the defect is attributable to one. */
  public readonly fieldName: string | undefined;

  /**
   * Creates a new ConfigurationError.
   *
   * @param message - Descriptive error message.
   * @param schemaName - Name of the schema type at fault.
   * @param fieldName - Declared field at fault, if any.
   */
  constructor(message: string, schemaName: string, fieldName?: string) {
    super(message);
    this.name = 'ConfigurationError';
    this.schemaName = schemaName;
    this.fieldName = fieldName;
  }
}

/**
 * Error thrown when a type descriptor is not one of the supported variants.
 */
export class UnsupportedTypeError extends ConfigurationError {
  /** The unrecognized descriptor kind (or primitive kind). */
  public readonly descriptorKind: string;

  constructor(message: string, descriptorKind: string, schemaName: string, fieldName?: string) {
    super(message, schemaName, fieldName);
    this.name = 'UnsupportedTypeError';
    this.descriptorKind = descriptorKind;
  }
}

/**
 * Describes an unrecognized descriptor for error messages.
 *
 * @param descriptor - Value found where a descriptor was expected.
 * @returns The value's `kind` if it has one, otherwise its `typeof`.
 */
export function describeUnknownDescriptor(descriptor: unknown): string {
  if (typeof descriptor === 'object' && descriptor !== null && 'kind' in descriptor) {
    return String(descriptor.kind);
  }
  return typeof descriptor;
}
