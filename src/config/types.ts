/**
 * Engine option types.
 *
 * @packageDocumentation
 */

/**
 * How primitive descriptors treat values of a different JSON type.
 *
 * - `strict`: the raw value must already have the declared type
 * - `coerce`: numbers and booleans are accepted as strings, decimal strings
 *   such as `"42"` or `"-2.5"` as numbers (no hex, binary or exponent
 *   forms), and `"true"`/`"false"` as booleans
 *
 * Mapping keys always arrive as strings, so they are parsed this way under
 * either mode.
 */
export type PrimitiveMode = 'strict' | 'coerce';

/**
 * What the builder does with raw mapping keys a schema does not declare.
 */
export type UnknownKeyPolicy = 'ignore' | 'reject';

/**
 * Options controlling one build.
 */
export interface EngineOptions {
  /** Deepest field path length the builder will descend to. */
  readonly maxDepth: number;
  /** Strictness of primitive matching. */
  readonly primitives: PrimitiveMode;
  /** Handling of undeclared raw keys. */
  readonly unknownKeys: UnknownKeyPolicy;
}

/**
 * Engine options with every field optional, for merging with defaults.
 */
export type PartialEngineOptions = Partial<EngineOptions>;

/**
 * All primitive modes.
 */
export const PRIMITIVE_MODES: readonly PrimitiveMode[] = ['strict', 'coerce'];

/**
 * All unknown key policies.
 */
export const UNKNOWN_KEY_POLICIES: readonly UnknownKeyPolicy[] = ['ignore', 'reject'];
