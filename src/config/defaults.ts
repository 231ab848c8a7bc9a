/**
 * Default engine options.
 *
 * @packageDocumentation
 */

import type { EngineOptions } from './types.js';

/**
 * Maximum nesting depth used when none is configured.
 */
export const DEFAULT_MAX_DEPTH = 64;

/**
 * Defaults: exact primitive matching, undeclared keys ignored.
 */
export const DEFAULT_ENGINE_OPTIONS: EngineOptions = Object.freeze({
  maxDepth: DEFAULT_MAX_DEPTH,
  primitives: 'strict',
  unknownKeys: 'ignore',
});
