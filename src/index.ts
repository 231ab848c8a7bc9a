/**
 * typed-params
 *
 * Schema-directed construction of typed, frozen params objects from
 * JSON-like data, with every validation error reported at once.
 *
 * @example
 * ```typescript
 * import { construct, defineSchema, t } from 'typed-params';
 *
 * const Params = defineSchema('Params', {
 *   ROW_NAMES: t.object('RowNames', { TOTAL_ROW: t.string(), QUESTION_ROW: t.string() }),
 *   PUBLICATION_ROW_ORDER: t.array(t.string()),
 * });
 *
 * const params = construct(Params, JSON.parse(text));
 * params.ROW_NAMES.TOTAL_ROW; // string
 * ```
 *
 * @packageDocumentation
 */

/**
 * Library version string.
 */
export const VERSION = '0.1.0';

export * from './schema/index.js';
export * from './engine/index.js';
export * from './config/index.js';
export * from './params/index.js';
export { Logger } from './utils/logger.js';
export type { LogEntry, LoggerOptions, LogLevel } from './utils/logger.js';
export { PathValidationError } from './utils/safe-fs.js';
