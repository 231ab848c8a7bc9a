/**
 * Params files and the mutable params container.
 *
 * @packageDocumentation
 */

export { ParamsContainer } from './container.js';
export type { ParamsContainerOptions } from './container.js';
export { ParamsLoadError, formatFromPath, loadParams, loadRawParams, parseRawParams } from './loader.js';
export type { LoadOptions, LoadParamsOptions, ParamsFormat } from './loader.js';
