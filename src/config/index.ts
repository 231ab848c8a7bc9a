/**
 * Engine options: defaults, validation and environment overrides.
 *
 * Override precedence: env > code > defaults
 *
 * @packageDocumentation
 */

export type {
  EngineOptions,
  PartialEngineOptions,
  PrimitiveMode,
  UnknownKeyPolicy,
} from './types.js';
export { PRIMITIVE_MODES, UNKNOWN_KEY_POLICIES } from './types.js';
export { DEFAULT_ENGINE_OPTIONS, DEFAULT_MAX_DEPTH } from './defaults.js';
export {
  MAX_DEPTH_LIMIT,
  OptionsValidationError,
  assertEngineOptionsValid,
  resolveEngineOptions,
  validateEngineOptions,
} from './validator.js';
export type { OptionIssue, OptionsValidationResult } from './validator.js';
export {
  EnvCoercionError,
  applyEnvOverrides,
  getEnvVarDocumentation,
  readEnvOverrides,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
