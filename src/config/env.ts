/**
 * Environment variable overrides for engine options.
 *
 * Provides support for TYPED_PARAMS_* environment variables to override
 * engine options at runtime. Environment variables take precedence over
 * options passed in code, which take precedence over defaults.
 *
 * Override precedence: env > code > defaults
 *
 * @packageDocumentation
 */

import {
  PRIMITIVE_MODES,
  UNKNOWN_KEY_POLICIES,
  type EngineOptions,
  type PartialEngineOptions,
} from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Gets the default environment from Node.js process.env.
 */
function getDefaultEnv(): EnvRecord {
  return process.env;
}

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

/**
 * Mapping from environment variable names to engine options.
 */
const ENV_VAR_MAPPINGS: Readonly<Record<string, keyof EngineOptions>> = {
  TYPED_PARAMS_MAX_DEPTH: 'maxDepth',
  TYPED_PARAMS_PRIMITIVES: 'primitives',
  TYPED_PARAMS_UNKNOWN_KEYS: 'unknownKeys',
};

/**
 * Coerces a string value to a number.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The coerced number value.
 * @throws EnvCoercionError if the value cannot be converted to a valid number.
 */
function coerceToNumber(value: string, envVar: string): number {
  const trimmed = value.trim();

  if (trimmed === '') {
    throw new EnvCoercionError(envVar, value, 'number', `Empty value for '${envVar}'`);
  }

  const num = Number(trimmed);

  if (Number.isNaN(num)) {
    throw new EnvCoercionError(envVar, value, 'number');
  }

  return num;
}

/**
 * Coerces a string value to one of a fixed set of names.
 *
 * Case-insensitive; surrounding whitespace is ignored.
 *
 * @param value - The string value to coerce.
 * @param allowed - The accepted names.
 * @param envVar - The environment variable name for error reporting.
 * @returns The matching name.
 * @throws EnvCoercionError if the value is not one of `allowed`.
 */
function coerceToOneOf<T extends string>(value: string, allowed: readonly T[], envVar: string): T {
  const normalized = value.trim().toLowerCase();
  const match = allowed.find((candidate) => candidate === normalized);

  if (match === undefined) {
    throw new EnvCoercionError(
      envVar,
      value,
      allowed.join(' | '),
      `Cannot coerce '${envVar}' value '${value}'. Expected one of: ${allowed.join(', ')}`
    );
  }

  return match;
}

type MutableOptions = { -readonly [K in keyof EngineOptions]?: EngineOptions[K] };

function applyEnvValue(
  overrides: MutableOptions,
  field: keyof EngineOptions,
  value: string,
  envVar: string
): void {
  switch (field) {
    case 'maxDepth':
      overrides.maxDepth = coerceToNumber(value, envVar);
      return;
    case 'primitives':
      overrides.primitives = coerceToOneOf(value, PRIMITIVE_MODES, envVar);
      return;
    case 'unknownKeys':
      overrides.unknownKeys = coerceToOneOf(value, UNKNOWN_KEY_POLICIES, envVar);
      return;
  }
}

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial options with values from environment variables. */
  overrides: PartialEngineOptions;
  /** List of environment variables that were applied. */
  appliedVars: string[];
  /** List of any coercion errors encountered. */
  errors: EnvCoercionError[];
}

/**
 * Reads environment variables and returns engine option overrides.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @param options - Set `collectErrors` to gather coercion errors instead of throwing.
 * @returns Result containing overrides and any errors.
 *
 * @example
 * ```typescript
 * const result = readEnvOverrides({ TYPED_PARAMS_PRIMITIVES: 'coerce' });
 * result.overrides.primitives; // 'coerce'
 * result.appliedVars; // ['TYPED_PARAMS_PRIMITIVES']
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = getDefaultEnv(),
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: MutableOptions = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, field] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      applyEnvValue(overrides, field, value, envVar);
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Applies environment variable overrides to engine options.
 *
 * @param options - The base options to override.
 * @param env - The environment object to read from (defaults to process.env).
 * @returns New options with environment overrides applied.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 *
 * @example
 * ```typescript
 * const options = applyEnvOverrides({ maxDepth: 16 });
 * // TYPED_PARAMS_MAX_DEPTH=32 yields { maxDepth: 32 }
 * ```
 */
export function applyEnvOverrides(
  options: PartialEngineOptions,
  env: EnvRecord = getDefaultEnv()
): PartialEngineOptions {
  const { overrides } = readEnvOverrides(env);

  return {
    ...options,
    ...overrides,
  };
}

/**
 * Gets documentation for all supported environment variables.
 *
 * @returns Documentation object mapping env var names to descriptions.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  return {
    TYPED_PARAMS_MAX_DEPTH: {
      description: 'Override the maximum nesting depth of params data',
      type: 'number',
    },
    TYPED_PARAMS_PRIMITIVES: {
      description: 'Primitive matching mode (strict, coerce)',
      type: 'string',
    },
    TYPED_PARAMS_UNKNOWN_KEYS: {
      description: 'Handling of undeclared keys (ignore, reject)',
      type: 'string',
    },
  };
}
