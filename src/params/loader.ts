/**
 * Params file loading: reads JSON or TOML params files into raw values and
 * constructs typed instances from them.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import * as TOML from '@iarna/toml';
import { construct } from '../engine/builder.js';
import type { PartialEngineOptions } from '../config/types.js';
import type { InstanceOf, SchemaType } from '../schema/types.js';
import { type Logger, logger as defaultLogger } from '../utils/logger.js';
import { safeReadTextFile } from '../utils/safe-fs.js';

/**
 * Supported params file formats.
 */
export type ParamsFormat = 'json' | 'toml';

const FORMATS_BY_EXTENSION: ReadonlyMap<string, ParamsFormat> = new Map<string, ParamsFormat>([
  ['.json', 'json'],
  ['.toml', 'toml'],
]);

/**
 * Error thrown when a params file cannot be read or parsed.
 */
export class ParamsLoadError extends Error {
  /** The params file involved, when the failure came from a file. */
  public readonly filePath: string | undefined;

  /**
   * Creates a new ParamsLoadError.
   *
   * @param message - Human-readable error message.
   * @param filePath - The params file involved, if any.
   * @param cause - The underlying read or syntax error.
   */
  constructor(message: string, filePath?: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ParamsLoadError';
    this.filePath = filePath;
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Parses params text into a raw value.
 *
 * @param text - File contents.
 * @param format - Syntax of `text`.
 * @returns The parsed raw value.
 * @throws ParamsLoadError if the text is not valid in the given format.
 *
 * @example
 * ```typescript
 * parseRawParams('[ROW_NAMES]\nTOTAL_ROW = "total_row_name"', 'toml');
 * // { ROW_NAMES: { TOTAL_ROW: 'total_row_name' } }
 * ```
 */
export function parseRawParams(text: string, format: ParamsFormat): unknown {
  try {
    if (format === 'toml') {
      return TOML.parse(text);
    }
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw new ParamsLoadError(
      `Failed to parse ${format.toUpperCase()} params: ${errorMessage(error)}`,
      undefined,
      error
    );
  }
}

/**
 * Picks the params format from a file extension (case-insensitive).
 *
 * @returns The format, or `undefined` for unsupported extensions.
 */
export function formatFromPath(filePath: string): ParamsFormat | undefined {
  return FORMATS_BY_EXTENSION.get(path.extname(filePath).toLowerCase());
}

/**
 * Options for loading params files.
 */
export interface LoadOptions {
  /** Logger for `params_file_loaded` entries. */
  readonly logger?: Logger;
}

/**
 * Reads a params file into a raw value.
 *
 * @param filePath - Path to a `.json` or `.toml` file.
 * @param options - Loader options.
 * @returns The parsed raw value.
 * @throws ParamsLoadError if the extension is unsupported, or the file cannot be read or parsed.
 */
export async function loadRawParams(filePath: string, options: LoadOptions = {}): Promise<unknown> {
  const log = options.logger ?? defaultLogger;

  const format = formatFromPath(filePath);
  if (format === undefined) {
    throw new ParamsLoadError(
      `Unsupported params file extension '${path.extname(filePath)}' (expected .json or .toml)`,
      filePath
    );
  }

  let file: { resolvedPath: string; text: string };
  try {
    file = await safeReadTextFile(filePath);
  } catch (error) {
    throw new ParamsLoadError(`Failed to read params file: ${errorMessage(error)}`, filePath, error);
  }

  let raw: unknown;
  try {
    raw = parseRawParams(file.text, format);
  } catch (error) {
    throw new ParamsLoadError(`${errorMessage(error)} (in ${file.resolvedPath})`, filePath, error);
  }

  log.debug('params_file_loaded', { path: file.resolvedPath, format, bytes: file.text.length });
  return raw;
}

/**
 * Options for {@link loadParams}.
 */
export interface LoadParamsOptions extends LoadOptions {
  /** Engine options for the construction. */
  readonly engine?: PartialEngineOptions;
}

/**
 * Loads a params file and constructs a typed instance from it.
 *
 * @throws ParamsLoadError if the file cannot be read or parsed.
 * @throws AggregatedValidationError if the contents do not fit the schema.
 *
 * @example
 * ```typescript
 * const params = await loadParams(Params, './params.toml');
 * ```
 */
export async function loadParams<S extends SchemaType>(
  schema: S,
  filePath: string,
  options: LoadParamsOptions = {}
): Promise<InstanceOf<S>> {
  const raw = await loadRawParams(filePath, options);
  return construct(schema, raw, options.engine);
}
