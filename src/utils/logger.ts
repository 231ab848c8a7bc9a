/**
 * Structured logging for params containers and loaders.
 *
 * Entries are written to stderr as one JSON object per line.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: file loads and other diagnostic detail
 * - `info`: successful params replacements
 * - `warn`: rejected replacements
 * - `error`: failures the caller did not handle
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * A structured log entry.
 */
export interface LogEntry {
  /**
   * ISO 8601 timestamp when the entry was created.
   * @example "2024-01-15T10:30:00.000Z"
   */
  readonly timestamp: string;

  readonly level: LogLevel;

  /**
   * Name of the component that wrote the entry.
   * @example "ParamsContainer"
   */
  readonly component: string;

  /**
   * Short snake_case event name.
   * @example "params_replaced"
   */
  readonly event: string;

  /**
   * Additional structured context.
   * @example { schema: "Params", version: 2 }
   */
  readonly data?: Record<string, unknown>;
}

/**
 * Entry written instead of a {@link LogEntry} whose data cannot be serialized.
 */
interface FallbackLogEntry {
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly component: string;
  readonly event: string;
  readonly serializationError: string;
  readonly originalData: '[unserializable]';
}

/**
 * Configuration options for creating a Logger instance.
 */
export interface LoggerOptions {
  /**
   * Name of the component using this logger.
   */
  readonly component: string;

  /**
   * Whether debug-level logging is enabled.
   * When `false` (default), debug() calls are no-ops.
   * @defaultValue false
   */
  readonly debugMode?: boolean;
}

/**
 * Structured logger that outputs JSON-formatted log entries to stderr.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'ParamsContainer', debugMode: true });
 * logger.info('params_replaced', { schema: 'Params', version: 2 });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;

  /**
   * Creates a new Logger instance.
   * @param options - Configuration options for the logger.
   */
  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
  }

  /**
   * Logs a debug-level message. Output only when debugMode is enabled.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  debug(event: string, data?: Record<string, unknown>): void {
    if (!this.debugMode) {
      return;
    }
    this.log('debug', event, data);
  }

  /**
   * Logs an info-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  /**
   * Logs a warning-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  /**
   * Logs an error-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const timestamp = new Date().toISOString();
    const entry: LogEntry =
      data === undefined
        ? { timestamp, level, component: this.component, event }
        : { timestamp, level, component: this.component, event, data };

    process.stderr.write(serializeEntry(entry) + '\n');
  }
}

function serializeEntry(entry: LogEntry): string {
  try {
    return JSON.stringify(entry);
  } catch (error) {
    const fallback: FallbackLogEntry = {
      timestamp: entry.timestamp,
      level: entry.level,
      component: entry.component,
      event: entry.event,
      serializationError: error instanceof Error ? error.message : String(error),
      originalData: '[unserializable]',
    };
    return JSON.stringify(fallback);
  }
}

/**
 * Default logger shared by containers and loaders that are given none.
 */
export const logger = new Logger({ component: 'typed-params', debugMode: false });
