/**
 * Mutable params container: a single swappable reference to the current
 * params instance.
 *
 * @packageDocumentation
 */

import { construct } from '../engine/builder.js';
import { AggregatedValidationError } from '../engine/errors.js';
import type { PartialEngineOptions } from '../config/types.js';
import type { InstanceOf, SchemaType } from '../schema/types.js';
import { type Logger, logger as defaultLogger } from '../utils/logger.js';
import { loadRawParams } from './loader.js';

/**
 * Options for creating a {@link ParamsContainer}.
 */
export interface ParamsContainerOptions {
  /** Engine options used for the initial build and every replacement. */
  readonly engine?: PartialEngineOptions;
  /** Logger for replacement events. */
  readonly logger?: Logger;
}

/**
 * Holds the current params instance of one schema type.
 *
 * Instances are frozen, and a replacement is a single reference assignment
 * made only after the new instance is fully built, so a reader sees either
 * the old instance or the new one.
 *
 * @example
 * ```typescript
 * const params = new ParamsContainer(Params, raw);
 * params.current.ROW_NAMES.TOTAL_ROW; // 'total_row_name'
 *
 * params.replace(nextRaw);
 * params.version; // 2
 * ```
 */
export class ParamsContainer<S extends SchemaType> {
  /** The schema type every instance of this container is built from. */
  public readonly schema: S;

  private readonly engine: PartialEngineOptions;
  private readonly log: Logger;
  private instance: InstanceOf<S>;
  private generation = 1;
  private queue: Promise<unknown> = Promise.resolve();
  /** Call-order ticket of the most recent replacement request. */
  private requests = 0;
  /** Ticket of the latest successful {@link replace} call. */
  private latestDirectReplace = 0;

  /**
   * Builds the initial instance.
   *
   * @throws AggregatedValidationError if `raw` does not fit the schema.
   */
  constructor(schema: S, raw: unknown, options: ParamsContainerOptions = {}) {
    this.schema = schema;
    this.engine = options.engine ?? {};
    this.log = options.logger ?? defaultLogger;
    this.instance = construct(schema, raw, this.engine);
  }

  /**
   * Creates a container from a JSON or TOML params file.
   *
   * @throws ParamsLoadError if the file cannot be read or parsed.
   * @throws AggregatedValidationError if the contents do not fit the schema.
   */
  static async fromFile<S extends SchemaType>(
    schema: S,
    filePath: string,
    options: ParamsContainerOptions = {}
  ): Promise<ParamsContainer<S>> {
    const raw = await loadRawParams(filePath, { logger: options.logger });
    return new ParamsContainer(schema, raw, options);
  }

  /** The current instance. */
  get current(): InstanceOf<S> {
    return this.instance;
  }

  /** Starts at 1 and increases by one on every successful replacement. */
  get version(): number {
    return this.generation;
  }

  /**
   * Rebuilds from new raw params and swaps the current instance.
   *
   * On failure the current instance is left untouched. A successful call
   * supersedes every {@link replaceFromFile} call made before it that has not
   * settled yet.
   *
   * @returns The new instance.
   * @throws AggregatedValidationError if `raw` does not fit the schema.
   */
  replace(raw: unknown): InstanceOf<S> {
    const ticket = this.takeTicket();
    const next = this.swap(raw);
    this.latestDirectReplace = ticket;
    return next;
  }

  /**
   * Loads a params file and replaces the current instance with its contents.
   *
   * File reloads run one at a time in call order, so the last call to settle
   * wins. A reload whose file finishes loading after a later synchronous
   * {@link replace} has succeeded is dropped: it logs
   * `params_reload_superseded` and resolves to the current instance without
   * building the file's contents.
   *
   * @throws ParamsLoadError if the file cannot be read or parsed.
   * @throws AggregatedValidationError if the contents do not fit the schema.
   */
  replaceFromFile(filePath: string): Promise<InstanceOf<S>> {
    const ticket = this.takeTicket();
    const task = this.queue.then(async () => {
      const raw = await loadRawParams(filePath, { logger: this.log });
      if (this.latestDirectReplace > ticket) {
        this.log.info('params_reload_superseded', {
          schema: this.schema.name,
          filePath,
          version: this.generation,
        });
        return this.instance;
      }
      return this.swap(raw);
    });
    this.queue = task.catch(() => undefined);
    return task;
  }

  private takeTicket(): number {
    this.requests += 1;
    return this.requests;
  }

  private swap(raw: unknown): InstanceOf<S> {
    let next: InstanceOf<S>;
    try {
      next = construct(this.schema, raw, this.engine);
    } catch (error) {
      if (error instanceof AggregatedValidationError) {
        this.log.warn('params_replace_failed', {
          schema: this.schema.name,
          version: this.generation,
          errorCount: error.errors.length,
          paths: error.paths,
        });
      }
      throw error;
    }

    this.instance = next;
    this.generation += 1;
    this.log.info('params_replaced', { schema: this.schema.name, version: this.generation });
    return next;
  }
}
