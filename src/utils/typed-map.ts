/**
 * Read-only Map wrapper with enforced key and value types.
 *
 * Used where field names taken from schema declarations are looked up
 * dynamically, so that a name such as `__proto__` or `constructor` is an
 * ordinary key rather than an object property.
 *
 * @packageDocumentation
 */

/**
 * Type-safe Map wrapper with enforced key and value types.
 *
 * @example
 * ```ts
 * const fields = TypedMap.fromEntries([['TOTAL_ROW', 'string']]);
 * fields.get('TOTAL_ROW'); // 'string'
 * fields.get('__proto__'); // undefined
 * ```
 *
 * @template K - The type of keys in the map.
 * @template V - The type of values in the map.
 */
export class TypedMap<K, V> {
  private readonly map: Map<K, V>;

  private constructor(entries: Iterable<readonly [K, V]>) {
    this.map = new Map<K, V>(entries);
  }

  /**
   * Creates a TypedMap from an iterable of entries. Later entries win.
   *
   * @param entries - An iterable of [key, value] tuples.
   */
  static fromEntries<K, V>(entries: Iterable<readonly [K, V]>): TypedMap<K, V> {
    return new TypedMap<K, V>(entries);
  }

  /**
   * Returns the value associated with the key, or undefined if not found.
   */
  get(key: K): V | undefined {
    return this.map.get(key);
  }

  has(key: K): boolean {
    return this.map.has(key);
  }

  /**
   * Returns the keys in insertion order.
   */
  keys(): IterableIterator<K> {
    return this.map.keys();
  }

  /**
   * Returns the [key, value] pairs in insertion order.
   */
  entries(): IterableIterator<[K, V]> {
    return this.map.entries();
  }

  get size(): number {
    return this.map.size;
  }
}
