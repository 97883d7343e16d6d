interface Entry<V> {
  value: V;
}

/**
 * Memo map with a fixed number of entries. Reads refresh recency; an insert
 * past the limit drops the least recently used entry.
 */
export class QueryCache<V> {
  private entries = new Map<string, Entry<V>>();

  constructor(private readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Cache limit must be a positive integer, got ${limit}`);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get(key: string): V | undefined {
    return this.touch(key)?.value;
  }

  set(key: string, value: V): void {
    this.entries.delete(key);
    this.entries.set(key, { value });
    if (this.entries.size > this.limit) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
      }
    }
  }

  getOrCompute(key: string, compute: () => V): V {
    const entry = this.touch(key);
    if (entry) return entry.value;

    const value = compute();
    this.set(key, value);
    return value;
  }

  clear(): void {
    this.entries.clear();
  }

  private touch(key: string): Entry<V> | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    // Map keeps insertion order, so re-inserting moves the key to the newest end
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry;
  }
}
