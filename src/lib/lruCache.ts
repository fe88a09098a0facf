/**
 * WHAT: Bounded Map with least-recently-used eviction and lazy TTL expiry.
 * WHY: Guild config is read on every message; caching it without a bound would
 *      grow with every guild the bot has ever seen.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export class LRUCache<K, V> {
  private readonly entries = new Map<K, { value: V; storedAt: number }>();

  constructor(
    private readonly maxSize: number,
    private readonly ttlMs: number
  ) {
    if (maxSize <= 0) throw new Error("LRUCache maxSize must be a positive number");
    if (ttlMs <= 0) throw new Error("LRUCache ttlMs must be a positive number");
  }

  /** Expired entries are dropped on read; hits move to the MRU end. */
  get(key: K): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (Date.now() - entry.storedAt > this.ttlMs) {
      this.entries.delete(key);
      return undefined;
    }

    // Map iterates in insertion order, so re-inserting marks it most recent
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.value;
  }

  set(key: K, value: V): void {
    this.entries.delete(key);
    if (this.entries.size >= this.maxSize) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }
    this.entries.set(key, { value, storedAt: Date.now() });
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
