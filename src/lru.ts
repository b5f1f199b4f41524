/**
 * Access-order list for LRU eviction. Relies on Set preserving insertion
 * order: touching re-inserts a key at the most-recent end.
 */
export class RecencyList<K> {
  private readonly order = new Set<K>();

  public touch(key: K): void {
    this.order.delete(key);
    this.order.add(key);
  }

  public delete(key: K): boolean {
    return this.order.delete(key);
  }

  /** Least recently touched key. */
  public oldest(): K | undefined {
    for (const key of this.order) return key;
    return undefined;
  }

  public clear(): void {
    this.order.clear();
  }

  /** Keys from least to most recently used. */
  public keys(): K[] {
    return [...this.order];
  }
}
