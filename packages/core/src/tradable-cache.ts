/**
 * Process-lifetime tradability by canonical item id. Entries are only ever
 * added; the first value stored for an id is kept.
 */
export class TradableCache {
  private readonly entries = new Map<number, boolean>();

  get size(): number {
    return this.entries.size;
  }

  get(canonicalItemId: number): boolean | undefined {
    return this.entries.get(canonicalItemId);
  }

  /**
   * Stores `tradable` unless the id is already classified, and returns the
   * value held by the cache afterwards.
   */
  remember(canonicalItemId: number, tradable: boolean): boolean {
    const existing = this.entries.get(canonicalItemId);
    if (existing !== undefined) {
      return existing;
    }
    this.entries.set(canonicalItemId, tradable);
    return tradable;
  }
}
