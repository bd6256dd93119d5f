export interface UnlockOracle {
  isUnlocked(itemId: number): boolean;
}

export interface UnlockedItemSet extends UnlockOracle {
  /** Returns `true` when the item was not unlocked before. */
  unlock(itemId: number): boolean;
  /** Returns `true` when the item was unlocked before. */
  lock(itemId: number): boolean;
  readonly size: number;
}

/**
 * In-memory unlock oracle. Persistence stays with the host, which seeds the
 * set on load and mirrors changes through {@link UnlockedItemSet.unlock}.
 */
export function createUnlockedItemSet(
  initial: Iterable<number> = [],
): UnlockedItemSet {
  const unlocked = new Set<number>();
  for (const itemId of initial) {
    if (itemId > 0) {
      unlocked.add(itemId);
    }
  }

  return {
    isUnlocked(itemId) {
      return unlocked.has(itemId);
    },
    unlock(itemId) {
      if (itemId <= 0 || unlocked.has(itemId)) {
        return false;
      }
      unlocked.add(itemId);
      return true;
    },
    lock(itemId) {
      return unlocked.delete(itemId);
    },
    get size() {
      return unlocked.size;
    },
  };
}
