/**
 * Bounded LRU set of record fingerprints. Set iteration order is insertion
 * order, so re-inserting a key moves it to the most recent position.
 */
export class FingerprintCache {
  private readonly entries = new Set<string>()
  private evictionCount = 0

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Cache capacity must be a positive integer, got ${capacity}`)
    }
  }

  /**
   * Returns `true` when `fingerprint` was unseen (it is now the most recent
   * entry) and `false` when it was already present (its recency is refreshed).
   * Check and insert happen in one synchronous step.
   */
  probeAndMark(fingerprint: string): boolean {
    if (this.entries.has(fingerprint)) {
      this.entries.delete(fingerprint)
      this.entries.add(fingerprint)
      return false
    }

    if (this.entries.size >= this.capacity) {
      this.evictOldest()
    }
    this.entries.add(fingerprint)
    return true
  }

  /** Membership test that does not touch recency. */
  has(fingerprint: string): boolean {
    return this.entries.has(fingerprint)
  }

  /** Fingerprints from least to most recently used. */
  keys(): string[] {
    return [...this.entries.keys()]
  }

  get size(): number {
    return this.entries.size
  }

  get evictions(): number {
    return this.evictionCount
  }

  private evictOldest(): void {
    const oldest = this.entries.keys().next()
    if (oldest.done) {
      return
    }
    this.entries.delete(oldest.value)
    this.evictionCount += 1
  }
}
