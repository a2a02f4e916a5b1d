interface CacheEntry<T> {
  value: T
  /** Epoch milliseconds. */
  expiresAt: number
}

/**
 * @summary Holds at most one value with an expiry instant.
 * @remarks
 * Not synchronised by itself; callers serialise fills (see {@link AsyncLock}).
 */
export class SingleSlotCache<T> {
  private entry: CacheEntry<T> | null = null

  /**
   * @summary Return the stored value while `now` is before its expiry.
   * @param now Epoch milliseconds.
   */
  peek(now: number): T | undefined {
    if (!this.entry || now >= this.entry.expiresAt) return undefined
    return this.entry.value
  }

  /**
   * @summary Replace the slot with a new value living for `ttlMs`.
   * @remarks A zero or negative TTL stores an entry that is already expired.
   */
  fill(value: T, ttlMs: number, now: number): void {
    this.entry = { value, expiresAt: now + ttlMs }
  }

  get isEmpty(): boolean {
    return this.entry === null
  }

  /** Expiry of the current entry, if any. */
  get expiresAt(): number | undefined {
    return this.entry?.expiresAt
  }
}
