/**
 * Set of seen listing fingerprints shared by every section worker.
 *
 * `add` checks and records in one synchronous step, so no two callers can
 * both observe a key as new. Keys are never removed.
 */
export class Deduplicator {
  private readonly seen = new Set<string>();

  /** `true` iff `key` was new and is now recorded */
  add(key: string): boolean {
    if (this.seen.has(key)) {
      return false;
    }
    this.seen.add(key);
    return true;
  }

  count(): number {
    return this.seen.size;
  }
}
