/**
 * Candidate Pool Cache
 *
 * Candidate pools such as "every type name visible in a compilation" are
 * expensive to collect and reused across many unresolved identifiers. This
 * cache belongs to one analysis session: create one per session, pass it to
 * whatever builds pools, and invalidate it when the session's inputs change.
 * It is never shared through module state.
 */

export class CandidatePoolCache<T> {
  private pools = new Map<string, readonly T[]>();
  private hits = 0;
  private misses = 0;

  /**
   * Return the pool stored under `key`, building and storing it on first use.
   * A builder that throws stores nothing.
   */
  getOrBuild(key: string, build: () => Iterable<T>): readonly T[] {
    const cached = this.pools.get(key);
    if (cached) {
      this.hits++;
      return cached;
    }

    this.misses++;
    const pool = Object.freeze([...build()]);
    this.pools.set(key, pool);
    return pool;
  }

  has(key: string): boolean {
    return this.pools.has(key);
  }

  /** Drop one pool, or every pool when no key is given */
  invalidate(key?: string): void {
    if (key === undefined) {
      this.pools.clear();
    } else {
      this.pools.delete(key);
    }
  }

  get size(): number {
    return this.pools.size;
  }

  getStats(): { pools: number; hits: number; misses: number } {
    return { pools: this.pools.size, hits: this.hits, misses: this.misses };
  }
}
