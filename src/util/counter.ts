/** `[key, count]` pairs in first-seen order. Integer-like keys keep their place, unlike object keys. */
export type Histogram = [string, number][];

/**
 * Tally of occurrences per key. Keys keep their first-insertion order, which
 * is also the tie-break order for {@link Counter.mostCommon}.
 */
export class Counter {
  private readonly counts = new Map<string, number>();

  increment(key: string, by = 1): void {
    this.counts.set(key, this.get(key) + by);
  }

  get(key: string): number {
    return this.counts.get(key) ?? 0;
  }

  get size(): number {
    return this.counts.size;
  }

  total(): number {
    let sum = 0;
    for (const value of this.counts.values()) sum += value;
    return sum;
  }

  entries(): Histogram {
    return Array.from(this.counts.entries());
  }

  mostCommon(limit?: number): [string, number][] {
    return rankEntries(this.entries(), limit);
  }

  leastCommon(limit?: number): [string, number][] {
    const sorted = this.entries().sort((a, b) => a[1] - b[1]);
    return limit === undefined ? sorted : sorted.slice(0, limit);
  }

  static fromEntries(entries: Histogram): Counter {
    const counter = new Counter();
    for (const [key, value] of entries) counter.increment(key, value);
    return counter;
  }
}

/** Descending by count; Array.prototype.sort is stable so ties keep input order. */
export function rankEntries(entries: [string, number][], limit?: number): [string, number][] {
  const sorted = [...entries].sort((a, b) => b[1] - a[1]);
  return limit === undefined ? sorted : sorted.slice(0, limit);
}
