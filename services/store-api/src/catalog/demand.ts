/**
 * Sale-miss counters, keyed by isbn.
 *
 * Only the failure path of a purchase writes here; only removal clears. A book
 * is "in demand" while its counter is above zero.
 */
export class DemandTracker {
  private readonly misses = new Map<number, number>();

  recordMiss(isbn: number, shortfall: number): number {
    if (!Number.isInteger(shortfall) || shortfall <= 0) {
      throw new RangeError(`Sale-miss shortfall for isbn ${isbn} must be a positive integer, got ${shortfall}`);
    }
    const total = this.missesFor(isbn) + shortfall;
    this.misses.set(isbn, total);
    return total;
  }

  missesFor(isbn: number): number {
    return this.misses.get(isbn) ?? 0;
  }

  clear(isbn: number): void {
    this.misses.delete(isbn);
  }

  clearAll(): void {
    this.misses.clear();
  }

  /** Isbns with at least one recorded miss, ascending */
  isbnsInDemand(): number[] {
    return [...this.misses.keys()].sort((a, b) => a - b);
  }
}
