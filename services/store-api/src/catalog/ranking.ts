import { averageRating, type StockBook } from '@bookstore/shared';

/** Negative when `a` ranks ahead of `b` */
export type RankOrder<T> = (a: T, b: T) => number;

/**
 * Binary heap holding at most `capacity` items. The root is the item that
 * ranks last, so a better candidate replaces it in O(log k).
 */
export class BoundedHeap<T> {
  private readonly items: T[] = [];

  constructor(
    private readonly capacity: number,
    private readonly order: RankOrder<T>
  ) {}

  get size(): number {
    return this.items.length;
  }

  offer(item: T): void {
    if (this.capacity === 0) return;

    if (this.items.length < this.capacity) {
      this.items.push(item);
      this.siftUp(this.items.length - 1);
    } else if (this.order(item, this.items[0]) < 0) {
      this.items[0] = item;
      this.siftDown(0);
    }
  }

  /** Contents, best first */
  drain(): T[] {
    return [...this.items].sort(this.order);
  }

  // The root must be the item that ranks last, so parent/child comparisons are inverted
  private ranksLater(i: number, j: number): boolean {
    return this.order(this.items[i], this.items[j]) > 0;
  }

  private siftUp(index: number): void {
    let child = index;
    while (child > 0) {
      const parent = (child - 1) >> 1;
      if (!this.ranksLater(child, parent)) break;
      this.swap(child, parent);
      child = parent;
    }
  }

  private siftDown(index: number): void {
    let parent = index;
    for (;;) {
      const left = parent * 2 + 1;
      const right = left + 1;
      let last = parent;
      if (left < this.items.length && this.ranksLater(left, last)) last = left;
      if (right < this.items.length && this.ranksLater(right, last)) last = right;
      if (last === parent) return;
      this.swap(parent, last);
      parent = last;
    }
  }

  private swap(i: number, j: number): void {
    const held = this.items[i];
    this.items[i] = this.items[j];
    this.items[j] = held;
  }
}

export type RatedEntry = Pick<StockBook, 'isbn' | 'totalRating' | 'numTimesRated'>;

/** Higher average first; equal averages by ascending isbn */
export const byRating: RankOrder<RatedEntry> = (a, b) =>
  averageRating(b) - averageRating(a) || a.isbn - b.isbn;

export function selectTopRated<T extends RatedEntry>(books: Iterable<T>, k: number): T[] {
  const heap = new BoundedHeap<T>(k, byRating);
  for (const book of books) {
    heap.offer(book);
  }
  return heap.drain();
}
