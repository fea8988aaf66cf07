/**
 * Bounded, newest-first history.
 *
 * Entries are kept oldest-first internally. Eviction only advances
 * `head`; the dead prefix is dropped once it outgrows the live part, so
 * an insert into a full history costs amortized O(1) whatever the limit.
 * Every mutation is synchronous: on the event loop an insert-with-eviction
 * never interleaves with a trim, so the size read and the removal it
 * drives always see the same state.
 */
export class BoundedHistory<T> {
  private entries: T[] = [];
  private head = 0;

  get size(): number {
    return this.entries.length - this.head;
  }

  /**
   * Inserts `item` as the newest entry. When the history already holds
   * `max` or more entries, the oldest are evicted in one step so that
   * the size equals `max` after the insert.
   */
  insert(item: T, max: number): void {
    if (this.size >= max) {
      this.evictOldest(this.size - max + 1);
    }
    this.entries.push(item);
  }

  /** Drops the oldest entries until at most `max` remain. */
  trimTo(max: number): number {
    if (this.size <= max) return 0;
    return this.evictOldest(this.size - max);
  }

  /** Newest-first copy. */
  snapshot(): T[] {
    return this.entries.slice(this.head).reverse();
  }

  clear(): void {
    this.entries = [];
    this.head = 0;
  }

  private evictOldest(count: number): number {
    const removed = Math.min(Math.max(0, count), this.size);
    this.head += removed;
    if (this.head > this.size) {
      this.entries = this.entries.slice(this.head);
      this.head = 0;
    }
    return removed;
  }
}
