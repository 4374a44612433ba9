/* src/runner/stream/queue.ts
 * Bounded, single-consumer async message queue.
 * Producers never block: when the buffer is full the oldest entry is
 * dropped and counted. Iteration is single-pass.
 */

export const DEFAULT_BUFFER_SIZE = 10_000;

export class MessageQueue<T> implements AsyncIterable<T> {
  private readonly items: T[] = [];
  private head = 0;
  private waiter: ((r: IteratorResult<T>) => void) | null = null;
  private closed = false;
  private iterated = false;
  private droppedCount = 0;

  constructor(private readonly capacity = DEFAULT_BUFFER_SIZE) {
    if (!Number.isInteger(capacity) || capacity < 1)
      throw new RangeError(`capacity must be a positive integer (got ${capacity})`);
  }

  public get size(): number {
    return this.items.length - this.head;
  }

  public get dropped(): number {
    return this.droppedCount;
  }

  public get isClosed(): boolean {
    return this.closed;
  }

  /** Enqueue (or hand straight to a waiting consumer). No-op once closed. */
  public push(item: T): void {
    if (this.closed) return;
    if (this.waiter) {
      const w = this.waiter;
      this.waiter = null;
      w({ value: item, done: false });
      return;
    }
    if (this.size >= this.capacity) {
      this.head += 1;
      this.droppedCount += 1;
    }
    this.items.push(item);
    this.compact();
  }

  /** End the sequence; buffered items are still delivered first. */
  public close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.waiter) {
      const w = this.waiter;
      this.waiter = null;
      w({ value: undefined, done: true });
    }
  }

  private compact(): void {
    // Reclaim the consumed prefix once it dominates the array.
    if (this.head > 1024 && this.head * 2 > this.items.length) {
      this.items.splice(0, this.head);
      this.head = 0;
    }
  }

  private next(): Promise<IteratorResult<T>> {
    if (this.size > 0) {
      const value = this.items[this.head];
      this.head += 1;
      this.compact();
      return Promise.resolve({ value, done: false });
    }
    if (this.closed) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolveP) => {
      this.waiter = resolveP;
    });
  }

  public [Symbol.asyncIterator](): AsyncIterator<T> {
    if (this.iterated) throw new Error('message sequence can only be iterated once');
    this.iterated = true;
    return {
      next: () => this.next(),
      return: () => {
        this.close();
        this.items.length = 0;
        this.head = 0;
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }
}
