/* src/runner/stream/hub.ts
 * Fan-out of stream messages to subscribers by stream id.
 * Publishing is synchronous, so each subscriber sees one instance's
 * messages in emission order.
 */
import { DEFAULT_BUFFER_SIZE, MessageQueue } from '@/runner/stream/queue';
import type { StreamMessage } from '@/runner/stream/frame';

export class StreamHub {
  private readonly subs = new Map<string, Set<MessageQueue<StreamMessage>>>();
  private closed = false;

  constructor(private readonly defaultCapacity = DEFAULT_BUFFER_SIZE) {}

  /**
   * Subscribe to one stream id.
   *
   * @returns A single-pass sequence; it ends when the hub closes or the
   *   consumer breaks out of iteration.
   */
  public subscribe(
    streamId: string,
    opts?: { capacity?: number },
  ): MessageQueue<StreamMessage> {
    const q = new MessageQueue<StreamMessage>(
      opts?.capacity ?? this.defaultCapacity,
    );
    if (this.closed) {
      q.close();
      return q;
    }
    let set = this.subs.get(streamId);
    if (!set) {
      set = new Set();
      this.subs.set(streamId, set);
    }
    set.add(q);
    return q;
  }

  public publish(msg: StreamMessage): void {
    const set = this.subs.get(msg.streamId);
    if (!set) return;
    for (const q of set) {
      if (q.isClosed) set.delete(q);
      else q.push(msg);
    }
    if (set.size === 0) this.subs.delete(msg.streamId);
  }

  /** Number of open subscriptions for a stream id. */
  public subscribers(streamId: string): number {
    let n = 0;
    for (const q of this.subs.get(streamId) ?? []) if (!q.isClosed) n += 1;
    return n;
  }

  /** Total messages dropped by slow subscribers of a stream id. */
  public dropped(streamId: string): number {
    let n = 0;
    for (const q of this.subs.get(streamId) ?? []) n += q.dropped;
    return n;
  }

  public close(): void {
    this.closed = true;
    for (const set of this.subs.values()) for (const q of set) q.close();
    this.subs.clear();
  }
}
