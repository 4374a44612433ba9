import { describe, expect, it } from 'vitest';

import { MessageQueue } from '@/runner/stream/queue';

const collect = async <T>(q: AsyncIterable<T>): Promise<T[]> => {
  const out: T[] = [];
  for await (const v of q) out.push(v);
  return out;
};

describe('MessageQueue', () => {
  it('delivers buffered items in order, then ends after close', async () => {
    const q = new MessageQueue<number>(10);
    q.push(1);
    q.push(2);
    q.close();
    q.push(3);
    expect(await collect(q)).toEqual([1, 2]);
  });

  it('drops the oldest entries when full and counts them', async () => {
    const q = new MessageQueue<number>(3);
    for (let i = 0; i < 5; i++) q.push(i);
    expect(q.size).toBe(3);
    expect(q.dropped).toBe(2);
    q.close();
    expect(await collect(q)).toEqual([2, 3, 4]);
  });

  it('hands items straight to a waiting consumer', async () => {
    const q = new MessageQueue<string>(1);
    const iter = q[Symbol.asyncIterator]();
    const pending = iter.next();
    q.push('a');
    expect(await pending).toEqual({ value: 'a', done: false });
    const end = iter.next();
    q.close();
    expect(await end).toEqual({ value: undefined, done: true });
  });

  it('can be iterated only once', () => {
    const q = new MessageQueue<number>();
    q[Symbol.asyncIterator]();
    expect(() => q[Symbol.asyncIterator]()).toThrow(
      'message sequence can only be iterated once',
    );
  });

  it('breaking out of iteration closes the queue', async () => {
    const q = new MessageQueue<number>();
    q.push(1);
    q.push(2);
    for await (const v of q) {
      expect(v).toBe(1);
      break;
    }
    expect(q.isClosed).toBe(true);
    expect(q.size).toBe(0);
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new MessageQueue(0)).toThrow(RangeError);
  });

  it('keeps order across many items (compaction)', async () => {
    const q = new MessageQueue<number>(5000);
    for (let i = 0; i < 3000; i++) q.push(i);
    q.close();
    const got = await collect(q);
    expect(got).toHaveLength(3000);
    expect(got.every((v, i) => v === i)).toBe(true);
  });
});
