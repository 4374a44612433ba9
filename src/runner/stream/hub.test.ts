import { describe, expect, it } from 'vitest';

import type { StreamMessage } from '@/runner/stream/frame';
import { StreamHub } from '@/runner/stream/hub';

const msg = (streamId: string, seq: number): StreamMessage => ({
  streamId,
  timestamp: 0,
  payload: seq,
  seq,
});

const collect = async (q: AsyncIterable<StreamMessage>): Promise<number[]> => {
  const out: number[] = [];
  for await (const m of q) out.push(m.seq);
  return out;
};

describe('StreamHub', () => {
  it('fans out by stream id, preserving order per subscriber', async () => {
    const hub = new StreamHub();
    const a1 = hub.subscribe('a');
    const a2 = hub.subscribe('a');
    const b = hub.subscribe('b');
    for (let i = 0; i < 3; i++) hub.publish(msg('a', i));
    hub.publish(msg('b', 9));
    hub.publish(msg('other', 1));
    expect(hub.subscribers('a')).toBe(2);
    hub.close();
    expect(await collect(a1)).toEqual([0, 1, 2]);
    expect(await collect(a2)).toEqual([0, 1, 2]);
    expect(await collect(b)).toEqual([9]);
  });

  it('a slow subscriber drops oldest without affecting others', async () => {
    const hub = new StreamHub();
    const small = hub.subscribe('s', { capacity: 2 });
    const big = hub.subscribe('s');
    for (let i = 0; i < 5; i++) hub.publish(msg('s', i));
    expect(hub.dropped('s')).toBe(3);
    hub.close();
    expect(await collect(small)).toEqual([3, 4]);
    expect(await collect(big)).toEqual([0, 1, 2, 3, 4]);
  });

  it('forgets closed subscriptions', () => {
    const hub = new StreamHub();
    const q = hub.subscribe('s');
    q.close();
    hub.publish(msg('s', 0));
    expect(hub.subscribers('s')).toBe(0);
  });

  it('subscriptions after close are already ended', async () => {
    const hub = new StreamHub();
    hub.close();
    expect(await collect(hub.subscribe('s'))).toEqual([]);
  });
});
