import { describe, expect, it } from 'vitest';

import { attachSessionSignals } from '@/runner/session/signals';

describe('attachSessionSignals', () => {
  it('installs and detaches SIGINT/SIGTERM/exit handlers', () => {
    const before = ['SIGINT', 'SIGTERM', 'exit'].map((e) => process.listenerCount(e));
    const detach = attachSessionSignals(
      () => undefined,
      () => undefined,
    );
    expect(['SIGINT', 'SIGTERM', 'exit'].map((e) => process.listenerCount(e))).toEqual(
      before.map((n) => n + 1),
    );
    detach();
    expect(['SIGINT', 'SIGTERM', 'exit'].map((e) => process.listenerCount(e))).toEqual(before);
  });
});
