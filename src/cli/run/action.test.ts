import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { loadConfig } from '@/cli/config/load';
import { layoutStreamIds, runDeck } from '@/cli/run/action';
import type { RunOptions } from '@/cli/run/options';
import { rmDirWithRetries } from '@/test';
import { writeDeck } from '@/test-support/deck';
import { discreteScript, emitterScript, failScript } from '@/test-support/scripts';

const opts = (o: Partial<RunOptions>): RunOptions => ({
  set: [],
  stream: [],
  trigger: [],
  ...o,
});

describe('scriptdeck run', () => {
  let dir: string;
  let logs: string[];
  let errors: string[];

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'scriptdeck-run-'));
    logs = [];
    errors = [];
    vi.spyOn(console, 'log').mockImplementation((...a: unknown[]) => {
      logs.push(a.map(String).join(' '));
    });
    vi.spyOn(console, 'error').mockImplementation((...a: unknown[]) => {
      errors.push(a.map(String).join(' '));
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rmDirWithRetries(dir);
  });

  it('defaults to the stream ids bound in the layout', async () => {
    await writeDeck(dir, [], {
      layout: { plots: [{ streamId: 'a' }, { streamId: 'b' }, { streamId: 'a' }], table: { streamId: 'rows' } },
    });
    expect(layoutStreamIds(await loadConfig(dir))).toEqual(['a', 'b', 'rows']);
  });

  it('streams plot messages and runs --trigger targets until --duration', async () => {
    await writeDeck(
      dir,
      [
        { name: 'sensor', type: 'streaming', src: emitterScript({ count: 3, streamId: 'temp' }) },
        { name: 'calc', type: 'discrete', src: discreteScript('result = state.gain * 10;') },
      ],
      { layout: { sliders: [{ id: 'gain', default: 1 }], plots: [{ streamId: 'temp' }] } },
    );
    const code = await runDeck(dir, opts({ set: ['gain=4'], trigger: ['calc'], duration: 1500 }));
    expect(code).toBe(0);
    expect(logs.filter((l) => l.startsWith('[temp'))).toEqual([
      '[temp #0] {"i":0}',
      '[temp #1] {"i":1}',
      '[temp #2] {"i":2}',
    ]);
    expect(logs).toContain('calc = 40');
    expect(logs.some((l) => l.startsWith('sensor: streaming (pid '))).toBe(true);
  });

  it('exits 1 when a --trigger run fails', async () => {
    await writeDeck(dir, [{ name: 'bad', type: 'discrete', src: failScript(1) }]);
    const code = await runDeck(dir, opts({ trigger: ['bad', 'ghost'], duration: 0 }));
    expect(code).toBe(1);
    expect(errors).toContain('bad: exited with code 1');
    expect(errors).toContain('script not found: ghost');
  });

  it('exits 1 on an invalid config', async () => {
    await writeDeck(dir, [], { layout: { sliders: [{ id: 'x', min: 3, max: 1, default: 2 }] } });
    const code = await runDeck(dir, opts({ duration: 0 }));
    expect(code).toBe(1);
    expect(errors[0]).toMatch(/^scriptdeck: invalid config in /);
  });
});
