import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { checkAction, renderScriptsTable } from '@/cli/check/action';
import { rmDirWithRetries } from '@/test';
import { writeDeck } from '@/test-support/deck';
import { echoScript, emitterScript } from '@/test-support/scripts';

describe('scriptdeck check', () => {
  let dir: string;
  let logs: string[];
  let errors: string[];

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'scriptdeck-check-'));
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

  it('renders one row per script', () => {
    const out = renderScriptsTable([
      {
        name: 'calc',
        mode: 'discrete',
        path: '/p/calc.py',
        functions: [{ name: 'add', display: 'Add' }],
      },
      { name: 'sensor', mode: 'streaming', path: '/p/sensor.py', functions: [] },
    ]);
    const rows = out.split('\n');
    expect(rows.some((r) => r.includes('calc') && r.includes('add (Add)'))).toBe(true);
    expect(rows.some((r) => r.includes('sensor') && r.includes('streaming'))).toBe(true);
  });

  it('lists scripts, widgets and streams of a valid config', async () => {
    await writeDeck(
      dir,
      [
        { name: 'calc', type: 'discrete', src: echoScript },
        { name: 'sensor', type: 'streaming', src: emitterScript({ count: 1 }) },
      ],
      {
        layout: {
          sliders: [{ id: 'gain' }],
          inputFields: [{ id: 'label' }],
          plots: [{ streamId: 'temp' }],
        },
      },
    );
    expect(await checkAction(dir, {})).toBe(0);
    expect(logs).toContain('widgets: gain, label');
    expect(logs).toContain('streams: temp');
    expect(logs.at(-1)).toBe('scriptdeck: config ok');
  });

  it('fails when a script file is missing', async () => {
    await writeDeck(dir, [], {
      scripts: [{ name: 'ghost', path: 'ghost.py', type: 'discrete' }],
    });
    expect(await checkAction(dir, {})).toBe(1);
    expect(errors).toEqual(['invalid scripts\nscripts[0] (ghost): ghost.py: file not found']);
  });
});
