import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { triggerAction } from '@/cli/trigger/action';
import { rmDirWithRetries } from '@/test';
import { writeDeck } from '@/test-support/deck';
import { discreteScript, echoScript, failScript } from '@/test-support/scripts';

describe('scriptdeck trigger', () => {
  let dir: string;
  let logs: string[];
  let errors: string[];

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'scriptdeck-trigger-'));
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

  it('runs with widget defaults plus --set and prints the JSON result', async () => {
    await writeDeck(
      dir,
      [
        {
          name: 'calc',
          type: 'discrete',
          src: discreteScript('result = { fn, sum: state.a + state.b };'),
          functions: [{ name: 'add' }],
        },
      ],
      { layout: { sliders: [{ id: 'a', default: 2 }] } },
    );
    const code = await triggerAction(dir, 'calc', 'add', { set: ['b=3'] });
    expect(code).toBe(0);
    expect(logs).toEqual([JSON.stringify({ fn: 'add', sum: 5 }, null, 2)]);
  });

  it('accepts script.function in one argument', async () => {
    await writeDeck(dir, [
      { name: 'echo', type: 'discrete', src: echoScript, functions: [{ name: 'go' }] },
    ]);
    const code = await triggerAction(dir, 'echo.go', undefined, { set: [] });
    expect(code).toBe(0);
    expect(JSON.parse(logs.join('\n'))).toEqual({ fn: 'go', state: {} });
  });

  it('prints the error and stderr tail, exit code 1', async () => {
    await writeDeck(dir, [{ name: 'bad', type: 'discrete', src: failScript(2, 'oh no') }]);
    const code = await triggerAction(dir, 'bad', undefined, { set: [] });
    expect(code).toBe(1);
    expect(errors).toEqual(['bad: exited with code 2', '  | oh no']);
  });

  it('reports a missing config', async () => {
    const code = await triggerAction(dir, 'calc', undefined, { set: [] });
    expect(code).toBe(1);
    expect(errors[0]).toMatch(/^scriptdeck: no scriptdeck\.config\.yml/);
  });

  it('reports an unknown script', async () => {
    await writeDeck(dir, [{ name: 'echo', type: 'discrete', src: echoScript }]);
    const code = await triggerAction(dir, 'nope', undefined, { set: [] });
    expect(code).toBe(1);
    expect(errors).toEqual(['script not found: nope']);
  });
});
