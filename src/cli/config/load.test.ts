import { mkdir, mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  findConfigPath,
  loadConfig,
  toDeclarations,
  widgetDefaults,
} from '@/cli/config/load';
import { ConfigError } from '@/runner/errors';
import { rmDirWithRetries } from '@/test';

const yml = `
scripts:
  - name: calc
    path: scripts/calc.py
    type: discrete
    functions:
      - name: add
        display: Add numbers
      - name: reset
  - name: sensor
    path: scripts/sensor.py
    type: streaming
layout:
  title: Bench
  sliders:
    - id: gain
      min: 0
      max: 5
      default: 1
    - id: offset
  inputFields:
    - id: label
      default: run-a
    - id: notes
  plots:
    - streamId: temp
runtime:
  command: python3
  args: ["-u"]
  restart:
    maxAttempts: 3
`;

describe('config loading', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'scriptdeck-config-'));
  });

  afterEach(async () => {
    await rmDirWithRetries(dir);
  });

  it('finds the nearest config walking up from a subdirectory', async () => {
    await writeFile(path.join(dir, 'scriptdeck.config.yml'), yml, 'utf8');
    const sub = path.join(dir, 'a', 'b');
    await mkdir(sub, { recursive: true });
    expect(findConfigPath(sub)).toBe(path.join(dir, 'scriptdeck.config.yml'));
  });

  it('loads YAML with defaults applied', async () => {
    await writeFile(path.join(dir, 'scriptdeck.config.yml'), yml, 'utf8');
    const cfg = await loadConfig(dir);
    expect(cfg.dir).toBe(dir);
    expect(cfg.runtime).toEqual({
      command: 'python3',
      args: ['-u'],
      timeoutMs: 30_000,
      stopGraceMs: 2_000,
      restart: { maxAttempts: 3 },
      bufferSize: 10_000,
    });
    expect(cfg.debug).toEqual({ streaming: false });
    expect(toDeclarations(cfg)).toEqual([
      {
        name: 'calc',
        path: 'scripts/calc.py',
        mode: 'discrete',
        functions: [
          { name: 'add', display: 'Add numbers' },
          { name: 'reset', display: 'reset' },
        ],
      },
      { name: 'sensor', path: 'scripts/sensor.py', mode: 'streaming', functions: [] },
    ]);
    expect(widgetDefaults(cfg)).toEqual({ gain: 1, offset: 0, label: 'run-a', notes: '' });
  });

  it('loads JSON from an explicit path', async () => {
    const p = path.join(dir, 'deck.json');
    await writeFile(
      p,
      JSON.stringify({ scripts: [{ name: 'x', path: 'x.py', type: 'discrete' }] }),
      'utf8',
    );
    const cfg = await loadConfig(dir, 'deck.json');
    expect(cfg.scripts[0]?.functions).toEqual([]);
    expect(cfg.layout.sliders).toEqual([]);
  });

  it('reports a missing config', async () => {
    await expect(loadConfig(dir, 'nope.yml')).rejects.toThrow(
      'scriptdeck: config not found: nope.yml',
    );
  });

  it('reports unparseable text', async () => {
    await writeFile(path.join(dir, 'scriptdeck.config.yml'), 'scripts: [', 'utf8');
    await expect(loadConfig(dir)).rejects.toThrow(ConfigError);
  });

  it('lists every schema issue with its path', async () => {
    await writeFile(
      path.join(dir, 'scriptdeck.config.yml'),
      `
scripts:
  - name: calc
    path: calc.py
    type: batch
  - name: calc
    path: calc.py
    type: discrete
layout:
  sliders:
    - id: calc
      min: 5
      max: 1
`,
      'utf8',
    );
    let caught: unknown;
    try {
      await loadConfig(dir);
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(caught.message.split('\n')[0]).toBe(
      `scriptdeck: invalid config in ${path.join(dir, 'scriptdeck.config.yml').replace(/\\/g, '/')}`,
    );
    expect(caught.issues.some((i) => i.startsWith('scripts.0.type:'))).toBe(true);
    expect(caught.issues).toContain('layout.sliders.0: slider min must not exceed max');
  });

  it('rejects widget ids that collide with script names', async () => {
    await writeFile(
      path.join(dir, 'scriptdeck.config.yml'),
      `
scripts:
  - name: calc
    path: calc.py
    type: discrete
  - name: calc
    path: calc2.py
    type: discrete
layout:
  inputFields:
    - id: calc
`,
      'utf8',
    );
    let caught: unknown;
    try {
      await loadConfig(dir);
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(caught.issues).toEqual([
      'scripts.1: duplicate script name "calc"',
      'layout.widgets.0: widget id "calc" collides with a script result key',
    ]);
  });

  const loadError = async (): Promise<ConfigError> => {
    try {
      await loadConfig(dir);
    } catch (e) {
      if (e instanceof ConfigError) return e;
      throw e;
    }
    throw new Error('expected a ConfigError');
  };

  it('rejects widget ids that collide with a function result key', async () => {
    await writeFile(
      path.join(dir, 'scriptdeck.config.yml'),
      `
scripts:
  - name: calc
    path: calc.py
    type: discrete
    functions:
      - name: add
layout:
  sliders:
    - id: calc.add
`,
      'utf8',
    );
    expect((await loadError()).issues).toEqual([
      'layout.widgets.0: widget id "calc.add" collides with a script result key',
    ]);
  });

  it('rejects script names containing a dot', async () => {
    await writeFile(
      path.join(dir, 'scriptdeck.config.yml'),
      `
scripts:
  - name: calc.v2
    path: calc.py
    type: discrete
`,
      'utf8',
    );
    expect((await loadError()).issues).toEqual([
      'scripts.0.name: script name must not contain "."',
    ]);
  });
});
