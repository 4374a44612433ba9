// src/test-support/deck.ts
// Temp project with a config that runs Node scripts.
import { writeFile } from 'node:fs/promises';
import path from 'node:path';

import YAML from 'yaml';

import { writeScript } from './scripts';

export type TestScript = {
  name: string;
  type: 'discrete' | 'streaming';
  src: string;
  functions?: Array<{ name: string; display?: string }>;
};

/** Write scripts plus scriptdeck.config.yml into `dir`. */
export const writeDeck = async (
  dir: string,
  scripts: TestScript[],
  extra: Record<string, unknown> = {},
): Promise<string> => {
  for (const s of scripts) await writeScript(dir, path.join('scripts', `${s.name}.cjs`), s.src);
  const cfg = {
    scripts: scripts.map((s) => ({
      name: s.name,
      path: `scripts/${s.name}.cjs`,
      type: s.type,
      ...(s.functions ? { functions: s.functions } : {}),
    })),
    runtime: {
      command: process.execPath,
      stopGraceMs: 500,
      restart: { baseDelayMs: 50, maxDelayMs: 50, maxAttempts: 1 },
    },
    ...extra,
  };
  const p = path.join(dir, 'scriptdeck.config.yml');
  await writeFile(p, YAML.stringify(cfg), 'utf8');
  return p;
};
