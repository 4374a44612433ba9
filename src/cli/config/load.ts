/* src/cli/config/load.ts
 * Locate, parse and validate scriptdeck configuration.
 * Search order: explicit path, then scriptdeck.config.{yml,yaml,json}
 * walking up from cwd.
 */
import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { ZodError } from 'zod';

import { type DeckConfig, deckConfigSchema } from '@/cli/config/schema';
import { parseText } from '@/common/config/parse';
import { ConfigError } from '@/runner/errors';
import type { ScriptDeclaration } from '@/runner/registry';
import type { AppStateValue } from '@/runner/state/value';

export const CONFIG_FILE_NAMES = [
  'scriptdeck.config.yml',
  'scriptdeck.config.yaml',
  'scriptdeck.config.json',
] as const;

export type LoadedConfig = DeckConfig & {
  /** Absolute path of the config file. */
  path: string;
  /** Directory script paths resolve against. */
  dir: string;
};

/** Find the nearest config file at or above `cwd`. */
export const findConfigPath = (cwd: string): string | null => {
  let dir = path.resolve(cwd);
  for (;;) {
    for (const name of CONFIG_FILE_NAMES) {
      const p = path.join(dir, name);
      if (existsSync(p)) return p;
    }
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
};

export const formatZodIssues = (e: ZodError): string[] =>
  e.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);

/**
 * Validate an already-parsed config object.
 *
 * @throws ConfigError listing every issue.
 */
export const parseDeckConfig = (raw: unknown, cfgPath: string): DeckConfig => {
  try {
    return deckConfigSchema.parse(raw ?? {});
  } catch (e) {
    if (!(e instanceof ZodError)) throw e;
    const rel = cfgPath.replace(/\\/g, '/');
    throw new ConfigError(`scriptdeck: invalid config in ${rel}`, formatZodIssues(e));
  }
};

/**
 * Load and validate the config.
 *
 * @param cwd - Search start directory.
 * @param explicit - Optional config path (relative to cwd).
 * @throws ConfigError when no config exists or it is invalid.
 */
export const loadConfig = async (
  cwd: string,
  explicit?: string,
): Promise<LoadedConfig> => {
  const cfgPath = explicit ? path.resolve(cwd, explicit) : findConfigPath(cwd);
  if (!cfgPath || !existsSync(cfgPath)) {
    throw new ConfigError(
      explicit
        ? `scriptdeck: config not found: ${explicit}`
        : `scriptdeck: no ${CONFIG_FILE_NAMES.join(' / ')} found at or above ${cwd}`,
    );
  }
  const text = await readFile(cfgPath, 'utf8');
  let raw: unknown;
  try {
    raw = parseText(cfgPath, text);
  } catch (e) {
    throw new ConfigError(
      `scriptdeck: cannot parse ${cfgPath.replace(/\\/g, '/')}`,
      [e instanceof Error ? e.message : String(e)],
    );
  }
  const cfg = parseDeckConfig(raw, cfgPath);
  return { ...cfg, path: cfgPath, dir: path.dirname(cfgPath) };
};

/** Script declarations for the registry (display label defaults to the function name). */
export const toDeclarations = (cfg: DeckConfig): ScriptDeclaration[] =>
  cfg.scripts.map((s) => ({
    name: s.name,
    path: s.path,
    mode: s.type,
    functions: s.functions.map((f) => ({
      name: f.name,
      display: f.display ?? f.name,
    })),
  }));

/** Initial app state from widget defaults. */
export const widgetDefaults = (
  cfg: DeckConfig,
): Record<string, AppStateValue> => {
  const out = new Map<string, AppStateValue>();
  for (const s of cfg.layout.sliders) out.set(s.id, s.default);
  for (const f of cfg.layout.inputFields) out.set(f.id, f.default ?? '');
  return Object.fromEntries(out);
};
