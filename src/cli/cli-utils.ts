/** Shared Commander helpers for the scriptdeck CLI.
 * DRY the repeated exitOverride + argument parsing across subcommands.
 */
import type { Command } from 'commander';

import { ConfigError } from '@/runner/errors';
import { type AppStateValue, coerceCliValue } from '@/runner/state/value';

/** Install a Commander exit override that swallows benign exits (help/version). */
export const installExitOverride = (cmd: Command): void => {
  cmd.exitOverride((err) => {
    const swallow = new Set<string>([
      'commander.helpDisplayed',
      'commander.help',
      'commander.version',
    ]);
    if (swallow.has(err.code)) return;
    throw err;
  });
};

/** Commander collector for repeatable `--set key=value`. */
export const collectAssignment = (value: string, previous: string[]): string[] => [
  ...previous,
  value,
];

/**
 * Parse `key=value` pairs into app state entries. Values that parse as JSON
 * keep their type (`gain=2.5`, `flags=[1,2]`); anything else is a string.
 *
 * @throws ConfigError when an entry has no `=` or an empty key.
 */
export const parseAssignments = (
  pairs: readonly string[],
): Record<string, AppStateValue> => {
  const out = new Map<string, AppStateValue>();
  for (const p of pairs) {
    const eq = p.indexOf('=');
    const key = eq > 0 ? p.slice(0, eq).trim() : '';
    if (!key) throw new ConfigError(`invalid --set "${p}" (expected key=value)`);
    out.set(key, coerceCliValue(p.slice(eq + 1)));
  }
  return Object.fromEntries(out);
};

/** Split `script.function` into its parts (first dot only). */
export const parseTarget = (target: string): { script: string; fn?: string } => {
  const dot = target.indexOf('.');
  return dot > 0
    ? { script: target.slice(0, dot), fn: target.slice(dot + 1) || undefined }
    : { script: target };
};

/** Compact single-line rendering of a value for console output. */
export const formatValue = (v: AppStateValue, max = 120): string => {
  const s = typeof v === 'string' ? v : JSON.stringify(v);
  return s.length > max ? `${s.slice(0, max - 1)}…` : s;
};
