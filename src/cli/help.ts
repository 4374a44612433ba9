import { readFileSync } from 'node:fs';

import { findConfigPath, parseDeckConfig } from '@/cli/config/load';
import { parseText } from '@/common/config/parse';
import { debugFallback } from '@/runner/util/debug';
import { DBG_SCOPE_CONFIG_LOAD } from '@/runner/util/debug-scopes';

/**
 * Render a help footer that lists declared scripts and examples.
 *
 * @param cwd - Directory used to locate `scriptdeck.config.*`.
 * @returns Multi‑line string (empty when config cannot be loaded).
 *
 * Notes:
 * - When `SCRIPTDECK_DEBUG=1`, logs why the config could not be read.
 */
export const renderAvailableScriptsHelp = (cwd: string): string => {
  const cfgPath = findConfigPath(cwd);
  if (!cfgPath) return '';
  try {
    const cfg = parseDeckConfig(parseText(cfgPath, readFileSync(cfgPath, 'utf8')), cfgPath);
    if (cfg.scripts.length === 0) return '';
    const discrete = cfg.scripts.filter((s) => s.type === 'discrete');
    const streaming = cfg.scripts.filter((s) => s.type === 'streaming');
    const lines = ['', 'Declared scripts:'];
    if (discrete.length > 0)
      lines.push(`  discrete:  ${discrete.map((s) => s.name).join(', ')}`);
    if (streaming.length > 0)
      lines.push(`  streaming: ${streaming.map((s) => s.name).join(', ')}`);
    lines.push('', 'Examples:', '  scriptdeck check', '  scriptdeck run --duration 10000');
    const first = discrete.at(0);
    if (first) {
      const fn = first.functions.at(0);
      lines.push(`  scriptdeck trigger ${first.name}${fn ? ` ${fn.name}` : ''}`);
    }
    lines.push('');
    return lines.join('\n');
  } catch (e) {
    debugFallback(
      DBG_SCOPE_CONFIG_LOAD,
      `help footer skipped (${e instanceof Error ? e.message : String(e)})`,
    );
    return '';
  }
};
