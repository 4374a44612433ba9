/* src/cli/check/action.ts
 * `scriptdeck check`: validate config + script files and list what the panel
 * will drive.
 */
import type { Command } from 'commander';
import { table } from 'table';

import { loadConfig } from '@/cli/config/load';
import { createDeck } from '@/runner/deck';
import { ConfigError } from '@/runner/errors';
import { bold, error, ok } from '@/runner/util/color';

/** Render the script listing (one row per script). */
export const renderScriptsTable = (
  rows: ReadonlyArray<{
    name: string;
    mode: string;
    path: string;
    functions: ReadonlyArray<{ name: string; display: string }>;
  }>,
): string =>
  table(
    [
      ['Script', 'Mode', 'Functions', 'Path'],
      ...rows.map((r) => [
        r.name,
        r.mode,
        r.functions.map((f) => `${f.name} (${f.display})`).join('\n') || '-',
        r.path,
      ]),
    ],
    { drawHorizontalLine: (i, n) => i === 0 || i === 1 || i === n },
  );

/** @returns Process exit code. */
export const checkAction = async (
  cwd: string,
  opts: { config?: string },
): Promise<number> => {
  try {
    const cfg = await loadConfig(cwd, opts.config);
    const { registry } = createDeck(cfg);
    console.log(`${bold('config')}: ${cfg.path.replace(/\\/g, '/')}`);
    console.log(renderScriptsTable(registry.list()));
    const ids = [
      ...cfg.layout.sliders.map((s) => s.id),
      ...cfg.layout.inputFields.map((f) => f.id),
    ];
    if (ids.length) console.log(`widgets: ${ids.join(', ')}`);
    const streams = cfg.layout.plots.map((p) => p.streamId);
    if (streams.length) console.log(`streams: ${streams.join(', ')}`);
    console.log(ok('scriptdeck: config ok'));
    return 0;
  } catch (e) {
    if (!(e instanceof ConfigError)) throw e;
    console.error(error(e.message));
    return 1;
  }
};

export const registerCheck = (cli: Command): Command => {
  cli
    .command('check')
    .description('validate the config and list declared scripts')
    .option('-c, --config <path>', 'config file (default: nearest scriptdeck.config.*)')
    .action(async (opts: { config?: string }) => {
      process.exitCode = await checkAction(process.cwd(), opts);
    });
  return cli;
};
