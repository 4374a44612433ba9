/* src/cli/trigger/action.ts
 * `scriptdeck trigger <script> [function]`: one discrete run against the
 * config's widget defaults (plus --set), result printed as JSON.
 */
import type { Command } from 'commander';

import { loadConfig } from '@/cli/config/load';
import { createDeck, type Deck } from '@/runner/deck';
import { isScriptdeckError } from '@/runner/errors';
import { resultKey } from '@/runner/registry';
import { attachSessionSignals } from '@/runner/session/signals';
import { error } from '@/runner/util/color';

import { collectAssignment, parseAssignments, parseTarget } from '../cli-utils';
import { renderEvent } from '../run/render';

export type TriggerOptions = { config?: string; set: string[] };

/** @returns Process exit code. */
export const triggerAction = async (
  cwd: string,
  target: string,
  fnArg: string | undefined,
  opts: TriggerOptions,
): Promise<number> => {
  const parsed = parseTarget(target);
  const fn = fnArg ?? parsed.fn;
  let deck: Deck;
  try {
    deck = createDeck(await loadConfig(cwd, opts.config));
    for (const [k, v] of Object.entries(parseAssignments(opts.set)))
      deck.store.set(k, v);
  } catch (e) {
    if (!isScriptdeckError(e)) throw e;
    console.error(error(e.message));
    return 1;
  }
  const { scheduler, supervisor } = deck;
  const detach = attachSessionSignals(
    () => void scheduler.stop(),
    () => supervisor.killAllSync(),
  );
  try {
    const value = await scheduler.trigger(parsed.script, fn);
    console.log(JSON.stringify(value, null, 2));
    return 0;
  } catch (e) {
    if (!isScriptdeckError(e)) throw e;
    const lines = renderEvent({
      type: 'error',
      key: resultKey(parsed.script, fn),
      error: e,
    });
    for (const line of lines) console.error(line);
    return 1;
  } finally {
    await scheduler.stop();
    detach();
  }
};

export const registerTrigger = (cli: Command): Command => {
  cli
    .command('trigger')
    .description('run one discrete script (or script function) and print its result')
    .argument('<script>', 'script name (or script.function)')
    .argument('[function]', 'function to call')
    .option('-c, --config <path>', 'config file (default: nearest scriptdeck.config.*)')
    .option('--set <key=value>', 'app state entry (repeatable)', collectAssignment, [])
    .action(async (script: string, fn: string | undefined, opts: TriggerOptions) => {
      process.exitCode = await triggerAction(process.cwd(), script, fn, opts);
    });
  return cli;
};
