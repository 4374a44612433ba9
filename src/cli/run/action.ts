/* src/cli/run/action.ts
 * `scriptdeck run`: console front end for a deck. Starts every streaming
 * script, prints subscribed stream messages as they arrive and drains
 * scheduler events once per frame until interrupted (or --duration).
 */
import type { Command } from 'commander';

import { loadConfig, type LoadedConfig } from '@/cli/config/load';
import { createDeck, type Deck } from '@/runner/deck';
import { ConfigError, isScriptdeckError, ScriptError } from '@/runner/errors';
import { attachSessionSignals } from '@/runner/session/signals';
import { error } from '@/runner/util/color';

import { parseAssignments, parseTarget } from '../cli-utils';
import { registerRunOptions, type RunOptions } from './options';
import { renderEvent, renderMessage } from './render';

/** Event drain interval. */
export const FRAME_MS = 100;

/** Stream ids shown by default: plot and table bindings in the layout. */
export const layoutStreamIds = (cfg: LoadedConfig): string[] => {
  const ids = cfg.layout.plots.map((p) => p.streamId);
  const tableStream = cfg.layout.table?.streamId;
  if (tableStream) ids.push(tableStream);
  return [...new Set(ids)];
};

const flushEvents = (deck: Deck): void => {
  for (const e of deck.scheduler.drainEvents()) {
    const print = e.type === 'error' ? console.error : console.log;
    for (const line of renderEvent(e)) print(line);
  }
};

/**
 * Run the deck until a signal arrives or `duration` elapses.
 *
 * @returns Process exit code (1 on config errors or a failed --trigger).
 */
export const runDeck = async (cwd: string, opts: RunOptions): Promise<number> => {
  let deck: Deck;
  let streamIds: string[];
  try {
    const cfg = await loadConfig(cwd, opts.config);
    deck = createDeck(cfg, { forwardOutput: opts.output });
    for (const [k, v] of Object.entries(parseAssignments(opts.set)))
      deck.store.set(k, v);
    streamIds = opts.stream.length > 0 ? opts.stream : layoutStreamIds(cfg);
  } catch (e) {
    if (!(e instanceof ConfigError)) throw e;
    console.error(error(e.message));
    return 1;
  }

  const { scheduler, supervisor } = deck;
  const consumers = streamIds.map(async (id) => {
    for await (const m of scheduler.subscribe(id)) console.log(renderMessage(m));
  });
  const frame = setInterval(() => flushEvents(deck), FRAME_MS);

  let timer: NodeJS.Timeout | undefined;
  let detach: () => void = () => undefined;
  const stopRequested = new Promise<void>((resolve) => {
    detach = attachSessionSignals(
      () => resolve(),
      () => supervisor.killAllSync(),
    );
    if (opts.duration !== undefined) timer = setTimeout(resolve, opts.duration);
  });

  let failed = false;
  try {
    await scheduler.start();
    for (const t of opts.trigger) {
      const { script, fn } = parseTarget(t);
      try {
        await scheduler.trigger(script, fn);
      } catch (e) {
        if (!isScriptdeckError(e)) throw e;
        failed = true;
        // Script errors already surface as events.
        if (!(e instanceof ScriptError)) console.error(error(e.message));
      }
    }
    await stopRequested;
  } finally {
    if (timer) clearTimeout(timer);
    await scheduler.stop();
    clearInterval(frame);
    flushEvents(deck);
    await Promise.all(consumers);
    detach();
  }
  return failed ? 1 : 0;
};

/**
 * Register the `run` subcommand on the provided root CLI.
 *
 * @returns The same root command for chaining.
 */
export const registerRun = (cli: Command): Command => {
  registerRunOptions(cli).action(async (opts: RunOptions) => {
    process.exitCode = await runDeck(process.cwd(), opts);
  });
  return cli;
};
