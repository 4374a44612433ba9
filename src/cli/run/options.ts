/* src/cli/run/options.ts
 * Option surface for `scriptdeck run`.
 */
import { type Command, InvalidArgumentError, Option } from 'commander';

import { collectAssignment } from '../cli-utils';

export type RunOptions = {
  config?: string;
  set: string[];
  stream: string[];
  trigger: string[];
  duration?: number;
  output?: boolean;
};

const parseDuration = (v: string): number => {
  const n = Number(v);
  if (!Number.isInteger(n) || n < 0)
    throw new InvalidArgumentError('expected a non-negative integer (ms)');
  return n;
};

/**
 * Register the `run` subcommand and its options.
 *
 * @returns The subcommand (action attached separately).
 */
export const registerRunOptions = (cli: Command): Command =>
  cli
    .command('run')
    .description(
      'start streaming scripts, print their messages and script events until interrupted',
    )
    .addOption(
      new Option('-c, --config <path>', 'config file (default: nearest scriptdeck.config.*)'),
    )
    .addOption(
      new Option('--set <key=value>', 'seed an app state entry (repeatable)')
        .argParser(collectAssignment)
        .default([]),
    )
    .addOption(
      new Option(
        '-s, --stream <id>',
        'stream id to print (repeatable; default: every plot in the layout)',
      )
        .argParser(collectAssignment)
        .default([]),
    )
    .addOption(
      new Option('-t, --trigger <script[.fn]>', 'trigger a discrete run after start (repeatable)')
        .argParser(collectAssignment)
        .default([]),
    )
    .addOption(
      new Option('--duration <ms>', 'stop after this many milliseconds').argParser(
        parseDuration,
      ),
    )
    .addOption(new Option('-o, --output', 'forward script stdout/stderr lines'));
