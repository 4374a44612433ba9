/* src/cli/index.ts
 * Root CLI factory for scriptdeck.
 * - Registers run, trigger and check.
 * - Global -d/--debug and -b/--boring map to SCRIPTDECK_DEBUG/SCRIPTDECK_BORING
 *   before any subcommand action.
 * - Never calls process.exit (exitOverride), so tests can drive it.
 */
import { Command } from 'commander';

import { registerCheck } from './check/action';
import { installExitOverride } from './cli-utils';
import { renderAvailableScriptsHelp } from './help';
import { registerRun } from './run/action';
import { registerTrigger } from './trigger/action';

/**
 * Build the root CLI (`scriptdeck`) without side effects (safe for tests).
 *
 * @returns New Commander `Command` instance.
 */
export const makeCli = (): Command => {
  const cli = new Command();
  cli
    .name('scriptdeck')
    .description(
      'Drive external scripts from a declarative control panel: one-shot runs fed with app state, and supervised scripts streaming live data.',
    )
    .option('-d, --debug', 'enable verbose debug logging')
    .option('-b, --boring', 'disable all color and styling (useful for tests/CI)');

  // Root-level help footer: declared scripts from the nearest config
  cli.addHelpText('after', () => renderAvailableScriptsHelp(process.cwd()));
  installExitOverride(cli);

  cli.hook('preAction', () => {
    const opts = cli.opts<{ debug?: boolean; boring?: boolean }>();
    if (opts.debug) process.env.SCRIPTDECK_DEBUG = '1';
    if (opts.boring) {
      process.env.SCRIPTDECK_BORING = '1';
      process.env.FORCE_COLOR = '0';
      process.env.NO_COLOR = '1';
    }
  });

  registerRun(cli);
  registerTrigger(cli);
  registerCheck(cli);

  // Bare `scriptdeck`: print help without exiting.
  cli.action(() => {
    console.log(cli.helpInformation());
  });

  return cli;
};
