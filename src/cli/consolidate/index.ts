/** src/cli/consolidate/index.ts
 * Consolidate CLI: thin registry that composes safety, options and action.
 */
import type { Command } from 'commander';

import { applyCliSafety, reportError } from '../cli-utils';
import { runConsolidate } from './action';
import { attachConsolidateOptions, type ConsolidateCliOptions } from './options';

/** Register the `consolidate` subcommand on the provided root CLI. */
export function registerConsolidate(cli: Command): Command {
  const sub = cli
    .command('consolidate')
    .argument('<address>', 'address whose coins are consolidated')
    .description(
      'Build transactions that merge the coins of one address, with live progress and Ctrl+C cancellation',
    );
  applyCliSafety(sub);
  attachConsolidateOptions(sub);
  sub.action(
    async (address: string, opts: ConsolidateCliOptions, cmd: Command) => {
      await runConsolidate(address, opts, cmd).catch(reportError);
    },
  );
  return cli;
}
