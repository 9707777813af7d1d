/* Root CLI factory for the "walletdesk" tool.
 * - Registers subcommands: consolidate, upload.
 * - Avoids invoking process.exit during tests (exitOverride).
 * - Global -d/--debug and -b/--boring resolve flags > config > built-ins.
 */
import { Command, Option } from 'commander';

import { applyCliSafety, rootDefaults, tagDefault } from './cli-utils';
import { registerConsolidate } from './consolidate';
import { registerUpload } from './upload';

/**
 * Build the root CLI (`walletdesk`) without side effects (safe for tests).
 *
 * @returns New Commander `Command` instance.
 */
export const makeCli = (): Command => {
  const cli = new Command();
  const { debugDefault, boringDefault } = rootDefaults();

  cli
    .name('walletdesk')
    .description(
      'Consolidate the coins of an address and upload small files on-chain from the terminal.',
    );

  const optDebug = new Option('-d, --debug', 'enable verbose debug logging');
  const optNoDebug = new Option(
    '-D, --no-debug',
    'disable verbose debug logging',
  );
  tagDefault(debugDefault ? optDebug : optNoDebug, true);
  cli.addOption(optDebug).addOption(optNoDebug);

  const optBoring = new Option(
    '-b, --boring',
    'disable all color and styling (useful for tests/CI)',
  );
  const optNoBoring = new Option(
    '-B, --no-boring',
    'do not disable color/styling',
  );
  tagDefault(boringDefault ? optBoring : optNoBoring, true);
  cli.addOption(optBoring).addOption(optNoBoring);

  applyCliSafety(cli);

  // Propagate -d/--debug and -b/--boring to the environment before any action.
  cli.hook('preAction', () => {
    const opts = cli.opts<{ debug?: boolean; boring?: boolean }>();
    const { debugDefault: dbg, boringDefault: boring } = rootDefaults();
    const fromCli = (name: string): boolean =>
      cli.getOptionValueSource(name) === 'cli';

    // An explicit WALLETDESK_DEBUG=1 survives unless negated on the command line.
    const debugFinal = fromCli('debug')
      ? Boolean(opts.debug)
      : process.env.WALLETDESK_DEBUG === '1' || dbg;
    const boringFinal = fromCli('boring') ? Boolean(opts.boring) : boring;

    if (debugFinal) process.env.WALLETDESK_DEBUG = '1';
    else delete process.env.WALLETDESK_DEBUG;
    if (boringFinal) {
      process.env.WALLETDESK_BORING = '1';
      process.env.FORCE_COLOR = '0';
      process.env.NO_COLOR = '1';
    } else {
      delete process.env.WALLETDESK_BORING;
    }
  });

  registerConsolidate(cli);
  registerUpload(cli);

  // Root invocation without a subcommand prints help (no exit).
  cli.action(() => {
    console.log(cli.helpInformation());
  });

  return cli;
};
