// src/cli/consolidate/options.ts
import type { Command } from 'commander';
import { Option as Opt } from 'commander';

import {
  loadConfigForDefaults,
  parseDelayMs,
  tagDefault,
} from '@/cli/cli-utils';
import {
  DEFAULT_MAXIMUM_DISPLAY,
  DEFAULT_MINIMUM_DISPLAY,
  MAX_STANDARD_TX_SIZE,
  MAX_TX_SIZE,
  MIN_TX_SIZE,
} from '@/runner/consolidate/options';
import { COIN_UNIT } from '@/wallet/units';

export type ConsolidateCliOptions = {
  coinbase?: boolean;
  nonCoinbase?: boolean;
  frozen?: boolean;
  tokens?: boolean;
  min?: string | boolean;
  max?: string | boolean;
  to?: string;
  maxTxSize?: number;
  snapshot?: string;
  export?: string;
  sign?: boolean;
  broadcast?: boolean;
  broadcastDelay?: number;
  yes?: boolean;
  live?: boolean;
};

const toInt = (v: string): number => Number(v.trim());

/** Boolean pair with the effective default tagged in help. */
const addPair = (
  sub: Command,
  on: Opt,
  off: Opt,
  effective: boolean,
): void => {
  tagDefault(on, effective);
  tagDefault(off, !effective);
  sub.addOption(on).addOption(off);
};

export function attachConsolidateOptions(sub: Command): void {
  const d = loadConfigForDefaults()?.cliDefaults?.consolidate;

  addPair(
    sub,
    new Opt('--coinbase', 'include coinbase coins'),
    new Opt('--no-coinbase', 'exclude coinbase coins'),
    d?.coinbase ?? true,
  );
  addPair(
    sub,
    new Opt('--non-coinbase', 'include non-coinbase coins'),
    new Opt('--no-non-coinbase', 'exclude non-coinbase coins'),
    d?.nonCoinbase ?? true,
  );
  addPair(
    sub,
    new Opt('--frozen', 'include frozen coins'),
    new Opt('--no-frozen', 'exclude frozen coins'),
    d?.frozen ?? false,
  );
  addPair(
    sub,
    new Opt('--tokens', 'include coins holding tokens (burns the tokens)'),
    new Opt('--no-tokens', 'exclude coins holding tokens'),
    d?.tokens ?? false,
  );

  sub
    .addOption(
      new Opt(
        '--min [amount]',
        `minimum coin value in ${COIN_UNIT} (${DEFAULT_MINIMUM_DISPLAY} when no amount is given)`,
      ),
    )
    .addOption(
      new Opt(
        '--max [amount]',
        `maximum coin value in ${COIN_UNIT} (${DEFAULT_MAXIMUM_DISPLAY} when no amount is given)`,
      ),
    )
    .addOption(
      new Opt(
        '--to <address>',
        'destination address, or "same" for the source address',
      ).default('same'),
    )
    .addOption(
      new Opt(
        '--max-tx-size <bytes>',
        `maximum transaction size (${String(MIN_TX_SIZE)}-${String(MAX_TX_SIZE)})`,
      )
        .argParser(toInt)
        .default(d?.maxTxSize ?? MAX_STANDARD_TX_SIZE),
    )
    .addOption(
      new Opt('--snapshot <file>', 'plan against a wallet snapshot file'),
    )
    .addOption(
      new Opt('--export <file>', 'write the unsigned transactions as JSON'),
    )
    .addOption(new Opt('--sign', 'sign the built transactions'))
    .addOption(
      new Opt('--broadcast', 'sign and broadcast the built transactions'),
    )
    .addOption(
      new Opt(
        '--broadcast-delay <ms>',
        'pause between broadcasts',
      ).argParser(parseDelayMs),
    )
    .addOption(
      new Opt('-y, --yes', 'accept the token-burn warning without asking'),
    );

  addPair(
    sub,
    new Opt('--live', 'render a live progress table'),
    new Opt('--no-live', 'log one line per progress event'),
    d?.live ?? Boolean(process.stdout.isTTY),
  );
}
