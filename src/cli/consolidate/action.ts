// src/cli/consolidate/action.ts
import type { Command } from 'commander';
import fse from 'fs-extra';

import { reportError, resolveFlag } from '@/cli/cli-utils';
import { resolveCommandContext } from '@/cli/context';
import { ConsolidationSession } from '@/runner/consolidate/session';
import { confirmTokenBurn } from '@/runner/prompt/confirm';
import { attachSessionSignals } from '@/runner/session/signals';
import { createUI } from '@/runner/ui';
import { isBoring } from '@/runner/util/color';
import { parseAddressFor } from '@/wallet/address';
import { BroadcastError } from '@/wallet/errors';

import type { ConsolidateCliOptions } from './options';
import { renderTransactions } from './render';

export const runConsolidate = async (
  address: string,
  opts: ConsolidateCliOptions,
  cmd: Command,
): Promise<void> => {
  const cwd = process.cwd();
  const ctx = await resolveCommandContext(cwd, { snapshot: opts.snapshot });
  const d = ctx.config.cliDefaults?.consolidate;
  const source = parseAddressFor(address, ctx.prefix);

  const ui = createUI({
    live: resolveFlag(
      cmd,
      'live',
      opts.live,
      d?.live,
      Boolean(process.stdout.isTTY),
    ),
    boring: isBoring(),
  });
  const session = new ConsolidationSession({
    backend: ctx.backend,
    source,
    ui,
    confirmTokenBurn: opts.yes ? () => Promise.resolve(true) : confirmTokenBurn,
  });

  // Coin-selection page
  const filter = await session.setCoinSelection({
    includeCoinbase: resolveFlag(cmd, 'coinbase', opts.coinbase, d?.coinbase, true),
    includeNonCoinbase: resolveFlag(
      cmd,
      'nonCoinbase',
      opts.nonCoinbase,
      d?.nonCoinbase,
      true,
    ),
    includeFrozen: resolveFlag(cmd, 'frozen', opts.frozen, d?.frozen, false),
    includeTokens: resolveFlag(cmd, 'tokens', opts.tokens, d?.tokens, false),
    minimum: opts.min ?? d?.minimum,
    maximum: opts.max ?? d?.maximum,
  });
  if (opts.tokens && !filter.includeTokens) {
    console.log('walletdesk: coins holding tokens are excluded');
  }
  await session.next();

  // Outputs page
  session.setOutputs({ destination: opts.to, maxTxSize: opts.maxTxSize });

  // Transactions page
  ui.start();
  const detach = attachSessionSignals(() => {
    session.cancel().catch(reportError);
  });
  try {
    await session.next();
    await session.settled();
  } finally {
    detach();
    ui.stop();
  }

  const status = session.getStatus();
  console.log(`walletdesk: ${session.getStatusText()}`);
  if (status === 'interrupted' || status === 'failed') {
    process.exitCode = 1;
    return;
  }
  if (status !== 'finished') return;

  console.log(renderTransactions(session.getTransactions()));

  if (opts.export) {
    await fse.outputJson(opts.export, session.exportTransactions(), { spaces: 2 });
    console.log(`walletdesk: wrote ${opts.export}`);
  }
  if (!opts.sign && !opts.broadcast) return;

  ui.start();
  try {
    const signed = await session.signAll();
    if (signed.state.kind === 'failed') {
      reportError(signed.state.error);
      return;
    }
    console.log(
      `walletdesk: signed ${String(signed.transactions.length)} transaction(s)`,
    );
    if (!opts.broadcast) return;
    const sent = await session.broadcastAll(
      opts.broadcastDelay ?? d?.broadcastDelay,
    );
    if (!sent.ok) {
      reportError(
        new BroadcastError(
          `broadcast of transaction ${String(sent.index + 1)} failed: ${sent.message}`,
        ),
      );
      return;
    }
    for (const txid of sent.txids) console.log(txid);
  } finally {
    ui.stop();
  }
};
