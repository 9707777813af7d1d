// src/cli/consolidate/render.ts
import { table } from 'table';

import { bold } from '@/runner/util/color';
import type { Transaction } from '@/wallet/types';
import { COIN_UNIT, formatSats } from '@/wallet/units';

export const outputValue = (tx: Transaction): number =>
  tx.outputs.reduce((sum, o) => sum + o.value, 0);

/** Tabular summary of built transactions, with a totals line. */
export const renderTransactions = (txs: readonly Transaction[]): string => {
  const rows: string[][] = [
    ['#', 'Inputs', `Value (${COIN_UNIT})`, 'Fee (sat)', 'Size (bytes)'].map(
      (h) => bold(h),
    ),
  ];
  for (const [i, tx] of txs.entries()) {
    rows.push([
      String(i + 1),
      String(tx.inputs.length),
      formatSats(outputValue(tx)),
      String(tx.fee),
      String(tx.size),
    ]);
  }
  const inputs = txs.reduce((n, tx) => n + tx.inputs.length, 0);
  const value = txs.reduce((n, tx) => n + outputValue(tx), 0);
  const fees = txs.reduce((n, tx) => n + tx.fee, 0);
  const body = table(rows, {
    columns: [
      { alignment: 'right' },
      { alignment: 'right' },
      { alignment: 'right' },
      { alignment: 'right' },
      { alignment: 'right' },
    ],
  }).trimEnd();
  return `${body}\n${String(txs.length)} transaction(s), ${String(inputs)} input(s), ${formatSats(value)} ${COIN_UNIT}, ${String(fees)} sat in fees`;
};
