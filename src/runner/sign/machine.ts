/* src/runner/sign/machine.ts
 * Iterative signing over a growing batch: pending(i) -> all-signed | failed.
 */
import { WalletError } from '@/wallet/errors';
import type { Transaction } from '@/wallet/types';

export type SigningState =
  | { kind: 'pending'; index: number }
  | { kind: 'all-signed' }
  | { kind: 'failed'; index: number; error: WalletError };

export type SigningHooks = {
  sign(tx: Transaction): Promise<Transaction>;
  /**
   * Called after the transaction at `index` is signed. Returning a
   * transaction appends it to the batch; null leaves the batch as is.
   */
  extend?(signed: Transaction, index: number): Promise<Transaction | null>;
  /** Number of transactions signed so far. */
  onSigned?(count: number, batchSize: number): void;
};

export type SigningResult = {
  state: Exclude<SigningState, { kind: 'pending' }>;
  transactions: readonly Transaction[];
};

/**
 * Sign `batch` one transaction at a time. Wallet failures (declined
 * signature, insufficient funds while extending) end in `failed`; anything
 * else propagates.
 */
export const signSequentially = async (
  batch: readonly Transaction[],
  hooks: SigningHooks,
): Promise<SigningResult> => {
  const txs = [...batch];
  let state: SigningState =
    txs.length > 0 ? { kind: 'pending', index: 0 } : { kind: 'all-signed' };

  while (state.kind === 'pending') {
    const i: number = state.index;
    const tx = txs[i];
    if (!tx) break;
    try {
      const signed = await hooks.sign(tx);
      txs[i] = signed;
      hooks.onSigned?.(i + 1, txs.length);
      const next = hooks.extend ? await hooks.extend(signed, i) : null;
      if (next) txs.push(next);
    } catch (e) {
      if (!(e instanceof WalletError)) throw e;
      state = { kind: 'failed', index: i, error: e };
      break;
    }
    state =
      i + 1 < txs.length ? { kind: 'pending', index: i + 1 } : { kind: 'all-signed' };
  }

  return {
    state: state.kind === 'pending' ? { kind: 'all-signed' } : state,
    transactions: txs,
  };
};
