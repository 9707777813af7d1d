/* src/wallet/snapshot/consolidator.ts
 * Offline consolidation planner: filters an address's coins and packs them
 * greedily into size-bounded transactions, one transaction per iteration.
 */
import { DUST_THRESHOLD } from '@/wallet/units';
import type {
  Coin,
  CoinFilter,
  ConsolidationRequest,
  Transaction,
} from '@/wallet/types';

export const TX_OVERHEAD_SIZE = 10;
export const P2PKH_INPUT_SIZE = 148;
export const P2PKH_OUTPUT_SIZE = 34;
export const FEE_PER_BYTE = 1;

export const estimateTxSize = (inputs: number, outputs: number): number =>
  TX_OVERHEAD_SIZE + P2PKH_INPUT_SIZE * inputs + P2PKH_OUTPUT_SIZE * outputs;

/** Largest input count that keeps a single-output transaction within maxTxSize. */
export const maxInputsFor = (maxTxSize: number): number =>
  Math.max(
    0,
    Math.floor(
      (maxTxSize - TX_OVERHEAD_SIZE - P2PKH_OUTPUT_SIZE) / P2PKH_INPUT_SIZE,
    ),
  );

export const matchesFilter = (coin: Coin, filter: CoinFilter): boolean => {
  if (coin.coinbase ? !filter.includeCoinbase : !filter.includeNonCoinbase)
    return false;
  if (coin.frozen && !filter.includeFrozen) return false;
  if (coin.token && !filter.includeTokens) return false;
  if (filter.minimumValue !== null && coin.value < filter.minimumValue)
    return false;
  if (filter.maximumValue !== null && coin.value > filter.maximumValue)
    return false;
  return true;
};

const byAge = (a: Coin, b: Coin): number =>
  a.height - b.height || a.txid.localeCompare(b.txid) || a.vout - b.vout;

/**
 * Lazily yield consolidation transactions for `request.source`.
 * A lone leftover coin is only moved when the destination differs from the
 * source; outputs below the dust threshold are never produced.
 */
export function* consolidationTransactions(
  coins: readonly Coin[],
  request: ConsolidationRequest,
): Generator<Transaction, void, undefined> {
  const selected = coins
    .filter((c) => c.address.equals(request.source))
    .filter((c) => matchesFilter(c, request))
    .sort(byAge);
  const perTx = maxInputsFor(request.maxTxSize);
  if (perTx === 0) return;
  const sameDestination = request.destination.equals(request.source);

  for (let i = 0; i < selected.length; i += perTx) {
    const batch = selected.slice(i, i + perTx);
    if (batch.length === 1 && sameDestination) return;
    const size = estimateTxSize(batch.length, 1);
    const fee = size * FEE_PER_BYTE;
    const total = batch.reduce((sum, c) => sum + c.value, 0);
    const value = total - fee;
    if (value < DUST_THRESHOLD) continue;
    yield {
      inputs: batch.map((c) => ({
        txid: c.txid,
        vout: c.vout,
        value: c.value,
        address: c.address.toString(),
      })),
      outputs: [
        { kind: 'address', address: request.destination.toString(), value },
      ],
      size,
      fee,
      signed: false,
    };
  }
}
