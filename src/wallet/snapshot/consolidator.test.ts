import { describe, expect, it } from 'vitest';

import { addr, coin } from '@/test-support/wallet';
import type { ConsolidationRequest } from '@/wallet/types';

import {
  consolidationTransactions,
  estimateTxSize,
  matchesFilter,
  maxInputsFor,
} from './consolidator';

const A = addr(0x11);
const B = addr(0x22);

const request = (over?: Partial<ConsolidationRequest>): ConsolidationRequest => ({
  source: A,
  destination: A,
  maxTxSize: 100_000,
  includeCoinbase: true,
  includeNonCoinbase: true,
  includeFrozen: false,
  includeTokens: false,
  minimumValue: null,
  maximumValue: null,
  ...over,
});

describe('size model', () => {
  it('estimates P2PKH sizes and input capacity', () => {
    expect(estimateTxSize(2, 1)).toBe(340);
    expect(maxInputsFor(100_000)).toBe(675);
    expect(maxInputsFor(192)).toBe(1);
    expect(maxInputsFor(191)).toBe(0);
  });
});

describe('matchesFilter', () => {
  it('applies kind flags and inclusive value bounds', () => {
    const r = request({ minimumValue: 546, maximumValue: 1000 });
    expect(matchesFilter(coin(1, A, { value: 546 }), r)).toBe(true);
    expect(matchesFilter(coin(1, A, { value: 1000 }), r)).toBe(true);
    expect(matchesFilter(coin(1, A, { value: 545 }), r)).toBe(false);
    expect(matchesFilter(coin(1, A, { value: 1001 }), r)).toBe(false);
    expect(matchesFilter(coin(1, A, { value: 600, frozen: true }), r)).toBe(false);
    expect(matchesFilter(coin(1, A, { value: 600, token: true }), r)).toBe(false);
    expect(
      matchesFilter(
        coin(1, A, { value: 600, coinbase: true }),
        request({ includeCoinbase: false }),
      ),
    ).toBe(false);
    expect(
      matchesFilter(coin(1, A, { value: 600 }), request({ includeNonCoinbase: false })),
    ).toBe(false);
  });
});

describe('consolidationTransactions', () => {
  const coins = [
    coin(3, A, { value: 3000 }),
    coin(1, A, { value: 1000 }),
    coin(2, A, { value: 2000 }),
    coin(4, B, { value: 9000 }),
  ];

  it('packs the oldest coins first and keeps a lone leftover in place', () => {
    const txs = [...consolidationTransactions(coins, request({ maxTxSize: 340 }))];
    expect(txs).toHaveLength(1);
    const [tx] = txs;
    expect(tx?.inputs.map((i) => i.value)).toEqual([1000, 2000]);
    expect(tx?.size).toBe(340);
    expect(tx?.fee).toBe(340);
    expect(tx?.signed).toBe(false);
    expect(tx?.outputs).toEqual([
      { kind: 'address', address: A.toString(), value: 2660 },
    ]);
  });

  it('moves a lone leftover when the destination differs', () => {
    const txs = [
      ...consolidationTransactions(
        coins,
        request({ maxTxSize: 340, destination: B }),
      ),
    ];
    expect(txs.map((t) => t.outputs[0]?.value)).toEqual([2660, 2808]);
    expect(txs[1]?.size).toBe(192);
  });

  it('skips batches whose output would be dust', () => {
    const dusty = [coin(1, A, { value: 400 }), coin(2, A, { value: 300 })];
    expect([...consolidationTransactions(dusty, request({ destination: B }))]).toEqual(
      [],
    );
  });

  it('yields nothing when no input fits the size limit', () => {
    expect([...consolidationTransactions(coins, request({ maxTxSize: 191 }))]).toEqual(
      [],
    );
  });

  it('is lazy', () => {
    const gen = consolidationTransactions(
      coins,
      request({ maxTxSize: 192, destination: B }),
    );
    const values: number[] = [];
    for (const tx of gen) {
      values.push(tx.inputs[0]?.value ?? 0);
      if (values.length === 2) break;
    }
    expect(values).toEqual([1000, 2000]);
  });
});
