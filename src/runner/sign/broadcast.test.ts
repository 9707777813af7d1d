import { describe, expect, it, vi } from 'vitest';

import type { BroadcastResult, Transaction } from '@/wallet/types';

import { broadcastAll } from './broadcast';

const tx = (txid: string): Transaction => ({
  inputs: [],
  outputs: [],
  size: 200,
  fee: 200,
  signed: true,
  txid,
});

describe('broadcastAll', () => {
  it('broadcasts every transaction in order', async () => {
    const seen: string[] = [];
    const progress: string[] = [];
    const res = await broadcastAll(
      [tx('a'), tx('b'), tx('c')],
      (t) => {
        seen.push(t.txid ?? '');
        return Promise.resolve({ ok: true, txid: t.txid ?? '' });
      },
      {
        delayMs: 0,
        onBroadcast: (n, total) => progress.push(`${String(n)}/${String(total)}`),
      },
    );
    expect(res).toEqual({ ok: true, txids: ['a', 'b', 'c'] });
    expect(seen).toEqual(['a', 'b', 'c']);
    expect(progress).toEqual(['1/3', '2/3', '3/3']);
  });

  it('stops at the first rejection', async () => {
    const broadcast = vi.fn(
      async (t: Transaction): Promise<BroadcastResult> =>
        t.txid === 'b'
          ? { ok: false, message: 'txn-mempool-conflict' }
          : { ok: true, txid: t.txid ?? '' },
    );
    const res = await broadcastAll([tx('a'), tx('b'), tx('c')], broadcast, {
      delayMs: 0,
    });
    expect(res).toEqual({
      ok: false,
      index: 1,
      message: 'txn-mempool-conflict',
      txids: ['a'],
    });
    expect(broadcast).toHaveBeenCalledTimes(2);
  });

  it('pauses after each successful broadcast', async () => {
    const started = Date.now();
    const res = await broadcastAll(
      [tx('a'), tx('b')],
      (t) => Promise.resolve({ ok: true, txid: t.txid ?? '' }),
      { delayMs: 25 },
    );
    expect(res.ok).toBe(true);
    expect(Date.now() - started).toBeGreaterThanOrEqual(40);
  });
});
