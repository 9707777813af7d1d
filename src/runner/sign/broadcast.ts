// src/runner/sign/broadcast.ts
import { setTimeout as delay } from 'node:timers/promises';

import type { BroadcastResult, Transaction } from '@/wallet/types';

export const DEFAULT_BROADCAST_DELAY_MS = 100;

export type BroadcastAllResult =
  | { ok: true; txids: string[] }
  | { ok: false; index: number; message: string; txids: string[] };

/**
 * Broadcast transactions in order, one at a time, pausing `delayMs` after
 * each success. The first failure stops the sequence.
 */
export const broadcastAll = async (
  txs: readonly Transaction[],
  broadcast: (tx: Transaction) => Promise<BroadcastResult>,
  opts?: {
    delayMs?: number;
    onBroadcast?: (count: number, total: number) => void;
  },
): Promise<BroadcastAllResult> => {
  const delayMs = opts?.delayMs ?? DEFAULT_BROADCAST_DELAY_MS;
  const txids: string[] = [];
  for (const [index, tx] of txs.entries()) {
    const res = await broadcast(tx);
    if (!res.ok) return { ok: false, index, message: res.message, txids };
    txids.push(res.txid);
    if (delayMs > 0) await delay(delayMs);
    opts?.onBroadcast?.(txids.length, txs.length);
  }
  return { ok: true, txids };
};
