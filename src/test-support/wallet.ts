/* src/test-support/wallet.ts
 * In-process wallet fakes shared by the session and CLI tests.
 */
import { Address, type AddressPrefix } from '@/wallet/address';
import type {
  BroadcastResult,
  Coin,
  Transaction,
  WalletBackend,
} from '@/wallet/types';

/** P2PKH address whose 20-byte hash repeats `byte`. */
export const addr = (
  byte: number,
  prefix: AddressPrefix = 'bitcoincash',
): Address => new Address(prefix, 'p2pkh', new Uint8Array(20).fill(byte));

export const txidOf = (n: number): string => n.toString(16).padStart(64, '0');

export const coin = (
  n: number,
  address: Address,
  over?: Partial<Omit<Coin, 'address'>>,
): Coin => ({
  txid: txidOf(n),
  vout: 0,
  value: 10_000,
  address,
  height: n,
  coinbase: false,
  frozen: false,
  token: false,
  ...over,
});

export const unsignedTx = (value: number): Transaction => ({
  inputs: [],
  outputs: [{ kind: 'address', address: addr(1).toString(), value }],
  size: 192,
  fee: 192,
  signed: false,
});

export type FakeBackend = WalletBackend & {
  signed: Transaction[];
  broadcasted: Transaction[];
};

/**
 * Backend whose sign() stamps txids "tx1", "tx2", ... in call order and whose
 * broadcast() echoes the txid.
 */
export const createFakeBackend = (
  over?: Partial<WalletBackend>,
): FakeBackend => {
  const signed: Transaction[] = [];
  const broadcasted: Transaction[] = [];
  return {
    name: 'fake',
    prefix: 'bitcoincash',
    consolidate: () => [],
    getUnusedAddress: () => Promise.resolve(addr(9)),
    sign: (tx) => {
      const out = { ...tx, signed: true, txid: `tx${String(signed.length + 1)}` };
      signed.push(out);
      return Promise.resolve(out);
    },
    broadcast: (tx): Promise<BroadcastResult> => {
      broadcasted.push(tx);
      return Promise.resolve({ ok: true, txid: tx.txid ?? '' });
    },
    ...over,
    signed,
    broadcasted,
  };
};
