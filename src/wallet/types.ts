// src/wallet/types.ts
import type { Address } from './address';

/** A spendable output owned by the wallet. */
export type Coin = {
  txid: string;
  vout: number;
  /** Value in satoshis. */
  value: number;
  address: Address;
  height: number;
  coinbase: boolean;
  frozen: boolean;
  /** Carries tokens that would be burned if spent by a plain transaction. */
  token: boolean;
};

export type TxInput = {
  txid: string;
  vout: number;
  value: number;
  address: string;
};

export type TxOutput =
  | { kind: 'address'; address: string; value: number }
  | { kind: 'data'; script: string; value: number };

export type Transaction = {
  inputs: readonly TxInput[];
  outputs: readonly TxOutput[];
  /** Serialized size in bytes (estimated while unsigned). */
  size: number;
  fee: number;
  signed: boolean;
  /** Known once the transaction is signed. */
  txid?: string;
};

export type CoinFilter = {
  includeCoinbase: boolean;
  includeNonCoinbase: boolean;
  includeFrozen: boolean;
  includeTokens: boolean;
  /** Lower value bound in satoshis (inclusive), or null. */
  minimumValue: number | null;
  /** Upper value bound in satoshis (inclusive), or null. */
  maximumValue: number | null;
};

export type ConsolidationRequest = CoinFilter & {
  source: Address;
  destination: Address;
  maxTxSize: number;
};

/** A lazily evaluated sequence; nothing is computed until iteration. */
export type LazySequence<T> = Iterable<T> | AsyncIterable<T>;

export type BroadcastResult =
  | { ok: true; txid: string }
  | { ok: false; message: string };

export type FileMetadata = {
  filename: string | null;
  fileext: string | null;
  filesize: number | null;
  fileSha256: string | null;
  prevFileSha256: string | null;
  uri: string | null;
};

export type UploadTransactionArgs = {
  /** Transaction whose change output funds this one. */
  previous: Transaction;
  chunkIndex: number;
  chunkCount: number;
  /** Chunk payload, or null once every chunk has been placed. */
  chunk: Uint8Array | null;
  metadata: FileMetadata;
  receiver: Address | null;
};

/** File-chunking protocol encoder (metadata op-return construction). */
export interface FileProtocol {
  calculateUploadCost(filesize: number, metadata: FileMetadata): number;
  /** Length in bytes of the metadata op-return script for this metadata. */
  metadataScriptLength(metadata: FileMetadata): number;
  /** @throws InsufficientFundsError */
  fundingTransaction(address: Address, cost: number): Promise<Transaction>;
  /** @throws InsufficientFundsError */
  uploadTransaction(
    args: UploadTransactionArgs,
  ): Promise<{ transaction: Transaction; isFinal: boolean }>;
}

export interface WalletBackend {
  readonly name: string;
  /** Address prefix used when parsing user-entered addresses. */
  readonly prefix?: Address['prefix'];
  consolidate(request: ConsolidationRequest): LazySequence<Transaction>;
  getUnusedAddress(): Promise<Address>;
  /** @throws SigningDeclinedError when the user declines. */
  sign(tx: Transaction): Promise<Transaction>;
  broadcast(tx: Transaction): Promise<BroadcastResult>;
  readonly files?: FileProtocol;
}
