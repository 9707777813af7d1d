import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createRecordingUI } from '@/test-support/ui';
import {
  addr,
  createFakeBackend,
  unsignedTx,
} from '@/test-support/wallet';
import {
  AddressError,
  InsufficientFundsError,
  SigningDeclinedError,
  ValidationError,
} from '@/wallet/errors';
import type {
  BroadcastResult,
  FileProtocol,
  Transaction,
  UploadTransactionArgs,
  WalletBackend,
} from '@/wallet/types';

import { UploadSession } from './session';

const HASH = 'ab'.repeat(32);

/** Metadata script of 50 bytes; cost is 1000 sat plus one per byte. */
const fakeFiles = (over?: Partial<FileProtocol>) => {
  const uploads: UploadTransactionArgs[] = [];
  const files: FileProtocol = {
    calculateUploadCost: (size) => 1000 + size,
    metadataScriptLength: () => 50,
    fundingTransaction: (_address, cost) => Promise.resolve(unsignedTx(cost)),
    uploadTransaction: (args) => {
      uploads.push(args);
      return Promise.resolve({
        transaction: unsignedTx(args.chunkIndex),
        isFinal: args.chunk === null || args.chunkIndex === args.chunkCount - 1,
      });
    },
    ...over,
  };
  return { files, uploads };
};

describe('UploadSession', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'walletdesk-upload-'));
    file = path.join(dir, 'notes.txt');
    await writeFile(file, new Uint8Array(450).fill(7));
  });
  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const setup = (opts?: {
    files?: Partial<FileProtocol>;
    backend?: Partial<WalletBackend>;
  }) => {
    const { files, uploads } = fakeFiles(opts?.files);
    const backend = createFakeBackend({ ...opts?.backend, files });
    const ui = createRecordingUI();
    const texts: string[] = [];
    const session = new UploadSession({
      backend,
      ui,
      broadcastDelayMs: 0,
      onProgressText: (t) => texts.push(t),
    });
    return { backend, session, texts, ui, uploads };
  };

  it('needs a backend that can upload files', () => {
    expect(() => new UploadSession({ backend: createFakeBackend() })).toThrow(
      'the fake backend does not support file uploads',
    );
  });

  it('signs the funding transaction and the chunk chain', async () => {
    const { session, texts, uploads } = setup();
    await session.selectFile(file);
    session.setPreviousHash(HASH.toUpperCase());
    expect(session.isDirty()).toBe(true);

    await expect(session.sign()).resolves.toEqual({
      kind: 'signed',
      uri: 'bitcoinfile:tx4',
      count: 4,
    });
    expect(texts).toEqual([
      'Signing 1 of 4 transactions',
      'Signing 2 of 4 transactions',
      'Signing 3 of 4 transactions',
      'Signing 4 of 4 transactions',
      'Signing complete. Ready to upload.',
    ]);
    expect(session.isDirty()).toBe(false);
    expect(session.canUpload()).toBe(true);
    expect(session.getCost()).toBe(1450);
    expect(session.getUri()).toBe('bitcoinfile:tx4');
    expect(session.getMetadata()).toMatchObject({
      filename: 'notes',
      fileext: '.txt',
      filesize: 450,
      prevFileSha256: HASH,
    });
    expect(session.getTransactions().map((t) => t.txid)).toEqual([
      'tx1',
      'tx2',
      'tx3',
      'tx4',
    ]);
    expect(
      uploads.map((u) => [u.chunkIndex, u.chunk?.length ?? null, u.previous.txid]),
    ).toEqual([
      [0, 220, 'tx1'],
      [1, 220, 'tx2'],
      [2, 10, 'tx3'],
    ]);
    expect(uploads.every((u) => u.receiver === null)).toBe(true);
  });

  it('passes the receiver through to every chunk', async () => {
    const receiver = addr(0x33);
    const { session, uploads } = setup();
    await session.selectFile(file);
    session.setReceiver(receiver.toShortString());
    await session.sign();
    expect(uploads).toHaveLength(3);
    expect(uploads.every((u) => u.receiver?.equals(receiver))).toBe(true);
  });

  it('validates inputs before building anything', async () => {
    const { session } = setup();
    await expect(session.sign()).rejects.toThrow(
      new ValidationError('select a file to upload'),
    );
    await session.selectFile(file);
    session.setPreviousHash('xyz');
    await expect(session.sign()).rejects.toThrow(
      'Previous document hash must be a 32 byte hexadecimal string or left empty.',
    );
    session.setPreviousHash('');
    session.setReceiver('nope');
    await expect(session.sign()).rejects.toThrow(AddressError);
    await expect(session.sign()).rejects.toThrow(
      'receiver address is invalid: invalid address nope: ',
    );
  });

  it('rejects a receiver on another network', async () => {
    const foreign = addr(0x33, 'bchtest').toString();
    const { session, uploads } = setup();
    await session.selectFile(file);
    session.setReceiver(foreign);
    await expect(session.sign()).rejects.toThrow(
      new AddressError(
        `receiver address is invalid: address ${foreign} is not a bitcoincash address`,
      ),
    );
    expect(uploads).toHaveLength(0);
  });

  it('rejects oversized files', async () => {
    const big = path.join(dir, 'big.bin');
    await writeFile(big, new Uint8Array(5262));
    const { session } = setup();
    await session.selectFile(big);
    await expect(session.sign()).rejects.toThrow(
      'Files cannot be larger than 5.261kB in size.',
    );
  });

  it('reports an unfunded upload with the required balance', async () => {
    const { session, ui } = setup({
      files: {
        fundingTransaction: () => Promise.reject(new InsufficientFundsError()),
      },
    });
    await session.selectFile(file);
    const message =
      'Insufficient funds. You must have a balance of at least 1450 sat and at least 1 block confirmation.';
    await expect(session.sign()).resolves.toEqual({ kind: 'failed', message });
    expect(session.getProgressText()).toBe(message);
    expect(session.canUpload()).toBe(false);
    expect(ui.calls).toEqual([`end sign:upload error ${message}`]);
  });

  it('names the chunk that ran out of funds', async () => {
    let calls = 0;
    const { session } = setup({
      files: {
        uploadTransaction: (args) =>
          ++calls === 2
            ? Promise.reject(new InsufficientFundsError())
            : Promise.resolve({
                transaction: unsignedTx(args.chunkIndex),
                isFinal: false,
              }),
      },
    });
    await session.selectFile(file);
    await expect(session.sign()).resolves.toEqual({
      kind: 'failed',
      message: 'Insufficient funds for file chunk #2',
    });
    expect(session.getTransactions()).toHaveLength(2);
    expect(session.canUpload()).toBe(false);
  });

  it('stops when a signature is declined', async () => {
    let calls = 0;
    const { session, backend } = setup({
      backend: {
        sign: (tx: Transaction) =>
          ++calls === 3
            ? Promise.reject(new SigningDeclinedError())
            : Promise.resolve({ ...tx, signed: true, txid: `s${String(calls)}` }),
      },
    });
    await session.selectFile(file);
    await expect(session.sign()).resolves.toEqual({
      kind: 'failed',
      message: 'Signing was declined',
    });
    expect(backend.signed).toEqual([]);
    expect(session.getUri()).toBeNull();
  });

  it('broadcasts the signed chain in order', async () => {
    const { session, texts, backend } = setup();
    await session.selectFile(file);
    await session.sign();
    texts.length = 0;

    await expect(session.upload()).resolves.toEqual({
      kind: 'uploaded',
      uri: 'bitcoinfile:tx4',
      sha256: session.getSha256(),
      txids: ['tx1', 'tx2', 'tx3', 'tx4'],
    });
    expect(backend.broadcasted.map((t) => t.txid)).toEqual([
      'tx1',
      'tx2',
      'tx3',
      'tx4',
    ]);
    expect(texts).toEqual([
      'Broadcasting 1 of 4 transactions',
      'Broadcasting 1 of 4 transactions',
      'Broadcasting 2 of 4 transactions',
      'Broadcasting 3 of 4 transactions',
      'Broadcasting 4 of 4 transactions',
      'File upload complete.',
    ]);
  });

  it('reports a rejected broadcast', async () => {
    const { session, ui } = setup({
      backend: {
        broadcast: async (tx): Promise<BroadcastResult> =>
          tx.txid === 'tx3'
            ? { ok: false, message: 'bad-txns-inputs-missingorspent' }
            : { ok: true, txid: tx.txid ?? '' },
      },
    });
    await session.selectFile(file);
    await session.sign();
    await expect(session.upload()).resolves.toEqual({
      kind: 'failed',
      messages: ['bad-txns-inputs-missingorspent', 'Upload failed. Try again.'],
    });
    expect(session.getProgressText()).toBe(
      'bad-txns-inputs-missingorspent\nUpload failed. Try again.',
    );
    expect(ui.calls.at(-1)).toBe(
      'end broadcast:upload error bad-txns-inputs-missingorspent',
    );
  });

  it('requires signing again after any edit', async () => {
    const { session } = setup();
    await session.selectFile(file);
    await session.sign();
    session.setReceiver('');
    expect(session.isDirty()).toBe(true);
    expect(session.canUpload()).toBe(false);
    expect(session.getUri()).toBeNull();
    expect(session.getTransactions()).toEqual([]);
    await expect(session.upload()).rejects.toThrow(
      'sign the upload transactions before uploading',
    );
  });
});
