import { describe, expect, it, vi } from 'vitest';

import { createRecordingUI } from '@/test-support/ui';
import {
  addr,
  createFakeBackend,
  unsignedTx,
} from '@/test-support/wallet';
import {
  AddressError,
  UnsupportedOperationError,
  ValidationError,
} from '@/wallet/errors';
import type { ConsolidationRequest, WalletBackend } from '@/wallet/types';

import {
  type ConsolidationStatus,
  ConsolidationSession,
} from './session';

const A = addr(0x11);
const B = addr(0x22);

const setup = (
  over?: Partial<WalletBackend>,
  confirmTokenBurn?: () => Promise<boolean>,
) => {
  const backend = createFakeBackend(over);
  const ui = createRecordingUI();
  const session = new ConsolidationSession({
    backend,
    source: A,
    ui,
    confirmTokenBurn,
  });
  const statuses: ConsolidationStatus[] = [];
  session.subscribe((e) => {
    if (e.type === 'status') statuses.push(e.status);
  });
  return { backend, ui, session, statuses };
};

const toTransactions = async (session: ConsolidationSession): Promise<void> => {
  await session.next();
  await session.next();
};

const endless = function* () {
  for (let i = 1; ; i++) yield unsignedTx(i);
};

describe('ConsolidationSession', () => {
  it('walks coins -> outputs -> transactions and builds', async () => {
    const { session, statuses, ui } = setup({
      consolidate: () => [unsignedTx(1), unsignedTx(2)],
    });
    expect(session.getPage()).toBe('coins');
    expect(session.getStatusText()).toBe('not started');
    await toTransactions(session);
    expect(session.getPage()).toBe('transactions');
    await expect(session.settled()).resolves.toBe('finished');

    expect(statuses).toEqual(['not-started', 'selecting', 'building', 'finished']);
    expect(session.getStatusText()).toBe('finished building transactions');
    expect(session.getProgress()).toBe(2);
    expect(session.getTransactions()).toHaveLength(2);
    expect(session.isComplete()).toBe(true);
    expect(session.isPageComplete()).toBe(true);
    expect(ui.calls).toEqual([
      'queued build:consolidate',
      'start build:consolidate',
      'progress build:consolidate 1',
      'progress build:consolidate 2',
      'end build:consolidate done',
    ]);
  });

  it('hands the collected inputs to the backend', async () => {
    let seen: ConsolidationRequest | null = null;
    const { session } = setup({
      consolidate: (request) => {
        seen = request;
        return [];
      },
    });
    await session.setCoinSelection({ includeCoinbase: false, minimum: true });
    session.setOutputs({ destination: B.toShortString(), maxTxSize: 5000 });
    await toTransactions(session);
    await session.settled();
    expect(seen).toMatchObject({
      includeCoinbase: false,
      includeNonCoinbase: true,
      minimumValue: 546,
      maximumValue: null,
      maxTxSize: 5000,
      source: A,
    });
    expect(session.getRequest().destination.equals(B)).toBe(true);
  });

  it('reports no-result for an empty build', async () => {
    const { session, statuses, ui } = setup();
    await toTransactions(session);
    await expect(session.settled()).resolves.toBe('no-result');
    expect(statuses).toEqual(['not-started', 'selecting', 'building', 'no-result']);
    expect(session.getStatusText()).toBe(
      'finished without generating any transactions',
    );
    expect(session.isComplete()).toBe(false);
    expect(ui.calls.at(-1)).toBe(
      'end build:consolidate empty finished without generating any transactions',
    );
  });

  it('surfaces producer failures as a failed status', async () => {
    const { session, statuses, ui } = setup({
      consolidate: () => {
        throw new Error('boom');
      },
    });
    await toTransactions(session);
    await expect(session.settled()).resolves.toBe('failed');
    expect(statuses.at(-1)).toBe('failed');
    expect(session.getError()).toBe('transaction producer failed: boom');
    expect(session.getStatusText()).toBe(
      'failed: transaction producer failed: boom',
    );
    expect(ui.calls.at(-1)).toBe(
      'end build:consolidate error transaction producer failed: boom',
    );
  });

  it('cancels a running build', async () => {
    const { session, statuses, ui } = setup({ consolidate: endless });
    await toTransactions(session);
    await session.cancel();
    await expect(session.settled()).resolves.toBe('interrupted');
    expect(statuses).toEqual([
      'not-started',
      'selecting',
      'building',
      'interrupted',
    ]);
    expect(session.getStatusText()).toBe('cancelled');
    expect(session.getTransactions()).toEqual([]);
    expect(ui.calls.at(-1)).toBe('end build:consolidate cancelled');
  });

  it('stops the build when leaving the transactions page', async () => {
    const { session } = setup({ consolidate: endless });
    await toTransactions(session);
    await expect(session.back()).resolves.toBe('outputs');
    expect(session.getStatus()).toBe('interrupted');
    expect(session.isPageComplete()).toBe(true);
  });

  it('starts a fresh build each time the transactions page is entered', async () => {
    const consolidate = vi.fn(() => [unsignedTx(1)]);
    const { session } = setup({ consolidate });
    await toTransactions(session);
    await session.settled();
    await session.back();
    await session.next();
    await expect(session.settled()).resolves.toBe('finished');
    expect(consolidate).toHaveBeenCalledTimes(2);
    expect(session.getTransactions()).toHaveLength(1);
  });

  it('asks before including token coins', async () => {
    const confirm = vi.fn(() => Promise.resolve(true));
    const { session } = setup(undefined, confirm);
    await expect(
      session.setCoinSelection({ includeTokens: true }),
    ).resolves.toMatchObject({ includeTokens: true });
    await session.setCoinSelection({ includeTokens: true, minimum: '0.1' });
    expect(confirm).toHaveBeenCalledTimes(1);
    expect(session.getFilter().minimumValue).toBe(10_000_000);
  });

  it('resets the token flag when the burn is declined or cannot be confirmed', async () => {
    const declined = setup(undefined, () => Promise.resolve(false)).session;
    await expect(
      declined.setCoinSelection({ includeTokens: true }),
    ).resolves.toMatchObject({ includeTokens: false });
    const unattended = setup().session;
    await unattended.setCoinSelection({ includeTokens: true });
    expect(unattended.getFilter().includeTokens).toBe(false);
  });

  it('rejects malformed output inputs and keeps the previous ones', () => {
    const { session } = setup();
    expect(() => session.setOutputs({ destination: 'nope' })).toThrow(
      AddressError,
    );
    expect(() => session.setOutputs({ maxTxSize: 100 })).toThrow(
      ValidationError,
    );
    expect(session.getRequest().destination).toBe(A);
    expect(session.getRequest().maxTxSize).toBe(100_000);
  });

  it('only signs, broadcasts or exports a finished build', async () => {
    const { session } = setup();
    await expect(session.signAll()).rejects.toThrow(
      new UnsupportedOperationError('cannot sign: not started'),
    );
    await expect(session.broadcastAll(0)).rejects.toThrow(
      'cannot broadcast: not started',
    );
    expect(() => session.exportTransactions()).toThrow(
      'cannot export: not started',
    );
  });

  it('signs and broadcasts the built transactions', async () => {
    const { session, backend, ui } = setup({
      consolidate: () => [unsignedTx(1), unsignedTx(2)],
    });
    await toTransactions(session);
    await session.settled();

    await expect(session.broadcastAll(0)).rejects.toThrow(
      'sign the transactions before broadcasting',
    );
    const exported = session.exportTransactions();
    expect(exported.source).toBe(A.toString());
    expect(exported.destination).toBe(A.toString());
    expect(exported.transactions.every((t) => !t.signed)).toBe(true);

    const signed = await session.signAll();
    expect(signed.state).toEqual({ kind: 'all-signed' });
    expect(session.getTransactions().map((t) => t.txid)).toEqual(['tx1', 'tx2']);

    await expect(session.broadcastAll(0)).resolves.toEqual({
      ok: true,
      txids: ['tx1', 'tx2'],
    });
    expect(backend.broadcasted).toHaveLength(2);
    expect(ui.calls.slice(5)).toEqual([
      'start sign:consolidate',
      'progress sign:consolidate 1/2',
      'progress sign:consolidate 2/2',
      'end sign:consolidate done',
      'start broadcast:consolidate',
      'progress broadcast:consolidate 1/2',
      'progress broadcast:consolidate 2/2',
      'end broadcast:consolidate done',
    ]);
  });
});
