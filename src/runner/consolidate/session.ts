/* src/runner/consolidate/session.ts
 * Consolidation wizard: coins -> outputs -> transactions. Owns one
 * CancellableBuilder and mirrors its events into status, progress and the
 * delivered transactions.
 */
import {
  type BuildEvent,
  CancellableBuilder,
} from '@/runner/build/builder';
import { type BuildStatus, statusText } from '@/runner/build/status';
import type { RowMeta } from '@/runner/progress/types';
import { broadcastAll, type BroadcastAllResult } from '@/runner/sign/broadcast';
import { type SigningResult, signSequentially } from '@/runner/sign/machine';
import type { RunnerUI } from '@/runner/ui/types';
import { debugLog } from '@/runner/util/debug';
import { DBG_SCOPE_CONSOLIDATE } from '@/runner/util/debug-scopes';
import type { Address } from '@/wallet/address';
import { UnsupportedOperationError, ValidationError } from '@/wallet/errors';
import type {
  CoinFilter,
  ConsolidationRequest,
  Transaction,
  WalletBackend,
} from '@/wallet/types';

import {
  type CoinSelectionInput,
  defaultCoinFilter,
  isDestinationComplete,
  MAX_STANDARD_TX_SIZE,
  resolveCoinFilter,
  resolveDestination,
  validateMaxTxSize,
} from './options';

export type ConsolidationPage = 'coins' | 'outputs' | 'transactions';
export const PAGES: readonly ConsolidationPage[] = [
  'coins',
  'outputs',
  'transactions',
];

/** Builder statuses plus a run failure. */
export type ConsolidationStatus = BuildStatus | 'failed';

export const consolidationStatusText = (
  status: ConsolidationStatus,
  error?: string | null,
): string =>
  status === 'failed'
    ? `failed: ${error ?? 'unknown error'}`
    : statusText(status);

export type ConsolidationEvent =
  | { type: 'status'; status: ConsolidationStatus }
  | { type: 'progress'; count: number };

export type ConsolidationListener = (e: ConsolidationEvent) => void;

export type ConsolidationSessionOptions = {
  backend: WalletBackend;
  source: Address;
  ui?: RunnerUI;
  /**
   * Asked when token-bearing coins are included. Resolving false keeps the
   * tokens safe by resetting the flag.
   */
  confirmTokenBurn?: () => Promise<boolean>;
};

export type OutputsInput = {
  /** "same" or an address. */
  destination?: string;
  maxTxSize?: number;
};

const BUILD_ROW: RowMeta = { phase: 'build', item: 'consolidate' };
const SIGN_ROW: RowMeta = { phase: 'sign', item: 'consolidate' };
const BROADCAST_ROW: RowMeta = { phase: 'broadcast', item: 'consolidate' };

export class ConsolidationSession {
  private readonly builder = new CancellableBuilder<Transaction>();
  private readonly listeners = new Set<ConsolidationListener>();
  private page: ConsolidationPage = 'coins';
  private status: ConsolidationStatus = 'not-started';
  private progress = 0;
  private error: string | null = null;
  private transactions: readonly Transaction[] = [];
  private filter: CoinFilter = defaultCoinFilter();
  private destinationText = 'same';
  private destination: Address;
  private maxTxSize = MAX_STANDARD_TX_SIZE;
  /** Event pump of the active build. */
  private pump: Promise<void> | null = null;

  constructor(private readonly opts: ConsolidationSessionOptions) {
    this.destination = opts.source;
  }

  subscribe(fn: ConsolidationListener): () => void {
    this.listeners.add(fn);
    return () => {
      this.listeners.delete(fn);
    };
  }

  getPage(): ConsolidationPage {
    return this.page;
  }
  getStatus(): ConsolidationStatus {
    return this.status;
  }
  getStatusText(): string {
    return consolidationStatusText(this.status, this.error);
  }
  /** Number of transactions built so far in the current run. */
  getProgress(): number {
    return this.progress;
  }
  getError(): string | null {
    return this.error;
  }
  getTransactions(): readonly Transaction[] {
    return this.transactions;
  }
  getFilter(): CoinFilter {
    return { ...this.filter };
  }
  getRequest(): ConsolidationRequest {
    return {
      ...this.filter,
      source: this.opts.source,
      destination: this.destination,
      maxTxSize: this.maxTxSize,
    };
  }

  /** True only once the build has finished with transactions. */
  isComplete(): boolean {
    return this.status === 'finished';
  }

  /** Whether the current page allows moving on. */
  isPageComplete(): boolean {
    switch (this.page) {
      case 'coins':
        return true;
      case 'outputs':
        return isDestinationComplete(
          this.destinationText,
          this.opts.source.prefix,
        );
      case 'transactions':
        return this.isComplete();
    }
  }

  /**
   * Coin-selection page inputs.
   *
   * @throws ValidationError for malformed amounts.
   */
  async setCoinSelection(input: CoinSelectionInput): Promise<CoinFilter> {
    const filter = resolveCoinFilter(input);
    if (filter.includeTokens && !this.filter.includeTokens) {
      const confirmed = this.opts.confirmTokenBurn
        ? await this.opts.confirmTokenBurn()
        : false;
      if (!confirmed) {
        debugLog(DBG_SCOPE_CONSOLIDATE, 'token burn declined; flag reset');
        filter.includeTokens = false;
      }
    }
    this.filter = filter;
    return this.getFilter();
  }

  /**
   * Outputs page inputs.
   *
   * @throws ValidationError for a malformed address or a size out of range.
   */
  setOutputs(input: OutputsInput): void {
    const text = input.destination ?? 'same';
    const destination = resolveDestination(text, this.opts.source);
    const maxTxSize = validateMaxTxSize(input.maxTxSize ?? this.maxTxSize);
    this.destinationText = text;
    this.destination = destination;
    this.maxTxSize = maxTxSize;
  }

  async next(): Promise<ConsolidationPage> {
    const i = PAGES.indexOf(this.page);
    const target = PAGES[i + 1];
    if (!target) return this.page;
    if (!this.isPageComplete()) {
      throw new ValidationError(`the ${this.page} page is incomplete`);
    }
    await this.goTo(target);
    return this.page;
  }

  async back(): Promise<ConsolidationPage> {
    const target = PAGES[PAGES.indexOf(this.page) - 1];
    if (target) await this.goTo(target);
    return this.page;
  }

  /**
   * Switch pages. A running build is always stopped first; entering the
   * transactions page starts a fresh one.
   */
  async goTo(page: ConsolidationPage): Promise<void> {
    await this.close();
    this.page = page;
    debugLog(DBG_SCOPE_CONSOLIDATE, `page -> ${page}`);
    if (page !== 'transactions') return;

    this.transactions = [];
    this.progress = 0;
    this.error = null;
    this.setStatus('not-started');
    this.setStatus('selecting');
    const request = this.getRequest();
    this.opts.ui?.onPhaseQueued(BUILD_ROW);
    const run = this.builder.start(() => this.opts.backend.consolidate(request));
    this.pump = this.drain(run.events);
  }

  /** Wait for the active build (if any) to deliver its final event. */
  async settled(): Promise<ConsolidationStatus> {
    await this.pump;
    return this.status;
  }

  /** Cooperative cancellation of the active build. */
  async cancel(): Promise<void> {
    await this.builder.requestCancellation();
  }

  /** Stop the active build and wait until its events are drained. */
  async close(): Promise<void> {
    await this.builder.stop();
    await this.pump;
    this.pump = null;
  }

  /** Unsigned transactions in a plain JSON shape. */
  exportTransactions(): {
    source: string;
    destination: string;
    transactions: readonly Transaction[];
  } {
    this.assertFinished('export');
    return {
      source: this.opts.source.toString(),
      destination: this.destination.toString(),
      transactions: this.transactions,
    };
  }

  /** Sign the built transactions one at a time. */
  async signAll(): Promise<SigningResult> {
    this.assertFinished('sign');
    const ui = this.opts.ui;
    const total = this.transactions.length;
    ui?.onPhaseStart(SIGN_ROW);
    const res = await signSequentially(this.transactions, {
      sign: (tx) => this.opts.backend.sign(tx),
      onSigned: (count) => {
        ui?.onPhaseProgress(SIGN_ROW, { count, total });
      },
    });
    if (res.state.kind === 'failed') {
      ui?.onPhaseEnd(SIGN_ROW, { kind: 'error', detail: res.state.error.message });
    } else {
      this.transactions = res.transactions;
      ui?.onPhaseEnd(SIGN_ROW, { kind: 'done' });
    }
    return res;
  }

  /** Broadcast signed transactions in order. */
  async broadcastAll(delayMs?: number): Promise<BroadcastAllResult> {
    this.assertFinished('broadcast');
    if (this.transactions.some((tx) => !tx.signed)) {
      throw new ValidationError('sign the transactions before broadcasting');
    }
    const ui = this.opts.ui;
    ui?.onPhaseStart(BROADCAST_ROW);
    const res = await broadcastAll(
      this.transactions,
      (tx) => this.opts.backend.broadcast(tx),
      {
        delayMs,
        onBroadcast: (count, total) => {
          ui?.onPhaseProgress(BROADCAST_ROW, { count, total });
        },
      },
    );
    ui?.onPhaseEnd(
      BROADCAST_ROW,
      res.ok ? { kind: 'done' } : { kind: 'error', detail: res.message },
    );
    return res;
  }

  private assertFinished(what: string): void {
    if (!this.isComplete()) {
      throw new UnsupportedOperationError(
        `cannot ${what}: ${consolidationStatusText(this.status, this.error)}`,
      );
    }
  }

  private setStatus(status: ConsolidationStatus): void {
    this.status = status;
    this.emit({ type: 'status', status });
  }

  private emit(e: ConsolidationEvent): void {
    for (const fn of this.listeners) fn(e);
  }

  private async drain(
    events: AsyncIterable<BuildEvent<Transaction>>,
  ): Promise<void> {
    const ui = this.opts.ui;
    for await (const e of events) {
      switch (e.type) {
        case 'status':
          this.setStatus(e.status);
          if (e.status === 'building') ui?.onPhaseStart(BUILD_ROW);
          else if (e.status === 'interrupted')
            ui?.onPhaseEnd(BUILD_ROW, { kind: 'cancelled' });
          break;
        case 'progress':
          this.progress = e.count;
          this.emit({ type: 'progress', count: e.count });
          ui?.onPhaseProgress(BUILD_ROW, { count: e.count });
          break;
        case 'results':
          this.transactions = e.results;
          if (e.results.length === 0) {
            this.setStatus('no-result');
            ui?.onPhaseEnd(BUILD_ROW, {
              kind: 'empty',
              detail: statusText('no-result'),
            });
          } else {
            ui?.onPhaseEnd(BUILD_ROW, { kind: 'done' });
          }
          break;
        case 'failed':
          this.error = e.error.message;
          this.setStatus('failed');
          ui?.onPhaseEnd(BUILD_ROW, { kind: 'error', detail: e.error.message });
          break;
        case 'finished':
          break;
      }
    }
  }
}
