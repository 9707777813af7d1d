/* src/runner/build/builder.ts
 * Cancellable background builder: drains a lazy producer on a worker turn
 * distinct from the caller's, reporting status/progress over an event
 * channel and honoring cooperative cancellation between items.
 */
import { setImmediate as nextTurn } from 'node:timers/promises';

import { debugLog } from '@/runner/util/debug';
import { DBG_SCOPE_BUILD } from '@/runner/util/debug-scopes';
import {
  BuilderBusyError,
  toProducerError,
  type WalletError,
} from '@/wallet/errors';
import type { LazySequence } from '@/wallet/types';

import { CancellationFlag } from './cancel-flag';
import { EventChannel } from './channel';
import type { BuildStatus } from './status';

export type Producer<A> = LazySequence<A> | (() => LazySequence<A>);

export type BuildEvent<A> =
  | {
      type: 'status';
      status: Extract<BuildStatus, 'building' | 'interrupted' | 'finished'>;
    }
  | { type: 'progress'; count: number }
  | { type: 'results'; results: readonly A[] }
  | { type: 'failed'; error: WalletError }
  | { type: 'finished' };

export type BuildOutcome<A> =
  | { kind: 'completed'; results: readonly A[] }
  | { kind: 'interrupted' }
  | { kind: 'failed'; error: WalletError };

export type BuildRun<A> = {
  /** Events in emission order; ends after `finished`. */
  events: AsyncIterable<BuildEvent<A>>;
  /** Settles (never rejects) once the run has emitted `finished`. */
  done: Promise<BuildOutcome<A>>;
};

type ActiveRun<A> = {
  flag: CancellationFlag;
  done: Promise<BuildOutcome<A>>;
};

const EMPTY: readonly never[] = Object.freeze([]);

const iterate = async function* <A>(
  seq: LazySequence<A>,
): AsyncGenerator<A, void, undefined> {
  yield* seq;
};

export class CancellableBuilder<A> {
  private active: ActiveRun<A> | null = null;
  private lastResults: readonly A[] = EMPTY;

  isRunning(): boolean {
    return this.active !== null;
  }

  /**
   * Start consuming `producer`. The first item is drawn on a later turn than
   * this call.
   *
   * @throws BuilderBusyError when a run is already active.
   */
  start(producer: Producer<A>): BuildRun<A> {
    if (this.active) throw new BuilderBusyError();
    const flag = new CancellationFlag();
    const channel = new EventChannel<BuildEvent<A>>();
    this.lastResults = EMPTY;
    const done = this.work(producer, flag, channel).finally(() => {
      channel.close();
      if (this.active?.flag === flag) this.active = null;
    });
    this.active = { flag, done };
    return { events: channel, done };
  }

  /** Request cooperative cancellation of the active run (no-op when idle). */
  async requestCancellation(): Promise<void> {
    const run = this.active;
    if (!run) return;
    debugLog(DBG_SCOPE_BUILD, 'cancellation requested');
    await run.flag.set();
  }

  /** Request cancellation and wait until the active run has fully stopped. */
  async stop(): Promise<void> {
    const run = this.active;
    if (!run) return;
    await run.flag.set();
    await run.done;
  }

  /** Results delivered by the last completed run (empty when none were delivered). */
  getLastResults(): readonly A[] {
    return this.lastResults;
  }

  private async work(
    producer: Producer<A>,
    flag: CancellationFlag,
    channel: EventChannel<BuildEvent<A>>,
  ): Promise<BuildOutcome<A>> {
    await nextTurn();
    channel.push({ type: 'status', status: 'building' });
    const results: A[] = [];
    const interrupted = (): BuildOutcome<A> => {
      debugLog(
        DBG_SCOPE_BUILD,
        `interrupted after ${String(results.length)} item(s)`,
      );
      channel.push({ type: 'status', status: 'interrupted' });
      channel.push({ type: 'finished' });
      return { kind: 'interrupted' };
    };
    try {
      const seq = typeof producer === 'function' ? producer() : producer;
      for await (const item of iterate(seq)) {
        if (await flag.isSet()) return interrupted();
        results.push(item);
        channel.push({ type: 'progress', count: results.length });
        await nextTurn();
      }
    } catch (e) {
      const error = toProducerError(e);
      debugLog(DBG_SCOPE_BUILD, `producer failed: ${error.message}`);
      channel.push({ type: 'failed', error });
      channel.push({ type: 'finished' });
      return { kind: 'failed', error };
    }
    if (await flag.isSet()) return interrupted();

    const delivered = Object.freeze(results.slice());
    // An empty sequence gets no terminal status here; the caller maps it to no-result.
    if (delivered.length > 0)
      channel.push({ type: 'status', status: 'finished' });
    this.lastResults = delivered;
    channel.push({ type: 'results', results: delivered });
    channel.push({ type: 'finished' });
    return { kind: 'completed', results: delivered };
  }
}
