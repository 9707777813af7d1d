// src/runner/ui/live-ui.ts
import { liveTrace } from '@/runner/live/trace';
import { ProgressModel } from '@/runner/progress/model';
import { LiveSink } from '@/runner/progress/sinks/live';
import type { PhaseOutcome, RowMeta } from '@/runner/progress/types';

import { endPhase, progressPhase, queuePhase, startPhase } from './lifecycle';
import type { PhaseProgress, RunnerUI } from './types';

export class LiveUI implements RunnerUI {
  private readonly model = new ProgressModel();
  private readonly sink: LiveSink;
  /** Idempotency guard for stop(). */
  private stopped = false;

  constructor(opts?: { boring?: boolean; refreshMs?: number }) {
    this.sink = new LiveSink(this.model, {
      boring: Boolean(opts?.boring),
      refreshMs: opts?.refreshMs,
    });
  }

  start(): void {
    liveTrace.ui.start();
    this.stopped = false;
    this.model.clearAll();
    this.sink.start();
  }
  onPhaseQueued(meta: RowMeta): void {
    queuePhase(this.model, meta);
  }
  onPhaseStart(meta: RowMeta, detail?: string): void {
    startPhase(this.model, meta, detail);
  }
  onPhaseProgress(meta: RowMeta, progress: PhaseProgress): void {
    progressPhase(this.model, meta, progress);
  }
  onPhaseEnd(meta: RowMeta, outcome: PhaseOutcome): void {
    if (outcome.kind === 'cancelled') liveTrace.ui.onCancelled();
    endPhase(this.model, meta, outcome);
    // Paint terminal rows right away rather than on the next tick.
    this.sink.flushNow();
  }
  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    liveTrace.ui.stop();
    // Persist the final full table.
    this.sink.stop();
  }
}
