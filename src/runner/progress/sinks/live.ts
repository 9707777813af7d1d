/* src/runner/progress/sinks/live.ts */
import { ProgressRenderer } from '@/runner/live/renderer';
import { liveTrace } from '@/runner/live/trace';
import type { ProgressModel } from '@/runner/progress/model';
import type { PhaseState, RowMeta } from '@/runner/progress/types';

import { BaseSink } from './base';

export class LiveSink extends BaseSink {
  private renderer: ProgressRenderer | null = null;
  /** Idempotency guard for stop(). */
  private stopped = false;

  constructor(
    model: ProgressModel,
    private readonly opts?: { boring?: boolean; refreshMs?: number },
  ) {
    super(model);
  }

  start(): void {
    this.stopped = false;
    if (this.renderer) return;
    liveTrace.sink.info('start() renderer=create');
    this.renderer = new ProgressRenderer({
      boring: Boolean(this.opts?.boring),
      refreshMs: this.opts?.refreshMs,
    });
    this.renderer.start();
    this.subscribeModel();
  }

  /** Persist the final frame (without clearing). */
  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    liveTrace.sink.info('stop() finalize');
    this.renderer?.finalize();
    this.renderer = null;
    this.unsubscribeModel();
  }

  /** Force an immediate render of the current table state. */
  flushNow(): void {
    this.renderer?.flush();
  }

  protected onUpdate(meta: RowMeta, state: PhaseState): void {
    liveTrace.sink.info('update', {
      phase: meta.phase,
      item: meta.item,
      kind: state.kind,
    });
    this.renderer?.update(meta, state);
  }
}
