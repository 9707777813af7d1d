// src/runner/ui/logger-ui.ts
import { ProgressModel } from '@/runner/progress/model';
import { LoggerSink } from '@/runner/progress/sinks/logger';
import type { PhaseOutcome, RowMeta } from '@/runner/progress/types';

import { endPhase, progressPhase, queuePhase, startPhase } from './lifecycle';
import type { PhaseProgress, RunnerUI } from './types';

export class LoggerUI implements RunnerUI {
  private readonly model = new ProgressModel();
  private readonly sink = new LoggerSink(this.model);

  start(): void {
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
    endPhase(this.model, meta, outcome);
  }
  stop(): void {
    this.sink.stop();
  }
}
