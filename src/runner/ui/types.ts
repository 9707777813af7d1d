// src/runner/ui/types.ts
import type { PhaseOutcome, RowMeta } from '@/runner/progress/types';

export type PhaseProgress = { count: number; total?: number; detail?: string };

export type RunnerUI = {
  start(): void;
  onPhaseQueued(meta: RowMeta): void;
  onPhaseStart(meta: RowMeta, detail?: string): void;
  onPhaseProgress(meta: RowMeta, progress: PhaseProgress): void;
  onPhaseEnd(meta: RowMeta, outcome: PhaseOutcome): void;
  stop(): void;
};
