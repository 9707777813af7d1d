// src/runner/ui/lifecycle.ts
// Shared row lifecycle helpers for UI implementations (LiveUI, LoggerUI).
// Centralizes ProgressModel updates; rendering/logging remain in their sinks.

import type { ProgressModel } from '@/runner/progress/model';
import type { PhaseOutcome, RowMeta } from '@/runner/progress/types';

import type { PhaseProgress } from './types';

export const queuePhase = (model: ProgressModel, meta: RowMeta): void => {
  model.update(meta, { kind: 'waiting' });
};

export const startPhase = (
  model: ProgressModel,
  meta: RowMeta,
  detail?: string,
  now: () => number = Date.now,
): void => {
  model.update(meta, { kind: 'running', startedAt: now(), count: 0, detail });
};

/** Progress on a running row; ignored once the row has ended. */
export const progressPhase = (
  model: ProgressModel,
  meta: RowMeta,
  p: PhaseProgress,
  now: () => number = Date.now,
): void => {
  const prev = model.get(meta);
  if (prev && prev.kind !== 'waiting' && prev.kind !== 'running') return;
  const startedAt = prev?.kind === 'running' ? prev.startedAt : now();
  model.update(meta, {
    kind: 'running',
    startedAt,
    count: p.count,
    total: p.total,
    detail: p.detail ?? (prev?.kind === 'running' ? prev.detail : undefined),
  });
};

/**
 * End a row with a final state. Duration is measured from the running
 * state's start; rows that never started report 0.
 */
export const endPhase = (
  model: ProgressModel,
  meta: RowMeta,
  outcome: PhaseOutcome,
  now: () => number = Date.now,
): void => {
  const prev = model.get(meta);
  const running = prev?.kind === 'running' ? prev : undefined;
  const durationMs = running ? Math.max(0, now() - running.startedAt) : 0;
  const count = running?.count ?? 0;
  const total = running?.total;
  switch (outcome.kind) {
    case 'done':
      model.update(meta, {
        kind: 'done',
        durationMs,
        count,
        total,
        detail: outcome.detail,
      });
      return;
    case 'empty':
      model.update(meta, { kind: 'empty', durationMs, detail: outcome.detail });
      return;
    case 'cancelled':
      model.update(meta, {
        kind: 'cancelled',
        durationMs,
        count,
        total,
        detail: outcome.detail,
      });
      return;
    case 'error':
      model.update(meta, { kind: 'error', durationMs, detail: outcome.detail });
      return;
  }
};
