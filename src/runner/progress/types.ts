// src/runner/progress/types.ts

/** Workflow phases rendered as rows. */
export type PhaseKind = 'build' | 'sign' | 'broadcast';

/** Row identity: phase plus the workflow it belongs to (e.g. "consolidate"). */
export type RowMeta = { phase: PhaseKind; item: string };

export type Progress = { count: number; total?: number };

export type PhaseState =
  | { kind: 'waiting' }
  | ({ kind: 'running'; startedAt: number; detail?: string } & Progress)
  | ({ kind: 'done'; durationMs: number; detail?: string } & Progress)
  | { kind: 'empty'; durationMs: number; detail?: string }
  | {
      kind: 'cancelled';
      durationMs?: number;
      count?: number;
      total?: number;
      detail?: string;
    }
  | { kind: 'error'; durationMs: number; detail: string };

export type PhaseOutcome =
  | { kind: 'done'; detail?: string }
  | { kind: 'empty'; detail?: string }
  | { kind: 'cancelled'; detail?: string }
  | { kind: 'error'; detail: string };

export const rowKey = (meta: RowMeta): string => `${meta.phase}:${meta.item}`;
