// src/runner/live/presentation.ts
import type { PhaseState } from '@/runner/progress/types';

import { fmtMs } from './format';
import { label, type StatusKind } from './labels';

export type Presentation = {
  /** BORING/TTY-aware status label (e.g., [OK], ✔︎ ok) */
  label: string;
  /** "count" or "count/total" ('' when not applicable) */
  progress: string;
  /** Elapsed time mm:ss ('' while waiting) */
  time: string;
  detail: string;
};

const toLabelKind = (st: PhaseState): StatusKind => {
  switch (st.kind) {
    case 'waiting':
      return 'waiting';
    case 'running':
      return 'run';
    case 'done':
      return 'ok';
    case 'empty':
      return 'empty';
    case 'cancelled':
      return 'cancelled';
    case 'error':
      return 'error';
  }
};

const fmtProgress = (count?: number, total?: number): string => {
  if (typeof count !== 'number') return '';
  return typeof total === 'number'
    ? `${String(count)}/${String(total)}`
    : String(count);
};

/** Map a row's PhaseState to presentational fields. */
export const presentRow = (args: {
  state: PhaseState;
  now?: () => number;
}): Presentation => {
  const { state } = args;
  const now = args.now ?? Date.now;
  switch (state.kind) {
    case 'waiting':
      return { label: label('waiting'), progress: '', time: '', detail: '' };
    case 'running':
      return {
        label: label('run'),
        progress: fmtProgress(state.count, state.total),
        time: fmtMs(now() - state.startedAt),
        detail: state.detail ?? '',
      };
    case 'error':
    case 'empty':
    case 'done':
    case 'cancelled':
      return {
        label: label(toLabelKind(state)),
        progress:
          state.kind === 'done' || state.kind === 'cancelled'
            ? fmtProgress(state.count, state.total)
            : '',
        time:
          typeof state.durationMs === 'number' ? fmtMs(state.durationMs) : '',
        detail: state.detail ?? '',
      };
  }
};
