/* src/runner/live/labels.ts
 * Shared BORING/TTY-aware status label helper for Logger and Live UIs.
 */
import { cancel, error, go, isBoring, ok, stop, warn } from '@/runner/util/color';

export type StatusKind =
  | 'waiting'
  | 'run'
  | 'ok'
  | 'empty'
  | 'cancelled'
  | 'error';

const BORING_LABELS: Record<StatusKind, string> = {
  waiting: '[WAIT]',
  run: '[RUN]',
  ok: '[OK]',
  empty: '[EMPTY]',
  cancelled: '[CANCELLED]',
  error: '[FAIL]',
};

/**
 * Render a status label suitable for table/log rows.
 * Bracketed tokens in BORING/non‑TTY mode.
 */
export const label = (kind: StatusKind): string => {
  if (isBoring()) return BORING_LABELS[kind];
  switch (kind) {
    case 'waiting':
      return cancel('⏸︎ waiting');
    case 'run':
      return go('▶︎ run');
    case 'ok':
      return ok('✔︎ ok');
    case 'empty':
      return warn('○ empty');
    case 'cancelled':
      return stop('◼︎ cancelled');
    case 'error':
      return error('✖︎ fail');
  }
};
