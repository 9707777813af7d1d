// src/runner/live/util.ts
import type { PhaseState } from '@/runner/progress/types';

export type StateCounts = {
  waiting: number;
  running: number;
  ok: number;
  empty: number;
  cancelled: number;
  fail: number;
};

export const computeCounts = (
  rows: Iterable<{ state: PhaseState }>,
): StateCounts => {
  const c: StateCounts = {
    waiting: 0,
    running: 0,
    ok: 0,
    empty: 0,
    cancelled: 0,
    fail: 0,
  };
  for (const { state: st } of rows) {
    if (st.kind === 'waiting') c.waiting += 1;
    else if (st.kind === 'running') c.running += 1;
    else if (st.kind === 'done') c.ok += 1;
    else if (st.kind === 'empty') c.empty += 1;
    else if (st.kind === 'cancelled') c.cancelled += 1;
    else c.fail += 1;
  }
  return c;
};
