// src/test-support/ui.ts
import type { RunnerUI } from '@/runner/ui/types';

/** RunnerUI that records each row callback as `<event> <phase>:<item>[ <detail>]`. */
export const createRecordingUI = (): RunnerUI & { calls: string[] } => {
  const calls: string[] = [];
  return {
    calls,
    start: () => calls.push('start'),
    onPhaseQueued: (m) => calls.push(`queued ${m.phase}:${m.item}`),
    onPhaseStart: (m) => calls.push(`start ${m.phase}:${m.item}`),
    onPhaseProgress: (m, p) =>
      calls.push(
        `progress ${m.phase}:${m.item} ${String(p.count)}${p.total === undefined ? '' : `/${String(p.total)}`}`,
      ),
    onPhaseEnd: (m, o) =>
      calls.push(
        `end ${m.phase}:${m.item} ${o.kind}${o.detail ? ` ${o.detail}` : ''}`,
      ),
    stop: () => calls.push('stop'),
  };
};
