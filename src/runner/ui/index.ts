// src/runner/ui/index.ts
import { LiveUI } from './live-ui';
import { LoggerUI } from './logger-ui';
import type { RunnerUI } from './types';

export type { PhaseProgress, RunnerUI } from './types';
export { LiveUI, LoggerUI };

/** Live table on a TTY, line-per-event logging otherwise. */
export const createUI = (opts: {
  live: boolean;
  boring: boolean;
}): RunnerUI =>
  opts.live ? new LiveUI({ boring: opts.boring }) : new LoggerUI();
