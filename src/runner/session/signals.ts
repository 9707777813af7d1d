// src/runner/session/signals.ts
import { liveTrace } from '@/runner/live/trace';

/**
 * Install a SIGINT handler for the duration of a session.
 * Returns the detach function; calling it more than once is harmless.
 */
export const attachSessionSignals = (onSigint: () => void): (() => void) => {
  liveTrace.session.info('install SIGINT handler');
  process.on('SIGINT', onSigint);
  let attached = true;
  return () => {
    if (!attached) return;
    attached = false;
    liveTrace.session.info('detach SIGINT handler');
    process.off('SIGINT', onSigint);
  };
};
