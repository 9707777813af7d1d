/* src/runner/live/trace.ts
 * Centralized, opt-in tracing for live rendering troubleshooting.
 * Emits to stderr only when WALLETDESK_LIVE_DEBUG=1, otherwise no-ops.
 */

const enabled = (): boolean => process.env.WALLETDESK_LIVE_DEBUG === '1';

type Dict = Record<string, unknown>;
const emit = (area: string, message: string, payload?: Dict): void => {
  if (!enabled()) return;
  if (payload && Object.keys(payload).length > 0) {
    console.error(`[walletdesk:live:${area}] ${message}`, payload);
  } else {
    console.error(`[walletdesk:live:${area}] ${message}`);
  }
};

export const liveTrace = {
  get enabled() {
    return enabled();
  },
  renderer: {
    start(payload?: Dict) {
      emit('renderer', 'start()', payload);
    },
    render(payload: Dict) {
      emit('renderer', 'render()', payload);
    },
    finalize() {
      emit('renderer', 'finalize()');
    },
  },
  sink: {
    info(message: string, payload?: Dict) {
      emit('sink', message, payload);
    },
  },
  session: {
    info(message: string, payload?: Dict) {
      emit('session', message, payload);
    },
  },
  ui: {
    start() {
      emit('UI', 'start()');
    },
    onCancelled() {
      emit('UI', 'onCancelled()');
    },
    stop() {
      emit('UI', 'stop() -> sink.stop()');
    },
  },
} as const;
