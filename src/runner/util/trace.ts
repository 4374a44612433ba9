/* src/runner/util/trace.ts
 * Centralized, opt-in tracing for streaming troubleshooting.
 * Emits to stderr only when SCRIPTDECK_STREAM_DEBUG=1 (or after
 * enableStreamTrace(), driven by `debug.streaming` in the config);
 * otherwise no-ops. Keeps instrumentation out of the bridge/supervisor logic.
 */

let enabled = process.env.SCRIPTDECK_STREAM_DEBUG === '1';

/** Turn tracing on at runtime (config `debug.streaming: true`). */
export const enableStreamTrace = (on = true): void => {
  enabled = on;
};

type Dict = Record<string, unknown>;
const emit = (area: string, label: string, payload?: Dict): void => {
  if (!enabled) return;
  if (payload && Object.keys(payload).length > 0) {
    console.error(`[scriptdeck:${area}] ${label}`, payload);
  } else {
    console.error(`[scriptdeck:${area}] ${label}`);
  }
};

export const streamTrace = {
  get enabled() {
    return enabled;
  },
  bridge: {
    bound(endpoint: string) {
      emit('bridge', 'bind()', { endpoint });
    },
    connection(endpoint: string) {
      emit('bridge', 'connection', { endpoint });
    },
    decodeError(streamId: string, reason: string) {
      emit('bridge', 'decode error (dropped)', { streamId, reason });
    },
    socketError(streamId: string, reason: string) {
      emit('bridge', 'socket error', { streamId, reason });
    },
    closed(endpoint: string) {
      emit('bridge', 'close()', { endpoint });
    },
  },
  supervisor: {
    spawn(payload: Dict) {
      emit('supervisor', 'spawn()', payload);
    },
    output(key: string, channel: 'stdout' | 'stderr', line: string) {
      emit('supervisor', `${channel}`, { key, line });
    },
    exit(payload: Dict) {
      emit('supervisor', 'exit', payload);
    },
    terminate(payload: Dict) {
      emit('supervisor', 'terminate()', payload);
    },
  },
  scheduler: {
    transition(key: string, from: string, to: string) {
      emit('scheduler', 'transition', { key, from, to });
    },
    restart(key: string, attempt: number, delayMs: number) {
      emit('scheduler', 'restart scheduled', { key, attempt, delayMs });
    },
  },
  session: {
    info(message: string, payload?: Dict) {
      emit('session', message, payload);
    },
  },
} as const;
