// src/runner/session/signals.ts
import { streamTrace } from '@/runner/util/trace';

/**
 * Install SIGINT/SIGTERM handlers plus a synchronous exit hook.
 *
 * @param onSignal - Graceful shutdown (async allowed).
 * @param onExit - Last-resort synchronous cleanup on process exit.
 * @returns Detach function.
 */
export const attachSessionSignals = (
  onSignal: (signal: NodeJS.Signals) => void,
  onExit: () => void,
): (() => void) => {
  const handler = (signal: NodeJS.Signals) => {
    streamTrace.session.info('signal received', { signal });
    onSignal(signal);
  };
  streamTrace.session.info('install signal handlers');
  process.on('SIGINT', handler);
  process.on('SIGTERM', handler);
  process.on('exit', onExit);
  return () => {
    process.off('SIGINT', handler);
    process.off('SIGTERM', handler);
    process.off('exit', onExit);
  };
};
