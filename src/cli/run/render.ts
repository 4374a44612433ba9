/* src/cli/run/render.ts
 * Console rendering for scheduler events and stream messages.
 */
import { ScriptError } from '@/runner/errors';
import type { ScriptEvent, ScriptStatus } from '@/runner/scheduler';
import type { StreamMessage } from '@/runner/stream/frame';
import { alert, cancel, dim, error, go, ok, warn } from '@/runner/util/color';

import { formatValue } from '../cli-utils';

const statusLabel = (s: ScriptStatus): string => {
  switch (s.kind) {
    case 'idle':
      return cancel('idle');
    case 'running':
      return go('running');
    case 'streaming':
      return ok(`streaming (pid ${s.pid.toString()}, ${s.endpoint})`);
    case 'failed': {
      const retry = s.retryScheduled ? 'restart pending' : 'retry required';
      return error(`failed (attempt ${s.attempts.toString()}, ${retry})`);
    }
  }
};

/** Lines to print for one event (stderr tail follows a script error). */
export const renderEvent = (e: ScriptEvent): string[] => {
  switch (e.type) {
    case 'status':
      return [`${e.key}: ${statusLabel(e.status)}`];
    case 'result':
      return [`${alert(e.key)} = ${formatValue(e.value)}`];
    case 'error': {
      const lines = [error(e.error.message)];
      const tail = e.error instanceof ScriptError ? e.error.detail.stderr : undefined;
      if (tail && tail.trim()) {
        for (const l of tail.trimEnd().split(/\r?\n/)) lines.push(dim(`  | ${l}`));
      }
      return lines;
    }
    case 'output':
      return [
        e.channel === 'stderr' ? warn(`${e.key}! ${e.line}`) : dim(`${e.key}> ${e.line}`),
      ];
  }
};

export const renderMessage = (m: StreamMessage): string =>
  `[${m.streamId} #${m.seq.toString()}] ${formatValue(m.payload)}`;
