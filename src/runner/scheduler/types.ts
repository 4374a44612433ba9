// src/runner/scheduler/types.ts
import type { ExitInfo } from '@/runner/exec/spawn';
import type { ScriptdeckError } from '@/runner/errors';

/** Per-key execution state (script, or script.function for discrete runs). */
export type ScriptStatus =
  | { kind: 'idle' }
  | { kind: 'running'; startedAt: number }
  | { kind: 'streaming'; startedAt: number; pid: number; endpoint: string }
  | {
      kind: 'failed';
      error: ScriptdeckError;
      at: number;
      /** Consecutive failures (streaming) counted toward the restart limit. */
      attempts: number;
      /** True while an automatic restart is pending. */
      retryScheduled: boolean;
      exit?: ExitInfo;
    };
