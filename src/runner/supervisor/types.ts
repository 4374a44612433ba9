// src/runner/supervisor/types.ts
import type { RuntimeSpec, SpawnHooks } from '@/runner/exec/spawn';
import type { ScriptDescriptor } from '@/runner/registry';
import type { MessageListener } from '@/runner/stream/bridge';
import type { AppState } from '@/runner/state/value';

/** One spawned process, owned by the supervisor for its lifetime. */
export type ScriptInvocation = Readonly<{
  id: number;
  descriptor: ScriptDescriptor;
  fn?: string;
  /** Result key / default stream id (script or script.function). */
  key: string;
  snapshot: AppState;
  startedAt: number;
  pid: number;
}>;

export type SupervisorOptions = {
  runtime: RuntimeSpec;
  /** Wall-clock limit for discrete runs (ms); 0 disables. */
  timeoutMs?: number;
  /** Grace between SIGTERM and SIGKILL (ms). */
  stopGraceMs?: number;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Capacity of each StreamHandle's message tap. */
  bufferSize?: number;
};

export type DiscreteOptions = {
  timeoutMs?: number;
  hooks?: SpawnHooks;
};

export type StreamingOptions = {
  /** Keep an own buffered message sequence on the handle (default true). */
  tap?: boolean;
  /** Registered on the bridge before the endpoint is bound. */
  onMessage?: MessageListener;
  hooks?: SpawnHooks;
};

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_STOP_GRACE_MS = 2_000;
