/* src/runner/scheduler/index.ts
 * Execution Scheduler: decides when scripts run, owns the per-key state
 * machine (idle -> running -> idle | failed; running -> streaming -> failed
 * -> running ...), writes discrete results back into the store and keeps one
 * supervised instance of each streaming script alive.
 */
import {
  AlreadyRunningError,
  NotFoundError,
  SchedulerStoppedError,
  ScriptdeckError,
  ScriptError,
} from '@/runner/errors';
import type { ExitInfo } from '@/runner/exec/spawn';
import {
  resultKey,
  type ScriptDescriptor,
  type ScriptRegistry,
} from '@/runner/registry';
import { normalizeResult } from '@/runner/result/table';
import { AppStateStore } from '@/runner/state/store';
import type { AppState, AppStateValue } from '@/runner/state/value';
import type { StreamMessage } from '@/runner/stream/frame';
import { StreamHub } from '@/runner/stream/hub';
import type { MessageQueue } from '@/runner/stream/queue';
import type { ProcessSupervisor, StreamHandle } from '@/runner/supervisor';
import { debugFallback } from '@/runner/util/debug';
import { DBG_SCOPE_SCHEDULER_RESTART } from '@/runner/util/debug-scopes';
import { streamTrace } from '@/runner/util/trace';

import {
  backoffDelay,
  DEFAULT_RESTART_POLICY,
  type RestartPolicy,
} from './backoff';
import { type ScriptEvent, UiEventQueue } from './events';
import type { ScriptStatus } from './types';

export * from './backoff';
export * from './events';
export * from './types';

export type SchedulerOptions = {
  registry: ScriptRegistry;
  supervisor: ProcessSupervisor;
  store?: AppStateStore;
  hub?: StreamHub;
  events?: UiEventQueue;
  restart?: Partial<RestartPolicy>;
  /** Forward script stdout/stderr lines as `output` events. */
  forwardOutput?: boolean;
};

const IDLE: ScriptStatus = Object.freeze({ kind: 'idle' });

const asScriptdeckError = (key: string, e: unknown): ScriptdeckError =>
  e instanceof ScriptdeckError ? e : ScriptError.spawnFailed(key, e);

export class ExecutionScheduler {
  public readonly store: AppStateStore;
  public readonly hub: StreamHub;
  public readonly events: UiEventQueue;
  private readonly registry: ScriptRegistry;
  private readonly supervisor: ProcessSupervisor;
  private readonly policy: RestartPolicy;
  private readonly forwardOutput: boolean;

  private readonly states = new Map<string, ScriptStatus>();
  private readonly streams = new Map<string, StreamHandle>();
  private readonly timers = new Map<string, NodeJS.Timeout>();
  private readonly failures = new Map<string, number>();
  /** Launches in flight, and those asked to stop before they went live. */
  private readonly launching = new Map<string, Promise<void>>();
  private readonly cancelled = new Set<string>();
  private readonly listeners = new Set<(e: ScriptEvent) => void>();
  private stopped = false;

  constructor(opts: SchedulerOptions) {
    this.registry = opts.registry;
    this.supervisor = opts.supervisor;
    this.store = opts.store ?? new AppStateStore();
    this.hub = opts.hub ?? new StreamHub();
    this.events = opts.events ?? new UiEventQueue();
    this.policy = { ...DEFAULT_RESTART_POLICY, ...opts.restart };
    this.forwardOutput = Boolean(opts.forwardOutput);
  }

  // ---------------------------------------------------------------- UI boundary

  /**
   * Run a discrete script (or one of its functions) with the current state.
   * On success the value is stored under the result key and returned.
   * Triggering a streaming script starts it when it is not alive.
   *
   * @throws AlreadyRunningError when the same key is still in flight.
   * @throws NotFoundError for an unknown script or function.
   * @throws ScriptError when the run fails (the key moves to `failed`).
   */
  public async trigger(name: string, fn?: string): Promise<AppStateValue> {
    const d = this.registry.lookup(name);
    if (d.mode === 'streaming') {
      if (fn !== undefined) throw new NotFoundError('function', resultKey(name, fn));
      await this.retry(name);
      return null;
    }
    const key = resultKey(name, fn);
    if (fn !== undefined && !d.functions.some((f) => f.name === fn))
      throw new NotFoundError('function', key);
    if (this.status(name, fn).kind === 'running') throw new AlreadyRunningError(key);
    if (this.stopped) throw new SchedulerStoppedError(key);

    // Status flips synchronously so a second trigger in the same tick is rejected.
    this.transition(key, { kind: 'running', startedAt: Date.now() });
    try {
      const raw = await this.supervisor.runDiscrete(d, fn, this.store.snapshot(), {
        hooks: this.outputHooks(key),
      });
      const value = normalizeResult(key, raw);
      this.store.set(key, value);
      this.transition(key, IDLE);
      this.emit({ type: 'result', key, value });
      return value;
    } catch (e) {
      const err = asScriptdeckError(key, e);
      this.transition(key, {
        kind: 'failed',
        error: err,
        at: Date.now(),
        attempts: 1,
        retryScheduled: false,
      });
      this.emit({ type: 'error', key, error: err });
      throw err;
    }
  }

  /** Subscribe to one stream id (plots, tables). */
  public subscribe(
    streamId: string,
    opts?: { capacity?: number },
  ): MessageQueue<StreamMessage> {
    return this.hub.subscribe(streamId, opts);
  }

  public currentState(): AppState {
    return this.store.snapshot();
  }

  /** Widget change from the UI. */
  public set(key: string, value: AppStateValue): void {
    this.store.set(key, value);
  }

  public status(name: string, fn?: string): ScriptStatus {
    return this.states.get(resultKey(name, fn)) ?? IDLE;
  }

  /** Status of every key that has left `idle` at least once. */
  public statuses(): Record<string, ScriptStatus> {
    return Object.fromEntries(this.states);
  }

  public onEvent(listener: (e: ScriptEvent) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Pending events for the UI frame (oldest first). */
  public drainEvents(): ScriptEvent[] {
    return this.events.drain();
  }

  // ---------------------------------------------------------------- streaming

  /** Start every declared streaming script once. Failures are reported, not thrown. */
  public async start(): Promise<void> {
    await Promise.all(this.registry.streaming().map((d) => this.launch(d)));
  }

  /**
   * Manual retry: restarts a streaming script (resetting its failure count)
   * or re-triggers a discrete one.
   */
  public async retry(name: string, fn?: string): Promise<void> {
    const d = this.registry.lookup(name);
    if (d.mode === 'discrete') {
      await this.trigger(name, fn);
      return;
    }
    const st = this.status(name).kind;
    if (st === 'running' || st === 'streaming') throw new AlreadyRunningError(name);
    this.clearTimer(name);
    this.failures.set(name, 0);
    await this.launch(d);
  }

  /**
   * Stop one streaming script on request; it returns to `idle`. A launch
   * still in progress is stopped as soon as its process is up.
   */
  public async stopStreaming(name: string): Promise<void> {
    this.registry.lookup(name);
    this.clearTimer(name);
    const pending = this.launching.get(name);
    if (pending) {
      this.cancelled.add(name);
      await pending;
      return;
    }
    const handle = this.streams.get(name);
    if (handle) await handle.stop();
    else if (this.status(name).kind === 'failed') this.transition(name, IDLE);
  }

  /** Handle for a live streaming script (stats, endpoint). */
  public streamHandle(name: string): StreamHandle | undefined {
    return this.streams.get(name);
  }

  /** Cancel restarts, stop all children and end every subscription. */
  public async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    for (const name of [...this.timers.keys()]) this.clearTimer(name);
    await Promise.all([...this.streams.values()].map((h) => h.stop()));
    await this.supervisor.shutdown();
    this.hub.close();
  }

  // ---------------------------------------------------------------- internals

  private outputHooks(key: string) {
    if (!this.forwardOutput) return undefined;
    return {
      onStdoutLine: (line: string) =>
        this.emit({ type: 'output', key, channel: 'stdout', line }),
      onStderrLine: (line: string) =>
        this.emit({ type: 'output', key, channel: 'stderr', line }),
    };
  }

  private async launch(d: ScriptDescriptor): Promise<void> {
    const key = d.name;
    if (this.stopped) return;
    this.cancelled.delete(key);
    const pending = this.startInstance(d);
    this.launching.set(key, pending);
    try {
      await pending;
    } finally {
      if (this.launching.get(key) === pending) this.launching.delete(key);
    }
  }

  private async startInstance(d: ScriptDescriptor): Promise<void> {
    const key = d.name;
    this.transition(key, { kind: 'running', startedAt: Date.now() });

    let handle: StreamHandle;
    try {
      handle = await this.supervisor.startStreaming(d, this.store.snapshot(), {
        tap: false,
        onMessage: (m) => this.hub.publish(m),
        hooks: this.outputHooks(key),
      });
    } catch (e) {
      if (this.cancelled.delete(key)) this.transition(key, IDLE);
      else this.failStreaming(d, asScriptdeckError(key, e));
      return;
    }
    if (this.stopped) {
      await handle.stop();
      return;
    }
    if (this.cancelled.delete(key)) {
      await handle.stop();
      this.transition(key, IDLE);
      return;
    }
    this.streams.set(key, handle);
    this.transition(key, {
      kind: 'streaming',
      startedAt: handle.invocation.startedAt,
      pid: handle.invocation.pid,
      endpoint: handle.endpoint,
    });
    void handle.exited.then((info) => this.onStreamExit(d, handle, info));
  }

  private onStreamExit(d: ScriptDescriptor, handle: StreamHandle, info: ExitInfo): void {
    const key = d.name;
    if (this.streams.get(key) === handle) this.streams.delete(key);
    if (info.stopped || this.stopped) {
      if (!this.stopped) this.transition(key, IDLE);
      return;
    }
    if (Date.now() - handle.invocation.startedAt >= this.policy.resetAfterMs)
      this.failures.set(key, 0);
    const stderr = handle.stderrTail();
    const err =
      info.code === 0
        ? ScriptError.exited(key, stderr)
        : ScriptError.nonZeroExit(key, info.code, info.signal, stderr);
    this.failStreaming(d, err, info);
  }

  private failStreaming(
    d: ScriptDescriptor,
    error: ScriptdeckError,
    exit?: ExitInfo,
  ): void {
    const key = d.name;
    const attempts = (this.failures.get(key) ?? 0) + 1;
    this.failures.set(key, attempts);
    const retryScheduled = !this.stopped && attempts <= this.policy.maxAttempts;
    this.transition(key, {
      kind: 'failed',
      error,
      at: Date.now(),
      attempts,
      retryScheduled,
      exit,
    });
    this.emit({ type: 'error', key, error });
    if (!retryScheduled) {
      debugFallback(
        DBG_SCOPE_SCHEDULER_RESTART,
        `${key}: giving up after ${attempts - 1} restart(s); manual retry required`,
      );
      return;
    }
    const delay = backoffDelay(attempts, this.policy);
    streamTrace.scheduler.restart(key, attempts, delay);
    const timer = setTimeout(() => {
      this.timers.delete(key);
      void this.launch(d);
    }, delay);
    this.timers.set(key, timer);
  }

  private clearTimer(name: string): void {
    const t = this.timers.get(name);
    if (t) clearTimeout(t);
    this.timers.delete(name);
  }

  private transition(key: string, next: ScriptStatus): void {
    const prev = this.states.get(key) ?? IDLE;
    this.states.set(key, next);
    streamTrace.scheduler.transition(key, prev.kind, next.kind);
    this.emit({ type: 'status', key, status: next });
  }

  private emit(e: ScriptEvent): void {
    this.events.push(e);
    for (const l of this.listeners) l(e);
  }
}
