/* src/runner/supervisor/index.ts
 * Process Supervisor: serializes app state to each invocation and drives the
 * child process in discrete (await one JSON result) or streaming (bound
 * endpoint + long-lived process) mode.
 */
import { spawnScript, type SpawnedScript } from '@/runner/exec/spawn';
import { NotFoundError, ScriptError } from '@/runner/errors';
import { resultKey, type ScriptDescriptor } from '@/runner/registry';
import {
  type AppState,
  type AppStateValue,
  parseAppStateValue,
} from '@/runner/state/value';
import { ENDPOINT_ENV, StreamBridge } from '@/runner/stream/bridge';
import type { StreamMessage } from '@/runner/stream/frame';
import { DEFAULT_BUFFER_SIZE, MessageQueue } from '@/runner/stream/queue';
import { StreamHandle } from '@/runner/supervisor/handle';
import { debugFallback } from '@/runner/util/debug';
import { DBG_SCOPE_SUPERVISOR_KILL } from '@/runner/util/debug-scopes';
import {
  DEFAULT_STOP_GRACE_MS,
  DEFAULT_TIMEOUT_MS,
  type DiscreteOptions,
  type ScriptInvocation,
  type StreamingOptions,
  type SupervisorOptions,
} from '@/runner/supervisor/types';

export { StreamHandle } from '@/runner/supervisor/handle';
export type { StreamStats } from '@/runner/supervisor/handle';
export * from '@/runner/supervisor/types';

/**
 * Parse discrete output: the whole trimmed stdout as one JSON value; when
 * the script printed diagnostics first, its last non-empty line.
 */
export const parseDiscreteOutput = (stdout: string): AppStateValue => {
  const text = stdout.trim();
  try {
    return parseAppStateValue(text);
  } catch (whole) {
    const lines = text.split(/\r?\n/).filter((l) => l.trim().length > 0);
    const last = lines.at(-1);
    if (lines.length < 2 || last === undefined) throw whole;
    return parseAppStateValue(last.trim());
  }
};

export class ProcessSupervisor {
  private readonly live = new Map<
    number,
    { invocation: ScriptInvocation; proc: SpawnedScript; handle?: StreamHandle }
  >();
  private nextId = 1;

  constructor(private readonly opts: SupervisorOptions) {}

  private get graceMs(): number {
    return this.opts.stopGraceMs ?? DEFAULT_STOP_GRACE_MS;
  }

  private track(
    descriptor: ScriptDescriptor,
    fn: string | undefined,
    snapshot: AppState,
    proc: SpawnedScript,
  ): ScriptInvocation {
    const invocation: ScriptInvocation = Object.freeze({
      id: this.nextId++,
      descriptor,
      fn,
      key: resultKey(descriptor.name, fn),
      snapshot,
      startedAt: Date.now(),
      pid: proc.pid,
    });
    this.live.set(invocation.id, { invocation, proc });
    void proc.exited.then(() => this.live.delete(invocation.id));
    return invocation;
  }

  /**
   * Run a script once and return its parsed JSON output.
   *
   * @throws NotFoundError when `fn` is not declared on the descriptor.
   * @throws ScriptError (spawn-failed | non-zero-exit | malformed-output | timeout).
   */
  public async runDiscrete(
    descriptor: ScriptDescriptor,
    fn: string | undefined,
    state: AppState,
    options?: DiscreteOptions,
  ): Promise<AppStateValue> {
    const key = resultKey(descriptor.name, fn);
    if (fn !== undefined && !descriptor.functions.some((f) => f.name === fn))
      throw new NotFoundError('function', key);

    let proc: SpawnedScript;
    try {
      proc = await spawnScript({
        key,
        runtime: this.opts.runtime,
        scriptPath: descriptor.path,
        fn,
        stdin: JSON.stringify(state),
        cwd: this.opts.cwd,
        env: this.opts.env,
        collectStdout: true,
        hooks: options?.hooks,
      });
    } catch (e) {
      throw ScriptError.spawnFailed(key, e);
    }
    this.track(descriptor, fn, state, proc);

    const timeoutMs =
      options?.timeoutMs ?? this.opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    let timedOut = false;
    const timer =
      timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            void proc.terminate(this.graceMs);
          }, timeoutMs)
        : undefined;

    const info = await proc.exited;
    if (timer) clearTimeout(timer);

    if (timedOut) throw ScriptError.timeout(key, timeoutMs);
    if (info.code !== 0)
      throw ScriptError.nonZeroExit(key, info.code, info.signal, proc.stderrTail());
    try {
      return parseDiscreteOutput(proc.stdout());
    } catch (e) {
      throw ScriptError.malformedOutput(key, e);
    }
  }

  /**
   * Bind a fresh endpoint, then spawn the streaming script with the endpoint
   * address in its environment and the state snapshot on stdin.
   *
   * @throws ScriptError (spawn-failed); the endpoint is closed first.
   */
  public async startStreaming(
    descriptor: ScriptDescriptor,
    state: AppState,
    options?: StreamingOptions,
  ): Promise<StreamHandle> {
    const key = resultKey(descriptor.name);
    const bridge = new StreamBridge(key);
    // Listeners go on before the endpoint exists, so no early frame is missed.
    let tap: MessageQueue<StreamMessage> | undefined;
    if (options?.tap ?? true) {
      const q = new MessageQueue<StreamMessage>(
        this.opts.bufferSize ?? DEFAULT_BUFFER_SIZE,
      );
      bridge.onMessage((m) => q.push(m));
      tap = q;
    }
    if (options?.onMessage) bridge.onMessage(options.onMessage);
    const endpoint = await bridge.bind();

    let proc: SpawnedScript;
    try {
      proc = await spawnScript({
        key,
        runtime: this.opts.runtime,
        scriptPath: descriptor.path,
        stdin: JSON.stringify(state),
        cwd: this.opts.cwd,
        env: { ...(this.opts.env ?? process.env), [ENDPOINT_ENV]: endpoint },
        hooks: options?.hooks,
      });
    } catch (e) {
      await bridge.close();
      throw ScriptError.spawnFailed(key, e);
    }
    const invocation = this.track(descriptor, undefined, state, proc);
    const handle = new StreamHandle(
      invocation,
      endpoint,
      bridge,
      proc,
      this.graceMs,
      tap,
    );
    const entry = this.live.get(invocation.id);
    if (entry) entry.handle = handle;
    return handle;
  }

  /** Invocations whose process is still alive. */
  public running(): ScriptInvocation[] {
    return [...this.live.values()].map((e) => e.invocation);
  }

  /**
   * Synchronous last resort for process exit hooks: SIGKILL every live child.
   * No grace period; async shutdown() is the normal path.
   */
  public killAllSync(): void {
    for (const { proc } of this.live.values()) {
      if (!proc.isRunning()) continue;
      try {
        process.kill(proc.pid, 'SIGKILL');
      } catch (e) {
        // ESRCH: exited between the check and the kill.
        debugFallback(
          DBG_SCOPE_SUPERVISOR_KILL,
          `${proc.key}: ${e instanceof Error ? e.message : String(e)}`,
        );
      }
    }
  }

  /** Stop every streaming handle and kill in-flight discrete processes. */
  public async shutdown(): Promise<void> {
    await Promise.all(
      [...this.live.values()].map((e) =>
        e.handle ? e.handle.stop() : e.proc.terminate(this.graceMs),
      ),
    );
  }
}
