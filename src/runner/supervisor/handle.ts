/* src/runner/supervisor/handle.ts
 * StreamHandle: a live streaming invocation plus its exclusive bridge.
 */
import type { ExitInfo, SpawnedScript } from '@/runner/exec/spawn';
import type { BridgeStats, MessageListener, StreamBridge } from '@/runner/stream/bridge';
import type { StreamMessage } from '@/runner/stream/frame';
import type { MessageQueue } from '@/runner/stream/queue';
import type { ScriptInvocation } from '@/runner/supervisor/types';

/** How long trailing frames may keep arriving after the process exits. */
const DRAIN_AFTER_EXIT_MS = 250;

export type StreamStats = BridgeStats & { dropped: number };

export class StreamHandle {
  private tapTaken = false;
  private readonly done: Promise<ExitInfo>;

  constructor(
    public readonly invocation: ScriptInvocation,
    public readonly endpoint: string,
    private readonly bridge: StreamBridge,
    private readonly proc: SpawnedScript,
    private readonly graceMs: number,
    /** Own buffered sequence, subscribed to the bridge before the spawn. */
    private readonly tap: MessageQueue<StreamMessage> | undefined,
  ) {
    this.done = this.proc.exited.then(async (info) => {
      if (!info.stopped) await this.bridge.drain(DRAIN_AFTER_EXIT_MS);
      await this.bridge.close();
      this.tap?.close();
      return info;
    });
  }

  /**
   * Every message of this instance, in emission order. Single pass: the
   * sequence ends after stop() or process exit, and a second call throws.
   */
  public messages(): AsyncIterable<StreamMessage> {
    if (!this.tap) throw new Error(`${this.invocation.key}: message tap disabled`);
    if (this.tapTaken)
      throw new Error(`${this.invocation.key}: messages() already taken`);
    this.tapTaken = true;
    return this.tap;
  }

  /** Synchronous per-message listener (used for hub fan-out). */
  public onMessage(listener: MessageListener): () => void {
    return this.bridge.onMessage(listener);
  }

  /** Resolves once the process has exited and the endpoint is closed. */
  public get exited(): Promise<ExitInfo> {
    return this.done;
  }

  public isRunning(): boolean {
    return this.proc.isRunning();
  }

  /** Last few KiB of the script's stderr. */
  public stderrTail(): string {
    return this.proc.stderrTail();
  }

  public stats(): StreamStats {
    return { ...this.bridge.stats(), dropped: this.tap?.dropped ?? 0 };
  }

  /** Terminate the process (graceful, then forced) and close the endpoint. */
  public async stop(): Promise<ExitInfo> {
    await this.proc.terminate(this.graceMs);
    return this.done;
  }
}
