/* src/runner/stream/bridge.ts
 * Streaming Channel Bridge: one loopback endpoint per streaming invocation.
 * Receives length-prefixed frames, decodes them into StreamMessage and
 * republishes synchronously to listeners in arrival order.
 */
import { createServer, type Server, type Socket } from 'node:net';

import { StreamDecodeError } from '@/runner/errors';
import {
  decodeFrame,
  FrameDecoder,
  MAX_FRAME_BYTES,
  type StreamMessage,
} from '@/runner/stream/frame';
import { debugFallback } from '@/runner/util/debug';
import { DBG_SCOPE_BRIDGE_LISTENER } from '@/runner/util/debug-scopes';
import { streamTrace } from '@/runner/util/trace';

/** Environment variable carrying the endpoint address to the script. */
export const ENDPOINT_ENV = 'SCRIPTDECK_STREAM_ENDPOINT';

export type MessageListener = (msg: StreamMessage) => void;

export type BridgeStats = {
  received: number;
  decodeErrors: number;
  connections: number;
};

export class StreamBridge {
  private server: Server | undefined;
  private address: string | undefined;
  private readonly sockets = new Set<Socket>();
  private readonly listeners = new Set<MessageListener>();
  private received = 0;
  private frames = 0;
  private decodeErrors = 0;
  private connections = 0;
  private closed = false;

  /**
   * @param defaultStreamId - Stream id for frames that carry none (the
   *   invocation's result key).
   */
  constructor(
    private readonly defaultStreamId: string,
    private readonly opts: { host?: string; maxFrameBytes?: number } = {},
  ) {}

  /** Bind to an ephemeral loopback port. Resolves with the endpoint address. */
  public async bind(): Promise<string> {
    if (this.closed) throw new Error('bridge is closed');
    if (this.address) return this.address;
    const host = this.opts.host ?? '127.0.0.1';
    const server = createServer((socket) => this.accept(socket));
    await new Promise<void>((resolveP, rejectP) => {
      server.once('error', rejectP);
      server.listen(0, host, () => {
        server.off('error', rejectP);
        resolveP();
      });
    });
    const addr = server.address();
    if (addr === null || typeof addr === 'string') {
      server.close();
      throw new Error('bridge: unexpected server address');
    }
    this.server = server;
    this.address = `tcp://${host}:${addr.port}`;
    streamTrace.bridge.bound(this.address);
    return this.address;
  }

  public get endpoint(): string | undefined {
    return this.address;
  }

  public get isClosed(): boolean {
    return this.closed;
  }

  public onMessage(listener: MessageListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  public stats(): BridgeStats {
    return {
      received: this.received,
      decodeErrors: this.decodeErrors,
      connections: this.connections,
    };
  }

  private accept(socket: Socket): void {
    if (this.closed) {
      socket.destroy();
      return;
    }
    this.connections += 1;
    this.sockets.add(socket);
    streamTrace.bridge.connection(this.address ?? '(unbound)');

    const decoder = new FrameDecoder(
      (body) => this.deliver(body),
      this.opts.maxFrameBytes ?? MAX_FRAME_BYTES,
    );
    socket.on('data', (chunk: Buffer) => {
      if (this.closed) return;
      try {
        decoder.push(chunk);
      } catch (e) {
        // Framing lost: nothing after this point can be trusted.
        this.countDecodeError(e);
        socket.destroy();
      }
    });
    socket.on('error', (e) => {
      streamTrace.bridge.socketError(this.defaultStreamId, e.message);
    });
    socket.on('close', () => {
      this.sockets.delete(socket);
    });
  }

  private deliver(body: Buffer): void {
    const seq = this.frames;
    this.frames += 1;
    let msg: StreamMessage;
    try {
      msg = decodeFrame(body, this.defaultStreamId, seq);
    } catch (e) {
      this.countDecodeError(e);
      return;
    }
    this.received += 1;
    for (const l of this.listeners) {
      try {
        l(msg);
      } catch (e) {
        debugFallback(
          DBG_SCOPE_BRIDGE_LISTENER,
          `${this.defaultStreamId}: ${e instanceof Error ? e.message : String(e)}`,
        );
      }
    }
  }

  /** Any failure while decoding input counts against this stream only. */
  private countDecodeError(e: unknown): void {
    this.decodeErrors += 1;
    const message =
      e instanceof StreamDecodeError
        ? e.message
        : `unexpected decode failure (${e instanceof Error ? e.message : String(e)})`;
    streamTrace.bridge.decodeError(this.defaultStreamId, message);
  }

  /**
   * Wait until every connection has ended (the script closed its side), or
   * the timeout passes. Lets trailing frames land after the process exits.
   */
  public async drain(timeoutMs: number): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    while (this.sockets.size > 0 && !this.closed && Date.now() < deadline) {
      await new Promise<void>((resolveP) => setTimeout(resolveP, 10));
    }
  }

  /** Destroy open connections and stop listening. Idempotent. */
  public async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    for (const s of this.sockets) s.destroy();
    this.sockets.clear();
    const server = this.server;
    this.server = undefined;
    if (!server) return;
    await new Promise<void>((resolveP) => {
      server.close(() => resolveP());
    });
    streamTrace.bridge.closed(this.address ?? '(unbound)');
  }
}
