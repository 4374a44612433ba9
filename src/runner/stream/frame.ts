/* src/runner/stream/frame.ts
 * Bridge wire contract: length-prefixed JSON frames.
 *
 *   [u32 big-endian length][length bytes of UTF-8 JSON]
 *
 * JSON body: { stream_id?: string, timestamp?: number, payload: <value> }.
 * A body without "payload" is read as a flat record: every field other than
 * stream_id/timestamp becomes the payload.
 */
import { z } from 'zod';

import { StreamDecodeError } from '@/runner/errors';
import { appStateValueSchema, type AppStateValue } from '@/runner/state/value';

export const FRAME_HEADER_BYTES = 4;
/** Larger length headers cannot be trusted; the connection is dropped. */
export const MAX_FRAME_BYTES = 16 * 1024 * 1024;

export type StreamMessage = {
  streamId: string;
  /** Frame timestamp when provided, otherwise receive time (epoch ms). */
  timestamp: number;
  payload: AppStateValue;
  /**
   * Emission index within the originating script instance. Every frame
   * received takes an index, so a dropped frame leaves a gap.
   */
  seq: number;
};

const frameSchema = z
  .object({
    stream_id: z.string().min(1).optional(),
    timestamp: z.number().finite().optional(),
    payload: appStateValueSchema.optional(),
  })
  .catchall(appStateValueSchema);

/** Encode one frame (used by tests and in-process publishers). */
export const encodeFrame = (body: {
  stream_id?: string;
  timestamp?: number;
  payload: AppStateValue;
}): Buffer => {
  const json = Buffer.from(JSON.stringify(body), 'utf8');
  const header = Buffer.alloc(FRAME_HEADER_BYTES);
  header.writeUInt32BE(json.length, 0);
  return Buffer.concat([header, json]);
};

/**
 * Incremental frame splitter for one connection. Frames are emitted
 * synchronously and in arrival order.
 */
export class FrameDecoder {
  private buf: Buffer = Buffer.alloc(0);
  private broken = false;

  constructor(
    private readonly onFrame: (body: Buffer) => void,
    private readonly maxBytes = MAX_FRAME_BYTES,
  ) {}

  /** True after an oversize header; the caller should drop the connection. */
  public get isBroken(): boolean {
    return this.broken;
  }

  /** Bytes held waiting for the rest of a frame. */
  public get buffered(): number {
    return this.buf.length;
  }

  /** @throws StreamDecodeError on an unrecoverable length header. */
  public push(chunk: Buffer): void {
    if (this.broken) return;
    this.buf = this.buf.length === 0 ? chunk : Buffer.concat([this.buf, chunk]);
    while (this.buf.length >= FRAME_HEADER_BYTES) {
      const len = this.buf.readUInt32BE(0);
      if (len > this.maxBytes) {
        this.broken = true;
        this.buf = Buffer.alloc(0);
        throw new StreamDecodeError(
          `frame length ${len} exceeds limit ${this.maxBytes}`,
        );
      }
      if (this.buf.length < FRAME_HEADER_BYTES + len) break;
      const body = this.buf.subarray(FRAME_HEADER_BYTES, FRAME_HEADER_BYTES + len);
      this.buf = this.buf.subarray(FRAME_HEADER_BYTES + len);
      this.onFrame(body);
    }
  }
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Decode one frame body into a message.
 *
 * @param defaultStreamId - Used when the frame carries no stream_id.
 * @throws StreamDecodeError for invalid UTF-8, JSON or shape.
 */
export const decodeFrame = (
  body: Buffer,
  defaultStreamId: string,
  seq: number,
  now: () => number = Date.now,
): StreamMessage => {
  let raw: unknown;
  try {
    raw = JSON.parse(utf8.decode(body));
  } catch (e) {
    throw new StreamDecodeError(
      `invalid frame body (${e instanceof Error ? e.message : String(e)})`,
      { cause: e },
    );
  }
  let parsed: ReturnType<typeof frameSchema.safeParse>;
  try {
    parsed = frameSchema.safeParse(raw);
  } catch (e) {
    // Deep nesting can overflow the recursive value schema.
    throw new StreamDecodeError(
      `invalid frame shape (${e instanceof Error ? e.message : String(e)})`,
      { cause: e },
    );
  }
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new StreamDecodeError(
      `invalid frame shape (${where}: ${issue?.message ?? 'unknown'})`,
    );
  }
  const { stream_id, timestamp, payload, ...rest } = parsed.data;
  return {
    streamId: stream_id ?? defaultStreamId,
    timestamp: timestamp ?? now(),
    payload: payload !== undefined ? payload : rest,
    seq,
  };
};
