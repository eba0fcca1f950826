/**
 * Length-prefixed framing: [u32 big-endian length][payload].
 */

import { Transform, type TransformCallback, type Writable } from "node:stream";
import { FrameError } from "../utils/errors.js";

export const HEADER_BYTES = 4;
export const MAX_FRAME_BYTES = 8 * 1024 * 1024;

export function encodeFrame(payload: Buffer): Buffer {
  if (payload.length > MAX_FRAME_BYTES) {
    throw new FrameError(`frame of ${payload.length} bytes exceeds ${MAX_FRAME_BYTES}`);
  }
  const header = Buffer.alloc(HEADER_BYTES);
  header.writeUInt32BE(payload.length, 0);
  return Buffer.concat([header, payload]);
}

/**
 * Write one frame and, when the destination is over its high-water mark,
 * wait for it to drain (or close) before resolving.
 */
export async function writeFrame(out: Writable, payload: Buffer): Promise<void> {
  if (out.write(encodeFrame(payload))) return;
  await new Promise<void>((resolve) => {
    const done = (): void => {
      out.off("drain", done);
      out.off("close", done);
      resolve();
    };
    out.on("drain", done);
    out.on("close", done);
  });
}

/** Accumulates chunks and pushes one Buffer per complete frame */
export class FrameDecoder extends Transform {
  private buffered: Buffer = Buffer.alloc(0);

  constructor(private readonly maxFrameBytes: number = MAX_FRAME_BYTES) {
    super({ readableObjectMode: true });
  }

  override _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    this.buffered = this.buffered.length === 0 ? chunk : Buffer.concat([this.buffered, chunk]);

    while (this.buffered.length >= HEADER_BYTES) {
      const length = this.buffered.readUInt32BE(0);
      if (length > this.maxFrameBytes) {
        callback(new FrameError(`incoming frame of ${length} bytes exceeds ${this.maxFrameBytes}`));
        return;
      }
      if (this.buffered.length < HEADER_BYTES + length) break;
      this.push(this.buffered.subarray(HEADER_BYTES, HEADER_BYTES + length));
      this.buffered = this.buffered.subarray(HEADER_BYTES + length);
    }
    callback();
  }

  override _flush(callback: TransformCallback): void {
    if (this.buffered.length > 0) {
      callback(new FrameError(`connection closed mid-frame (${this.buffered.length} bytes pending)`));
      return;
    }
    callback();
  }
}
