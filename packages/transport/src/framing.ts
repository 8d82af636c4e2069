/**
 * Length-prefixed framing: a 4-byte big-endian payload length followed by
 * the payload bytes.
 */

export const FRAME_HEADER_BYTES = 4;

export class FrameTooLargeError extends Error {
  readonly size: number;
  readonly limit: number;

  constructor(size: number, limit: number) {
    super(`Frame of ${size} bytes exceeds limit of ${limit} bytes`);
    this.name = 'FrameTooLargeError';
    this.size = size;
    this.limit = limit;
  }
}

export function encodeFrame(payload: Buffer): Buffer {
  const frame = Buffer.allocUnsafe(FRAME_HEADER_BYTES + payload.length);
  frame.writeUInt32BE(payload.length, 0);
  payload.copy(frame, FRAME_HEADER_BYTES);
  return frame;
}

/**
 * Reassembles frames from a byte stream. One decoder per connection.
 */
export class FrameDecoder {
  private buffer: Buffer = Buffer.alloc(0);

  constructor(private readonly maxFrameBytes: number) {}

  /**
   * Append received bytes and return every frame completed by them.
   *
   * @throws FrameTooLargeError when a header announces an oversized frame;
   * the stream cannot be resynchronised after that
   */
  push(chunk: Buffer): Buffer[] {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
    const frames: Buffer[] = [];

    while (this.buffer.length >= FRAME_HEADER_BYTES) {
      const length = this.buffer.readUInt32BE(0);
      if (length > this.maxFrameBytes) {
        throw new FrameTooLargeError(length, this.maxFrameBytes);
      }
      if (this.buffer.length < FRAME_HEADER_BYTES + length) {
        break;
      }

      // Copy so the frame does not pin the whole receive chunk
      frames.push(Buffer.from(this.buffer.subarray(FRAME_HEADER_BYTES, FRAME_HEADER_BYTES + length)));
      this.buffer = this.buffer.subarray(FRAME_HEADER_BYTES + length);
    }

    return frames;
  }

  get bufferedBytes(): number {
    return this.buffer.length;
  }
}
