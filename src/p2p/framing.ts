import { Uint8ArrayList } from 'uint8arraylist';
import { FrameError } from '../errors';

/** Size of the big-endian length prefix */
export const FRAME_HEADER_LENGTH = 4;

/** Exclusive upper bound on a frame's payload length */
export const MAX_FRAME_LENGTH = 100_000_000;

export function isValidFrameLength(length: number): boolean {
  return Number.isInteger(length) && length > 0 && length < MAX_FRAME_LENGTH;
}

/**
 * @throws FrameError INVALID_LENGTH unless 0 < length < MAX_FRAME_LENGTH
 */
export function assertFrameLength(length: number): void {
  if (!isValidFrameLength(length)) {
    throw new FrameError('INVALID_LENGTH', `Invalid frame length: ${length}`);
  }
}

/**
 * Prefix `payload` with its length.
 */
export function encodeFrame(payload: Uint8Array): Uint8Array {
  assertFrameLength(payload.byteLength);
  const frame = new Uint8Array(FRAME_HEADER_LENGTH + payload.byteLength);
  new DataView(frame.buffer).setUint32(0, payload.byteLength, false);
  frame.set(payload, FRAME_HEADER_LENGTH);
  return frame;
}

/**
 * Reads length-prefixed frames off a stream source, chunk boundaries ignored.
 */
export class FrameReader {
  private readonly buffer = new Uint8ArrayList();
  private readonly iterator: AsyncIterator<Uint8Array | Uint8ArrayList>;

  constructor(source: AsyncIterable<Uint8Array | Uint8ArrayList>) {
    this.iterator = source[Symbol.asyncIterator]();
  }

  /**
   * Read the next frame's payload. The length is validated before any of
   * the payload is awaited.
   * @throws FrameError TRUNCATED if the source ends early, INVALID_LENGTH on a bad prefix
   */
  async read(): Promise<Uint8Array> {
    if (!(await this.fill(FRAME_HEADER_LENGTH))) {
      throw new FrameError('TRUNCATED', 'Stream ended before frame header');
    }
    const length = this.buffer.getUint32(0, false);
    assertFrameLength(length);
    this.buffer.consume(FRAME_HEADER_LENGTH);

    if (!(await this.fill(length))) {
      throw new FrameError('TRUNCATED', `Stream ended inside a ${length} byte frame`);
    }
    const payload = this.buffer.subarray(0, length);
    this.buffer.consume(length);
    return payload;
  }

  private async fill(length: number): Promise<boolean> {
    while (this.buffer.byteLength < length) {
      const next = await this.iterator.next();
      if (next.done) {
        return false;
      }
      this.buffer.append(next.value);
    }
    return true;
  }
}

/**
 * Read exactly one frame from `source`.
 */
export async function readFrame(source: AsyncIterable<Uint8Array | Uint8ArrayList>): Promise<Uint8Array> {
  return new FrameReader(source).read();
}
