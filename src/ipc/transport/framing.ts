/**
 * Length-prefixed frame codec for byte streams.
 *
 * Wire layout of one frame:
 *
 *   [length u32][descriptor count u32][descriptor i32 x count][payload]
 *
 * `length` counts every byte after itself. Descriptors ride inside the frame
 * they were sent with, so frame N's descriptors can never be confused with
 * frame N+1's.
 */

import {
  FRAME_DESCRIPTOR_COUNT_SIZE,
  FRAME_DESCRIPTOR_SIZE,
  FRAME_LENGTH_SIZE,
  MAX_FRAME_DESCRIPTORS,
  MAX_FRAME_SIZE,
} from '@/constants.js';
import { TransportError } from '@/ipc/errors/index.js';

import type { Frame } from './types.js';

/**
 * Serialize a frame for writing to a stream.
 */
export function toWireFrame(frame: Frame): Buffer {
  if (frame.files.length > MAX_FRAME_DESCRIPTORS) {
    throw new TransportError(
      `Frame carries ${frame.files.length} descriptors, limit is ${MAX_FRAME_DESCRIPTORS}`
    );
  }

  const descriptorBlock = FRAME_DESCRIPTOR_COUNT_SIZE + frame.files.length * FRAME_DESCRIPTOR_SIZE;
  const length = descriptorBlock + frame.bytes.byteLength;
  if (length > MAX_FRAME_SIZE) {
    throw new TransportError(`Frame of ${length} bytes exceeds limit of ${MAX_FRAME_SIZE}`);
  }

  const header = Buffer.allocUnsafe(FRAME_LENGTH_SIZE + descriptorBlock);
  header.writeUInt32LE(length, 0);
  header.writeUInt32LE(frame.files.length, FRAME_LENGTH_SIZE);
  frame.files.forEach((fd, index) => {
    header.writeInt32LE(
      fd,
      FRAME_LENGTH_SIZE + FRAME_DESCRIPTOR_COUNT_SIZE + index * FRAME_DESCRIPTOR_SIZE
    );
  });

  return Buffer.concat([header, frame.bytes]);
}

/**
 * Accumulates stream chunks and yields complete frames.
 *
 * A chunk may hold several frames, part of one, or the tail of one and the
 * head of the next; incomplete bytes stay buffered until the rest arrives.
 */
export class FrameReader {
  private buffer: Buffer = Buffer.alloc(0);

  /**
   * Append a chunk and return every frame it completes.
   *
   * @throws TransportError if a length or descriptor header is impossible
   */
  push(chunk: Buffer): Frame[] {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);

    const frames: Frame[] = [];
    while (this.buffer.length >= FRAME_LENGTH_SIZE) {
      const length = this.buffer.readUInt32LE(0);
      if (length > MAX_FRAME_SIZE) {
        throw new TransportError(`Frame length ${length} exceeds limit of ${MAX_FRAME_SIZE}`);
      }
      if (length < FRAME_DESCRIPTOR_COUNT_SIZE) {
        throw new TransportError(`Frame length ${length} too short for descriptor header`);
      }
      if (this.buffer.length < FRAME_LENGTH_SIZE + length) {
        break;
      }

      const body = this.buffer.subarray(FRAME_LENGTH_SIZE, FRAME_LENGTH_SIZE + length);
      frames.push(this.parseBody(body));
      this.buffer = this.buffer.subarray(FRAME_LENGTH_SIZE + length);
    }

    return frames;
  }

  /**
   * Bytes of an incomplete frame still waiting for more data.
   */
  get pendingBytes(): number {
    return this.buffer.length;
  }

  clear(): void {
    this.buffer = Buffer.alloc(0);
  }

  private parseBody(body: Buffer): Frame {
    const count = body.readUInt32LE(0);
    const payloadOffset = FRAME_DESCRIPTOR_COUNT_SIZE + count * FRAME_DESCRIPTOR_SIZE;
    if (count > MAX_FRAME_DESCRIPTORS || payloadOffset > body.length) {
      throw new TransportError(`Frame declares ${count} descriptors, which do not fit its body`);
    }

    const files: number[] = [];
    for (let i = 0; i < count; i++) {
      const fd = body.readInt32LE(FRAME_DESCRIPTOR_COUNT_SIZE + i * FRAME_DESCRIPTOR_SIZE);
      if (fd < 0) {
        throw new TransportError(`Frame carries invalid descriptor ${fd}`);
      }
      files.push(fd);
    }

    return { bytes: Buffer.from(body.subarray(payloadOffset)), files };
  }
}
