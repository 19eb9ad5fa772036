/**
 * Message envelope.
 *
 * Payload layout inside a frame:
 *
 *   [magic u32][opcode u32][correlation id u32, requests and responses only][fields...]
 */

import { Decoder, buildFrame } from '@/ipc/codec/index.js';
import type { Codec } from '@/ipc/codec/index.js';
import { DecodeError } from '@/ipc/errors/index.js';
import { releaseDescriptors } from '@/ipc/file/IpcFile.js';
import type { Frame } from '@/ipc/transport/types.js';

/**
 * Build an outgoing message frame.
 *
 * @param correlationId - Present for requests and responses, absent for plain messages
 */
export function buildMessage<T>(
  magic: number,
  opcode: number,
  correlationId: number | undefined,
  codec: Codec<T>,
  payload: T
): Frame {
  return buildFrame((encoder) => {
    encoder.writeU32(magic);
    encoder.writeU32(opcode);
    if (correlationId !== undefined) {
      encoder.writeU32(correlationId);
    }
    codec.encode(encoder, payload);
  });
}

/**
 * Inbound message whose header has been read but whose payload has not.
 *
 * The payload can be decoded exactly once, and the decode must consume every
 * byte and every attached descriptor.
 */
export class Message {
  private consumed = false;
  private correlation: number | undefined;

  private constructor(
    readonly magic: number,
    readonly opcode: number,
    private readonly decoder: Decoder,
    private readonly files: readonly number[]
  ) {}

  /**
   * Read the envelope header of a frame.
   *
   * @throws DecodeError if the frame is shorter than the header
   */
  static fromFrame(frame: Frame): Message {
    const decoder = new Decoder(frame.bytes, frame.files);
    const magic = decoder.readU32();
    const opcode = decoder.readU32();
    return new Message(magic, opcode, decoder, frame.files);
  }

  get isConsumed(): boolean {
    return this.consumed;
  }

  /**
   * Correlation id that follows the header of requests and responses.
   * Reading it again returns the same id.
   */
  readCorrelationId(): number {
    if (this.correlation === undefined) {
      if (this.consumed) {
        throw new DecodeError('Correlation id must be read before the payload');
      }
      this.correlation = this.decoder.readU32();
    }
    return this.correlation;
  }

  /**
   * Decode the payload. On failure every attached descriptor is closed,
   * since the partially decoded value is dropped.
   *
   * @throws DecodeError on malformed payload, trailing data, or a second decode
   */
  decodePayload<T>(codec: Codec<T>): T {
    if (this.consumed) {
      throw new DecodeError(`Message ${this.opcode} payload already decoded`);
    }
    this.consumed = true;

    try {
      const value = codec.decode(this.decoder);
      this.decoder.ensureConsumed();
      return value;
    } catch (error) {
      releaseDescriptors(this.files);
      throw error;
    }
  }

  /**
   * Drop an undecoded message, closing its descriptors.
   */
  discard(): void {
    if (this.consumed) return;
    this.consumed = true;
    releaseDescriptors(this.files);
  }
}
