/**
 * Bounds-checked little-endian byte reader over one message payload and its
 * attached descriptors.
 *
 * Every read checks the remaining length first and throws DecodeError when the
 * payload is short, so a truncated or hostile frame never reads out of bounds.
 */

import { DecodeError } from '@/ipc/errors/index.js';

export class Decoder {
  private position = 0;
  private descriptorIndex = 0;
  private readonly view: DataView;

  constructor(
    private readonly bytes: Uint8Array,
    private readonly descriptors: readonly number[] = []
  ) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get offset(): number {
    return this.position;
  }

  get remainingBytes(): number {
    return this.bytes.byteLength - this.position;
  }

  get remainingDescriptors(): number {
    return this.descriptors.length - this.descriptorIndex;
  }

  readU8(): number {
    this.need(1, 'u8');
    const value = this.view.getUint8(this.position);
    this.position += 1;
    return value;
  }

  readU16(): number {
    this.need(2, 'u16');
    const value = this.view.getUint16(this.position, true);
    this.position += 2;
    return value;
  }

  readU32(): number {
    this.need(4, 'u32');
    const value = this.view.getUint32(this.position, true);
    this.position += 4;
    return value;
  }

  readI8(): number {
    this.need(1, 'i8');
    const value = this.view.getInt8(this.position);
    this.position += 1;
    return value;
  }

  readI16(): number {
    this.need(2, 'i16');
    const value = this.view.getInt16(this.position, true);
    this.position += 2;
    return value;
  }

  readI32(): number {
    this.need(4, 'i32');
    const value = this.view.getInt32(this.position, true);
    this.position += 4;
    return value;
  }

  readU64(): bigint {
    this.need(8, 'u64');
    const value = this.view.getBigUint64(this.position, true);
    this.position += 8;
    return value;
  }

  readI64(): bigint {
    this.need(8, 'i64');
    const value = this.view.getBigInt64(this.position, true);
    this.position += 8;
    return value;
  }

  readF32(): number {
    this.need(4, 'f32');
    const value = this.view.getFloat32(this.position, true);
    this.position += 4;
    return value;
  }

  readF64(): number {
    this.need(8, 'f64');
    const value = this.view.getFloat64(this.position, true);
    this.position += 8;
    return value;
  }

  /**
   * Copy the next `count` bytes out of the payload.
   */
  readBytes(count: number): Uint8Array {
    this.need(count, `${count}-byte buffer`);
    // Uint8Array constructor copies; Buffer#slice would alias the frame
    const slice = new Uint8Array(this.bytes.subarray(this.position, this.position + count));
    this.position += count;
    return slice;
  }

  /**
   * Read a u32 length prefix and check it against what is left to decode.
   *
   * @param available - Upper bound the count may not exceed (defaults to remaining bytes)
   */
  readLength(available: number = this.remainingBytes): number {
    const count = this.readU32();
    if (count > available) {
      throw new DecodeError(`Length prefix ${count} exceeds remaining payload (${available})`);
    }
    return count;
  }

  /**
   * Pop the next attached descriptor, in the order the encoder attached them.
   */
  takeDescriptor(): number {
    const fd = this.descriptors[this.descriptorIndex];
    if (fd === undefined) {
      throw new DecodeError('Message carries no more file descriptors');
    }
    this.descriptorIndex += 1;
    return fd;
  }

  /**
   * Assert the payload was consumed exactly: no trailing bytes, no unclaimed descriptors.
   */
  ensureConsumed(): void {
    if (this.remainingBytes !== 0) {
      throw new DecodeError(`${this.remainingBytes} trailing bytes after decode`);
    }
    if (this.remainingDescriptors !== 0) {
      throw new DecodeError(`${this.remainingDescriptors} file descriptors left unconsumed`);
    }
  }

  private need(count: number, what: string): void {
    if (this.remainingBytes < count) {
      throw new DecodeError(
        `Need ${count} bytes for ${what} at offset ${this.position}, ${this.remainingBytes} remaining`
      );
    }
  }
}
