/**
 * Growable little-endian byte writer with a side list of attached descriptors.
 */

import { EncodeError } from '@/ipc/errors/index.js';
import type { Frame } from '@/ipc/transport/types.js';

const INITIAL_CAPACITY = 64;

const U64_MAX = 0xffff_ffff_ffff_ffffn;
const I64_MIN = -0x8000_0000_0000_0000n;
const I64_MAX = 0x7fff_ffff_ffff_ffffn;

export class Encoder {
  private buffer: Buffer;
  private length = 0;
  private readonly descriptors: number[] = [];

  constructor(initialCapacity: number = INITIAL_CAPACITY) {
    this.buffer = Buffer.allocUnsafe(Math.max(initialCapacity, 1));
  }

  /**
   * Number of payload bytes written so far.
   */
  get byteLength(): number {
    return this.length;
  }

  writeU8(value: number): void {
    this.checkInteger('u8', value, 0, 0xff);
    this.reserve(1);
    this.buffer.writeUInt8(value, this.length);
    this.length += 1;
  }

  writeU16(value: number): void {
    this.checkInteger('u16', value, 0, 0xffff);
    this.reserve(2);
    this.buffer.writeUInt16LE(value, this.length);
    this.length += 2;
  }

  writeU32(value: number): void {
    this.checkInteger('u32', value, 0, 0xffff_ffff);
    this.reserve(4);
    this.buffer.writeUInt32LE(value, this.length);
    this.length += 4;
  }

  writeI8(value: number): void {
    this.checkInteger('i8', value, -0x80, 0x7f);
    this.reserve(1);
    this.buffer.writeInt8(value, this.length);
    this.length += 1;
  }

  writeI16(value: number): void {
    this.checkInteger('i16', value, -0x8000, 0x7fff);
    this.reserve(2);
    this.buffer.writeInt16LE(value, this.length);
    this.length += 2;
  }

  writeI32(value: number): void {
    this.checkInteger('i32', value, -0x8000_0000, 0x7fff_ffff);
    this.reserve(4);
    this.buffer.writeInt32LE(value, this.length);
    this.length += 4;
  }

  writeU64(value: bigint): void {
    if (value < 0n || value > U64_MAX) {
      throw new EncodeError(`Value ${value} out of range for u64`);
    }
    this.reserve(8);
    this.buffer.writeBigUInt64LE(value, this.length);
    this.length += 8;
  }

  writeI64(value: bigint): void {
    if (value < I64_MIN || value > I64_MAX) {
      throw new EncodeError(`Value ${value} out of range for i64`);
    }
    this.reserve(8);
    this.buffer.writeBigInt64LE(value, this.length);
    this.length += 8;
  }

  writeF32(value: number): void {
    this.reserve(4);
    this.buffer.writeFloatLE(value, this.length);
    this.length += 4;
  }

  writeF64(value: number): void {
    this.reserve(8);
    this.buffer.writeDoubleLE(value, this.length);
    this.length += 8;
  }

  /**
   * Append raw bytes with no length prefix.
   */
  writeBytes(bytes: Uint8Array): void {
    this.reserve(bytes.byteLength);
    this.buffer.set(bytes, this.length);
    this.length += bytes.byteLength;
  }

  /**
   * Write a u32 element count, rejecting lengths that do not fit.
   */
  writeLength(count: number): void {
    if (count > 0xffff_ffff) {
      throw new EncodeError(`Length ${count} does not fit in u32 prefix`);
    }
    this.writeU32(count);
  }

  /**
   * Attach a descriptor to the outgoing message, in traversal order.
   */
  appendDescriptor(fd: number): void {
    this.descriptors.push(fd);
  }

  /**
   * Snapshot the written bytes and attached descriptors as a frame.
   */
  toFrame(): Frame {
    return {
      bytes: Buffer.from(this.buffer.subarray(0, this.length)),
      files: [...this.descriptors],
    };
  }

  private reserve(extra: number): void {
    const required = this.length + extra;
    if (required <= this.buffer.length) {
      return;
    }
    let capacity = this.buffer.length * 2;
    while (capacity < required) {
      capacity *= 2;
    }
    const next = Buffer.allocUnsafe(capacity);
    this.buffer.copy(next, 0, 0, this.length);
    this.buffer = next;
  }

  private checkInteger(type: string, value: number, min: number, max: number): void {
    if (!Number.isInteger(value) || value < min || value > max) {
      throw new EncodeError(`Value ${value} out of range for ${type}`);
    }
  }
}
