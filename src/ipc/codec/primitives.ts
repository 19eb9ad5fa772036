/**
 * Fixed-width and length-prefixed primitive codecs.
 */

import { DecodeError } from '@/ipc/errors/index.js';
import { IpcFile } from '@/ipc/file/IpcFile.js';

import type { Codec } from './types.js';

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

export const u8: Codec<number> = {
  encode: (encoder, value) => encoder.writeU8(value),
  decode: (decoder) => decoder.readU8(),
};

export const u16: Codec<number> = {
  encode: (encoder, value) => encoder.writeU16(value),
  decode: (decoder) => decoder.readU16(),
};

export const u32: Codec<number> = {
  encode: (encoder, value) => encoder.writeU32(value),
  decode: (decoder) => decoder.readU32(),
};

export const u64: Codec<bigint> = {
  encode: (encoder, value) => encoder.writeU64(value),
  decode: (decoder) => decoder.readU64(),
};

export const i8: Codec<number> = {
  encode: (encoder, value) => encoder.writeI8(value),
  decode: (decoder) => decoder.readI8(),
};

export const i16: Codec<number> = {
  encode: (encoder, value) => encoder.writeI16(value),
  decode: (decoder) => decoder.readI16(),
};

export const i32: Codec<number> = {
  encode: (encoder, value) => encoder.writeI32(value),
  decode: (decoder) => decoder.readI32(),
};

export const i64: Codec<bigint> = {
  encode: (encoder, value) => encoder.writeI64(value),
  decode: (decoder) => decoder.readI64(),
};

export const f32: Codec<number> = {
  encode: (encoder, value) => encoder.writeF32(value),
  decode: (decoder) => decoder.readF32(),
};

export const f64: Codec<number> = {
  encode: (encoder, value) => encoder.writeF64(value),
  decode: (decoder) => decoder.readF64(),
};

export const bool: Codec<boolean> = {
  encode: (encoder, value) => encoder.writeU8(value ? 1 : 0),
  decode: (decoder) => {
    const byte = decoder.readU8();
    if (byte > 1) {
      throw new DecodeError(`Invalid boolean byte ${byte}`);
    }
    return byte === 1;
  },
};

/**
 * UTF-8 string with a u32 byte-length prefix.
 */
export const string: Codec<string> = {
  encode: (encoder, value) => {
    const bytes = Buffer.from(value, 'utf-8');
    encoder.writeLength(bytes.byteLength);
    encoder.writeBytes(bytes);
  },
  decode: (decoder) => {
    const bytes = decoder.readBytes(decoder.readLength());
    try {
      return utf8Decoder.decode(bytes);
    } catch {
      throw new DecodeError('String payload is not valid UTF-8');
    }
  },
};

/**
 * Opaque byte buffer with a u32 length prefix.
 */
export const bytes: Codec<Uint8Array> = {
  encode: (encoder, value) => {
    encoder.writeLength(value.byteLength);
    encoder.writeBytes(value);
  },
  decode: (decoder) => decoder.readBytes(decoder.readLength()),
};

/**
 * Descriptor-carrying file. Writes no inline bytes: the descriptor is moved
 * into the message's descriptor list and popped back off in the same order.
 */
export const file: Codec<IpcFile> = {
  encode: (encoder, value) => encoder.appendDescriptor(value.takeFd()),
  decode: (decoder) => IpcFile.adoptFd(decoder.takeDescriptor()),
};
