/**
 * Whole-frame helpers: encode one value into a frame, decode a frame back
 * into exactly one value.
 */

import { releaseDescriptors } from '@/ipc/file/IpcFile.js';
import type { Frame } from '@/ipc/transport/types.js';

import { Decoder } from './Decoder.js';
import { Encoder } from './Encoder.js';
import type { Codec } from './types.js';

/**
 * Run `write` against a fresh Encoder and return the resulting frame.
 *
 * Descriptors are moved out of their IpcFiles while encoding; if `write`
 * throws part way, the descriptors already moved are closed so they do not leak.
 */
export function buildFrame(write: (encoder: Encoder) => void): Frame {
  const encoder = new Encoder();
  try {
    write(encoder);
  } catch (error) {
    releaseDescriptors(encoder.toFrame().files);
    throw error;
  }
  return encoder.toFrame();
}

export function encodeValue<T>(codec: Codec<T>, value: T): Frame {
  return buildFrame((encoder) => codec.encode(encoder, value));
}

/**
 * Decode a frame that must contain exactly one value and nothing else.
 */
export function decodeValue<T>(codec: Codec<T>, frame: Frame): T {
  const decoder = new Decoder(frame.bytes, frame.files);
  const value = codec.decode(decoder);
  decoder.ensureConsumed();
  return value;
}
