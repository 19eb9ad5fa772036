/**
 * Type-directed binary codec.
 */

export { Decoder } from './Decoder.js';
export { Encoder } from './Encoder.js';
export { buildFrame, decodeValue, encodeValue } from './frame.js';
export {
  bool,
  bytes,
  f32,
  f64,
  file,
  i16,
  i32,
  i64,
  i8,
  string,
  u16,
  u32,
  u64,
  u8,
} from './primitives.js';
export { enumeration, map, optional, sequence, struct, transform, variant } from './composites.js';
export type { Codec, Infer, InferShape, Shape, VariantOf } from './types.js';
