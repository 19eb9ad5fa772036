/**
 * Codec capability contract.
 *
 * A type takes part in IPC by providing both halves: `encode` appends the
 * value's canonical bytes (and any owned descriptors) to an Encoder, `decode`
 * consumes exactly those bytes and descriptors from a Decoder. Neither the
 * Encoder nor the Decoder knows about domain types.
 */

import type { Decoder } from './Decoder.js';
import type { Encoder } from './Encoder.js';

export interface Codec<T> {
  encode(encoder: Encoder, value: T): void;
  decode(decoder: Decoder): T;
}

/**
 * Value type carried by a codec.
 */
export type Infer<C> = C extends Codec<infer T> ? T : never;

/**
 * Field codecs of a struct, in wire order.
 */
export type Shape = Record<string, Codec<unknown>>;

export type InferShape<S extends Shape> = { [K in keyof S]: Infer<S[K]> };

/**
 * Tagged union value produced by `variant()`.
 */
export type VariantOf<V extends Shape> = {
  [K in keyof V & string]: { kind: K; value: Infer<V[K]> };
}[keyof V & string];
