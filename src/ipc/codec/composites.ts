/**
 * Aggregate codecs built from other codecs: optionals, sequences, maps,
 * structs, tagged unions and string enumerations.
 */

import { DecodeError, EncodeError } from '@/ipc/errors/index.js';

import type { Decoder } from './Decoder.js';
import type { Codec, InferShape, Shape, VariantOf } from './types.js';

/**
 * Upper bound for an element count: each element consumes at least one byte
 * or one descriptor, so a count above that can only come from a corrupt prefix.
 */
function elementBudget(decoder: Decoder): number {
  return decoder.remainingBytes + decoder.remainingDescriptors;
}

/**
 * One presence byte (0 or 1) followed by the value when present.
 */
export function optional<T>(codec: Codec<T>): Codec<T | undefined> {
  return {
    encode(encoder, value) {
      if (value === undefined) {
        encoder.writeU8(0);
        return;
      }
      encoder.writeU8(1);
      codec.encode(encoder, value);
    },
    decode(decoder) {
      const flag = decoder.readU8();
      if (flag === 0) {
        return undefined;
      }
      if (flag !== 1) {
        throw new DecodeError(`Invalid optional presence byte ${flag}`);
      }
      return codec.decode(decoder);
    },
  };
}

/**
 * u32 element count followed by each element in order.
 */
export function sequence<T>(codec: Codec<T>): Codec<T[]> {
  return {
    encode(encoder, values) {
      encoder.writeLength(values.length);
      for (const value of values) {
        codec.encode(encoder, value);
      }
    },
    decode(decoder) {
      const count = decoder.readLength(elementBudget(decoder));
      const values: T[] = [];
      for (let i = 0; i < count; i++) {
        values.push(codec.decode(decoder));
      }
      return values;
    },
  };
}

/**
 * u32 entry count followed by key/value pairs in insertion order.
 */
export function map<K, V>(keyCodec: Codec<K>, valueCodec: Codec<V>): Codec<Map<K, V>> {
  return {
    encode(encoder, entries) {
      encoder.writeLength(entries.size);
      for (const [key, value] of entries) {
        keyCodec.encode(encoder, key);
        valueCodec.encode(encoder, value);
      }
    },
    decode(decoder) {
      const count = decoder.readLength(elementBudget(decoder));
      const entries = new Map<K, V>();
      for (let i = 0; i < count; i++) {
        const key = keyCodec.decode(decoder);
        if (entries.has(key)) {
          throw new DecodeError('Duplicate key in map payload');
        }
        entries.set(key, valueCodec.decode(decoder));
      }
      return entries;
    },
  };
}

/**
 * Fields encoded one after another in the order the shape declares them.
 * The declaration order is the wire contract.
 *
 * @example
 * ```typescript
 * const header = struct({ name: string, value: string });
 * ```
 */
export function struct<S extends Shape>(shape: S): Codec<InferShape<S>> {
  const fields = Object.entries(shape);
  return {
    encode(encoder, value) {
      for (const [name, codec] of fields) {
        codec.encode(encoder, value[name]);
      }
    },
    decode(decoder) {
      const result: Record<string, unknown> = {};
      for (const [name, codec] of fields) {
        result[name] = codec.decode(decoder);
      }
      return result as InferShape<S>;
    },
  };
}

/**
 * Tagged union: u8 discriminant (declaration index) then the active payload.
 *
 * @example
 * ```typescript
 * const body = variant({ file, contents: bytes });
 * body.encode(encoder, { kind: 'contents', value: new Uint8Array([1, 2]) });
 * ```
 */
export function variant<V extends Shape>(variants: V): Codec<VariantOf<V>> {
  const entries = Object.entries(variants);
  if (entries.length > 0x100) {
    throw new EncodeError(`Variant has ${entries.length} alternatives, at most 256 fit a u8 tag`);
  }
  const kinds = entries.map(([kind]) => kind);

  return {
    encode(encoder, value) {
      const index = kinds.indexOf(value.kind);
      const codec = entries[index]?.[1];
      if (!codec) {
        throw new EncodeError(`Unknown variant kind '${value.kind}'`);
      }
      encoder.writeU8(index);
      codec.encode(encoder, value.value);
    },
    decode(decoder) {
      const index = decoder.readU8();
      const entry = entries[index];
      if (!entry) {
        throw new DecodeError(`Unknown variant discriminant ${index}`);
      }
      const [kind, codec] = entry;
      const decoded: unknown = { kind, value: codec.decode(decoder) };
      return decoded as VariantOf<V>;
    },
  };
}

/**
 * String enumeration carried as a u8 index into `values`.
 *
 * @example
 * ```typescript
 * const cacheLevel = enumeration(['ResolveOnly', 'CreateConnection']);
 * ```
 */
export function enumeration<T extends string>(values: readonly T[]): Codec<T> {
  if (values.length > 0x100) {
    throw new EncodeError(`Enumeration has ${values.length} members, at most 256 fit a u8`);
  }
  return {
    encode(encoder, value) {
      const index = values.indexOf(value);
      if (index < 0) {
        throw new EncodeError(`'${value}' is not a member of the enumeration`);
      }
      encoder.writeU8(index);
    },
    decode(decoder) {
      const index = decoder.readU8();
      const value = values[index];
      if (value === undefined) {
        throw new DecodeError(`Unknown enumeration index ${index}`);
      }
      return value;
    },
  };
}

/**
 * Carry a domain type over an existing wire codec.
 *
 * `fromWire` may throw DecodeError to reject a well-formed but invalid value.
 *
 * @example
 * ```typescript
 * const url = transform(string, { toWire: (u: URL) => u.href, fromWire: (s) => new URL(s) });
 * ```
 */
export function transform<T, W>(
  wire: Codec<W>,
  mapping: { toWire: (value: T) => W; fromWire: (value: W) => T }
): Codec<T> {
  return {
    encode: (encoder, value) => wire.encode(encoder, mapping.toWire(value)),
    decode: (decoder) => mapping.fromWire(wire.decode(decoder)),
  };
}
