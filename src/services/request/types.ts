/**
 * Domain types and codecs of the request service.
 */

import {
  bytes,
  enumeration,
  file,
  sequence,
  string,
  struct,
  transform,
  variant,
} from '@/ipc/codec/index.js';
import type { Infer } from '@/ipc/codec/index.js';
import { DecodeError } from '@/ipc/errors/index.js';

// ============================================================================
// Headers
// ============================================================================

export const header = struct({ name: string, value: string });

export type Header = Infer<typeof header>;

/**
 * Ordered header list. Names may repeat (e.g. Set-Cookie).
 */
export const headerMap = sequence(header);

export type HeaderMap = Header[];

/**
 * Case-insensitive lookup of the first header with the given name.
 */
export function getHeader(headers: HeaderMap, name: string): string | undefined {
  const wanted = name.toLowerCase();
  return headers.find((entry) => entry.name.toLowerCase() === wanted)?.value;
}

// ============================================================================
// URL
// ============================================================================

/**
 * Absolute URL carried as its serialized string. An unparsable string is
 * rejected while decoding.
 */
export const url = transform(string, {
  toWire: (value: URL) => value.href,
  fromWire: (value) => {
    try {
      return new URL(value);
    } catch {
      throw new DecodeError(`Invalid URL: ${value}`);
    }
  },
});

// ============================================================================
// Enumerations
// ============================================================================

export const NETWORK_ERRORS = [
  'UnableToResolveHost',
  'UnableToConnect',
  'TimeoutReached',
  'TooManyRedirects',
  'SSLHandshakeFailed',
  'SSLVerificationFailed',
  'MalformedUrl',
  'InvalidContentEncoding',
  'RequestCancelled',
  'Unknown',
] as const;

export type NetworkError = (typeof NETWORK_ERRORS)[number];

export const networkError = enumeration(NETWORK_ERRORS);

/**
 * How far `ensureConnection` should go: resolve the host only, or also open
 * a connection to it.
 */
export const CACHE_LEVELS = ['ResolveOnly', 'CreateConnection'] as const;

export type CacheLevel = (typeof CACHE_LEVELS)[number];

export const cacheLevel = enumeration(CACHE_LEVELS);

// ============================================================================
// Selected file
// ============================================================================

/**
 * A named response body: either an open descriptor the receiver reads from,
 * or the bytes themselves when the peers do not share a descriptor table.
 */
export const selectedFile = struct({
  name: string,
  fileOrContents: variant({ file, contents: bytes }),
});

export type SelectedFile = Infer<typeof selectedFile>;
