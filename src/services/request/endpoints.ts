/**
 * Request service endpoints.
 *
 * RequestServer is implemented by the service process and called by its
 * clients; RequestClient is implemented by every client and receives the
 * progress notifications of the requests it started.
 */

import { bool, bytes, i32, optional, string, struct, u32, u64 } from '@/ipc/codec/index.js';
import { defineEndpoint, message, request } from '@/ipc/protocol/index.js';
import type { MessagesOf } from '@/ipc/protocol/index.js';

import { cacheLevel, headerMap, networkError, selectedFile, url } from './types.js';

const requestIdOnly = struct({ requestId: i32 });

export const RequestServerEndpoint = defineEndpoint({
  name: 'RequestServer',
  magic: 0x52515356,
  messages: {
    getHeaders: request(struct({ id: i32, url }), struct({ id: i32, status: u32, headers: headerMap })),
    startRequest: request(
      struct({
        requestId: i32,
        method: string,
        url,
        requestHeaders: headerMap,
        body: bytes,
      }),
      struct({ started: bool })
    ),
    stopRequest: request(requestIdOnly, struct({ stopped: bool })),
    setCertificate: request(
      struct({ requestId: i32, certificate: string, key: string }),
      struct({ accepted: bool })
    ),
    ensureConnection: message(struct({ url, cacheLevel })),
  },
});

export const RequestClientEndpoint = defineEndpoint({
  name: 'RequestClient',
  magic: 0x52514354,
  messages: {
    requestStarted: message(struct({ requestId: i32, body: selectedFile })),
    headersBecameAvailable: message(
      struct({
        requestId: i32,
        headers: headerMap,
        statusCode: optional(u32),
        reasonPhrase: optional(string),
      })
    ),
    requestFinished: message(
      struct({ requestId: i32, totalSize: u64, networkError: optional(networkError) })
    ),
    certificateRequested: message(requestIdOnly),
  },
});

export type RequestServerMessages = MessagesOf<typeof RequestServerEndpoint>;

export type RequestClientMessages = MessagesOf<typeof RequestClientEndpoint>;
