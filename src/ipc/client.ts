/**
 * IPC Client
 *
 * Client-side counterpart of MultiServer: connects to a service socket and
 * wraps it in a Connection bound to the caller's handlers.
 */

import { getConnectTimeout } from '@/constants.js';
import { Connection } from '@/ipc/connection/index.js';
import { createStub } from '@/ipc/protocol/index.js';
import type { Endpoint, Handlers, MessageMap } from '@/ipc/protocol/index.js';
import { SocketTransport, connectSocket } from '@/ipc/transport/index.js';

export interface ConnectOptions<L extends MessageMap, P extends MessageMap> {
  socketPath: string;
  /** Endpoint this client implements (the server's notifications) */
  local: Endpoint<L>;
  handlers: Handlers<L>;
  /** Endpoint the server implements */
  peer: Endpoint<P>;
  /** Connect timeout (defaults to PORTAL_CONNECT_TIMEOUT_MS or 5s) */
  connectTimeoutMs?: number;
  /** Default sendSync timeout for the connection */
  syncTimeoutMs?: number;
  /** The server resolves descriptor numbers in this process's table */
  sharedDescriptorTable?: boolean;
}

/**
 * Connect to a service and return an open Connection.
 *
 * @throws IPCConnectionError if the socket is missing or refuses the connection
 * @throws IPCTimeoutError if connecting takes longer than the timeout
 *
 * @example
 * ```typescript
 * const connection = await connectToServer({
 *   socketPath: getServiceSocketPath('request'),
 *   local: RequestClientEndpoint,
 *   handlers: { requestStarted: () => {}, ... },
 *   peer: RequestServerEndpoint,
 * });
 * const { status } = await connection.sendSync('getHeaders', { id: 1, url });
 * ```
 */
export async function connectToServer<L extends MessageMap, P extends MessageMap>(
  options: ConnectOptions<L, P>
): Promise<Connection<P>> {
  const stub = createStub(options.local, options.handlers);
  const socket = await connectSocket(
    options.socketPath,
    options.connectTimeoutMs ?? getConnectTimeout()
  );

  return new Connection({
    transport: new SocketTransport(socket, {
      sharedDescriptorTable: options.sharedDescriptorTable ?? false,
    }),
    stub,
    peer: options.peer,
    ...(options.syncTimeoutMs !== undefined ? { syncTimeoutMs: options.syncTimeoutMs } : {}),
  });
}
