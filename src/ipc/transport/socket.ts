/**
 * Socket Connection Helper
 *
 * Opens a Unix domain socket connection with a connect timeout.
 */

import { connect } from 'net';

import type { Socket } from 'net';

import { IPCTimeoutError, formatConnectionError } from '@/ipc/errors/index.js';
import { createLogger } from '@/ui/logging/index.js';

const log = createLogger('client');

/**
 * Connect to a Unix domain socket.
 *
 * @param socketPath - Filesystem path of the listening socket
 * @param timeoutMs - Give up after this long (0 disables the timeout)
 * @throws IPCConnectionError when the socket refuses or does not exist
 * @throws IPCTimeoutError when the connect does not complete in time
 */
export function connectSocket(socketPath: string, timeoutMs: number): Promise<Socket> {
  return new Promise((resolve, reject) => {
    const socket: Socket = connect(socketPath);
    let timeoutHandle: NodeJS.Timeout | null = null;

    const cleanup = (): void => {
      if (timeoutHandle) {
        clearTimeout(timeoutHandle);
        timeoutHandle = null;
      }
      socket.removeListener('connect', onConnect);
      socket.removeListener('error', onError);
    };

    const onConnect = (): void => {
      cleanup();
      log.debug(`Connected to ${socketPath}`);
      resolve(socket);
    };

    const onError = (error: Error): void => {
      cleanup();
      socket.destroy();
      reject(formatConnectionError(socketPath, error));
    };

    if (timeoutMs > 0) {
      timeoutHandle = setTimeout(() => {
        cleanup();
        socket.destroy();
        reject(new IPCTimeoutError('connect', timeoutMs));
      }, timeoutMs);
    }

    socket.once('connect', onConnect);
    socket.once('error', onError);
  });
}
