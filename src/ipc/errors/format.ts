/**
 * Error Formatting
 *
 * Wraps raw Node.js socket errors into structured IPC error classes.
 */

import { getErrorCode, getErrorMessage } from '@/utils/errors.js';

import { IPCConnectionError, IPCError, TransportError } from './IPCError.js';

export function formatConnectionError(
  socketPath: string,
  error: Error
): IPCConnectionError {
  const code = getErrorCode(error);
  const message = [
    'IPC connection error',
    `Socket: ${socketPath}`,
    ...(code ? [`Code: ${code}`] : []),
    `Details: ${error.message}`,
  ].join(' | ');
  return new IPCConnectionError(message, socketPath, code);
}

export function formatTransportError(error: unknown): TransportError {
  if (error instanceof TransportError) {
    return error;
  }
  return new TransportError(`Socket failure: ${getErrorMessage(error)}`, getErrorCode(error));
}

/**
 * Normalize anything thrown inside the dispatch path into an IPCError.
 *
 * Handler exceptions keep their message but are reported as IPCError so the
 * owner sees a single error hierarchy.
 */
export function toIPCError(error: unknown): IPCError {
  if (error instanceof IPCError) {
    return error;
  }
  return new IPCError(getErrorMessage(error));
}
