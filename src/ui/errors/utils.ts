/**
 * Helpers for turning errors into CLI outcomes.
 */

import { IPCConnectionError, IPCError } from '@/ipc/errors/index.js';
import { EXIT_CODES, type ExitCode } from '@/utils/exitCodes.js';

import { CommandError } from './CommandError.js';

const UNAVAILABLE_CODES = new Set(['ENOENT', 'ECONNREFUSED']);

/**
 * Detect whether an error means the service socket is missing or not accepting.
 *
 * @example
 * ```typescript
 * try {
 *   await RequestClient.connect();
 * } catch (error) {
 *   if (isServiceUnavailableError(error)) {
 *     console.error('Request service is not running. Start it with: portal serve');
 *   }
 * }
 * ```
 */
export function isServiceUnavailableError(error: unknown): boolean {
  return (
    error instanceof IPCConnectionError &&
    error.code !== undefined &&
    UNAVAILABLE_CODES.has(error.code)
  );
}

/**
 * Exit code carried by an error, or GENERIC_FAILURE for foreign errors.
 */
export function getExitCode(error: unknown): ExitCode {
  if (error instanceof CommandError || error instanceof IPCError) {
    return error.exitCode;
  }
  return EXIT_CODES.GENERIC_FAILURE;
}
