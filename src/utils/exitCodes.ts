/**
 * Semantic exit codes for the portal CLI and the errors it surfaces.
 *
 * Exit codes follow semantic ranges:
 * - **0**: Success
 * - **1**: Generic failure
 * - **80-99**: User errors (invalid input, missing service, permissions)
 * - **100-119**: Software errors (protocol violations, transport failures, timeouts)
 */

export const EXIT_CODES = {
  /** Command completed successfully */
  SUCCESS: 0,

  /** Generic failure (use specific codes when possible) */
  GENERIC_FAILURE: 1,

  // User Errors (80-99)

  /** Invalid URL format */
  INVALID_URL: 80,

  /** Invalid command-line arguments or options */
  INVALID_ARGUMENTS: 81,

  /** Requested resource not found (service socket, file, etc.) */
  RESOURCE_NOT_FOUND: 83,

  /** Service already running on the requested socket */
  SERVICE_ALREADY_RUNNING: 86,

  // Software Errors (100-119)

  /** Peer sent bytes that do not decode */
  PROTOCOL_DECODE_ERROR: 100,

  /** Peer sent a message the endpoint does not define */
  PROTOCOL_UNKNOWN_MESSAGE: 101,

  /** Synchronous call timed out */
  IPC_TIMEOUT: 102,

  /** Connection died while a call was in flight */
  CONNECTION_CLOSED: 103,

  /** Socket read/write failure */
  TRANSPORT_FAILURE: 104,

  /** Generic software error (use specific codes when possible) */
  SOFTWARE_ERROR: 110,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
