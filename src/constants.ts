/**
 * Centralized configuration constants for portal.
 *
 * Wire limits, timeouts and the environment variables that override them.
 */

// ============================================================================
// WIRE FORMAT
// ============================================================================

/**
 * Size of the frame length prefix in bytes
 */
export const FRAME_LENGTH_SIZE = 4;

/**
 * Size of the descriptor count that follows the length prefix
 */
export const FRAME_DESCRIPTOR_COUNT_SIZE = 4;

/**
 * Size of one descriptor entry in the frame's descriptor block
 */
export const FRAME_DESCRIPTOR_SIZE = 4;

/**
 * Largest frame body accepted from a peer (64MB)
 * Anything bigger is treated as a corrupted length prefix
 */
export const MAX_FRAME_SIZE = 64 * 1024 * 1024;

/**
 * Largest number of descriptors a single frame may carry
 * Matches the common SCM_MAX_FD limit of Linux
 */
export const MAX_FRAME_DESCRIPTORS = 253;

/**
 * Largest correlation id before wrapping back to 1
 */
export const MAX_CORRELATION_ID = 0xffffffff;

/**
 * Timed-out calls a connection keeps waiting on before it gives up on the peer
 * Their ids stay reserved until a late reply arrives
 */
export const MAX_ABANDONED_CALLS = 1024;

// ============================================================================
// TIMEOUTS
// ============================================================================

/**
 * Default synchronous call timeout in milliseconds (0 = wait until the connection dies)
 *
 * Can be overridden via PORTAL_SYNC_TIMEOUT_MS environment variable
 */
export function getSyncCallTimeout(): number {
  return readMillisecondsFromEnv('PORTAL_SYNC_TIMEOUT_MS', 0);
}

/**
 * Client connect timeout in milliseconds (5 seconds)
 *
 * Can be overridden via PORTAL_CONNECT_TIMEOUT_MS environment variable
 */
export function getConnectTimeout(): number {
  return readMillisecondsFromEnv('PORTAL_CONNECT_TIMEOUT_MS', 5000);
}

function readMillisecondsFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined) {
    return fallback;
  }
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) || parsed < 0 ? fallback : parsed;
}

// ============================================================================
// SESSION LAYOUT
// ============================================================================

/**
 * Environment variable carrying the session id shared by cooperating processes
 */
export const SESSION_ID_ENV = 'PORTAL_SESSION_ID';

/**
 * Environment variable overriding the runtime directory (defaults to os.tmpdir())
 */
export const RUNTIME_DIR_ENV = 'PORTAL_RUNTIME_DIR';

/**
 * Session id used when PORTAL_SESSION_ID is unset
 */
export const DEFAULT_SESSION_ID = 'default';

/**
 * Service name of the request service socket
 */
export const REQUEST_SERVICE_NAME = 'request';
