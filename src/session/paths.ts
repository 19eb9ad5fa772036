/**
 * Session path generation and management.
 *
 * Every service of a session listens on
 * `<runtime dir>/session/<session id>/portal/<service>`, with its PID file
 * `<service>.pid` beside the socket.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { DEFAULT_SESSION_ID, RUNTIME_DIR_ENV, SESSION_ID_ENV } from '@/constants.js';

/**
 * Get the runtime directory (PORTAL_RUNTIME_DIR or the OS temp directory).
 *
 * Read on every call so tests can point it at a temp directory.
 */
export function getRuntimeDir(): string {
  const override = process.env[RUNTIME_DIR_ENV];
  if (override && override.trim().length > 0) {
    return path.isAbsolute(override) ? override : path.resolve(override);
  }

  return os.tmpdir();
}

/**
 * Get the current session id (PORTAL_SESSION_ID or "default").
 *
 * @throws Error if the id would escape the session directory
 */
export function getSessionId(): string {
  const raw = process.env[SESSION_ID_ENV]?.trim();
  if (!raw) {
    return DEFAULT_SESSION_ID;
  }
  if (raw.includes('/') || raw.includes('\\') || raw === '.' || raw === '..') {
    throw new Error(`Invalid session id: ${raw}`);
  }
  return raw;
}

export function getSessionDir(): string {
  return path.join(getRuntimeDir(), 'session', getSessionId());
}

/**
 * Directory holding the sockets and PID files of every service of the session.
 */
export function getPortalDir(): string {
  return path.join(getSessionDir(), 'portal');
}

/**
 * Get the Unix domain socket path of a service.
 *
 * @example
 * ```typescript
 * process.env.PORTAL_RUNTIME_DIR = '/tmp/s';
 * getServiceSocketPath('request'); // → /tmp/s/session/default/portal/request
 * ```
 */
export function getServiceSocketPath(service: string): string {
  return path.join(getPortalDir(), assertServiceName(service));
}

export function getServicePidPath(service: string): string {
  return path.join(getPortalDir(), `${assertServiceName(service)}.pid`);
}

/**
 * Ensure the portal directory exists. Safe to call multiple times.
 *
 * @throws Error if directory creation fails due to permissions
 */
export function ensurePortalDir(): void {
  fs.mkdirSync(getPortalDir(), { recursive: true });
}

function assertServiceName(service: string): string {
  if (service.length === 0 || service.includes('/') || service.startsWith('.')) {
    throw new Error(`Invalid service name: ${service}`);
  }
  return service;
}
