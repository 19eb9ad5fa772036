/**
 * Service PID file management.
 *
 * A running service records its PID beside its socket so a second `serve`
 * can tell a live service from a stale socket.
 */

import * as fs from 'fs';

import { createLogger } from '@/ui/logging/index.js';
import { AtomicFileWriter } from '@/utils/atomicFile.js';
import { getErrorCode, getErrorMessage } from '@/utils/errors.js';

import { ensurePortalDir, getServicePidPath } from './paths.js';

const log = createLogger('session');

/**
 * Read and parse a PID from a file.
 *
 * @returns Parsed PID or null if the file is missing or holds no number
 */
export function readPidFromFile(filePath: string): number | null {
  let contents: string;
  try {
    contents = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    log.debug(`No PID at ${filePath}: ${getErrorMessage(error)}`);
    return null;
  }

  const pid = parseInt(contents.trim(), 10);
  return Number.isNaN(pid) || pid <= 0 ? null : pid;
}

/**
 * Write a service's PID file atomically.
 *
 * @example
 * ```typescript
 * writeServicePid('request', process.pid);
 * ```
 */
export function writeServicePid(service: string, pid: number): void {
  ensurePortalDir();
  AtomicFileWriter.writeSync(getServicePidPath(service), pid.toString());
}

export function readServicePid(service: string): number | null {
  return readPidFromFile(getServicePidPath(service));
}

/**
 * Remove a service's PID file. Safe to call multiple times.
 */
export function cleanupServicePid(service: string): void {
  try {
    fs.rmSync(getServicePidPath(service), { force: true });
  } catch (error) {
    log.debug(`Failed to cleanup PID file: ${getErrorMessage(error)}`);
  }
}

/**
 * Check if a process with the given PID is alive (signal 0 probe).
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return getErrorCode(error) === 'EPERM';
  }
}
