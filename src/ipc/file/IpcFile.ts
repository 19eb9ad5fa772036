/**
 * Owning wrapper for an open file descriptor that travels over IPC.
 *
 * Ownership is single: encoding an IpcFile moves its descriptor into the
 * outgoing message, after which the wrapper is empty. Trying to move or read
 * an empty wrapper throws, so a descriptor that is sent twice or used after
 * sending is caught at the call site instead of surfacing as a stray fd later.
 */

import * as fs from 'fs';

import { EncodeError } from '@/ipc/errors/index.js';
import { createLogger } from '@/ui/logging/index.js';
import { getErrorMessage } from '@/utils/errors.js';

const log = createLogger('transport');

export class IpcFile {
  private descriptor: number | null;

  private constructor(fd: number) {
    this.descriptor = fd;
  }

  /**
   * Adopt an already-open descriptor. The IpcFile becomes its owner.
   */
  static adoptFd(fd: number): IpcFile {
    if (!Number.isInteger(fd) || fd < 0) {
      throw new EncodeError(`Invalid file descriptor: ${fd}`);
    }
    return new IpcFile(fd);
  }

  /**
   * Open a path and wrap the resulting descriptor.
   */
  static open(filePath: string, flags: fs.OpenMode = 'r'): IpcFile {
    return new IpcFile(fs.openSync(filePath, flags));
  }

  /**
   * The owned descriptor, or null once it has been taken or closed.
   */
  get fd(): number | null {
    return this.descriptor;
  }

  get isOwned(): boolean {
    return this.descriptor !== null;
  }

  /**
   * Move the descriptor out. The caller becomes responsible for closing it.
   */
  takeFd(): number {
    if (this.descriptor === null) {
      throw new EncodeError('File descriptor already taken from IpcFile');
    }
    const fd = this.descriptor;
    this.descriptor = null;
    return fd;
  }

  /**
   * Close the descriptor if this wrapper still owns it. Safe to call twice.
   */
  close(): void {
    if (this.descriptor === null) {
      return;
    }
    const fd = this.descriptor;
    this.descriptor = null;
    fs.closeSync(fd);
  }
}

/**
 * Close descriptors that were moved into a message nobody will decode
 * (encode failed part way, frame arrived on a dead connection, decode failed).
 */
export function releaseDescriptors(fds: readonly number[]): void {
  for (const fd of fds) {
    try {
      fs.closeSync(fd);
    } catch (error) {
      log.debug(`Failed to close descriptor ${fd}: ${getErrorMessage(error)}`);
    }
  }
}
