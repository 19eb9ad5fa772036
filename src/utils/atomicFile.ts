import * as crypto from 'crypto';
import * as fs from 'fs';

import { createLogger } from '@/ui/logging/index.js';
import { getErrorMessage } from '@/utils/errors.js';

const log = createLogger('session');

/**
 * Atomic file writes using the tmp-file-then-rename pattern.
 *
 * The target path never holds a partially written file, even when two
 * processes race to write it.
 */
export class AtomicFileWriter {
  private static getTempPath(filePath: string): string {
    return `${filePath}.${process.pid}.${crypto.randomUUID()}.tmp`;
  }

  /**
   * Write data to a file atomically.
   *
   * @throws Error if the write or the rename fails
   */
  static writeSync(
    filePath: string,
    data: string,
    options: { encoding?: BufferEncoding } = {}
  ): void {
    const tmpPath = this.getTempPath(filePath);

    try {
      fs.writeFileSync(tmpPath, data, { encoding: options.encoding ?? 'utf-8' });
      fs.renameSync(tmpPath, filePath);
    } catch (error) {
      try {
        fs.unlinkSync(tmpPath);
      } catch (cleanupError) {
        log.debug(`Failed to remove ${tmpPath}: ${getErrorMessage(cleanupError)}`);
      }
      throw error;
    }
  }
}
