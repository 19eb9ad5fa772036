/**
 * Structured errors for CLI commands.
 */

import { EXIT_CODES, type ExitCode } from '@/utils/exitCodes.js';

/**
 * Extra context printed under a command error.
 */
export interface ErrorMetadata {
  /** User-facing suggestion for resolving the error */
  suggestion?: string;
  /** Technical note or additional context */
  note?: string;
}

/**
 * Error thrown by a command with the exit code the CLI should end with.
 *
 * @example
 * ```typescript
 * throw new CommandError(
 *   'Request service is not running',
 *   { suggestion: 'Start it with: portal serve' },
 *   EXIT_CODES.RESOURCE_NOT_FOUND
 * );
 * ```
 */
export class CommandError extends Error {
  readonly metadata: ErrorMetadata;
  readonly exitCode: ExitCode;

  constructor(
    message: string,
    metadata: ErrorMetadata = {},
    exitCode: ExitCode = EXIT_CODES.GENERIC_FAILURE
  ) {
    super(message);
    this.name = 'CommandError';
    this.metadata = metadata;
    this.exitCode = exitCode;
  }
}
