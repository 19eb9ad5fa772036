import { Option } from 'commander';

import { CommandError } from '@/ui/errors/index.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Shared --json flag for commands that support machine-readable output.
 */
export const jsonOption = new Option('-j, --json', 'Output as JSON').default(false);

/**
 * Shared --timeout <ms> option bounding synchronous calls to the service.
 */
export const timeoutOption = new Option(
  '--timeout <ms>',
  'Give up on the service reply after this many milliseconds (0 = wait)'
).argParser(parseMilliseconds);

export function parseMilliseconds(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new CommandError(
      `Invalid timeout: ${value}`,
      { suggestion: 'Pass a whole number of milliseconds, e.g. --timeout 5000' },
      EXIT_CODES.INVALID_ARGUMENTS
    );
  }
  return parsed;
}

/**
 * Parse an absolute URL argument. Bare paths become `file:` URLs.
 *
 * @throws CommandError with INVALID_URL if the value does not parse
 */
export function parseUrlArgument(value: string): URL {
  const candidate = value.startsWith('/') ? `file://${value}` : value;
  try {
    return new URL(candidate);
  } catch {
    throw new CommandError(
      `Invalid URL: ${value}`,
      { suggestion: 'Use an absolute URL such as file:///index.html' },
      EXIT_CODES.INVALID_URL
    );
  }
}
