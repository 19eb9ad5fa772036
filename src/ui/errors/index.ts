/**
 * Error handling for the portal CLI.
 */

export { CommandError, type ErrorMetadata } from './CommandError.js';
export { getExitCode, isServiceUnavailableError } from './utils.js';
