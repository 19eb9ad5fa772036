import { CommandError, getExitCode, isServiceUnavailableError } from '@/ui/errors/index.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';
import { getErrorMessage } from '@/utils/errors.js';

/**
 * Standard options supported by CommandRunner.
 */
export interface BaseCommandOptions {
  /** Output as JSON instead of human-readable format */
  json?: boolean;
}

/**
 * Command logic. Returns the data to print or throws.
 */
export type CommandHandler<TOptions extends BaseCommandOptions, TResult> = (
  options: TOptions
) => Promise<TResult>;

export type CommandFormatter<TResult> = (data: TResult) => string;

/**
 * Outcome of running a command: what to print and how to exit.
 */
export interface CommandOutcome {
  stdout: string[];
  stderr: string[];
  exitCode: number;
}

/**
 * Run a command handler and describe its outcome without touching the process.
 *
 * Errors carrying an exit code (CommandError, IPCError) keep it; an
 * unavailable service socket gets a hint to start the service.
 */
export async function executeCommand<TOptions extends BaseCommandOptions, TResult>(
  handler: CommandHandler<TOptions, TResult>,
  options: TOptions,
  formatter: CommandFormatter<TResult>
): Promise<CommandOutcome> {
  try {
    const data = await handler(options);
    const stdout = options.json ? JSON.stringify(data, jsonReplacer, 2) : formatter(data);
    return { stdout: [stdout], stderr: [], exitCode: EXIT_CODES.SUCCESS };
  } catch (error) {
    const message = getErrorMessage(error);
    const exitCode = getExitCode(error);
    const suggestion = isServiceUnavailableError(error)
      ? 'Start the request service with: portal serve'
      : error instanceof CommandError
        ? error.metadata.suggestion
        : undefined;

    if (options.json) {
      const payload = { success: false, error: message, ...(suggestion ? { suggestion } : {}) };
      return { stdout: [JSON.stringify(payload, null, 2)], stderr: [], exitCode };
    }

    const stderr = [`Error: ${message}`];
    if (suggestion) {
      stderr.push(suggestion);
    }
    if (error instanceof CommandError && error.metadata.note) {
      stderr.push(error.metadata.note);
    }
    return { stdout: [], stderr, exitCode };
  }
}

/**
 * Run a command with consistent error handling, output formatting and exit codes.
 *
 * @example
 * ```typescript
 * await runCommand(
 *   async (opts) => fetchHeaders(opts.url),
 *   options,
 *   formatHeaders
 * );
 * ```
 */
export async function runCommand<TOptions extends BaseCommandOptions, TResult>(
  handler: CommandHandler<TOptions, TResult>,
  options: TOptions,
  formatter: CommandFormatter<TResult>
): Promise<void> {
  const outcome = await executeCommand(handler, options, formatter);
  for (const line of outcome.stdout) {
    console.log(line);
  }
  for (const line of outcome.stderr) {
    console.error(line);
  }
  process.exitCode = outcome.exitCode;
}

/**
 * JSON.stringify replacer for the value types the IPC layer produces.
 */
function jsonReplacer(_key: string, value: unknown): unknown {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (value instanceof URL) {
    return value.href;
  }
  return value;
}
