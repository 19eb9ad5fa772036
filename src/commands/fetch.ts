import type { Command } from 'commander';

import type { BaseCommandOptions } from '@/commands/shared/CommandRunner.js';
import { runCommand } from '@/commands/shared/CommandRunner.js';
import { jsonOption, parseUrlArgument, timeoutOption } from '@/commands/shared/commonOptions.js';
import { IPCTimeoutError } from '@/ipc/errors/index.js';
import {
  RequestClient,
  readBody,
  type HeaderMap,
  type NetworkError,
  type Request,
  type RequestResult,
} from '@/services/request/index.js';
import { CommandError } from '@/ui/errors/index.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

interface FetchOptions extends BaseCommandOptions {
  method: string;
  header: string[];
  timeout?: number;
}

export interface FetchResult {
  url: string;
  statusCode: number | undefined;
  reasonPhrase: string | undefined;
  headers: HeaderMap;
  totalSize: bigint;
  networkError: NetworkError | undefined;
  body: string;
}

/**
 * Parse `Name: value` header arguments.
 *
 * @throws CommandError with INVALID_ARGUMENTS for a header without a colon
 */
export function parseHeaderArguments(values: readonly string[]): HeaderMap {
  return values.map((raw) => {
    const separator = raw.indexOf(':');
    if (separator <= 0) {
      throw new CommandError(
        `Invalid header: ${raw}`,
        { suggestion: 'Use the form "Name: value"' },
        EXIT_CODES.INVALID_ARGUMENTS
      );
    }
    return { name: raw.slice(0, separator).trim(), value: raw.slice(separator + 1).trim() };
  });
}

/**
 * Run one request through the request service and collect its result.
 */
export async function fetchUrl(url: URL, options: FetchOptions): Promise<FetchResult> {
  const headers = parseHeaderArguments(options.header);
  const client = await RequestClient.connect(
    options.timeout !== undefined ? { syncTimeoutMs: options.timeout } : {}
  );

  try {
    const request = await client.startRequest(options.method.toUpperCase(), url, { headers });
    if (!request) {
      throw new CommandError(
        `Request service refused ${url.href}`,
        { note: 'Only file: URLs are served' },
        EXIT_CODES.INVALID_URL
      );
    }

    const result = await waitForResult(request, options.timeout ?? 0);
    if (result.connectionError) {
      throw result.connectionError;
    }

    const body = result.body ? Buffer.from(readBody(result.body)).toString('utf-8') : '';
    return {
      url: url.href,
      statusCode: result.statusCode,
      reasonPhrase: result.reasonPhrase,
      headers: result.headers,
      totalSize: result.totalSize,
      networkError: result.networkError,
      body,
    };
  } finally {
    client.close();
  }
}

/**
 * Wait for the request to finish, giving up after `timeoutMs` (0 = wait).
 */
function waitForResult(request: Request, timeoutMs: number): Promise<RequestResult> {
  if (timeoutMs <= 0) {
    return request.done;
  }
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new IPCTimeoutError(`fetch ${request.url.href}`, timeoutMs));
    }, timeoutMs);
    void request.done.then((result) => {
      clearTimeout(timer);
      resolve(result);
    });
  });
}

export function formatFetch(result: FetchResult): string {
  if (result.networkError) {
    return `Network error: ${result.networkError}`;
  }
  return result.body;
}

function collectHeader(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Register fetch command
 */
export function registerFetchCommand(program: Command): void {
  program
    .command('fetch')
    .description('Fetch a URL through the request service and print its body')
    .argument('<url>', 'Absolute URL (a bare /path means file:///path)')
    .option('-X, --method <method>', 'Request method', 'GET')
    .option('-H, --header <header>', 'Request header "Name: value" (repeatable)', collectHeader, [])
    .addOption(jsonOption)
    .addOption(timeoutOption)
    .action(async (rawUrl: string, options: FetchOptions) => {
      await runCommand(async (opts) => fetchUrl(parseUrlArgument(rawUrl), opts), options, formatFetch);
    });
}
