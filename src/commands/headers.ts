import type { Command } from 'commander';

import type { BaseCommandOptions } from '@/commands/shared/CommandRunner.js';
import { runCommand } from '@/commands/shared/CommandRunner.js';
import { jsonOption, parseUrlArgument, timeoutOption } from '@/commands/shared/commonOptions.js';
import { RequestClient, type HeaderMap } from '@/services/request/index.js';

interface HeadersOptions extends BaseCommandOptions {
  timeout?: number;
}

export interface HeadersResult {
  url: string;
  status: number;
  headers: HeaderMap;
}

/**
 * Ask the request service for the status and headers of a URL.
 */
export async function fetchHeaders(url: URL, options: HeadersOptions = {}): Promise<HeadersResult> {
  const client = await RequestClient.connect(
    options.timeout !== undefined ? { syncTimeoutMs: options.timeout } : {}
  );
  try {
    const { status, headers } = await client.getHeaders(url);
    return { url: url.href, status, headers };
  } finally {
    client.close();
  }
}

export function formatHeaders(result: HeadersResult): string {
  return [String(result.status), ...result.headers.map((h) => `${h.name}: ${h.value}`)].join('\n');
}

/**
 * Register headers command
 */
export function registerHeadersCommand(program: Command): void {
  program
    .command('headers')
    .description('Print the status and headers the request service reports for a URL')
    .argument('<url>', 'Absolute URL (a bare /path means file:///path)')
    .addOption(jsonOption)
    .addOption(timeoutOption)
    .action(async (rawUrl: string, options: HeadersOptions) => {
      await runCommand(
        async (opts) => fetchHeaders(parseUrlArgument(rawUrl), opts),
        options,
        formatHeaders
      );
    });
}
