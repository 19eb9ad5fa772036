#!/usr/bin/env node

import { Command } from 'commander';

import { commandRegistry } from '@/commandRegistry.js';
import { CommandError, getExitCode } from '@/ui/errors/index.js';
import { createLogger, enableDebugLogging } from '@/ui/logging/index.js';
import { getErrorMessage } from '@/utils/errors.js';
import { VERSION } from '@/utils/version.js';

const CLI_NAME = 'portal';
const CLI_DESCRIPTION = 'Typed IPC between local processes over Unix domain sockets';

const log = createLogger('portal');

/**
 * Main entry point.
 *
 * 1. Enable debug logging early when --debug is present
 * 2. Register every command on a Commander program
 * 3. Parse arguments and route to the command
 */
async function main(): Promise<void> {
  if (process.argv.includes('--debug')) {
    enableDebugLogging();
  }

  const program = new Command()
    .name(CLI_NAME)
    .description(CLI_DESCRIPTION)
    .version(VERSION)
    .option('--debug', 'Enable debug logging (verbose output)');

  commandRegistry.forEach((register) => register(program));

  await program.parseAsync();
}

main().catch((error: unknown) => {
  console.error(`Error: ${getErrorMessage(error)}`);
  if (error instanceof CommandError && error.metadata.suggestion) {
    console.error(error.metadata.suggestion);
  }
  log.debug(error instanceof Error && error.stack ? error.stack : String(error));
  process.exitCode = getExitCode(error);
});
