import * as path from 'path';

import type { Command } from 'commander';

import { REQUEST_SERVICE_NAME } from '@/constants.js';
import { RequestService } from '@/services/request/index.js';
import {
  cleanupServicePid,
  getServiceSocketPath,
  isProcessAlive,
  readServicePid,
  writeServicePid,
} from '@/session/index.js';
import { CommandError, getExitCode } from '@/ui/errors/index.js';
import { createLogger } from '@/ui/logging/index.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';
import { getErrorMessage } from '@/utils/errors.js';

const log = createLogger('portal');

interface ServeOptions {
  root: string;
}

export interface RunningService {
  socketPath: string;
  root: string;
  service: RequestService;
  stop: () => Promise<void>;
}

/**
 * Start the request service on the session's socket and record its PID.
 *
 * @throws CommandError with SERVICE_ALREADY_RUNNING if a live process owns the socket
 */
export async function startRequestService(options: ServeOptions): Promise<RunningService> {
  const existing = readServicePid(REQUEST_SERVICE_NAME);
  if (existing !== null && existing !== process.pid && isProcessAlive(existing)) {
    throw new CommandError(
      `Request service already running (pid ${existing})`,
      { suggestion: `Stop it with: kill ${existing}` },
      EXIT_CODES.SERVICE_ALREADY_RUNNING
    );
  }

  const root = path.resolve(options.root);
  const socketPath = getServiceSocketPath(REQUEST_SERVICE_NAME);
  const service = new RequestService({ root });
  await service.listen(socketPath);
  writeServicePid(REQUEST_SERVICE_NAME, process.pid);

  let stopped = false;
  const stop = async (): Promise<void> => {
    if (stopped) {
      return;
    }
    stopped = true;
    await service.stop();
    cleanupServicePid(REQUEST_SERVICE_NAME);
  };

  return { socketPath, root, service, stop };
}

/**
 * Register serve command
 */
export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Run the request service, serving file: URLs under a root directory')
    .option('-r, --root <dir>', 'Directory file: URL paths resolve under', process.cwd())
    .action(async (options: ServeOptions) => {
      let running: RunningService;
      try {
        running = await startRequestService(options);
      } catch (error) {
        console.error(`Error: ${getErrorMessage(error)}`);
        if (error instanceof CommandError && error.metadata.suggestion) {
          console.error(error.metadata.suggestion);
        }
        process.exitCode = getExitCode(error);
        return;
      }

      log.info(`Serving ${running.root} on ${running.socketPath}`);

      const shutdown = (signal: NodeJS.Signals): void => {
        log.info(`Received ${signal}, stopping`);
        running.stop().then(
          () => {
            process.exitCode = EXIT_CODES.SUCCESS;
          },
          (error: unknown) => {
            log.info(`Shutdown failed: ${getErrorMessage(error)}`);
            process.exitCode = EXIT_CODES.SOFTWARE_ERROR;
          }
        );
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    });
}
