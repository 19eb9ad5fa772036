import type { Command } from 'commander';

import { registerFetchCommand } from '@/commands/fetch.js';
import { registerHeadersCommand } from '@/commands/headers.js';
import { registerServeCommand } from '@/commands/serve.js';

/**
 * Command registration function type
 */
export type CommandRegistrar = (program: Command) => void;

const addCommandGroup = (groupName: string): CommandRegistrar => {
  return (program: Command) => {
    program.commandsGroup(groupName);
  };
};

/**
 * Registry of all CLI commands with grouping.
 * Order matters: groups organize commands in help output.
 */
export const commandRegistry: CommandRegistrar[] = [
  addCommandGroup('Service:'),
  registerServeCommand,

  addCommandGroup('Requests:'),
  registerHeadersCommand,
  registerFetchCommand,
];
