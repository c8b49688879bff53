import { Command } from 'commander';
import { registerRunCommand } from './commands/run';
import { registerSourcesCommand } from './commands/sources';

export const CLI_NAME = 'corroborate';
export const CLI_VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command()
    .name(CLI_NAME)
    .version(CLI_VERSION)
    .description('Build a corroborated inventory of organizations from public signals');

  registerRunCommand(program);
  registerSourcesCommand(program);
  return program;
}
