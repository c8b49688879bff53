import type { Command } from 'commander';
import { SOURCE_ADAPTERS } from '@corroborate/agents';

export function registerSourcesCommand(program: Command): void {
  program
    .command('sources')
    .description('List the available source ids')
    .action(() => {
      for (const adapter of SOURCE_ADAPTERS) {
        console.log(`${adapter.id.padEnd(8)} ${adapter.label}: ${adapter.description}`);
      }
    });
}
