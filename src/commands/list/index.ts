/**
 * List commands - Inspect the pillar and the expansion
 */

import type { Command } from 'commander';
import { registerListEnvCommand } from './env';
import { registerListHostsCommand } from './hosts';

/**
 * Register all list commands
 */
export function registerListCommands(program: Command): void {
  const listCmd = program
    .command('list')
    .description('Inspect environments and generated hosts');

  registerListEnvCommand(listCmd);
  registerListHostsCommand(listCmd);
}
