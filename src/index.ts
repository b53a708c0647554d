#!/usr/bin/env tsx

/**
 * cloudmap CLI - Main entry point
 * Expands a compact cloud inventory into salt-cloud providers, profiles and maps
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { CLOUDMAP_VERSION } from './constants';

// Commands
import { registerGenerateCommand } from './commands/generate';
import { registerValidateCommand } from './commands/validate';
import { registerListCommands } from './commands/list';

const program = new Command();

program
  .name('cloudmap')
  .description('Expand a compact cloud inventory into salt-cloud providers, profiles and maps')
  .version(CLOUDMAP_VERSION, '-v, --version', 'Show version information')
  .option('--no-color', 'Disable colored output');

// Register all commands
registerGenerateCommand(program);
registerValidateCommand(program);
registerListCommands(program);

// Default action (no command) - show a short guide
program.action(() => {
  console.log(chalk.green('========================================================'));
  console.log(chalk.green(`   cloudmap v${CLOUDMAP_VERSION}`));
  console.log(chalk.green('========================================================'));
  console.log('');
  console.log(chalk.cyan('Run with --help to see available commands'));
  console.log('');
  console.log(chalk.yellow('Generate:'));
  console.log('  cloudmap generate -p pillar.yml           Write files to /etc/salt');
  console.log('  cloudmap generate -n --diff               Show what would change');
  console.log('  cloudmap generate --json                  Print the trees as JSON');
  console.log('');
  console.log(chalk.yellow('Inspect:'));
  console.log('  cloudmap validate                         Validate the pillar');
  console.log('  cloudmap list env                         Environments and zones');
  console.log('  cloudmap list hosts <env>                 Hostnames per profile');
});

// Error handling
program.showHelpAfterError('(add --help for additional information)');

// Parse arguments
await program.parseAsync(process.argv);
