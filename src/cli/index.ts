#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import { providersCommand } from './commands/providers.js';
import { modelsCommand } from './commands/models.js';
import { enhanceCommand, describeImageCommand } from './commands/enhance.js';
import { settingsCommand } from './commands/settings.js';

const program = new Command();

program
  .name('voxedit')
  .description('Voxedit - transcript enhancement with local and cloud models')
  .version('0.1.0');

program.addCommand(providersCommand);
program.addCommand(modelsCommand);
program.addCommand(settingsCommand);
program.addCommand(enhanceCommand);
program.addCommand(describeImageCommand);

program.on('command:*', () => {
  console.error(chalk.red(`Invalid command: ${program.args.join(' ')}`));
  console.log(chalk.yellow('Run `voxedit --help` for available commands'));
  process.exit(1);
});

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  process.exit(1);
});
