#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { launchCommand } from '../commands/launch';
import { version, description } from '../../package.json';

const program = new Command();

program
  .name('gdrun')
  .description(description)
  // The engine's own --help and --version are forwarded, so the launcher's use other names
  .version(version, '--launcher-version', 'Show the launcher version')
  .helpOption('--launcher-help', 'Show launcher help')
  .configureOutput({
    outputError: (str, write) => write(chalk.red(str))
  });

launchCommand(program);

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
  process.exit(1);
});
