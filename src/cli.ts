#!/usr/bin/env node

import process from 'node:process';
import { Command } from 'commander';
import { configCommand } from './commands/config.js';
import { healthCommand } from './commands/health.js';
import { initCommand } from './commands/init.js';
import { runCommand } from './commands/run.js';
import { syncCommand } from './commands/sync.js';
import { getPackageInfo } from './utils/package-info.js';

// Get package information
const packageInfo = getPackageInfo();

// Create the main command
const program = new Command();

program
  .name(packageInfo.name)
  .description(packageInfo.description || 'Keeps local folders in step with a cloud remote and supervises Syncthing')
  .version(packageInfo.version)
  .option('-c, --config <file>', 'Path to the configuration file')
  .option('-v, --verbose', 'Show debug output and stack traces');

// Register commands
program.addCommand(runCommand, { isDefault: true });
program.addCommand(initCommand);
program.addCommand(configCommand);
program.addCommand(syncCommand);
program.addCommand(healthCommand);

// Parse command line arguments
program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
