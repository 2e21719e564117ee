import chalk from 'chalk';
import { Command } from 'commander';
import { ConfigManager } from '../config/config-manager.js';
import { exitWithError, globalOptions } from './shared.js';

export const initCommand = new Command('init')
  .description('Write a default configuration file')
  .option('-f, --force', 'Overwrite an existing configuration')
  .option('-w, --watch <paths...>', 'Folders to watch (default: ~/Sync)')
  .action(async (options: { force?: boolean; watch?: string[] }, command: Command) => {
    try {
      const result = await ConfigManager.getInstance().initConfig({
        configPath: globalOptions(command).config,
        watchPaths: options.watch,
        force: options.force ?? false,
      });

      if (!result.created) {
        console.log(chalk.yellow(`Configuration already exists at ${result.configPath}`));
        console.log(chalk.gray('Use --force to overwrite it.'));
        return;
      }

      console.log(chalk.green(`✔ Created configuration at ${result.configPath}`));
      console.log(chalk.gray('\nNext steps:'));
      console.log(chalk.gray('  1. Set "rclone_remote" to a remote from "rclone listremotes"'));
      console.log(chalk.gray('  2. Adjust "watch_paths" to the folders you want synced'));
      console.log(chalk.gray('  3. Start the daemon with "syncwarden run"'));
    }
    catch (error) {
      exitWithError(error, command);
    }
  });
