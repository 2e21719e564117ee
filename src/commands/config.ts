import { spawn } from 'node:child_process';
import * as fs from 'node:fs';
import process from 'node:process';
import chalk from 'chalk';
import { Command } from 'commander';
import { ConfigManager } from '../config/config-manager.js';
import { CONFIG_ERROR_CODES, createConfigError } from '../config/schemas.js';
import { SyncWardenError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { exitWithError, globalOptions, loadDaemonConfig } from './shared.js';

const REDACTED = '********';

export const configCommand = new Command('config')
  .description('Show or change the configuration')
  .option('--json', 'Output in JSON format')
  .action(async (options: { json?: boolean }, command: Command) => {
    try {
      const config = await loadDaemonConfig(command);
      const file = ConfigManager.getInstance().toConfigFile(config);
      const display = {
        ...file,
        syncthing_api_key: file.syncthing_api_key ? REDACTED : null,
      };

      if (options.json) {
        console.log(JSON.stringify(display, null, 2));
        return;
      }

      console.log(chalk.cyan(`Configuration: ${config.configPath}\n`));
      for (const [key, value] of Object.entries(display)) {
        const shown = Array.isArray(value) ? value.join(', ') || '(none)' : String(value);
        console.log(`  ${chalk.gray(key.padEnd(30))} ${shown}`);
      }
    }
    catch (error) {
      exitWithError(error, command);
    }
  });

// Subcommand: config set
configCommand
  .command('set')
  .description('Set a configuration value (e.g. "debounce 60", "rclone_flags --fast-list,--verbose")')
  .argument('<key>', 'Configuration key, or one of the short names debounce, max_wait, health_check')
  .argument('<value>', 'Value to set; "null" clears an optional key')
  .action(async (key: string, value: string, _options: unknown, command: Command) => {
    try {
      const result = await ConfigManager.getInstance().setValue(key, value, globalOptions(command).config);
      logger.success(`Set ${result.key} = ${JSON.stringify(result.value)}`);
    }
    catch (error) {
      exitWithError(error, command);
    }
  });

// Subcommand: config add-watch
configCommand
  .command('add-watch')
  .description('Add a directory to the watch list')
  .argument('<path>', 'Directory to watch')
  .action(async (watchPath: string, _options: unknown, command: Command) => {
    try {
      const result = await ConfigManager.getInstance().addWatchPath(watchPath, globalOptions(command).config);
      if (result.changed) {
        logger.success(`Now watching: ${result.watchPath}`);
      }
      else {
        console.log(chalk.yellow(`Path already being watched: ${result.watchPath}`));
      }
    }
    catch (error) {
      exitWithError(error, command);
    }
  });

// Subcommand: config remove-watch
configCommand
  .command('remove-watch')
  .description('Remove a directory from the watch list')
  .argument('<path>', 'Directory to stop watching')
  .action(async (watchPath: string, _options: unknown, command: Command) => {
    try {
      const result = await ConfigManager.getInstance().removeWatchPath(watchPath, globalOptions(command).config);
      logger.success(`Removed from watch list: ${result.watchPath}`);
    }
    catch (error) {
      exitWithError(error, command);
    }
  });

// Subcommand: config edit
configCommand
  .command('edit')
  .description('Open the configuration file in $EDITOR and check it afterwards')
  .action(async (_options: unknown, command: Command) => {
    try {
      const manager = ConfigManager.getInstance();
      const configPath = manager.resolveConfigPath(globalOptions(command).config);
      if (!fs.existsSync(configPath)) {
        throw createConfigError(
          CONFIG_ERROR_CODES.FILE_NOT_FOUND,
          `No configuration file at ${configPath}. Run 'syncwarden init' to create one.`,
        );
      }

      const editor = resolveEditor();
      console.log(chalk.cyan(`Opening ${configPath} in ${editor}...`));
      await openInEditor(editor, configPath);

      await manager.loadConfig(configPath);
      logger.success('Configuration is valid');
    }
    catch (error) {
      exitWithError(error, command);
    }
  });

function resolveEditor(): string {
  const editor = process.env.EDITOR?.trim() || process.env.VISUAL?.trim();
  if (editor) {
    return editor;
  }
  return process.platform === 'win32' ? 'notepad' : 'nano';
}

/**
 * Run the editor on the terminal and wait for it to exit. The editor
 * setting may carry arguments, as in `code --wait`.
 */
function openInEditor(editor: string, file: string): Promise<void> {
  const [program = editor, ...args] = editor.split(/\s+/);

  return new Promise((resolve, reject) => {
    const child = spawn(program, [...args, file], { stdio: 'inherit' });
    child.once('error', (error) => {
      reject(new SyncWardenError('SW-003', `Failed to open editor ${program}: ${error.message}`, error));
    });
    child.once('exit', (code, signal) => {
      if (code === 0) {
        resolve();
        return;
      }
      reject(new SyncWardenError('SW-003', `Editor ${program} exited with ${code === null ? `signal ${signal ?? 'unknown'}` : `code ${code}`}`));
    });
  });
}
