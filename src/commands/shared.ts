import type { Command } from 'commander';
import type { DaemonConfig } from '../types/daemon.js';
import process from 'node:process';
import { ConfigManager } from '../config/config-manager.js';
import { handleError } from '../utils/errors.js';
import { logger, parseLogLevel } from '../utils/logger.js';

export interface GlobalOptions {
  config?: string;
  verbose?: boolean;
}

export interface LoggingOptions {
  logToFile?: boolean;
}

export function globalOptions(command: Command): GlobalOptions {
  return command.optsWithGlobals<GlobalOptions>();
}

/**
 * Load the configuration named by `--config` (or the default one) and point
 * the logger at its level and log file.
 */
export async function loadDaemonConfig(command: Command, options: LoggingOptions = {}): Promise<DaemonConfig> {
  const config = await ConfigManager.getInstance().loadConfig(globalOptions(command).config);
  configureLogging(config, command, options);
  return config;
}

/**
 * Apply a config's log level and file; `--verbose` forces DEBUG.
 */
export function configureLogging(config: DaemonConfig, command: Command, options: LoggingOptions = {}): void {
  logger.configure({
    logLevel: globalOptions(command).verbose ? parseLogLevel('DEBUG') : parseLogLevel(config.logLevel),
    logFile: options.logToFile ? config.logFile : null,
  });
}

export function exitWithError(error: unknown, command: Command): never {
  handleError(error, globalOptions(command).verbose ?? false);
  process.exit(1);
}
