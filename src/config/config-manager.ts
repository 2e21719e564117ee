import * as fs from 'node:fs';
import * as path from 'node:path';
import process from 'node:process';
import type { DaemonConfig } from '../types/daemon.js';
import { errorMessage, SyncWardenError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { expandPath, getConfigFile, getDefaultLogFile } from '../utils/paths.js';
import {
  CONFIG_ERROR_CODES,
  type ConfigFile,
  type ConfigFileInput,
  configFileSchema,
  createConfigError,
  describeIssues,
} from './schemas.js';

export const DEFAULT_WATCH_PATHS: readonly string[] = ['~/Sync'];

export interface InitOptions {
  configPath?: string;
  watchPaths?: readonly string[];
  force?: boolean;
}

export interface InitResult {
  configPath: string;
  created: boolean;
}

export type ConfigKey = keyof ConfigFile;

export interface SetValueResult {
  configPath: string;
  key: ConfigKey;
  value: unknown;
}

export interface WatchListResult {
  configPath: string;
  /** Absolute form of the path that was added or removed */
  watchPath: string;
  changed: boolean;
}

// Short names accepted by `config set`
const KEY_ALIASES: Readonly<Record<string, ConfigKey>> = {
  debounce: 'debounce_seconds',
  max_wait: 'max_wait_seconds',
  health_check: 'health_check_interval',
};

const TRUE_WORDS = new Set(['true', '1', 'yes', 'on']);
const FALSE_WORDS = new Set(['false', '0', 'no', 'off']);

function isConfigKey(key: string): key is ConfigKey {
  return Object.prototype.hasOwnProperty.call(configFileSchema.shape, key);
}

export function resolveConfigKey(key: string): ConfigKey | null {
  const resolved = KEY_ALIASES[key] ?? key;
  return isConfigKey(resolved) ? resolved : null;
}

/**
 * Turn a command-line string into a value of the same kind the key holds
 * now: booleans, numbers, comma-separated lists, or a string where `null`
 * clears an optional key.
 * @param key The config key being set
 * @param raw The value as typed
 * @param current The key's current value
 * @returns The parsed value, not yet validated against the schema
 */
export function parseSettingValue(key: ConfigKey, raw: string, current: unknown): unknown {
  const trimmed = raw.trim();

  if (typeof current === 'boolean') {
    const lower = trimmed.toLowerCase();
    if (TRUE_WORDS.has(lower)) {
      return true;
    }
    if (FALSE_WORDS.has(lower)) {
      return false;
    }
    throw createConfigError(CONFIG_ERROR_CODES.VALIDATION_ERROR, `${key} expects true or false, got "${raw}"`);
  }

  if (typeof current === 'number') {
    const value = Number(trimmed);
    if (trimmed === '' || !Number.isFinite(value)) {
      throw createConfigError(CONFIG_ERROR_CODES.VALIDATION_ERROR, `${key} expects a number, got "${raw}"`);
    }
    return value;
  }

  if (Array.isArray(current)) {
    return trimmed.split(',').map(item => item.trim()).filter(item => item.length > 0);
  }

  return trimmed === '' || trimmed === 'null' ? null : trimmed;
}

export class ConfigManager {
  private static instance: ConfigManager;

  private constructor() {}

  public static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  public resolveConfigPath(explicitPath?: string): string {
    return explicitPath ? expandPath(explicitPath) : getConfigFile();
  }

  /**
   * Read, validate and freeze the configuration. Any problem here is fatal
   * for the daemon and surfaces as a ConfigError.
   */
  async loadConfig(explicitPath?: string): Promise<DaemonConfig> {
    const configPath = this.resolveConfigPath(explicitPath);
    const configFile = this.applyEnvironmentVariables(await this.readConfigFile(configPath));
    const config = this.toDaemonConfig(configFile, configPath);

    logger.debug(`Configuration loaded from ${configPath}`);
    return config;
  }

  async readConfigFile(configPath: string): Promise<ConfigFile> {
    let content: string;
    try {
      content = await fs.promises.readFile(configPath, 'utf-8');
    }
    catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw createConfigError(
          CONFIG_ERROR_CODES.FILE_NOT_FOUND,
          `No configuration file at ${configPath}. Run 'syncwarden init' to create one.`,
        );
      }
      throw error;
    }

    let rawConfig: unknown;
    try {
      rawConfig = JSON.parse(content);
    }
    catch (error) {
      throw createConfigError(
        CONFIG_ERROR_CODES.PARSE_ERROR,
        `Failed to parse configuration file ${configPath}: ${errorMessage(error)}`,
        error,
      );
    }

    return this.validateConfigFile(rawConfig, configPath);
  }

  private validateConfigFile(rawConfig: unknown, configPath: string): ConfigFile {
    const result = configFileSchema.safeParse(rawConfig);
    if (!result.success) {
      throw createConfigError(
        CONFIG_ERROR_CODES.VALIDATION_ERROR,
        `Invalid configuration in ${configPath}: ${describeIssues(result.error)}`,
        result.error.issues,
      );
    }
    return result.data;
  }

  /**
   * Write through a temporary file and a rename: readers see either the old
   * file or the new one.
   */
  private async writeConfigFile(configPath: string, file: ConfigFile): Promise<void> {
    const tempPath = `${configPath}.${process.pid}.tmp`;
    try {
      await fs.promises.mkdir(path.dirname(configPath), { recursive: true });
      await fs.promises.writeFile(tempPath, `${JSON.stringify(file, null, 2)}\n`, 'utf-8');
      await fs.promises.rename(tempPath, configPath);
    }
    catch (error) {
      await fs.promises.rm(tempPath, { force: true });
      throw createConfigError(
        CONFIG_ERROR_CODES.WRITE_ERROR,
        `Failed to write configuration file ${configPath}: ${errorMessage(error)}`,
        error,
      );
    }
  }

  /**
   * Write a default configuration unless one already exists.
   */
  async initConfig(options: InitOptions = {}): Promise<InitResult> {
    const configPath = this.resolveConfigPath(options.configPath);

    if (!options.force && fs.existsSync(configPath)) {
      return { configPath, created: false };
    }

    const defaults = this.defaultConfigFile(options.watchPaths ?? DEFAULT_WATCH_PATHS);
    await this.writeConfigFile(configPath, defaults);

    logger.debug(`Default configuration written to ${configPath}`);
    return { configPath, created: true };
  }

  /**
   * Set one key in the persisted file. The whole file is validated before
   * anything is written.
   */
  async setValue(key: string, rawValue: string, explicitPath?: string): Promise<SetValueResult> {
    const configKey = resolveConfigKey(key);
    if (!configKey) {
      throw createConfigError(
        CONFIG_ERROR_CODES.VALIDATION_ERROR,
        `Unknown config key: ${key}. Known keys: ${Object.keys(configFileSchema.shape).join(', ')}`,
      );
    }

    const configPath = this.resolveConfigPath(explicitPath);
    const file = await this.readConfigFile(configPath);
    const value = parseSettingValue(configKey, rawValue, file[configKey]);
    const updated = this.validateConfigFile({ ...file, [configKey]: value }, configPath);

    await this.writeConfigFile(configPath, updated);
    return { configPath, key: configKey, value: updated[configKey] };
  }

  /**
   * Append a directory to `watch_paths`. The path is stored as given, so a
   * leading `~` survives; duplicates are compared after expansion.
   */
  async addWatchPath(watchPath: string, explicitPath?: string): Promise<WatchListResult> {
    const expanded = expandPath(watchPath);

    let stats: fs.Stats;
    try {
      stats = await fs.promises.stat(expanded);
    }
    catch (error) {
      throw new SyncWardenError('SW-101', `Path does not exist: ${expanded}`, error instanceof Error ? error : undefined);
    }
    if (!stats.isDirectory()) {
      throw new SyncWardenError('SW-101', `Path is not a directory: ${expanded}`);
    }

    const configPath = this.resolveConfigPath(explicitPath);
    const file = await this.readConfigFile(configPath);
    if (file.watch_paths.some(existing => expandPath(existing) === expanded)) {
      return { configPath, watchPath: expanded, changed: false };
    }

    const updated = this.validateConfigFile({ ...file, watch_paths: [...file.watch_paths, watchPath] }, configPath);
    await this.writeConfigFile(configPath, updated);
    return { configPath, watchPath: expanded, changed: true };
  }

  async removeWatchPath(watchPath: string, explicitPath?: string): Promise<WatchListResult> {
    const expanded = expandPath(watchPath);
    const configPath = this.resolveConfigPath(explicitPath);
    const file = await this.readConfigFile(configPath);

    const remaining = file.watch_paths.filter(existing => expandPath(existing) !== expanded);
    if (remaining.length === file.watch_paths.length) {
      throw new SyncWardenError('SW-104', `Path is not being watched: ${expanded}`);
    }

    const updated = this.validateConfigFile({ ...file, watch_paths: remaining }, configPath);
    await this.writeConfigFile(configPath, updated);
    return { configPath, watchPath: expanded, changed: true };
  }

  public defaultConfigFile(watchPaths: readonly string[]): ConfigFile {
    const input: ConfigFileInput = { watch_paths: [...watchPaths] };
    return configFileSchema.parse(input);
  }

  /**
   * Convert the persisted snake_case file into the frozen runtime settings.
   */
  public toDaemonConfig(file: ConfigFile, configPath: string): DaemonConfig {
    const watchPaths = [...new Set(file.watch_paths.map(expandPath))];

    return Object.freeze({
      configPath,
      watchPaths: Object.freeze(watchPaths),
      rcloneRemote: file.rclone_remote,
      rcloneDest: file.rclone_dest,
      rcloneFlags: Object.freeze([...file.rclone_flags]),
      pullOnStartup: file.pull_on_startup,
      startupPullTimeoutMs: file.startup_pull_timeout * 1000,
      syncTimeoutMs: file.sync_timeout * 1000,
      debounceMs: file.debounce_seconds * 1000,
      maxWaitMs: file.max_wait_seconds * 1000,
      healthCheckIntervalMs: file.health_check_interval * 1000,
      healthProbeTimeoutMs: file.health_probe_timeout * 1000,
      healthFailureThreshold: file.health_failure_threshold,
      restartSyncthingOnFailure: file.restart_syncthing_on_failure,
      stopSyncthingOnExit: file.stop_syncthing_on_exit,
      syncthingApi: file.syncthing_api.replace(/\/+$/, ''),
      syncthingApiKey: file.syncthing_api_key,
      syncthingExe: file.syncthing_exe ? expandPath(file.syncthing_exe) : null,
      peerIdleTimeoutMs: file.peer_idle_timeout * 1000,
      ignorePatterns: Object.freeze([...file.ignore_patterns]),
      logLevel: file.log_level,
      logFile: file.log_file ? expandPath(file.log_file) : getDefaultLogFile(),
    });
  }

  /**
   * The effective configuration in its persisted shape, for display.
   */
  public toConfigFile(config: DaemonConfig): ConfigFile {
    return {
      watch_paths: [...config.watchPaths],
      rclone_remote: config.rcloneRemote,
      rclone_dest: config.rcloneDest,
      rclone_flags: [...config.rcloneFlags],
      pull_on_startup: config.pullOnStartup,
      startup_pull_timeout: config.startupPullTimeoutMs / 1000,
      sync_timeout: config.syncTimeoutMs / 1000,
      debounce_seconds: config.debounceMs / 1000,
      max_wait_seconds: config.maxWaitMs / 1000,
      health_check_interval: config.healthCheckIntervalMs / 1000,
      health_probe_timeout: config.healthProbeTimeoutMs / 1000,
      health_failure_threshold: config.healthFailureThreshold,
      restart_syncthing_on_failure: config.restartSyncthingOnFailure,
      stop_syncthing_on_exit: config.stopSyncthingOnExit,
      syncthing_api: config.syncthingApi,
      syncthing_api_key: config.syncthingApiKey,
      syncthing_exe: config.syncthingExe,
      peer_idle_timeout: config.peerIdleTimeoutMs / 1000,
      ignore_patterns: [...config.ignorePatterns],
      log_level: config.logLevel,
      log_file: config.logFile,
    };
  }

  /**
   * Environment overrides: SYNCWARDEN_LOG_LEVEL and SYNCTHING_API_KEY.
   */
  private applyEnvironmentVariables(file: ConfigFile): ConfigFile {
    const overridden: ConfigFile = { ...file };

    const envLevel = process.env.SYNCWARDEN_LOG_LEVEL;
    if (envLevel) {
      const result = configFileSchema.shape.log_level.safeParse(envLevel);
      if (result.success) {
        overridden.log_level = result.data;
      }
      else {
        logger.warn(`Ignoring SYNCWARDEN_LOG_LEVEL=${envLevel}: expected DEBUG, INFO, WARNING or ERROR`);
      }
    }

    const envApiKey = process.env.SYNCTHING_API_KEY;
    if (envApiKey) {
      overridden.syncthing_api_key = envApiKey;
    }

    return overridden;
  }
}
