import { z } from 'zod';

const seconds = z.number().nonnegative('Durations must be non-negative');

const logLevelSchema = z.preprocess(
  value => (typeof value === 'string' ? value.toUpperCase().replace(/^WARN$/, 'WARNING') : value),
  z.enum(['DEBUG', 'INFO', 'WARNING', 'ERROR']),
);

// Persisted configuration file (~/.syncwarden/config.json)
export const configFileSchema = z.object({
  watch_paths: z.array(z.string().min(1, 'Watch paths cannot be empty')).default([]),
  rclone_remote: z.string().min(1, 'rclone remote is required').default('gdrive'),
  rclone_dest: z.string().min(1, 'rclone destination is required').default('Sync-Backup'),
  rclone_flags: z.array(z.string()).default(['--verbose']),
  pull_on_startup: z.boolean().default(true),
  startup_pull_timeout: seconds.default(120),
  sync_timeout: z.number().positive('sync_timeout must be positive').default(600),
  debounce_seconds: seconds.default(30),
  max_wait_seconds: seconds.default(300),
  health_check_interval: z.number().positive('health_check_interval must be positive').default(60),
  health_probe_timeout: z.number().positive('health_probe_timeout must be positive').default(5),
  health_failure_threshold: z.number().int().min(1).default(1),
  restart_syncthing_on_failure: z.boolean().default(true),
  stop_syncthing_on_exit: z.boolean().default(true),
  syncthing_api: z.string().url('Invalid Syncthing API URL').default('http://localhost:8384'),
  syncthing_api_key: z.string().nullable().default(null),
  syncthing_exe: z.string().nullable().default(null),
  peer_idle_timeout: seconds.default(120),
  ignore_patterns: z.array(z.string()).default([]),
  log_level: logLevelSchema.default('INFO'),
  log_file: z.string().nullable().default(null),
});

export type ConfigFile = z.infer<typeof configFileSchema>;
export type ConfigFileInput = z.input<typeof configFileSchema>;
export type LogLevelSetting = ConfigFile['log_level'];

// Validation error codes
export const CONFIG_ERROR_CODES = {
  FILE_NOT_FOUND: 'SW-1204',
  PARSE_ERROR: 'SW-1205',
  VALIDATION_ERROR: 'SW-1206',
  WRITE_ERROR: 'SW-1207',
} as const;

export type ConfigErrorCode = typeof CONFIG_ERROR_CODES[keyof typeof CONFIG_ERROR_CODES];

export class ConfigError extends Error {
  public readonly code: ConfigErrorCode;
  public readonly details?: unknown;

  constructor(code: ConfigErrorCode, message: string, details?: unknown) {
    super(`[${code}] ${message}`);
    this.name = 'ConfigError';
    this.code = code;
    this.details = details;

    // Ensures proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

export function createConfigError(code: ConfigErrorCode, message: string, details?: unknown): ConfigError {
  return new ConfigError(code, message, details);
}

/**
 * One line per zod issue, `path: message`.
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}
