import chalk from 'chalk';

export interface ErrorSuggestion {
  code: string;
  message: string;
  suggestions: string[];
  documentation?: string;
}

// Error code ranges:
// SW-001 to SW-099: General errors
// SW-100 to SW-199: File watching errors
// SW-200 to SW-299: Sync subprocess errors
// SW-300 to SW-399: Peer-sync (Syncthing) errors
// SW-400 to SW-499: Daemon lifecycle errors
// SW-1200 to SW-1299: Configuration errors (see config/schemas.ts)

const ERROR_SUGGESTIONS: Map<string, ErrorSuggestion> = new Map([
  ['SW-002', {
    code: 'SW-002',
    message: 'Invalid command options',
    suggestions: [
      'Run the command with --help to see the accepted options',
    ],
  }],
  ['SW-003', {
    code: 'SW-003',
    message: 'Editor failed',
    suggestions: [
      'Set $EDITOR or $VISUAL to an editor that is installed',
    ],
  }],
  ['SW-101', {
    code: 'SW-101',
    message: 'Watch path does not exist',
    suggestions: [
      'Create the directory or remove it from "watch_paths"',
      'Run "syncwarden config" to see the effective watch paths',
    ],
  }],
  ['SW-102', {
    code: 'SW-102',
    message: 'Failed to register file watcher',
    suggestions: [
      'Check that the directory is readable',
      'On Linux, raise fs.inotify.max_user_watches for large trees',
    ],
  }],
  ['SW-103', {
    code: 'SW-103',
    message: 'Watcher is already active',
    suggestions: [
      'Stop the watcher before starting it again',
    ],
  }],
  ['SW-104', {
    code: 'SW-104',
    message: 'Path is not being watched',
    suggestions: [
      'Run "syncwarden config" to list the current watch paths',
    ],
  }],
  ['SW-201', {
    code: 'SW-201',
    message: 'rclone executable not found',
    suggestions: [
      'Install rclone and make sure it is on PATH',
      'Run "rclone config" to set up the remote named in "rclone_remote"',
    ],
    documentation: 'https://rclone.org/install/',
  }],
  ['SW-203', {
    code: 'SW-203',
    message: 'Sync timed out',
    suggestions: [
      'Raise "sync_timeout" in the config for large first syncs',
      'Check network connectivity to the remote',
    ],
  }],
  ['SW-301', {
    code: 'SW-301',
    message: 'Syncthing is not responding',
    suggestions: [
      'Check that Syncthing is running and "syncthing_api" points at its GUI address',
      'Set "syncthing_api_key" if the API key cannot be read from config.xml',
    ],
  }],
  ['SW-401', {
    code: 'SW-401',
    message: 'Daemon is already running',
    suggestions: [
      'Stop the running instance before starting another',
    ],
  }],
  ['SW-1204', {
    code: 'SW-1204',
    message: 'Configuration file not found',
    suggestions: [
      'Run "syncwarden init" to create a configuration',
      'Point at another file with --config <path>',
    ],
  }],
  ['SW-1205', {
    code: 'SW-1205',
    message: 'Configuration file is not valid JSON',
    suggestions: [
      'Check the JSON syntax of the config file',
      'Recreate it with "syncwarden init --force"',
    ],
  }],
  ['SW-1206', {
    code: 'SW-1206',
    message: 'Invalid configuration',
    suggestions: [
      'Durations must be non-negative numbers of seconds',
      '"log_level" must be one of DEBUG, INFO, WARNING, ERROR',
    ],
  }],
]);

export class SyncWardenError extends Error {
  public readonly code: string;
  public readonly suggestions: readonly string[];
  public readonly documentation?: string;

  // Store original error for debugging
  public readonly originalError?: Error;

  constructor(code: string, message?: string, originalError?: Error) {
    const errorSuggestion = ERROR_SUGGESTIONS.get(code);
    const errorMessage = message || errorSuggestion?.message || 'Unknown error';

    super(`${code}: ${errorMessage}`);

    this.name = 'SyncWardenError';
    this.code = code;
    this.suggestions = Object.freeze(errorSuggestion?.suggestions || []);
    this.documentation = errorSuggestion?.documentation;
    this.originalError = originalError;

    if (originalError?.stack) {
      this.stack = originalError.stack;
    }

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, SyncWardenError.prototype);
  }

  public format(verbose = false): string {
    let output = chalk.red(`Error ${this.message}`);

    if (this.suggestions.length > 0) {
      output += `\n\n${chalk.yellow('Suggestions:')}`;
      this.suggestions.forEach((suggestion) => {
        output += `\n  • ${chalk.gray(suggestion)}`;
      });
    }

    if (this.documentation) {
      output += `\n\n${chalk.blue('Documentation: ')}${chalk.gray(this.documentation)}`;
    }

    if (verbose && this.stack) {
      output += `\n\n${chalk.gray('Stack trace:')}`;
      output += `\n${chalk.gray(this.stack)}`;
    }

    return output;
  }
}

/**
 * Errors carrying a code in one of the ranges above.
 */
export function hasErrorCode(error: unknown): error is Error & { code: string } {
  return error instanceof Error
    && 'code' in error
    && typeof error.code === 'string'
    && error.code.startsWith('SW-');
}

/**
 * Map an arbitrary error to a SyncWardenError, guessing the code from the
 * system error text.
 */
export function toSyncWardenError(error: unknown): SyncWardenError {
  if (error instanceof SyncWardenError) {
    return error;
  }
  if (hasErrorCode(error)) {
    const message = error.message.replace(/^\[SW-\d+\]\s*/, '');
    return new SyncWardenError(error.code, message, error);
  }
  if (error instanceof Error) {
    let code = 'SW-001';
    if (error.message.includes('ENOENT') && error.message.includes('rclone')) {
      code = 'SW-201';
    }
    else if (error.message.includes('ECONNREFUSED')) {
      code = 'SW-301';
    }
    return new SyncWardenError(code, error.message, error);
  }
  return new SyncWardenError('SW-001', String(error));
}

/**
 * Global error handler for the CLI
 */
export function handleError(error: unknown, verbose = false): void {
  console.error(toSyncWardenError(error).format(verbose));
}

/**
 * Message text of anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
