import * as os from 'node:os';
import * as path from 'node:path';
import process from 'node:process';

/**
 * Expand a leading `~` and resolve to an absolute path.
 * @param input Path as written in the config or on the command line
 * @returns Absolute path
 */
export function expandPath(input: string): string {
  if (input === '~') {
    return os.homedir();
  }
  if (input.startsWith('~/') || input.startsWith('~\\')) {
    return path.resolve(os.homedir(), input.slice(2));
  }
  return path.resolve(input);
}

/**
 * Directory holding the config and log files. `SYNCWARDEN_HOME` overrides it.
 */
export function getConfigDir(): string {
  const override = process.env.SYNCWARDEN_HOME;
  if (override) {
    return expandPath(override);
  }
  return path.join(os.homedir(), '.syncwarden');
}

export function getConfigFile(): string {
  return path.join(getConfigDir(), 'config.json');
}

export function getDefaultLogFile(): string {
  return path.join(getConfigDir(), 'syncwarden.log');
}
