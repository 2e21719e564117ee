import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

interface PackageJson {
  name: string;
  version: string;
  description?: string;
  [key: string]: unknown;
}

const PACKAGE_NAME = 'syncwarden';

let cachedPackageJson: PackageJson | null = null;

function isPackageJson(value: unknown): value is PackageJson {
  return typeof value === 'object'
    && value !== null
    && 'name' in value
    && 'version' in value
    && typeof value.name === 'string'
    && typeof value.version === 'string';
}

/**
 * Get the package.json contents. Uses caching to avoid repeated file reads.
 * @returns The parsed package.json object
 */
export function getPackageInfo(): PackageJson {
  if (cachedPackageJson) {
    return cachedPackageJson;
  }

  // src/utils and dist/utils both sit two levels below the package root
  const here = dirname(fileURLToPath(import.meta.url));
  const candidate = join(here, '..', '..', 'package.json');

  if (existsSync(candidate)) {
    const parsed: unknown = JSON.parse(readFileSync(candidate, 'utf-8'));
    if (isPackageJson(parsed) && parsed.name === PACKAGE_NAME) {
      cachedPackageJson = parsed;
      return parsed;
    }
  }

  cachedPackageJson = {
    name: PACKAGE_NAME,
    version: '0.0.0',
    description: 'Sync orchestration daemon for rclone bisync and Syncthing',
  };

  return cachedPackageJson;
}

/**
 * Get the package version
 * @returns The version string from package.json
 */
export function getVersion(): string {
  return getPackageInfo().version;
}
