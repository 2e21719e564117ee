import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { minimatch } from 'minimatch';
import { errorMessage } from './errors.js';
import { logger } from './logger.js';

export const IGNORE_FILE_NAME = '.syncignore';

// Path segments never worth a sync: VCS data, editor state, peer-sync markers
export const DEFAULT_IGNORED_SEGMENTS: ReadonlySet<string> = new Set([
  '.git',
  '.obsidian',
  '__pycache__',
  '.sync',
  '.stfolder',
  '.stversions',
  'node_modules',
]);

// Default patterns to always ignore
const DEFAULT_PATTERNS = [
  '*.tmp',
  '*.swp',
  '*~',
  'Thumbs.db',
];

/**
 * Load ignore patterns from a watch root's .syncignore file and combine them
 * with the defaults and any configured patterns.
 * @param rootPath The watch root to look for .syncignore in
 * @param extraPatterns Gitignore-style patterns from the config file
 * @returns Array of glob patterns relative to the root
 */
export async function loadIgnorePatterns(rootPath: string, extraPatterns: readonly string[] = []): Promise<string[]> {
  const patterns = [...DEFAULT_PATTERNS, ...extraPatterns.map(convertGitignoreToGlob)];
  const ignoreFilePath = path.join(rootPath, IGNORE_FILE_NAME);

  try {
    const content = await fs.readFile(ignoreFilePath, 'utf-8');
    const customPatterns = parseIgnoreFile(content);
    patterns.push(...customPatterns);
    logger.debug(`Loaded ${customPatterns.length} ignore patterns from ${ignoreFilePath}`);
  }
  catch (error) {
    // A missing .syncignore is the normal case
    if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
      logger.warn(`Could not read ${ignoreFilePath}: ${errorMessage(error)}`);
    }
  }

  return patterns;
}

/**
 * Parse ignore file content into patterns
 * @param content The content of the ignore file
 * @returns Array of valid patterns
 */
export function parseIgnoreFile(content: string): string[] {
  const patterns: string[] = [];
  const lines = content.split(/\r?\n/);

  for (const line of lines) {
    const trimmed = line.trim();

    // Skip empty lines and comments
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    // Negation has no meaning when any match suppresses an event
    if (trimmed.startsWith('!')) {
      logger.debug(`Negation pattern not supported, skipping: ${trimmed}`);
      continue;
    }

    patterns.push(convertGitignoreToGlob(trimmed));
  }

  return patterns;
}

/**
 * Convert a gitignore-style pattern to a glob relative to the watch root
 * @param pattern Gitignore-style pattern
 * @returns Glob pattern for minimatch
 */
export function convertGitignoreToGlob(pattern: string): string {
  let glob = pattern;

  // If pattern ends with /, it matches directories only
  if (glob.endsWith('/')) {
    glob = `${glob.slice(0, -1)}/**`;
  }

  // Anchored patterns are relative to the root
  if (glob.startsWith('/')) {
    return glob.slice(1);
  }

  // Unanchored patterns with a slash match at any depth
  if (glob.includes('/') && !glob.startsWith('**')) {
    glob = `**/${glob}`;
  }

  return glob;
}

/**
 * Build the predicate chokidar calls for every path under `rootPath`.
 * Hidden entries and the default segments are always ignored.
 */
export function createIgnoreMatcher(rootPath: string, patterns: readonly string[]): (filePath: string) => boolean {
  return (filePath: string) => {
    const relative = path.relative(rootPath, filePath);
    if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
      return false;
    }

    const normalized = relative.split(path.sep).join('/');
    const segments = normalized.split('/');
    if (segments.some(segment => DEFAULT_IGNORED_SEGMENTS.has(segment) || segment.startsWith('.'))) {
      return true;
    }

    return patterns.some(pattern => minimatch(normalized, pattern, { dot: true, nocase: true, matchBase: true }));
  };
}
