import type { FSWatcher } from 'chokidar';
import type { ActivityKind, ActivitySignal } from '../types/daemon.js';
import { EventEmitter, on } from 'node:events';
import * as fs from 'node:fs';
import chokidar from 'chokidar';
import { Backoff, type BackoffOptions } from '../utils/backoff.js';
import { errorMessage, SyncWardenError } from '../utils/errors.js';
import { formatDuration } from '../utils/formatters.js';
import { createIgnoreMatcher, loadIgnorePatterns } from '../utils/ignore-patterns.js';
import { logger } from '../utils/logger.js';

export interface ChangeWatcherOptions {
  ignorePatterns?: readonly string[];
  backoff?: BackoffOptions;
}

interface WatchEntry {
  watcher: FSWatcher | null;
  retryTimer: NodeJS.Timeout | null;
  backoff: Backoff;
}

function toWatchError(error: unknown): SyncWardenError {
  if (error instanceof SyncWardenError) {
    return error;
  }
  return new SyncWardenError('SW-102', errorMessage(error), error instanceof Error ? error : undefined);
}

function isActivitySignal(value: unknown): value is ActivitySignal {
  return typeof value === 'object'
    && value !== null
    && 'at' in value
    && value.at instanceof Date
    && 'path' in value
    && typeof value.path === 'string';
}

/**
 * Watches each configured directory and emits an `activity` event for every
 * file mutation. It never decides whether to sync.
 *
 * Each root is registered independently. A root that is missing, or whose
 * watcher errors, is logged and re-registered after a growing delay while
 * the other roots keep working.
 *
 * Events: `activity` (ActivitySignal), `watch:error` (root, Error),
 * `watch:ready` (root).
 */
export class ChangeWatcher extends EventEmitter {
  private readonly roots: readonly string[];
  private readonly ignorePatterns: readonly string[];
  private readonly backoffOptions: BackoffOptions;
  private readonly entries = new Map<string, WatchEntry>();
  private isActive = false;

  constructor(roots: readonly string[], options: ChangeWatcherOptions = {}) {
    super();
    this.roots = roots;
    this.ignorePatterns = options.ignorePatterns ?? [];
    this.backoffOptions = options.backoff ?? { initialDelay: 1000, maxDelay: 60000 };
  }

  async start(): Promise<void> {
    if (this.isActive) {
      throw new SyncWardenError('SW-103', 'Watcher is already active');
    }
    this.isActive = true;

    for (const root of this.roots) {
      this.entries.set(root, {
        watcher: null,
        retryTimer: null,
        backoff: new Backoff(this.backoffOptions),
      });
      await this.register(root);
    }

    logger.debug('File watcher started');
  }

  async stop(): Promise<void> {
    if (!this.isActive) {
      return;
    }
    this.isActive = false;

    const closing: Promise<void>[] = [];
    for (const entry of this.entries.values()) {
      if (entry.retryTimer !== null) {
        clearTimeout(entry.retryTimer);
        entry.retryTimer = null;
      }
      if (entry.watcher) {
        closing.push(entry.watcher.close());
        entry.watcher = null;
      }
    }
    await Promise.all(closing);
    this.entries.clear();

    logger.info('File watcher stopped');
  }

  /**
   * The activity events as a lazy stream. Ends quietly when `abortSignal`
   * fires; events are buffered while the consumer is busy.
   */
  async* signals(abortSignal?: AbortSignal): AsyncGenerator<ActivitySignal> {
    try {
      for await (const args of on(this, 'activity', { signal: abortSignal })) {
        const values: unknown[] = Array.isArray(args) ? args : [];
        const [value] = values;
        if (isActivitySignal(value)) {
          yield value;
        }
      }
    }
    catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        return;
      }
      throw error;
    }
  }

  /**
   * Roots with a live watcher right now.
   */
  public getWatchedPaths(): string[] {
    return [...this.entries.entries()]
      .filter(([, entry]) => entry.watcher !== null)
      .map(([root]) => root);
  }

  public get active(): boolean {
    return this.isActive;
  }

  private async register(root: string): Promise<void> {
    const entry = this.entries.get(root);
    if (!entry || !this.isActive) {
      return;
    }

    try {
      await this.assertDirectory(root);
      const patterns = await loadIgnorePatterns(root, this.ignorePatterns);

      // stop() may have run while we were reading the disk
      if (!this.isActive) {
        return;
      }

      const watcher = chokidar.watch(root, {
        ignored: createIgnoreMatcher(root, patterns),
        persistent: true,
        ignoreInitial: true,
        usePolling: false,
        awaitWriteFinish: {
          stabilityThreshold: 500,
          pollInterval: 100,
        },
      });

      watcher
        .on('add', filePath => this.handleFileChange(root, 'add', filePath))
        .on('change', filePath => this.handleFileChange(root, 'change', filePath))
        .on('unlink', filePath => this.handleFileChange(root, 'unlink', filePath))
        .on('unlinkDir', dirPath => this.handleDirectoryRemoval(root, dirPath))
        .on('error', error => this.handleWatchError(root, error));

      entry.watcher = watcher;
      entry.backoff.reset();
      logger.info(`Watching: ${root}`);
      this.emit('watch:ready', root);
    }
    catch (error) {
      this.scheduleRetry(root, toWatchError(error));
    }
  }

  private async assertDirectory(root: string): Promise<void> {
    let stats: fs.Stats;
    try {
      stats = await fs.promises.stat(root);
    }
    catch (error) {
      throw new SyncWardenError('SW-101', `Watch path does not exist: ${root}`, error instanceof Error ? error : undefined);
    }
    if (!stats.isDirectory()) {
      throw new SyncWardenError('SW-101', `Watch path is not a directory: ${root}`);
    }
  }

  private handleFileChange(root: string, kind: ActivityKind, filePath: string): void {
    if (!this.isActive) {
      return;
    }

    const signal: ActivitySignal = Object.freeze({
      at: new Date(),
      watchRoot: root,
      path: filePath,
      kind,
    });
    this.emit('activity', signal);
  }

  private handleDirectoryRemoval(root: string, dirPath: string): void {
    if (dirPath === root) {
      // Never signal for a vanished root: a bisync would mirror the deletion
      this.handleWatchError(root, new SyncWardenError('SW-101', `Watch path was removed: ${root}`));
      return;
    }
    this.handleFileChange(root, 'unlinkDir', dirPath);
  }

  private handleWatchError(root: string, error: unknown): void {
    const entry = this.entries.get(root);
    if (!entry || !this.isActive) {
      return;
    }

    const watcher = entry.watcher;
    entry.watcher = null;
    if (watcher) {
      watcher.close().catch((closeError: unknown) => {
        logger.debug(`Closing failed watcher for ${root}: ${String(closeError)}`);
      });
    }

    this.scheduleRetry(root, toWatchError(error));
  }

  private scheduleRetry(root: string, error: SyncWardenError): void {
    const entry = this.entries.get(root);
    if (!entry || !this.isActive || entry.retryTimer !== null) {
      return;
    }

    const delay = entry.backoff.next();
    logger.error(`Watch failed for ${root}: ${error.message}. Retrying in ${formatDuration(delay)}`);
    this.emit('watch:error', root, error);

    entry.retryTimer = setTimeout(() => {
      entry.retryTimer = null;
      this.register(root).catch((registerError: unknown) => {
        logger.error(`Unexpected error re-registering ${root}: ${String(registerError)}`);
      });
    }, delay);
  }
}
