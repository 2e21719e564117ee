import pLimit from 'p-limit';
import type { DaemonConfig, PullResult, SyncAttempt, SyncOutcome } from '../types/daemon.js';
import { errorMessage } from '../utils/errors.js';
import { formatDuration } from '../utils/formatters.js';
import { logger } from '../utils/logger.js';
import { needsResync, type ProcessResult, RcloneClient, summarizeOutput } from './rclone.js';

/**
 * Anything that can tell us when the peer-sync service has settled.
 */
export interface PeerIdleProbe {
  waitForIdle: (timeoutMs: number, signal?: AbortSignal) => Promise<boolean>;
}

export interface SyncExecutorOptions {
  rclone?: RcloneClient;
  peer?: PeerIdleProbe | null;
  historyLimit?: number;
}

export interface RunSyncOptions {
  resync?: boolean;
}

const MKDIR_TIMEOUT_MS = 30_000;
const DEFAULT_HISTORY_LIMIT = 50;

function outcomeOf(result: ProcessResult): SyncOutcome {
  if (result.timedOut || result.aborted) {
    return 'timeout';
  }
  return result.exitCode === 0 ? 'success' : 'failure';
}

/**
 * Runs rclone against the watched folders, one invocation at a time.
 *
 * The external tool keeps per-path state and is not safe to run twice
 * against the same folder, so every call (bisync, pull, push, mkdir) goes
 * through a single-slot queue. Attempt history belongs to this class; other
 * components only get frozen copies.
 */
export class SyncExecutor {
  private readonly config: DaemonConfig;
  private readonly rclone: RcloneClient;
  private readonly peer: PeerIdleProbe | null;
  private readonly historyLimit: number;
  private readonly limit = pLimit(1);
  private readonly preparedPaths = new Set<string>();
  private readonly abortController = new AbortController();
  private history: SyncAttempt[] = [];

  constructor(config: DaemonConfig, options: SyncExecutorOptions = {}) {
    this.config = config;
    this.rclone = options.rclone ?? new RcloneClient({
      remote: config.rcloneRemote,
      dest: config.rcloneDest,
      flags: config.rcloneFlags,
    });
    this.peer = options.peer ?? null;
    this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
  }

  /**
   * Bisync one folder. Retries once with --resync when rclone reports missing
   * bisync state; any other failure is recorded and left for the next trigger.
   */
  runSync(localPath: string, options: RunSyncOptions = {}): Promise<SyncAttempt> {
    return this.limit(() => this.executeSync(localPath, options.resync ?? false));
  }

  /**
   * Bisync every watched folder in order.
   */
  async syncAll(): Promise<SyncAttempt[]> {
    await this.waitForPeer('sync');
    const attempts: SyncAttempt[] = [];
    for (const localPath of this.config.watchPaths) {
      attempts.push(await this.runSync(localPath));
    }
    return attempts;
  }

  /**
   * Copy remote to local, newer files winning (`rclone copy --update`).
   */
  pull(localPath: string, timeoutMs: number): Promise<PullResult> {
    return this.limit(() => this.executeCopy('pull', localPath, timeoutMs));
  }

  async pullAll(timeoutMs: number): Promise<PullResult[]> {
    await this.waitForPeer('pull');
    const results: PullResult[] = [];
    for (const localPath of this.config.watchPaths) {
      results.push(await this.pull(localPath, timeoutMs));
    }
    return results;
  }

  push(localPath: string, timeoutMs: number): Promise<PullResult> {
    return this.limit(() => this.executeCopy('push', localPath, timeoutMs));
  }

  /**
   * Kill whatever rclone process is running and refuse new work. Used on
   * shutdown once the grace period is over.
   */
  abort(): void {
    if (!this.abortController.signal.aborted) {
      logger.warn('Aborting in-flight rclone work');
      this.abortController.abort();
    }
  }

  public get busy(): boolean {
    return this.limit.activeCount + this.limit.pendingCount > 0;
  }

  public getHistory(): readonly SyncAttempt[] {
    return Object.freeze([...this.history]);
  }

  private async executeSync(localPath: string, resync: boolean): Promise<SyncAttempt> {
    const remotePath = this.rclone.remotePathFor(localPath);

    if (this.abortController.signal.aborted) {
      logger.warn(`Sync of ${localPath} skipped: shutting down`);
      return this.record({
        localPath,
        remotePath,
        startedAt: new Date(),
        finishedAt: new Date(),
        outcome: 'failure',
        resync,
        recovery: false,
        exitCode: null,
      });
    }

    if (!this.preparedPaths.has(localPath)) {
      await this.ensureRemoteExists(localPath, remotePath);
      this.preparedPaths.add(localPath);
    }

    const { attempt, result } = await this.invokeBisync(localPath, remotePath, resync, false);

    if (attempt.outcome === 'failure' && !resync && needsResync(result)) {
      logger.warn(`Bisync state missing for ${localPath}, recovering with --resync`);
      const retry = await this.invokeBisync(localPath, remotePath, true, true);
      return retry.attempt;
    }

    return attempt;
  }

  private async invokeBisync(
    localPath: string,
    remotePath: string,
    resync: boolean,
    recovery: boolean,
  ): Promise<{ attempt: SyncAttempt; result: ProcessResult }> {
    const args = this.rclone.bisyncArgs(localPath, resync);
    logger.info(`Running: ${this.rclone.command} ${args.join(' ')}`);

    const startedAt = new Date();
    const result = await this.rclone.bisync(localPath, resync, {
      timeoutMs: this.config.syncTimeoutMs,
      signal: this.abortController.signal,
    });

    const attempt = this.record({
      localPath,
      remotePath,
      startedAt,
      finishedAt: new Date(),
      outcome: outcomeOf(result),
      resync,
      recovery,
      exitCode: result.exitCode,
    });

    this.logResult('Sync', `${localPath} <-> ${remotePath}`, result, this.config.syncTimeoutMs);
    return { attempt, result };
  }

  private async executeCopy(direction: 'pull' | 'push', localPath: string, timeoutMs: number): Promise<PullResult> {
    const remotePath = this.rclone.remotePathFor(localPath);
    const label = direction === 'pull' ? `${remotePath} -> ${localPath}` : `${localPath} -> ${remotePath}`;
    const verb = direction === 'pull' ? 'Pull' : 'Push';
    const args = direction === 'pull' ? this.rclone.pullArgs(localPath) : this.rclone.pushArgs(localPath);

    if (this.abortController.signal.aborted) {
      logger.warn(`${verb} of ${localPath} skipped: shutting down`);
      const skipped: PullResult = { localPath, remotePath, outcome: 'failure', exitCode: null };
      return Object.freeze(skipped);
    }

    logger.info(`${verb}ing: ${this.rclone.command} ${args.join(' ')}`);

    const callOptions = { timeoutMs, signal: this.abortController.signal };
    const result = direction === 'pull'
      ? await this.rclone.pull(localPath, callOptions)
      : await this.rclone.push(localPath, callOptions);

    this.logResult(verb, label, result, timeoutMs);
    return Object.freeze({
      localPath,
      remotePath,
      outcome: outcomeOf(result),
      exitCode: result.exitCode,
    });
  }

  private async ensureRemoteExists(localPath: string, remotePath: string): Promise<void> {
    logger.info(`Ensuring remote exists: ${remotePath}`);
    const result = await this.rclone.mkdir(localPath, {
      timeoutMs: MKDIR_TIMEOUT_MS,
      signal: this.abortController.signal,
    });
    if (result.exitCode !== 0) {
      logger.warn(`Could not create remote directory ${remotePath}: ${result.spawnError?.message ?? summarizeOutput(result)}`);
    }
  }

  private async waitForPeer(operation: 'sync' | 'pull'): Promise<void> {
    if (!this.peer) {
      return;
    }
    try {
      const idle = await this.peer.waitForIdle(this.config.peerIdleTimeoutMs, this.abortController.signal);
      if (!idle) {
        logger.warn(`Syncthing still busy, proceeding with rclone ${operation} anyway`);
      }
    }
    catch (error) {
      logger.warn(`Could not query Syncthing state before ${operation}: ${errorMessage(error)}`);
    }
  }

  private logResult(verb: string, label: string, result: ProcessResult, timeoutMs: number): void {
    const took = formatDuration(result.durationMs);

    if (result.spawnError) {
      logger.error(`${verb} failed: ${label}: could not start ${this.rclone.command}: ${result.spawnError.message}`);
    }
    else if (result.aborted) {
      logger.error(`${verb} aborted during shutdown after ${took}: ${label} (process killed)`);
    }
    else if (result.timedOut) {
      logger.error(`${verb} timed out after ${formatDuration(timeoutMs)}: ${label} (process killed)`);
    }
    else if (result.exitCode === 0) {
      logger.info(`${verb} completed in ${took}: ${label}`);
    }
    else {
      logger.error(`${verb} failed: ${label} (exit code ${result.exitCode ?? 'none'}): ${summarizeOutput(result)}`);
    }
  }

  private record(attempt: SyncAttempt): SyncAttempt {
    const frozen = Object.freeze(attempt);
    this.history.push(frozen);
    if (this.history.length > this.historyLimit) {
      this.history = this.history.slice(-this.historyLimit);
    }
    return frozen;
  }
}
