import type { DaemonConfig, PullResult, StartupReport, SyncAttempt } from '../types/daemon.js';
import { logger } from '../utils/logger.js';
import type { SyncExecutor } from './executor.js';

/**
 * One-time pull-then-bisync run before the daemon starts watching.
 *
 * A failed pull is not fatal: the bisync still runs and the daemon still
 * goes on to watch, so local edits stay protected.
 */
export class StartupSequencer {
  private readonly config: DaemonConfig;
  private readonly executor: Pick<SyncExecutor, 'pullAll' | 'syncAll'>;
  private report: StartupReport | null = null;

  constructor(config: DaemonConfig, executor: Pick<SyncExecutor, 'pullAll' | 'syncAll'>) {
    this.config = config;
    this.executor = executor;
  }

  async run(): Promise<StartupReport> {
    if (this.report) {
      return this.report;
    }

    if (!this.config.pullOnStartup) {
      logger.info('Startup pull disabled, skipping startup sync');
      return this.finish('skipped', [], []);
    }

    logger.info('Pulling latest from remote...');
    const pulls = await this.executor.pullAll(this.config.startupPullTimeoutMs);
    const failedPulls = pulls.filter(pull => pull.outcome !== 'success');

    for (const pull of failedPulls) {
      logger.warn(`Startup pull ${pull.outcome === 'timeout' ? 'timed out' : 'failed'} for ${pull.localPath}, continuing with bisync`);
    }

    logger.info('Running initial sync...');
    const attempts = await this.executor.syncAll();

    return this.finish(failedPulls.length > 0 ? 'degraded' : 'completed', pulls, attempts);
  }

  public getReport(): StartupReport | null {
    return this.report;
  }

  private finish(
    state: StartupReport['state'],
    pulls: readonly PullResult[],
    attempts: readonly SyncAttempt[],
  ): StartupReport {
    this.report = Object.freeze({
      state,
      pulls: Object.freeze([...pulls]),
      attempts: Object.freeze([...attempts]),
    });
    logger.info(`Startup sequence ${state}`);
    return this.report;
  }
}
