import type { DaemonConfig, DaemonStatus, HealthState, StartupReport } from '../types/daemon.js';
import { setTimeout as sleep } from 'node:timers/promises';
import { HealthMonitor } from '../health/monitor.js';
import { type PeerSyncService, SyncthingClient } from '../peer/syncthing-client.js';
import { SyncDebouncer } from '../sync/debouncer.js';
import { SyncExecutor } from '../sync/executor.js';
import { StartupSequencer } from '../sync/startup.js';
import { errorMessage, SyncWardenError } from '../utils/errors.js';
import { formatDuration } from '../utils/formatters.js';
import { logger } from '../utils/logger.js';
import { ChangeWatcher } from '../watch/change-watcher.js';

export interface OrchestratorDependencies {
  executor?: SyncExecutor;
  watcher?: ChangeWatcher;
  /** null runs without a peer-sync service: no health checks, no idle wait */
  peer?: PeerSyncService | null;
}

type LifecycleState = 'idle' | 'starting' | 'running' | 'stopping' | 'stopped';

export interface StopOptions {
  /** Leave Syncthing running even when `stopSyncthingOnExit` is set */
  keepPeerRunning?: boolean;
}

const DEFAULT_GRACE_MS = 15_000;
const RECENT_ATTEMPTS = 10;

/**
 * Wires the components together and owns their lifecycle.
 *
 * Start order: startup pull and bisync, then the watcher, the health loop and
 * the pump that feeds watcher signals into the debouncer. Stop order is the
 * reverse, with a bounded wait for a sync that is already running.
 */
export class Orchestrator {
  private readonly config: DaemonConfig;
  private readonly peer: PeerSyncService | null;
  private readonly executor: SyncExecutor;
  private readonly watcher: ChangeWatcher;
  private readonly monitor: HealthMonitor | null;
  private readonly startup: StartupSequencer;
  private readonly debouncer: SyncDebouncer;
  private readonly pumpController = new AbortController();

  private state: LifecycleState = 'idle';
  private pump: Promise<void> | null = null;
  private startupRun: Promise<StartupReport> | null = null;
  private stopping: Promise<void> | null = null;

  constructor(config: DaemonConfig, dependencies: OrchestratorDependencies = {}) {
    this.config = config;
    this.peer = dependencies.peer === undefined
      ? new SyncthingClient({
          apiUrl: config.syncthingApi,
          apiKey: config.syncthingApiKey,
          exePath: config.syncthingExe,
          requestTimeoutMs: config.healthProbeTimeoutMs,
        })
      : dependencies.peer;

    this.executor = dependencies.executor ?? new SyncExecutor(config, { peer: this.peer });
    this.watcher = dependencies.watcher ?? new ChangeWatcher(config.watchPaths, {
      ignorePatterns: config.ignorePatterns,
    });
    this.monitor = this.peer
      ? new HealthMonitor(this.peer, {
          intervalMs: config.healthCheckIntervalMs,
          probeTimeoutMs: config.healthProbeTimeoutMs,
          failureThreshold: config.healthFailureThreshold,
          restartOnFailure: config.restartSyncthingOnFailure,
        })
      : null;
    this.startup = new StartupSequencer(config, this.executor);
    this.debouncer = new SyncDebouncer({
      debounceMs: config.debounceMs,
      maxWaitMs: config.maxWaitMs,
      onTrigger: async () => {
        await this.executor.syncAll();
      },
    });
  }

  async start(): Promise<StartupReport> {
    if (this.state !== 'idle') {
      throw new SyncWardenError('SW-401', `Daemon cannot start from state "${this.state}"`);
    }
    this.state = 'starting';

    logger.info('syncwarden starting up');
    logger.info(`Watching: ${this.config.watchPaths.join(', ')}`);
    logger.info(`rclone: ${this.config.rcloneRemote}:${this.config.rcloneDest}`);

    this.startupRun = this.startup.run();
    const report = await this.startupRun;

    if (this.state !== 'starting') {
      // stop() arrived during the startup sync
      return report;
    }

    // Subscribe before any watcher can emit
    this.pump = this.pumpSignals();
    await this.watcher.start();
    this.monitor?.start();

    this.state = 'running';
    logger.info('syncwarden running. Press Ctrl+C to stop.');
    return report;
  }

  /**
   * Shut everything down. Safe to call more than once and from any state;
   * later calls share the first one's promise.
   */
  stop(graceMs: number = DEFAULT_GRACE_MS, options: StopOptions = {}): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown(graceMs, options);
    }
    return this.stopping;
  }

  /**
   * Stop Syncthing if `stopSyncthingOnExit` asks for it. Failures are logged.
   */
  async stopPeer(): Promise<void> {
    if (!this.peer || !this.config.stopSyncthingOnExit) {
      return;
    }
    try {
      await this.peer.stop();
    }
    catch (error) {
      logger.error(`Failed to stop Syncthing: ${errorMessage(error)}`);
    }
  }

  public getStatus(): DaemonStatus {
    const history = this.executor.getHistory();
    return Object.freeze({
      running: this.state === 'running',
      startup: this.startup.getReport(),
      health: this.getHealth(),
      syncing: this.debouncer.syncing || this.executor.busy,
      pendingActivity: this.debouncer.pending(),
      recentAttempts: Object.freeze(history.slice(-RECENT_ATTEMPTS)),
    });
  }

  public get lifecycle(): LifecycleState {
    return this.state;
  }

  private getHealth(): HealthState {
    return this.monitor?.getState() ?? Object.freeze({
      status: 'unknown',
      lastCheckedAt: null,
      consecutiveFailures: 0,
      restarts: 0,
    });
  }

  private async pumpSignals(): Promise<void> {
    try {
      for await (const activity of this.watcher.signals(this.pumpController.signal)) {
        this.debouncer.signal(activity);
      }
    }
    catch (error) {
      logger.error(`Activity stream ended unexpectedly: ${errorMessage(error)}`);
    }
  }

  private async shutdown(graceMs: number, options: StopOptions): Promise<void> {
    const wasStarting = this.state === 'starting';
    this.state = 'stopping';
    logger.info('Shutting down...');

    this.pumpController.abort();
    this.debouncer.cancel();
    // A restart that ignores the abort is not waited for past the grace period
    if (this.monitor && !(await this.withinGrace(this.monitor.stop(), graceMs))) {
      logger.warn('Health check still running after the grace period, leaving it behind');
    }
    await this.watcher.stop();
    await this.pump;

    await this.drain(graceMs, wasStarting);

    if (!options.keepPeerRunning) {
      await this.stopPeer();
    }

    this.state = 'stopped';
    logger.info('syncwarden stopped');
  }

  /**
   * Give a running sync, or the startup sequence, the grace period to finish,
   * then kill it. Once aborted the executor refuses further rclone work, so a
   * startup still waiting on Syncthing is left to wind down on its own.
   */
  private async drain(graceMs: number, startupInProgress: boolean): Promise<void> {
    if (!startupInProgress && !this.debouncer.syncing && !this.executor.busy) {
      return;
    }

    logger.info(`Waiting up to ${formatDuration(graceMs)} for the running sync to finish`);
    const startupDone = startupInProgress && this.startupRun
      ? this.startupRun.then(() => undefined, () => undefined)
      : Promise.resolve();
    const finished = await this.withinGrace(startupDone.then(() => this.waitForExecutor()), graceMs);

    if (!finished) {
      logger.warn('Grace period expired');
      this.executor.abort();
      await this.debouncer.idle();
    }
  }

  /**
   * True when `work` settles before `graceMs` runs out.
   */
  private async withinGrace(work: Promise<unknown>, graceMs: number): Promise<boolean> {
    const grace = new AbortController();
    const finished = await Promise.race([
      work.then(() => true, () => true),
      sleep(graceMs, false, { signal: grace.signal }).catch(() => false),
    ]);
    grace.abort();
    return finished;
  }

  private async waitForExecutor(): Promise<void> {
    await this.debouncer.idle();
    while (this.executor.busy) {
      await sleep(100);
    }
  }
}
