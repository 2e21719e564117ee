import type { HealthState } from '../types/daemon.js';
import type { PeerSyncService } from '../peer/syncthing-client.js';
import { EventEmitter } from 'node:events';
import { errorMessage } from '../utils/errors.js';
import { formatDuration } from '../utils/formatters.js';
import { logger } from '../utils/logger.js';

export interface HealthMonitorOptions {
  intervalMs: number;
  probeTimeoutMs: number;
  /** Consecutive failures before the service counts as unresponsive */
  failureThreshold: number;
  restartOnFailure: boolean;
}

/**
 * Probes the peer-sync service on a fixed interval and restarts it when it
 * stops answering.
 *
 * The loop is a self-rescheduling timer: the next probe is only scheduled
 * once the current one (and any restart) has finished, so probes never
 * overlap. Emits `status` with a HealthState snapshot after every probe and
 * `restart` with the restart result.
 */
export class HealthMonitor extends EventEmitter {
  private readonly peer: PeerSyncService;
  private readonly options: HealthMonitorOptions;
  private state: HealthState = Object.freeze({
    status: 'unknown',
    lastCheckedAt: null,
    consecutiveFailures: 0,
    restarts: 0,
  });

  private timer: NodeJS.Timeout | null = null;
  private probeController: AbortController | null = null;
  private running = false;
  private cycle: Promise<void> | null = null;

  constructor(peer: PeerSyncService, options: HealthMonitorOptions) {
    super();
    this.peer = peer;
    this.options = options;
  }

  /**
   * Start probing. The first probe runs immediately.
   */
  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    logger.info(`Health checks every ${formatDuration(this.options.intervalMs)}`);
    this.runCycle();
  }

  /**
   * Stop the loop and abort an in-flight probe, including a restart it
   * started, then wait for it to give way.
   */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.probeController?.abort();
    await this.cycle;
  }

  public getState(): HealthState {
    return this.state;
  }

  public get active(): boolean {
    return this.running;
  }

  /**
   * One probe plus whatever it leads to. Exposed for the `health` command and
   * for tests; the loop calls it too.
   */
  async check(): Promise<HealthState> {
    const controller = new AbortController();
    this.probeController = controller;
    try {
      return await this.runCheck(controller.signal);
    }
    finally {
      this.probeController = null;
    }
  }

  private async runCheck(signal: AbortSignal): Promise<HealthState> {
    let healthy: boolean;
    try {
      healthy = await this.peer.ping(this.options.probeTimeoutMs, signal);
    }
    catch (error) {
      logger.debug(`Health probe error: ${errorMessage(error)}`);
      healthy = false;
    }

    // Aborted by stop(): the result says nothing about the service
    if (signal.aborted) {
      return this.state;
    }

    if (healthy) {
      this.onSuccess();
    }
    else {
      await this.onFailure(signal);
    }

    this.emit('status', this.state);
    return this.state;
  }

  private onSuccess(): void {
    if (this.state.status !== 'healthy') {
      logger.info('Syncthing is healthy');
    }
    this.update({ status: 'healthy', consecutiveFailures: 0 });
  }

  private async onFailure(signal: AbortSignal): Promise<void> {
    const failures = this.state.consecutiveFailures + 1;
    const thresholdReached = failures >= this.options.failureThreshold;

    this.update({
      status: thresholdReached ? 'unresponsive' : this.state.status,
      consecutiveFailures: failures,
    });

    if (!thresholdReached) {
      logger.warn(`Syncthing health check failed (${failures}/${this.options.failureThreshold})`);
      return;
    }

    if (!this.options.restartOnFailure) {
      logger.warn('Syncthing is not responding, automatic restart is disabled');
      return;
    }

    logger.warn('Syncthing is not responding, restarting');
    let restarted = false;
    try {
      restarted = await this.peer.restart(signal);
      if (!restarted) {
        logger.error('Syncthing restart did not bring the service back');
      }
    }
    catch (error) {
      if (signal.aborted) {
        logger.info('Syncthing restart interrupted by shutdown');
        return;
      }
      logger.error(`Syncthing restart failed: ${errorMessage(error)}`);
    }

    this.update({ consecutiveFailures: 0, restarts: this.state.restarts + 1 });
    this.emit('restart', restarted);
  }

  private update(patch: Partial<HealthState>): void {
    this.state = Object.freeze({
      ...this.state,
      ...patch,
      lastCheckedAt: new Date(),
    });
  }

  private runCycle(): void {
    this.timer = null;
    this.cycle = this.check()
      .then(() => undefined)
      .catch((error: unknown) => {
        logger.error(`Health check cycle failed: ${errorMessage(error)}`);
      })
      .finally(() => {
        this.cycle = null;
        if (this.running) {
          this.timer = setTimeout(() => this.runCycle(), this.options.intervalMs);
        }
      });
  }
}
