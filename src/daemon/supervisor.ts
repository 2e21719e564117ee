import type { FSWatcher } from 'chokidar';
import type { DaemonConfig, StartupReport } from '../types/daemon.js';
import { EventEmitter } from 'node:events';
import chokidar from 'chokidar';
import { ConfigManager } from '../config/config-manager.js';
import { errorMessage, SyncWardenError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { Orchestrator } from './orchestrator.js';

export type ManagedDaemon = Pick<Orchestrator, 'start' | 'stop' | 'stopPeer'>;

export interface SupervisorOptions {
  /** Grace period handed to the orchestrator on reload and on stop */
  graceMs: number;
  /** Quiet period after the last write to the config file */
  reloadDelayMs?: number;
  createDaemon?: (config: DaemonConfig) => ManagedDaemon;
  loadConfig?: (configPath: string) => Promise<DaemonConfig>;
}

const DEFAULT_RELOAD_DELAY_MS = 500;

/**
 * Runs an orchestrator for the current configuration and swaps it for a new
 * one when the config file changes on disk.
 *
 * A file that no longer loads is logged and the running orchestrator is
 * kept. Syncthing is left running across a swap; `stopPeer` handles it on
 * exit. Emits `reload` with the new config before the new orchestrator
 * starts.
 */
export class Supervisor extends EventEmitter {
  private config: DaemonConfig;
  private readonly graceMs: number;
  private readonly reloadDelayMs: number;
  private readonly createDaemon: (config: DaemonConfig) => ManagedDaemon;
  private readonly loadConfig: (configPath: string) => Promise<DaemonConfig>;

  private current: ManagedDaemon | null = null;
  private watcher: FSWatcher | null = null;
  private reloadTimer: NodeJS.Timeout | null = null;
  private reloads: Promise<unknown> = Promise.resolve();
  private stopping: Promise<void> | null = null;

  constructor(config: DaemonConfig, options: SupervisorOptions) {
    super();
    this.config = config;
    this.graceMs = options.graceMs;
    this.reloadDelayMs = options.reloadDelayMs ?? DEFAULT_RELOAD_DELAY_MS;
    this.createDaemon = options.createDaemon ?? (next => new Orchestrator(next));
    this.loadConfig = options.loadConfig ?? (configPath => ConfigManager.getInstance().loadConfig(configPath));
  }

  async start(): Promise<StartupReport> {
    if (this.current || this.stopping) {
      throw new SyncWardenError('SW-401', 'Supervisor has already been started');
    }
    const daemon = this.createDaemon(this.config);
    this.current = daemon;
    this.watchConfigFile();
    return daemon.start();
  }

  public getConfig(): DaemonConfig {
    return this.config;
  }

  /**
   * Re-read the config file and restart the orchestrator with it. Reloads
   * run one at a time. Resolves true when a new orchestrator was started.
   */
  reload(): Promise<boolean> {
    const run = this.reloads.then(() => this.applyReload());
    this.reloads = run.catch(() => undefined);
    return run;
  }

  /**
   * Close the config watcher and stop the current orchestrator. Later calls
   * share the first one's promise.
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  async stopPeer(): Promise<void> {
    await this.current?.stopPeer();
  }

  private watchConfigFile(): void {
    const watcher = chokidar.watch(this.config.configPath, {
      persistent: true,
      ignoreInitial: true,
    });

    watcher
      .on('add', () => this.scheduleReload())
      .on('change', () => this.scheduleReload())
      .on('error', (error) => {
        logger.warn(`Config file watcher error: ${errorMessage(error)}`);
      });

    this.watcher = watcher;
    logger.debug(`Watching config file: ${this.config.configPath}`);
  }

  // Editors often write a file several times per save
  private scheduleReload(): void {
    if (this.stopping) {
      return;
    }
    if (this.reloadTimer !== null) {
      clearTimeout(this.reloadTimer);
    }
    this.reloadTimer = setTimeout(() => {
      this.reloadTimer = null;
      this.reload().catch((error: unknown) => {
        logger.error(`Config reload failed: ${errorMessage(error)}`);
      });
    }, this.reloadDelayMs);
  }

  private async applyReload(): Promise<boolean> {
    if (this.stopping) {
      return false;
    }
    logger.info('Config file changed, reloading...');

    let next: DaemonConfig;
    try {
      next = await this.loadConfig(this.config.configPath);
    }
    catch (error) {
      logger.error(`Failed to reload config, keeping the current settings: ${errorMessage(error)}`);
      return false;
    }

    if (JSON.stringify(next) === JSON.stringify(this.config)) {
      logger.info('Config unchanged');
      return false;
    }
    if (this.stopping) {
      return false;
    }

    await this.current?.stop(this.graceMs, { keepPeerRunning: true });
    if (this.stopping) {
      return false;
    }

    this.config = next;
    const daemon = this.createDaemon(next);
    this.current = daemon;
    this.emit('reload', next);
    logger.info('Config reloaded successfully');

    await daemon.start();
    return true;
  }

  private async shutdown(): Promise<void> {
    if (this.reloadTimer !== null) {
      clearTimeout(this.reloadTimer);
      this.reloadTimer = null;
    }
    await this.watcher?.close();
    this.watcher = null;
    await this.current?.stop(this.graceMs, { keepPeerRunning: true });
  }
}
