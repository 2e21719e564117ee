import process from 'node:process';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export type ShutdownCallback = (reason: string) => Promise<void> | void;

/**
 * Routes SIGINT, SIGTERM (and SIGBREAK on Windows) to a single shutdown
 * callback, then runs the registered cleanups. The first signal wins; later
 * ones only log.
 */
export class ShutdownHandler {
  private callback: ShutdownCallback | null = null;
  private readonly cleanups: ShutdownCallback[] = [];
  private readonly listeners = new Map<NodeJS.Signals, () => void>();
  private shutdown: Promise<void> | null = null;
  private resolveDone: (() => void) | null = null;
  private readonly done: Promise<void>;

  constructor() {
    this.done = new Promise<void>((resolve) => {
      this.resolveDone = resolve;
    });
  }

  onShutdown(callback: ShutdownCallback): this {
    this.callback = callback;
    return this;
  }

  registerCleanup(callback: ShutdownCallback): this {
    this.cleanups.push(callback);
    return this;
  }

  install(): this {
    if (this.listeners.size > 0) {
      return this;
    }

    const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
    if (process.platform === 'win32') {
      signals.push('SIGBREAK');
    }

    for (const signal of signals) {
      const listener = (): void => {
        logger.info(`Received ${signal}, initiating shutdown...`);
        this.trigger(signal).catch((error: unknown) => {
          logger.error(`Shutdown failed: ${errorMessage(error)}`);
        });
      };
      this.listeners.set(signal, listener);
      process.on(signal, listener);
    }

    logger.debug('Shutdown handlers installed');
    return this;
  }

  uninstall(): void {
    for (const [signal, listener] of this.listeners) {
      process.removeListener(signal, listener);
    }
    this.listeners.clear();
  }

  /**
   * Run the shutdown once. Errors from the callback or a cleanup are logged
   * and do not stop the remaining cleanups.
   */
  trigger(reason: string): Promise<void> {
    if (this.shutdown) {
      logger.info('Shutdown already in progress');
      return this.shutdown;
    }
    this.shutdown = this.run(reason);
    return this.shutdown;
  }

  public get triggered(): boolean {
    return this.shutdown !== null;
  }

  /**
   * Resolves once a triggered shutdown has finished.
   */
  wait(): Promise<void> {
    return this.done;
  }

  private async run(reason: string): Promise<void> {
    const steps = this.callback ? [this.callback, ...this.cleanups] : this.cleanups;
    for (const step of steps) {
      try {
        await step(reason);
      }
      catch (error) {
        logger.error(`Shutdown step failed: ${errorMessage(error)}`);
      }
    }
    this.uninstall();
    this.resolveDone?.();
  }
}
