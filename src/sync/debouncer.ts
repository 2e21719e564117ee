import type { ActivitySignal } from '../types/daemon.js';
import { errorMessage } from '../utils/errors.js';
import { formatDuration } from '../utils/formatters.js';
import { logger } from '../utils/logger.js';

export type TriggerReason = 'quiet' | 'max-wait' | 'follow-up' | 'flush';

export interface SyncDebouncerOptions {
  /** Quiet period restarted by every signal */
  debounceMs: number;
  /** Ceiling measured from the first signal of a burst */
  maxWaitMs: number;
  /** The sync to run. Rejections are logged, never rethrown. */
  onTrigger: (reason: TriggerReason) => Promise<void>;
}

/**
 * Turns a noisy stream of activity signals into at most one running sync.
 *
 * Two timers drive it: a quiet timer reset by each signal and a fixed
 * deadline armed by the first signal of a burst. Both call `fire()`, which is
 * the only place a trigger is decided. Signals that arrive while a sync is
 * running are folded into a single follow-up that starts as soon as the
 * running one settles.
 */
export class SyncDebouncer {
  private readonly debounceMs: number;
  private readonly maxWaitMs: number;
  private readonly onTrigger: (reason: TriggerReason) => Promise<void>;

  private quietTimer: NodeJS.Timeout | null = null;
  private deadlineTimer: NodeJS.Timeout | null = null;
  private burstStartedAt: number | null = null;
  private burstSignals = 0;
  private inFlight: Promise<void> | null = null;
  private signalledDuringSync = false;
  private cancelled = false;
  private triggerCount = 0;

  constructor(options: SyncDebouncerOptions) {
    this.debounceMs = options.debounceMs;
    this.maxWaitMs = options.maxWaitMs;
    this.onTrigger = options.onTrigger;
  }

  /**
   * Record activity. Cheap and synchronous; safe to call for every event.
   */
  signal(activity?: ActivitySignal): void {
    if (this.cancelled) {
      return;
    }

    if (activity) {
      logger.debug(`Activity (${activity.kind}): ${activity.path}`);
    }

    if (this.inFlight) {
      this.signalledDuringSync = true;
      return;
    }

    this.burstSignals++;

    if (this.burstStartedAt === null) {
      this.burstStartedAt = Date.now();
      this.deadlineTimer = setTimeout(() => this.fire('max-wait'), this.maxWaitMs);
    }

    if (this.quietTimer !== null) {
      clearTimeout(this.quietTimer);
    }
    this.quietTimer = setTimeout(() => this.fire('quiet'), this.debounceMs);
  }

  /**
   * Fire the pending trigger now instead of waiting for a timer.
   */
  flush(): void {
    if (this.burstStartedAt !== null) {
      this.fire('flush');
    }
  }

  /**
   * Drop pending timers and any queued follow-up. A sync that is already
   * running is left alone; await `idle()` to wait for it.
   */
  cancel(): void {
    this.cancelled = true;
    this.signalledDuringSync = false;
    this.resetBurst();
  }

  /**
   * True while a burst is being timed or a follow-up is queued.
   */
  pending(): boolean {
    return this.burstStartedAt !== null || this.signalledDuringSync;
  }

  public get syncing(): boolean {
    return this.inFlight !== null;
  }

  public get triggers(): number {
    return this.triggerCount;
  }

  /**
   * Resolves once no triggered sync is running, follow-ups included.
   */
  async idle(): Promise<void> {
    while (this.inFlight) {
      await this.inFlight;
    }
  }

  private fire(reason: TriggerReason): void {
    const startedAt = this.burstStartedAt;
    const signals = this.burstSignals;
    this.resetBurst();

    if (this.cancelled) {
      return;
    }

    if (this.inFlight) {
      this.signalledDuringSync = true;
      return;
    }

    this.triggerCount++;
    if (reason === 'max-wait') {
      logger.info(`Max wait of ${formatDuration(this.maxWaitMs)} exceeded, forcing sync (${signals} changes)`);
    }
    else if (reason === 'follow-up') {
      logger.info('Changes arrived during the last sync, syncing again');
    }
    else {
      const waited = startedAt === null ? 0 : Date.now() - startedAt;
      logger.info(`Quiet period reached, triggering sync (${signals} changes over ${formatDuration(waited)})`);
    }

    this.inFlight = this.execute(reason);
  }

  private async execute(reason: TriggerReason): Promise<void> {
    // fire() must have stored this promise in inFlight before the finally
    // below clears it, even when onTrigger throws synchronously
    await Promise.resolve();
    try {
      await this.onTrigger(reason);
    }
    catch (error) {
      logger.error(`Triggered sync failed: ${errorMessage(error)}`);
    }
    finally {
      this.inFlight = null;
      if (this.signalledDuringSync && !this.cancelled) {
        this.signalledDuringSync = false;
        this.fire('follow-up');
      }
    }
  }

  private resetBurst(): void {
    if (this.quietTimer !== null) {
      clearTimeout(this.quietTimer);
      this.quietTimer = null;
    }
    if (this.deadlineTimer !== null) {
      clearTimeout(this.deadlineTimer);
      this.deadlineTimer = null;
    }
    this.burstStartedAt = null;
    this.burstSignals = 0;
  }
}
