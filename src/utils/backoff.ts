export interface BackoffOptions {
  initialDelay?: number;
  maxDelay?: number;
  factor?: number;
  jitter?: boolean;
}

/**
 * Exponential delay sequence for re-trying an operation that has no natural
 * retry trigger of its own (watch registration, for instance).
 */
export class Backoff {
  private readonly initialDelay: number;
  private readonly maxDelay: number;
  private readonly factor: number;
  private readonly jitter: boolean;
  private attempt = 0;

  constructor(options: BackoffOptions = {}) {
    this.initialDelay = options.initialDelay ?? 1000;
    this.maxDelay = options.maxDelay ?? 60000;
    this.factor = options.factor ?? 2;
    this.jitter = options.jitter !== false;
  }

  /**
   * Delay before the next attempt, in milliseconds. Advances the sequence.
   */
  public next(): number {
    const delay = this.calculateDelay(this.attempt);
    this.attempt++;
    return delay;
  }

  public reset(): void {
    this.attempt = 0;
  }

  public get attempts(): number {
    return this.attempt;
  }

  private calculateDelay(attempt: number): number {
    let delay = Math.min(
      this.initialDelay * this.factor ** attempt,
      this.maxDelay,
    );

    if (this.jitter) {
      // Add random jitter (±25%)
      const jitterAmount = delay * 0.25;
      delay = delay + (Math.random() * 2 - 1) * jitterAmount;
    }

    return Math.round(delay);
  }
}
