export type CircuitState = 'closed' | 'open' | 'half_open';

export interface CircuitBreakerOptions {
  failureThreshold: number;
  resetTimeoutMs: number;
}

export class CircuitOpenError extends Error {
  constructor(readonly retryAfterMs: number) {
    super(`Circuit open; retry after ${retryAfterMs}ms`);
    this.name = 'CircuitOpenError';
  }
}

/**
 * Stop calling a failing dependency after `failureThreshold` consecutive
 * failures; allow one trial call once `resetTimeoutMs` has passed.
 */
export class CircuitBreaker {
  private state: CircuitState = 'closed';
  private consecutiveFailures = 0;
  private openedAt = 0;

  constructor(private readonly options: CircuitBreakerOptions) {
    if (!Number.isInteger(options.failureThreshold) || options.failureThreshold < 1) {
      throw new RangeError('failureThreshold must be a positive integer');
    }
  }

  getState(): CircuitState {
    if (this.state === 'open' && Date.now() - this.openedAt >= this.options.resetTimeoutMs) {
      this.state = 'half_open';
    }
    return this.state;
  }

  /**
   * Run `operation` unless the circuit is open. Errors rejected by
   * `isFailure` (e.g. caller cancellation) pass through without counting.
   */
  async execute<T>(operation: () => Promise<T>, isFailure: (error: unknown) => boolean = () => true): Promise<T> {
    const state = this.getState();
    if (state === 'open') {
      throw new CircuitOpenError(Math.max(0, this.openedAt + this.options.resetTimeoutMs - Date.now()));
    }

    try {
      const result = await operation();
      this.consecutiveFailures = 0;
      this.state = 'closed';
      return result;
    } catch (error) {
      if (!isFailure(error)) throw error;
      this.consecutiveFailures += 1;
      if (state === 'half_open' || this.consecutiveFailures >= this.options.failureThreshold) {
        this.state = 'open';
        this.openedAt = Date.now();
      }
      throw error;
    }
  }
}
