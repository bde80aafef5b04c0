import { AppError } from '../../shared/errors/app-error';
import { abortReason } from '../../shared/async/resilience';

export interface RateLimitRule {
  maxCalls: number;
  windowMs: number;
}

export interface AcquireOptions {
  signal?: AbortSignal;
  /** Overrides the limiter-wide max wait for this call. */
  maxWaitMs?: number;
}

interface Waiter {
  admit: () => void;
  fail: (error: AppError) => void;
}

interface ClassState {
  rule: RateLimitRule;
  admissions: number[];
  waiters: Waiter[];
  drainTimer?: NodeJS.Timeout;
}

function assertRule(name: string, rule: RateLimitRule): void {
  if (!Number.isInteger(rule.maxCalls) || rule.maxCalls < 1) {
    throw new RangeError(`Rate limit "${name}": maxCalls must be a positive integer`);
  }
  if (!Number.isFinite(rule.windowMs) || rule.windowMs <= 0) {
    throw new RangeError(`Rate limit "${name}": windowMs must be positive`);
  }
}

/**
 * Sliding-window admission per rate-limit class. Calls over the limit wait in
 * FIFO order until a slot frees, or fail with RATE_LIMIT_EXCEEDED once the
 * max wait elapses.
 */
export class SlidingWindowRateLimiter {
  private readonly states = new Map<string, ClassState>();
  private readonly maxWaitMs: number;
  private readonly defaultRule: RateLimitRule;

  constructor(
    rules: Record<string, RateLimitRule>,
    options: { maxWaitMs: number; defaultRule?: RateLimitRule },
  ) {
    this.maxWaitMs = options.maxWaitMs;
    this.defaultRule = options.defaultRule ?? { maxCalls: 5, windowMs: 1000 };
    assertRule('default', this.defaultRule);
    for (const [name, rule] of Object.entries(rules)) {
      assertRule(name, rule);
      this.states.set(name, { rule, admissions: [], waiters: [] });
    }
  }

  acquire(rateLimitClass: string, options: AcquireOptions = {}): Promise<void> {
    const { signal } = options;
    if (signal?.aborted) return Promise.reject(abortReason(signal, `rate-limit:${rateLimitClass}`));

    const state = this.stateFor(rateLimitClass);
    const now = Date.now();
    this.expire(state, now);

    if (state.waiters.length === 0 && state.admissions.length < state.rule.maxCalls) {
      state.admissions.push(now);
      return Promise.resolve();
    }

    const maxWaitMs = options.maxWaitMs ?? this.maxWaitMs;
    if (maxWaitMs <= 0) {
      return Promise.reject(this.exceeded(rateLimitClass, maxWaitMs));
    }

    return new Promise<void>((resolve, reject) => {
      let onAbort: (() => void) | undefined;
      const cleanup = () => {
        clearTimeout(waitTimer);
        if (onAbort) signal?.removeEventListener('abort', onAbort);
        const idx = state.waiters.indexOf(waiter);
        if (idx !== -1) state.waiters.splice(idx, 1);
      };
      const waiter: Waiter = {
        admit: () => {
          cleanup();
          resolve();
        },
        fail: (error) => {
          cleanup();
          reject(error);
          this.scheduleDrain(state);
        },
      };
      const waitTimer = setTimeout(() => waiter.fail(this.exceeded(rateLimitClass, maxWaitMs)), maxWaitMs);
      if (signal) {
        const abortSignal = signal;
        onAbort = () => waiter.fail(abortReason(abortSignal, `rate-limit:${rateLimitClass}`));
        abortSignal.addEventListener('abort', onAbort, { once: true });
      }
      state.waiters.push(waiter);
      this.scheduleDrain(state);
    });
  }

  /** Admissions inside the current window and queued waiters for a class. */
  inspect(rateLimitClass: string): { admittedInWindow: number; waiting: number } {
    const state = this.stateFor(rateLimitClass);
    this.expire(state, Date.now());
    return { admittedInWindow: state.admissions.length, waiting: state.waiters.length };
  }

  /** Reject every waiter and stop timers; used on shutdown. */
  dispose(): void {
    for (const [name, state] of this.states) {
      if (state.drainTimer) clearTimeout(state.drainTimer);
      state.drainTimer = undefined;
      for (const waiter of [...state.waiters]) {
        waiter.fail(new AppError('RATE_LIMIT_EXCEEDED', `Rate limiter for "${name}" was disposed`));
      }
    }
  }

  private stateFor(rateLimitClass: string): ClassState {
    let state = this.states.get(rateLimitClass);
    if (!state) {
      state = { rule: this.defaultRule, admissions: [], waiters: [] };
      this.states.set(rateLimitClass, state);
    }
    return state;
  }

  private expire(state: ClassState, now: number): void {
    const { windowMs } = state.rule;
    while (state.admissions.length > 0 && now - state.admissions[0] >= windowMs) {
      state.admissions.shift();
    }
  }

  private scheduleDrain(state: ClassState): void {
    if (state.drainTimer || state.waiters.length === 0) return;
    const now = Date.now();
    this.expire(state, now);
    const oldest = state.admissions[0];
    const delay = oldest === undefined ? 0 : Math.max(0, oldest + state.rule.windowMs - now);
    state.drainTimer = setTimeout(() => {
      state.drainTimer = undefined;
      this.drain(state);
    }, delay);
  }

  private drain(state: ClassState): void {
    const now = Date.now();
    this.expire(state, now);
    while (state.waiters.length > 0 && state.admissions.length < state.rule.maxCalls) {
      const waiter = state.waiters[0];
      state.admissions.push(now);
      waiter.admit();
    }
    this.scheduleDrain(state);
  }

  private exceeded(rateLimitClass: string, maxWaitMs: number): AppError {
    return new AppError(
      'RATE_LIMIT_EXCEEDED',
      `Rate limit for "${rateLimitClass}" not available within ${maxWaitMs}ms`,
      undefined,
      { rateLimitClass, maxWaitMs },
    );
  }
}
