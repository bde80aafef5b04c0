import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { vi } from 'vitest';
import { SlidingWindowRateLimiter } from '../../../src/core/gateway/rateLimiter';

describe('SlidingWindowRateLimiter', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  const twoPerTenSeconds = (maxWaitMs: number) =>
    new SlidingWindowRateLimiter(
      { chembl: { maxCalls: 2, windowMs: 10_000 }, pubchem: { maxCalls: 1, windowMs: 10_000 } },
      { maxWaitMs },
    );

  it('holds the third call in a window until the oldest admission expires', async () => {
    const limiter = twoPerTenSeconds(30_000);
    await limiter.acquire('chembl');
    await limiter.acquire('chembl');

    let admitted = false;
    const third = limiter.acquire('chembl').then(() => {
      admitted = true;
    });
    expect(limiter.inspect('chembl')).toEqual({ admittedInWindow: 2, waiting: 1 });

    await vi.advanceTimersByTimeAsync(9_999);
    expect(admitted).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    await third;
    expect(admitted).toBe(true);
    expect(limiter.inspect('chembl')).toEqual({ admittedInWindow: 1, waiting: 0 });
  });

  it('fails with RATE_LIMIT_EXCEEDED once the max wait elapses', async () => {
    const limiter = twoPerTenSeconds(5_000);
    await limiter.acquire('chembl');
    await limiter.acquire('chembl');

    const third = limiter.acquire('chembl');
    const assertion = expect(third).rejects.toMatchObject({
      code: 'RATE_LIMIT_EXCEEDED',
      message: 'Rate limit for "chembl" not available within 5000ms',
      details: { rateLimitClass: 'chembl', maxWaitMs: 5000 },
    });
    await vi.advanceTimersByTimeAsync(5_000);
    await assertion;
    expect(limiter.inspect('chembl').waiting).toBe(0);
  });

  it('rejects immediately when no wait is allowed', async () => {
    const limiter = twoPerTenSeconds(30_000);
    await limiter.acquire('pubchem');

    await expect(limiter.acquire('pubchem', { maxWaitMs: 0 })).rejects.toMatchObject({ code: 'RATE_LIMIT_EXCEEDED' });
  });

  it('admits waiters in arrival order', async () => {
    const limiter = twoPerTenSeconds(60_000);
    const order: string[] = [];
    await limiter.acquire('pubchem');
    const b = limiter.acquire('pubchem').then(() => order.push('b'));
    const c = limiter.acquire('pubchem').then(() => order.push('c'));

    await vi.advanceTimersByTimeAsync(10_000);
    expect(order).toEqual(['b']);

    await vi.advanceTimersByTimeAsync(10_000);
    await Promise.all([b, c]);
    expect(order).toEqual(['b', 'c']);
  });

  it('keeps classes independent', async () => {
    const limiter = twoPerTenSeconds(0);
    await limiter.acquire('pubchem');

    await expect(limiter.acquire('chembl')).resolves.toBeUndefined();
    expect(limiter.inspect('pubchem')).toEqual({ admittedInWindow: 1, waiting: 0 });
  });

  it('rejects a queued waiter when its signal aborts', async () => {
    const limiter = twoPerTenSeconds(30_000);
    await limiter.acquire('pubchem');
    const controller = new AbortController();

    const waiting = limiter.acquire('pubchem', { signal: controller.signal });
    controller.abort();

    await expect(waiting).rejects.toMatchObject({ code: 'TIMEOUT', message: 'rate-limit:pubchem was aborted' });
    expect(limiter.inspect('pubchem').waiting).toBe(0);
    limiter.dispose();
  });
});
