import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CircuitBreaker, CircuitOpenError } from '../../../src/core/llm/circuit-breaker';

const fail = () => Promise.reject(new Error('upstream 500'));

describe('CircuitBreaker', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('opens after consecutive failures and rejects without calling', async () => {
    const breaker = new CircuitBreaker({ failureThreshold: 2, resetTimeoutMs: 1000 });
    const operation = vi.fn(fail);

    await expect(breaker.execute(operation)).rejects.toThrow('upstream 500');
    await expect(breaker.execute(operation)).rejects.toThrow('upstream 500');
    expect(breaker.getState()).toBe('open');

    vi.setSystemTime(400);
    const rejected = breaker.execute(operation);
    await expect(rejected).rejects.toBeInstanceOf(CircuitOpenError);
    await expect(rejected).rejects.toThrow('Circuit open; retry after 600ms');
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('closes again after a successful trial call', async () => {
    const breaker = new CircuitBreaker({ failureThreshold: 1, resetTimeoutMs: 1000 });
    await expect(breaker.execute(fail)).rejects.toThrow('upstream 500');

    vi.setSystemTime(1000);
    expect(breaker.getState()).toBe('half_open');

    await expect(breaker.execute(async () => 'trial ok')).resolves.toBe('trial ok');
    expect(breaker.getState()).toBe('closed');
  });

  it('reopens when the trial call fails', async () => {
    const breaker = new CircuitBreaker({ failureThreshold: 3, resetTimeoutMs: 1000 });
    for (let i = 0; i < 3; i++) {
      await expect(breaker.execute(fail)).rejects.toThrow('upstream 500');
    }

    vi.setSystemTime(1500);
    await expect(breaker.execute(fail)).rejects.toThrow('upstream 500');
    expect(breaker.getState()).toBe('open');
  });

  it('does not count errors the caller marks as non-failures', async () => {
    const breaker = new CircuitBreaker({ failureThreshold: 1, resetTimeoutMs: 1000 });
    const cancelled = () => Promise.reject(new Error('cancelled'));

    await expect(breaker.execute(cancelled, () => false)).rejects.toThrow('cancelled');
    await expect(breaker.execute(cancelled, () => false)).rejects.toThrow('cancelled');
    expect(breaker.getState()).toBe('closed');

    await expect(breaker.execute(async () => 'ok')).resolves.toBe('ok');
  });
});
