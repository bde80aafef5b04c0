import { afterEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { ToolGateway } from '../../../src/core/gateway/toolGateway';
import { ToolRegistry, type ToolExecutionContext } from '../../../src/core/gateway/toolRegistry';
import { ToolResultCache } from '../../../src/core/gateway/toolCache';
import { SlidingWindowRateLimiter } from '../../../src/core/gateway/rateLimiter';
import { ProviderCallError } from '../../../src/core/gateway/providerErrors';

vi.mock('../../../src/shared/logging/logger', () => {
  const log = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  return { logger: log, childLogger: () => log };
});

type SearchArgs = { query: string; limit: number };
type Execute = (args: SearchArgs, ctx: ToolExecutionContext) => Promise<unknown>;

function buildGateway(
  execute: Execute,
  opts: {
    maxAttempts?: number;
    cacheable?: boolean;
    maxCalls?: number;
    windowMs?: number;
    maxWaitMs?: number;
    providerTimeoutMs?: number;
  } = {},
) {
  const registry = new ToolRegistry();
  registry.register({
    name: 'search_compounds',
    description: 'Search compounds by name',
    schema: z.object({ query: z.string().min(1), limit: z.number().int().default(5) }),
    sideEffect: 'read_only',
    provider: 'chembl',
    cacheable: opts.cacheable,
    execute,
  });
  return new ToolGateway({
    registry,
    cache: new ToolResultCache({ ttlMs: 60_000, maxEntries: 100 }),
    limiter: new SlidingWindowRateLimiter(
      { chembl: { maxCalls: opts.maxCalls ?? 100, windowMs: opts.windowMs ?? 60_000 } },
      { maxWaitMs: opts.maxWaitMs ?? 1_000 },
    ),
    maxAttempts: opts.maxAttempts ?? 3,
    baseDelayMs: 1,
    providerTimeoutMs: opts.providerTimeoutMs ?? 5_000,
  });
}

describe('ToolGateway', () => {
  it('serves a repeated call from cache without calling the provider again', async () => {
    const execute = vi.fn<Execute>().mockResolvedValue({ molecules: [{ chemblId: 'CHEMBL25' }] });
    const gateway = buildGateway(execute);

    const first = await gateway.invoke('search_compounds', { query: 'aspirin' });
    const second = await gateway.invoke('search_compounds', { query: 'aspirin' });

    expect(first).toMatchObject({ cached: false, attempts: 1 });
    expect(second).toMatchObject({ cached: true, attempts: 0, result: { molecules: [{ chemblId: 'CHEMBL25' }] } });
    expect(execute).toHaveBeenCalledTimes(1);
    expect(gateway.stats()).toEqual({ providerCalls: 1, cacheHits: 1, inFlightJoins: 0, cacheSize: 1 });
  });

  it('treats argument key order and defaults as the same call', async () => {
    const execute = vi.fn<Execute>().mockResolvedValue({ molecules: [] });
    const gateway = buildGateway(execute);

    await gateway.invoke('search_compounds', { query: 'aspirin', limit: 5 });
    const again = await gateway.invoke('search_compounds', { limit: 5, query: 'aspirin' });
    const defaulted = await gateway.invoke('search_compounds', { query: 'aspirin' });

    expect(again.cached).toBe(true);
    expect(defaulted.cached).toBe(true);
    expect(execute).toHaveBeenCalledTimes(1);
  });

  it('joins identical concurrent calls onto one provider request', async () => {
    let release: (value: unknown) => void = () => undefined;
    const execute = vi.fn<Execute>(
      () =>
        new Promise((resolve) => {
          release = resolve;
        }),
    );
    const gateway = buildGateway(execute);

    const a = gateway.invoke('search_compounds', { query: 'aspirin' });
    const b = gateway.invoke('search_compounds', { query: 'aspirin' });
    await vi.waitFor(() => expect(execute).toHaveBeenCalledTimes(1));
    release({ molecules: ['shared'] });

    const [ra, rb] = await Promise.all([a, b]);
    expect(ra.result).toEqual({ molecules: ['shared'] });
    expect(rb.result).toEqual({ molecules: ['shared'] });
    expect(gateway.stats()).toMatchObject({ providerCalls: 1, inFlightJoins: 1 });
  });

  it('retries a transient provider failure', async () => {
    const execute = vi
      .fn<Execute>()
      .mockRejectedValueOnce(new ProviderCallError('HTTP 503 from ChEMBL', { status: 503 }))
      .mockResolvedValueOnce({ molecules: [] });
    const gateway = buildGateway(execute);

    const result = await gateway.invoke('search_compounds', { query: 'aspirin' });

    expect(result.attempts).toBe(2);
    expect(execute).toHaveBeenCalledTimes(2);
    expect(gateway.stats().providerCalls).toBe(2);
  });

  it('fails fast with PROVIDER_ERROR on a non-transient failure', async () => {
    const execute = vi.fn<Execute>().mockRejectedValue(new ProviderCallError('HTTP 401 from ChEMBL', { status: 401 }));
    const gateway = buildGateway(execute);

    await expect(gateway.invoke('search_compounds', { query: 'aspirin' })).rejects.toMatchObject({
      code: 'PROVIDER_ERROR',
      message: 'tool:search_compounds failed after 1 attempt',
    });
    expect(execute).toHaveBeenCalledTimes(1);
  });

  it('reports a refused request as INVALID_TOOL_CALL without retrying', async () => {
    const execute = vi
      .fn<Execute>()
      .mockRejectedValue(new ProviderCallError('HTTP 404 from ChEMBL', { status: 404 }));
    const gateway = buildGateway(execute, { maxAttempts: 3 });

    await expect(gateway.invoke('search_compounds', { query: 'CHEMBL0000' })).rejects.toMatchObject({
      code: 'INVALID_TOOL_CALL',
      message: 'search_compounds rejected the request: HTTP 404 from ChEMBL',
      details: { toolName: 'search_compounds', status: 404 },
    });
    expect(execute).toHaveBeenCalledTimes(1);
  });

  it('gives up after the attempt budget on repeated network errors', async () => {
    const execute = vi.fn<Execute>().mockRejectedValue(new TypeError('fetch failed'));
    const gateway = buildGateway(execute, { maxAttempts: 3 });

    await expect(gateway.invoke('search_compounds', { query: 'aspirin' })).rejects.toMatchObject({
      code: 'PROVIDER_ERROR',
      message: 'tool:search_compounds failed after 3 attempts',
      details: { attempts: 3 },
    });
    expect(execute).toHaveBeenCalledTimes(3);
  });

  it('does not cache failures', async () => {
    const execute = vi
      .fn<Execute>()
      .mockRejectedValueOnce(new ProviderCallError('HTTP 404', { status: 404 }))
      .mockResolvedValueOnce({ molecules: [] });
    const gateway = buildGateway(execute);

    await expect(gateway.invoke('search_compounds', { query: 'aspirin' })).rejects.toMatchObject({ code: 'INVALID_TOOL_CALL' });
    await expect(gateway.invoke('search_compounds', { query: 'aspirin' })).resolves.toMatchObject({ cached: false });
    expect(execute).toHaveBeenCalledTimes(2);
  });

  it('rejects invalid calls before touching the provider', async () => {
    const execute = vi.fn<Execute>().mockResolvedValue({});
    const gateway = buildGateway(execute);

    await expect(gateway.invoke('search_compounds', { query: '' })).rejects.toMatchObject({ code: 'INVALID_TOOL_CALL' });
    await expect(gateway.invoke('get_everything', {})).rejects.toMatchObject({ code: 'INVALID_TOOL_CALL' });
    expect(execute).not.toHaveBeenCalled();
  });

  it('always calls non-cacheable tools', async () => {
    const execute = vi.fn<Execute>().mockResolvedValue({ runs: [] });
    const gateway = buildGateway(execute, { cacheable: false });

    await gateway.invoke('search_compounds', { query: 'aspirin' });
    const second = await gateway.invoke('search_compounds', { query: 'aspirin' });

    expect(second.cached).toBe(false);
    expect(execute).toHaveBeenCalledTimes(2);
  });

  it('surfaces RATE_LIMIT_EXCEEDED without retrying', async () => {
    const execute = vi.fn<Execute>().mockResolvedValue({ molecules: [] });
    const gateway = buildGateway(execute, { maxCalls: 1, maxWaitMs: 0 });

    await gateway.invoke('search_compounds', { query: 'aspirin' });
    await expect(gateway.invoke('search_compounds', { query: 'ibuprofen' })).rejects.toMatchObject({
      code: 'RATE_LIMIT_EXCEEDED',
    });
    expect(execute).toHaveBeenCalledTimes(1);
  });

  it('treats a provider timeout as transient', async () => {
    const execute = vi.fn<Execute>(
      (_args, ctx) =>
        new Promise((_, reject) => {
          ctx.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        }),
    );
    const gateway = buildGateway(execute, { maxAttempts: 2, providerTimeoutMs: 20 });

    await expect(gateway.invoke('search_compounds', { query: 'aspirin' })).rejects.toMatchObject({
      code: 'PROVIDER_ERROR',
      message: 'tool:search_compounds failed after 2 attempts',
    });
    expect(execute).toHaveBeenCalledTimes(2);
  });

  it('stops when the caller aborts', async () => {
    const controller = new AbortController();
    controller.abort();
    const execute = vi.fn<Execute>().mockResolvedValue({});
    const gateway = buildGateway(execute);

    await expect(
      gateway.invoke('search_compounds', { query: 'aspirin' }, { signal: controller.signal }),
    ).rejects.toMatchObject({ code: 'TIMEOUT' });
    expect(execute).not.toHaveBeenCalled();
  });

  it('releases a joined caller as soon as its own signal aborts', async () => {
    let release: (value: unknown) => void = () => undefined;
    const execute = vi.fn<Execute>(
      () =>
        new Promise((resolve) => {
          release = resolve;
        }),
    );
    const gateway = buildGateway(execute);
    const controller = new AbortController();

    const leader = gateway.invoke('search_compounds', { query: 'aspirin' });
    const joiner = gateway.invoke('search_compounds', { query: 'aspirin' }, { signal: controller.signal });
    await vi.waitFor(() => expect(execute).toHaveBeenCalledTimes(1));
    controller.abort();

    await expect(joiner).rejects.toMatchObject({ code: 'TIMEOUT', message: 'tool:search_compounds was aborted' });

    release({ molecules: ['late'] });
    await expect(leader).resolves.toMatchObject({ result: { molecules: ['late'] } });
    expect(gateway.stats()).toMatchObject({ providerCalls: 1, inFlightJoins: 1 });
  });
});

describe('ToolGateway rate limiting', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('admits two of three concurrent calls at once and the third after the window', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
    const execute = vi.fn<Execute>(async (args) => ({ query: args.query }));
    const gateway = buildGateway(execute, { maxCalls: 2, windowMs: 10_000, maxWaitMs: 30_000 });

    const calls = ['aspirin', 'ibuprofen', 'naproxen'].map((query) => gateway.invoke('search_compounds', { query }));
    await vi.advanceTimersByTimeAsync(0);
    expect(execute).toHaveBeenCalledTimes(2);

    await vi.advanceTimersByTimeAsync(9_999);
    expect(execute).toHaveBeenCalledTimes(2);

    await vi.advanceTimersByTimeAsync(1);
    expect(execute).toHaveBeenCalledTimes(3);
    const results = await Promise.all(calls);
    expect(results.map((r) => r.result)).toEqual([{ query: 'aspirin' }, { query: 'ibuprofen' }, { query: 'naproxen' }]);
  });

  it('fails the third call with RATE_LIMIT_EXCEEDED when the wait budget is shorter than the window', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
    const execute = vi.fn<Execute>(async (args) => ({ query: args.query }));
    const gateway = buildGateway(execute, { maxCalls: 2, windowMs: 10_000, maxWaitMs: 5_000 });

    const [first, second, third] = ['aspirin', 'ibuprofen', 'naproxen'].map((query) =>
      gateway.invoke('search_compounds', { query }),
    );
    const rejected = expect(third).rejects.toMatchObject({
      code: 'RATE_LIMIT_EXCEEDED',
      message: 'Rate limit for "chembl" not available within 5000ms',
    });
    await vi.advanceTimersByTimeAsync(5_000);

    await rejected;
    await expect(first).resolves.toMatchObject({ attempts: 1 });
    await expect(second).resolves.toMatchObject({ attempts: 1 });
    expect(execute).toHaveBeenCalledTimes(2);
  });
});
