import { AppError, isAppErrorCode } from '../../shared/errors/app-error';
import { raceAbort, retry } from '../../shared/async/resilience';
import { logger } from '../../shared/logging/logger';
import { isRejectedRequest, isTransientProviderError, ProviderCallError } from './providerErrors';
import { buildToolCacheKey, type ToolResultCache } from './toolCache';
import type { SlidingWindowRateLimiter } from './rateLimiter';
import type { BoundToolCall, RegisteredCapability, ToolCatalogEntry, ToolRegistry } from './toolRegistry';

export interface InvokeOptions {
  signal?: AbortSignal;
  /** Epoch ms; no retry is started after it. */
  deadlineAt?: number;
  traceId?: string;
}

export interface ToolInvocationResult {
  toolName: string;
  result: unknown;
  cached: boolean;
  latencyMs: number;
  /** Provider attempts made for this result; 0 when served from cache. */
  attempts: number;
}

export interface ToolGatewayStats {
  providerCalls: number;
  cacheHits: number;
  inFlightJoins: number;
  cacheSize: number;
}

export interface ToolGatewayOptions {
  registry: ToolRegistry;
  cache: ToolResultCache;
  limiter: SlidingWindowRateLimiter;
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  providerTimeoutMs: number;
}

interface ProviderOutcome {
  value: unknown;
  attempts: number;
}

/**
 * The single call surface between agents and capability providers.
 *
 * One instance owns the cache, the limiter and the in-flight table; every
 * agent of every concurrent run shares it.
 */
export class ToolGateway {
  private readonly inFlight = new Map<string, Promise<ProviderOutcome>>();
  private providerCalls = 0;
  private cacheHits = 0;
  private inFlightJoins = 0;

  constructor(private readonly options: ToolGatewayOptions) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new RangeError('maxAttempts must be a positive integer');
    }
  }

  get registry(): ToolRegistry {
    return this.options.registry;
  }

  async invoke(toolName: string, args: unknown, invokeOptions: InvokeOptions = {}): Promise<ToolInvocationResult> {
    const startedAt = Date.now();
    const { tool, call } = this.options.registry.validateToolCall({ name: toolName, args });

    if (tool.cacheable) {
      const hit = this.options.cache.get(toolName, call.args);
      if (hit) {
        this.cacheHits += 1;
        logger.debug({ toolName, traceId: invokeOptions.traceId }, '[Gateway] Cache hit');
        return { toolName, result: hit.value, cached: true, latencyMs: Date.now() - startedAt, attempts: 0 };
      }
    }

    const key = buildToolCacheKey(toolName, call.args);
    const outcome = await this.singleFlight(key, tool, call, invokeOptions);

    return {
      toolName,
      result: outcome.value,
      cached: false,
      latencyMs: Date.now() - startedAt,
      attempts: outcome.attempts,
    };
  }

  stats(): ToolGatewayStats {
    return {
      providerCalls: this.providerCalls,
      cacheHits: this.cacheHits,
      inFlightJoins: this.inFlightJoins,
      cacheSize: this.options.cache.size,
    };
  }

  describeTools(names: readonly string[]): ToolCatalogEntry[] {
    return this.options.registry.describeTools(names);
  }

  /** Fail queued admissions and drop expired cache entries. */
  dispose(): void {
    this.options.limiter.dispose();
    this.options.cache.prune();
  }

  private async singleFlight(
    key: string,
    tool: RegisteredCapability,
    call: BoundToolCall,
    invokeOptions: InvokeOptions,
  ): Promise<ProviderOutcome> {
    const existing = this.inFlight.get(key);
    if (existing) {
      this.inFlightJoins += 1;
      try {
        return await raceAbort(existing, invokeOptions.signal, `tool:${tool.name}`);
      } catch (error) {
        // The leader gave up on its own deadline; this caller still has time.
        const leaderAborted = isAppErrorCode(error, 'TIMEOUT') && !invokeOptions.signal?.aborted;
        if (!leaderAborted || this.inFlight.get(key) === existing) throw error;
        return this.singleFlight(key, tool, call, invokeOptions);
      }
    }

    const pending = this.callWithRetries(tool, call, invokeOptions);
    this.inFlight.set(key, pending);
    try {
      const outcome = await pending;
      if (tool.cacheable) {
        this.options.cache.set(tool.name, call.args, outcome.value);
      }
      return outcome;
    } finally {
      if (this.inFlight.get(key) === pending) {
        this.inFlight.delete(key);
      }
    }
  }

  private async callWithRetries(
    tool: RegisteredCapability,
    call: BoundToolCall,
    invokeOptions: InvokeOptions,
  ): Promise<ProviderOutcome> {
    const { signal, deadlineAt, traceId } = invokeOptions;
    let attempts = 0;

    const value = await retry(
      async () => {
        await this.options.limiter.acquire(tool.rateLimitClass, { signal });
        attempts += 1;
        this.providerCalls += 1;
        return this.callProvider(call, invokeOptions);
      },
      {
        retries: this.options.maxAttempts - 1,
        baseDelayMs: this.options.baseDelayMs,
        maxDelayMs: this.options.maxDelayMs,
        operationName: `tool:${tool.name}`,
        signal,
        deadlineAt,
        errorCode: 'PROVIDER_ERROR',
        shouldRetry: (error) => isTransientProviderError(error),
        onRetry: (error, attempt, delayMs) => {
          logger.warn(
            { toolName: tool.name, attempt, delayMs, traceId, error: error instanceof Error ? error.message : String(error) },
            '[Gateway] Provider call failed; retrying',
          );
        },
      },
    );

    return { value, attempts };
  }

  private async callProvider(call: BoundToolCall, invokeOptions: InvokeOptions): Promise<unknown> {
    const controller = new AbortController();
    const timeoutMs = this.options.providerTimeoutMs;
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    const callerSignal = invokeOptions.signal;
    const onCallerAbort = () => controller.abort(callerSignal?.reason);
    callerSignal?.addEventListener('abort', onCallerAbort, { once: true });

    try {
      return await call.run({ traceId: invokeOptions.traceId ?? 'untraced', signal: controller.signal });
    } catch (error) {
      if (controller.signal.aborted && !callerSignal?.aborted) {
        throw new ProviderCallError(`${call.toolName} timed out after ${timeoutMs}ms`, {
          transient: true,
          cause: error,
        });
      }
      // The agent chose bad arguments; let it see the refusal and correct itself.
      if (isRejectedRequest(error)) {
        throw new AppError('INVALID_TOOL_CALL', `${call.toolName} rejected the request: ${error.message}`, error, {
          toolName: call.toolName,
          status: error.status,
        });
      }
      if (error instanceof AppError || error instanceof ProviderCallError || error instanceof TypeError) {
        throw error;
      }
      throw new ProviderCallError(error instanceof Error ? error.message : String(error), {
        transient: false,
        cause: error,
      });
    } finally {
      clearTimeout(timer);
      callerSignal?.removeEventListener('abort', onCallerAbort);
    }
  }
}
