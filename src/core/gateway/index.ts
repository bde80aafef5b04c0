import type { AppConfig } from '../../shared/config/env';
import { SlidingWindowRateLimiter, type RateLimitRule } from './rateLimiter';
import { ToolResultCache } from './toolCache';
import { ToolGateway } from './toolGateway';
import { ToolRegistry, type ProviderName } from './toolRegistry';

export { ToolGateway } from './toolGateway';
export type { InvokeOptions, ToolInvocationResult, ToolGatewayStats } from './toolGateway';
export { ToolRegistry } from './toolRegistry';
export type { CapabilityDescriptor, ProviderName, ToolExecutionContext } from './toolRegistry';
export { ProviderCallError } from './providerErrors';

export function rateLimitRulesFromConfig(config: AppConfig): Record<ProviderName, RateLimitRule> {
  return {
    chembl: { maxCalls: config.CHEMBL_RATE_LIMIT_MAX, windowMs: config.CHEMBL_RATE_LIMIT_WINDOW_MS },
    pubchem: { maxCalls: config.PUBCHEM_RATE_LIMIT_MAX, windowMs: config.PUBCHEM_RATE_LIMIT_WINDOW_MS },
    pubmed: { maxCalls: config.PUBMED_RATE_LIMIT_MAX, windowMs: config.PUBMED_RATE_LIMIT_WINDOW_MS },
    web: { maxCalls: config.WEB_RATE_LIMIT_MAX, windowMs: config.WEB_RATE_LIMIT_WINDOW_MS },
    lab: { maxCalls: config.LAB_RATE_LIMIT_MAX, windowMs: config.LAB_RATE_LIMIT_WINDOW_MS },
  };
}

/** Build the one gateway a process shares across every run. */
export function createToolGateway(config: AppConfig, registry: ToolRegistry = new ToolRegistry()): ToolGateway {
  return new ToolGateway({
    registry,
    cache: new ToolResultCache({
      ttlMs: config.TOOL_CACHE_TTL_SEC * 1000,
      maxEntries: config.TOOL_CACHE_MAX_ENTRIES,
    }),
    limiter: new SlidingWindowRateLimiter(rateLimitRulesFromConfig(config), {
      maxWaitMs: config.RATE_LIMIT_MAX_WAIT_MS,
    }),
    maxAttempts: config.PROVIDER_MAX_ATTEMPTS,
    baseDelayMs: config.PROVIDER_BASE_DELAY_MS,
    providerTimeoutMs: config.PROVIDER_TIMEOUT_MS,
  });
}
