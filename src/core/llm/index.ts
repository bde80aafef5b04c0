import type { AppConfig } from '../../shared/config/env';
import type { LLMClient } from './llm-types';
import { OpenAICompatibleClient } from './openai-client';

export type { LLMClient, LLMChatMessage, LLMRequest, LLMResponse } from './llm-types';

export interface LLMClientOptions {
  model?: string;
}

export function createLLMClient(config: AppConfig, opts: LLMClientOptions = {}): LLMClient {
  return new OpenAICompatibleClient({
    baseUrl: config.LLM_BASE_URL,
    apiKey: config.LLM_API_KEY,
    model: opts.model ?? config.CHAT_MODEL,
    temperature: config.LLM_TEMPERATURE,
    timeoutMs: config.LLM_TIMEOUT_MS,
    maxRetries: config.LLM_MAX_RETRIES,
  });
}
