import { z } from 'zod';
import type { LLMClient, LLMRequest, LLMResponse } from './llm-types';
import { CircuitBreaker, CircuitOpenError } from './circuit-breaker';
import { AppError } from '../../shared/errors/app-error';
import { abortReason, retry } from '../../shared/async/resilience';
import { logger } from '../../shared/logging/logger';

export interface OpenAICompatibleConfig {
  baseUrl: string;
  model: string;
  apiKey?: string;
  temperature?: number;
  timeoutMs?: number;
  maxRetries?: number;
  retryBaseDelayMs?: number;
}

interface ChatCompletionPayload {
  model: string;
  messages: LLMRequest['messages'];
  temperature: number;
  max_tokens?: number;
  response_format?: { type: 'json_object' };
}

const chatCompletionSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z
          .object({
            content: z.string().nullable().optional(),
          })
          .optional(),
      }),
    )
    .default([]),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
    })
    .optional(),
});

class ChatCompletionHttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = 'ChatCompletionHttpError';
  }
}

function assertSafeBaseUrl(rawBaseUrl: string): string {
  const trimmed = rawBaseUrl.trim().replace(/\/$/, '').replace(/\/chat\/completions$/, '');
  const parsed = new URL(trimmed);
  if (parsed.protocol !== 'https:') {
    throw new Error('LLM base URL must use HTTPS.');
  }
  return parsed.toString().replace(/\/$/, '');
}

/**
 * Merge every system message into one leading block; some compatible
 * endpoints drop or reject system turns after the first.
 */
function collapseSystemMessages(messages: LLMRequest['messages']): LLMRequest['messages'] {
  const systemParts: string[] = [];
  const rest: LLMRequest['messages'] = [];
  for (const message of messages) {
    if (message.role === 'system') {
      const text = message.content.trim();
      if (text.length > 0) systemParts.push(text);
      continue;
    }
    rest.push({ ...message });
  }
  if (systemParts.length === 0) return rest;
  return [{ role: 'system', content: systemParts.join('\n\n') }, ...rest];
}

function isRetryableLlmError(error: unknown): boolean {
  if (error instanceof CircuitOpenError) return false;
  if (error instanceof ChatCompletionHttpError) {
    return error.status === 408 || error.status === 429 || error.status >= 500;
  }
  return true;
}

/** Chat client for any OpenAI-compatible `/chat/completions` endpoint. */
export class OpenAICompatibleClient implements LLMClient {
  private readonly config: Required<Omit<OpenAICompatibleConfig, 'apiKey'>> & { apiKey?: string };
  private readonly breaker: CircuitBreaker;

  constructor(config: OpenAICompatibleConfig) {
    this.config = {
      baseUrl: assertSafeBaseUrl(config.baseUrl),
      model: config.model,
      apiKey: config.apiKey,
      temperature: config.temperature ?? 0.5,
      timeoutMs: config.timeoutMs ?? 120000,
      maxRetries: config.maxRetries ?? 2,
      retryBaseDelayMs: config.retryBaseDelayMs ?? 500,
    };
    this.breaker = new CircuitBreaker({ failureThreshold: 5, resetTimeoutMs: 60000 });
  }

  async chat(request: LLMRequest): Promise<LLMResponse> {
    const model = (request.model ?? this.config.model).trim();
    const payload: ChatCompletionPayload = {
      model,
      messages: collapseSystemMessages(request.messages),
      temperature: request.temperature ?? this.config.temperature,
      max_tokens: request.maxTokens,
      response_format: request.responseFormat === 'json_object' ? { type: 'json_object' } : undefined,
    };

    logger.debug({ model, messageCount: payload.messages.length }, '[LLM] Request');

    try {
      return await retry(
        () =>
          this.breaker.execute(
            () => this.post(payload, request),
            () => !request.signal?.aborted,
          ),
        {
          retries: this.config.maxRetries,
          baseDelayMs: this.config.retryBaseDelayMs,
          operationName: `llm:${model}`,
          signal: request.signal,
          shouldRetry: isRetryableLlmError,
          onRetry: (error, attempt, delayMs) => {
            logger.warn(
              { attempt, delayMs, error: error instanceof Error ? error.message : String(error) },
              '[LLM] Retry',
            );
          },
        },
      );
    } catch (error) {
      if (request.signal?.aborted) throw abortReason(request.signal, `llm:${model}`);
      logger.error({ err: error, model }, '[LLM] Failed after retries');
      throw error;
    }
  }

  private async post(payload: ChatCompletionPayload, request: LLMRequest): Promise<LLMResponse> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    const apiKey = request.apiKey ?? this.config.apiKey;
    if (apiKey) {
      headers['Authorization'] = `Bearer ${apiKey}`;
    }

    const controller = new AbortController();
    const timeout = request.timeout ?? this.config.timeoutMs;
    const timer = setTimeout(() => controller.abort(), timeout);
    const onCallerAbort = () => controller.abort();
    request.signal?.addEventListener('abort', onCallerAbort, { once: true });

    let response: Response;
    try {
      response = await fetch(`${this.config.baseUrl}/chat/completions`, {
        method: 'POST',
        headers,
        body: JSON.stringify(payload),
        signal: controller.signal,
      });
    } catch (error) {
      if (controller.signal.aborted && !request.signal?.aborted) {
        throw new AppError('TIMEOUT', `LLM request timed out after ${timeout}ms`, error);
      }
      throw error;
    } finally {
      clearTimeout(timer);
      request.signal?.removeEventListener('abort', onCallerAbort);
    }

    if (!response.ok) {
      const text = await response.text();
      logger.warn({ status: response.status, model: payload.model }, '[LLM] API error');
      throw new ChatCompletionHttpError(
        response.status,
        `LLM API error: ${response.status} ${response.statusText} - ${text.slice(0, 200)}`,
      );
    }

    const parsed = chatCompletionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new AppError('PROVIDER_ERROR', 'LLM response did not match the chat completion shape', parsed.error);
    }

    const data = parsed.data;
    return {
      content: data.choices[0]?.message?.content ?? '',
      model: data.model,
      usage: data.usage
        ? { promptTokens: data.usage.prompt_tokens, completionTokens: data.usage.completion_tokens }
        : undefined,
    };
  }
}
