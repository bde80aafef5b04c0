import type { LLMClient } from '../llm/llm-types';
import { abortReason } from '../../shared/async/resilience';
import { logger } from '../../shared/logging/logger';

export interface GoalSummarizerOptions {
  client: LLMClient;
  model?: string;
  /** Results shorter than this are observed as-is. */
  minChars: number;
  /** Serialized payload budget sent to the model. */
  maxInputChars?: number;
  timeoutMs?: number;
}

export interface SummaryOutcome {
  digest: string;
  summarized: boolean;
}

const SYSTEM_PROMPT = [
  'You condense raw chemistry and biology tool output for a research agent.',
  'Keep every number, identifier, assay name and unit that bears on the goal.',
  'Drop everything unrelated to the goal. Do not speculate beyond the data.',
  'Answer in plain text, at most a few short paragraphs.',
].join(' ');

export function serializeToolResult(result: unknown): string {
  if (typeof result === 'string') return result;
  try {
    return JSON.stringify(result) ?? String(result);
  } catch {
    return '[unserializable tool result]';
  }
}

/**
 * Compress a tool result toward the calling agent's goal with one cheap
 * model call. Model failures fall back to the raw serialized result; only an
 * abort from the caller propagates.
 */
export class GoalDirectedSummarizer {
  private readonly maxInputChars: number;

  constructor(private readonly options: GoalSummarizerOptions) {
    this.maxInputChars = options.maxInputChars ?? 24_000;
  }

  async summarize(rawResult: unknown, goal: string, signal?: AbortSignal): Promise<SummaryOutcome> {
    const raw = serializeToolResult(rawResult);
    if (raw.length < this.options.minChars) {
      return { digest: raw, summarized: false };
    }

    const payload = raw.length > this.maxInputChars ? `${raw.slice(0, this.maxInputChars)}\n[truncated]` : raw;

    try {
      const response = await this.options.client.chat({
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: `Goal: ${goal}\n\nTool output:\n${payload}` },
        ],
        model: this.options.model,
        temperature: 0.1,
        timeout: this.options.timeoutMs,
        signal,
      });

      const digest = response.content.trim();
      if (digest.length === 0 || digest.length >= raw.length) {
        logger.debug({ rawChars: raw.length, digestChars: digest.length }, '[Summarizer] Digest not smaller; using raw result');
        return { digest: raw, summarized: false };
      }
      return { digest, summarized: true };
    } catch (error) {
      if (signal?.aborted) throw abortReason(signal, 'summarize');
      logger.warn({ err: error, goal }, '[Summarizer] Model call failed; using raw result');
      return { digest: raw, summarized: false };
    }
  }
}
