export type LLMRole = 'system' | 'user' | 'assistant';

export interface LLMChatMessage {
  role: LLMRole;
  content: string;
}

export interface LLMRequest {
  messages: LLMChatMessage[];
  model?: string;
  apiKey?: string;
  temperature?: number;
  maxTokens?: number;
  /** Per-request timeout in ms; falls back to the client default. */
  timeout?: number;
  responseFormat?: 'json_object' | 'text';
  signal?: AbortSignal;
}

export interface LLMUsage {
  promptTokens?: number;
  completionTokens?: number;
}

export interface LLMResponse {
  content: string;
  model?: string;
  usage?: LLMUsage;
}

/** The reasoning-model collaborator: one `chat` call per THINKING step, summary or fusion. */
export interface LLMClient {
  chat(request: LLMRequest): Promise<LLMResponse>;
}
