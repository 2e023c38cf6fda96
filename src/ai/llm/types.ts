/**
 * LLM abstraction: provider-agnostic interface so scoring and question
 * generation can swap OpenAI/Open Router without changing callers.
 * Prompts request structured JSON and run at low temperature.
 */

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMOptions {
  temperature?: number;
  maxTokens?: number;
  /** Ask the provider for a JSON object response. */
  json?: boolean;
  /** Cancels the underlying HTTP request. */
  signal?: AbortSignal;
}

export interface LLMResponse {
  content: string;
  usage?: { promptTokens: number; completionTokens: number };
}

export interface ILLMService {
  chat(messages: LLMMessage[], options?: LLMOptions): Promise<LLMResponse>;
}
