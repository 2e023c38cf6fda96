import OpenAI from 'openai';
import type { ILLMService, LLMMessage, LLMOptions, LLMResponse } from './types';
import { config } from '../../config';
import { logger } from '../../config/logger';

/**
 * LLM service using Open Router (https://openrouter.ai).
 * OpenAI-compatible API; preferred for scoring and question generation when OPENROUTER_API_KEY is set.
 */
export class OpenRouterLLMService implements ILLMService {
  private client: OpenAI;
  private authErrorLogged = false;

  constructor(
    apiKey: string = config.ai.openRouterApiKey,
    private readonly model: string = config.ai.openRouterModel
  ) {
    this.client = new OpenAI({
      apiKey,
      baseURL: 'https://openrouter.ai/api/v1',
      maxRetries: 0,
    });
  }

  async chat(messages: LLMMessage[], options?: LLMOptions): Promise<LLMResponse> {
    try {
      const completion = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: messages.map((m) => ({ role: m.role, content: m.content })),
          temperature: options?.temperature ?? config.ai.defaultTemperature,
          max_tokens: options?.maxTokens ?? 512,
        },
        { signal: options?.signal }
      );

      return {
        content: completion.choices[0]?.message?.content ?? '',
        usage: {
          promptTokens: completion.usage?.prompt_tokens ?? 0,
          completionTokens: completion.usage?.completion_tokens ?? 0,
        },
      };
    } catch (error) {
      if (error instanceof OpenAI.APIError && (error.status === 401 || error.status === 403) && !this.authErrorLogged) {
        this.authErrorLogged = true;
        logger.warn('OpenRouter auth failed (401/403). Scoring will fail open until OPENROUTER_API_KEY is fixed.');
      }
      throw error;
    }
  }
}
