/**
 * Single LLM provider export. Prefers Open Router when OPENROUTER_API_KEY is set,
 * then OpenAI. Returns null when neither is configured so callers can pick a
 * non-LLM fallback.
 */
import type { ILLMService } from './types';
import { config } from '../../config';
import { OpenRouterLLMService } from './OpenRouterLLMService';
import { OpenAILLMService } from './OpenAILLMService';

let instance: ILLMService | null | undefined;

export function getLLMService(): ILLMService | null {
  if (instance === undefined) {
    if (config.ai.openRouterApiKey) {
      instance = new OpenRouterLLMService();
    } else if (config.ai.openaiApiKey) {
      instance = new OpenAILLMService();
    } else {
      instance = null;
    }
  }
  return instance;
}

export type { ILLMService, LLMMessage, LLMOptions, LLMResponse } from './types';
