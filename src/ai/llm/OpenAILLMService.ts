import OpenAI from 'openai';
import type { ILLMService, LLMMessage, LLMOptions, LLMResponse } from './types';
import { config } from '../../config';

export class OpenAILLMService implements ILLMService {
  private openai: OpenAI;

  constructor(
    apiKey: string = config.ai.openaiApiKey,
    private readonly model: string = config.ai.openaiModel
  ) {
    // Timeouts and retries belong to the orchestrator's call runner.
    this.openai = new OpenAI({ apiKey, maxRetries: 0 });
  }

  async chat(messages: LLMMessage[], options?: LLMOptions): Promise<LLMResponse> {
    const completion = await this.openai.chat.completions.create(
      {
        model: this.model,
        messages: messages.map((m) => ({ role: m.role, content: m.content })),
        temperature: options?.temperature ?? config.ai.defaultTemperature,
        max_tokens: options?.maxTokens ?? 512,
        ...(options?.json ? { response_format: { type: 'json_object' as const } } : {}),
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
  }
}
