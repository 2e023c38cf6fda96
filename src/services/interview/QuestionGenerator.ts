/**
 * Turns plan items into spoken question text. Literal prompts pass through;
 * generated prompts ask the LLM for one question on the topic and fall back to
 * a deterministic question when the LLM is missing, slow or unusable.
 */

import type { ILLMService } from '../../ai/llm';
import { SYSTEM_PROMPT_QUESTION, buildQuestionPrompt, stripCodeFences } from '../../ai/prompts';
import type { PlanItem } from '../../types';
import type { Clock } from './Clock';
import { runCancellable } from './cancellation';

export interface GeneratedQuestion {
  text: string;
  /** False when the fallback question was used */
  generated: boolean;
  error?: string;
}

export function fallbackQuestion(topic: string): string {
  return `Let's talk about ${topic}. Can you walk me through your experience with it?`;
}

function parseQuestion(raw: string): string | null {
  const cleaned = stripCodeFences(raw);
  try {
    const parsed: unknown = JSON.parse(cleaned);
    if (typeof parsed === 'object' && parsed !== null && 'question' in parsed && typeof parsed.question === 'string') {
      return parsed.question.trim() || null;
    }
    return null;
  } catch {
    // Plain text instead of JSON; use it if it reads like a question.
    return cleaned.length > 15 && !cleaned.startsWith('{') ? cleaned : null;
  }
}

export class QuestionGenerator {
  constructor(
    private readonly llm: ILLMService | null,
    private readonly clock: Clock,
    private readonly timeoutMs: number
  ) {}

  async questionFor(item: PlanItem, signal: AbortSignal): Promise<GeneratedQuestion> {
    const prompt = item.prompt;
    if (prompt.kind === 'text') return { text: prompt.text, generated: false };

    const fallback = fallbackQuestion(prompt.topic);
    const llm = this.llm;
    if (!llm) return { text: fallback, generated: false };

    const minutes = Math.max(1, Math.round(item.targetMs / 60000));
    const outcome = await runCancellable(this.clock, { timeoutMs: this.timeoutMs, signal }, (s) =>
      llm.chat(
        [
          { role: 'system', content: SYSTEM_PROMPT_QUESTION },
          { role: 'user', content: buildQuestionPrompt(prompt.topic, prompt.hint, minutes) },
        ],
        { temperature: 0.4, maxTokens: 120, json: true, signal: s }
      )
    );

    switch (outcome.status) {
      case 'ok': {
        const text = parseQuestion(outcome.value.content);
        return text ? { text, generated: true } : { text: fallback, generated: false, error: 'unusable generator output' };
      }
      case 'timeout':
        return { text: fallback, generated: false, error: `generation timed out after ${outcome.timeoutMs}ms` };
      case 'failed':
        return { text: fallback, generated: false, error: outcome.error.message };
      case 'cancelled':
        return { text: fallback, generated: false };
    }
  }
}
