/**
 * Coverage scoring: how much of what a question asks for the answer actually
 * covers. Pluggable behind CoverageScorer; the decision engine only sees a
 * number in [0, 1] and an optional follow-up suggestion.
 */

import type { ILLMService } from '../../ai/llm';
import { getLLMService } from '../../ai/llm';
import { SYSTEM_PROMPT_COVERAGE, buildCoveragePrompt, stripCodeFences } from '../../ai/prompts';
import type { Rubric } from '../../types';
import { ScoringFailureError } from './errors';

export interface ScoringRequest {
  question: string;
  transcript: string;
  rubric: Rubric;
}

export interface CoverageScore {
  /** 0 = nothing relevant, 1 = every expected point covered */
  coverage: number;
  followUpText?: string;
}

export interface CoverageScorer {
  score(request: ScoringRequest, signal: AbortSignal): Promise<CoverageScore>;
}

const STOP_WORDS = new Set([
  'the', 'and', 'for', 'with', 'that', 'this', 'from', 'your', 'you', 'how', 'what', 'why', 'when', 'are', 'was',
  'were', 'have', 'has', 'had', 'into', 'about', 'their', 'they', 'them', 'its', 'our', 'not', 'but', 'can', 'use',
]);

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[^\w\s]/g, ' ')
    .split(/\s+/)
    .filter((w) => w.length > 2 && !STOP_WORDS.has(w));
}

function clampUnit(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/**
 * Keyword overlap against the rubric's expected points. A point counts as
 * covered when at least half of its keywords show up in the transcript.
 * Without a rubric, coverage grows with answer length up to `minAnswerWords`.
 */
export class KeywordCoverageScorer implements CoverageScorer {
  constructor(private readonly minAnswerWords: number) {}

  async score(request: ScoringRequest): Promise<CoverageScore> {
    const words = new Set(tokenize(request.transcript));
    const points = request.rubric.expectedPoints.filter((p) => tokenize(p).length > 0);

    if (points.length === 0) {
      const wordCount = request.transcript.split(/\s+/).filter(Boolean).length;
      const coverage = this.minAnswerWords > 0 ? clampUnit(wordCount / this.minAnswerWords) : 1;
      return { coverage };
    }

    const missing: string[] = [];
    for (const point of points) {
      const keywords = tokenize(point);
      const hits = keywords.filter((k) => words.has(k)).length;
      if (hits * 2 < keywords.length) missing.push(point);
    }

    return {
      coverage: (points.length - missing.length) / points.length,
      followUpText: missing.length > 0 ? `Could you say a bit more about ${missing[0]}?` : undefined,
    };
  }
}

/** Asks the configured LLM for a coverage judgement in JSON. */
export class LLMCoverageScorer implements CoverageScorer {
  constructor(private readonly llm: ILLMService) {}

  async score(request: ScoringRequest, signal: AbortSignal): Promise<CoverageScore> {
    const response = await this.llm.chat(
      [
        { role: 'system', content: SYSTEM_PROMPT_COVERAGE },
        {
          role: 'user',
          content: buildCoveragePrompt(request.question, request.transcript, request.rubric.expectedPoints),
        },
      ],
      { temperature: 0.2, maxTokens: 200, json: true, signal }
    );
    return parseCoverageResponse(response.content);
  }
}

export function parseCoverageResponse(raw: string): CoverageScore {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFences(raw));
  } catch {
    throw new ScoringFailureError('Scorer returned invalid JSON');
  }
  if (typeof parsed !== 'object' || parsed === null || !('coverage' in parsed)) {
    throw new ScoringFailureError('Scorer response has no coverage field');
  }
  const coverage = Number(parsed.coverage);
  if (!Number.isFinite(coverage)) {
    throw new ScoringFailureError('Scorer coverage is not a number');
  }
  const followUp = 'followUp' in parsed && typeof parsed.followUp === 'string' ? parsed.followUp.trim() : '';
  return { coverage: clampUnit(coverage), followUpText: followUp || undefined };
}

export function createCoverageScorer(minAnswerWords: number): CoverageScorer {
  const llm = getLLMService();
  return llm ? new LLMCoverageScorer(llm) : new KeywordCoverageScorer(minAnswerWords);
}
