/**
 * Follow-Up Decision Engine: after each answer, decide whether to move on,
 * probe once more, or move on because the item is out of time. Holds no
 * session state; everything comes in through DecisionInput. A failed or slow
 * scoring call never blocks the session: it fails open to `advance`.
 */

import type { BudgetState, Decision, PlanItem } from '../../types';
import { logger } from '../../config/logger';
import type { Clock } from './Clock';
import type { CoverageScorer } from './CoverageScorer';
import { runCancellable } from './cancellation';

/** Transcript recorded when no usable answer was captured. */
export const NO_ANSWER = '[no answer]';

export function isNoAnswer(transcript: string): boolean {
  return transcript === NO_ANSWER || transcript.trim() === '';
}

export interface DecisionSettings {
  coverageThreshold: number;
  maxDepth: number;
  minCostMs: number;
  scoringTimeoutMs: number;
}

export interface DecisionInput {
  item: PlanItem;
  question: string;
  transcript: string;
  /** Follow-ups already issued for this item */
  depth: number;
  itemElapsedMs: number;
  budget: BudgetState;
}

export type DecisionBasis = 'no_answer' | 'budget' | 'depth' | 'coverage' | 'scoring_failed';

export interface DecisionResult {
  decision: Decision;
  basis: DecisionBasis;
  coverage?: number;
  /** Set when scoring failed or timed out and the engine failed open */
  scoringError?: string;
}

const GENERIC_FOLLOW_UP = 'Could you walk me through a specific example of that?';

export class FollowUpDecisionEngine {
  constructor(
    private readonly scorer: CoverageScorer,
    private readonly clock: Clock,
    private readonly settings: DecisionSettings
  ) {}

  /** Time this item can still use, bounded by its maximum and by what later items need. */
  availableMs(input: Pick<DecisionInput, 'item' | 'itemElapsedMs' | 'budget'>): number {
    const itemLeft = input.item.maxMs - input.itemElapsedMs;
    const globalLeft = input.budget.remainingTotalMs - input.budget.pendingFloorMs;
    return Math.min(itemLeft, globalLeft);
  }

  async decide(input: DecisionInput, signal: AbortSignal): Promise<DecisionResult> {
    if (isNoAnswer(input.transcript)) {
      return { decision: { kind: 'force_advance' }, basis: 'no_answer' };
    }
    if (this.availableMs(input) < this.settings.minCostMs) {
      return { decision: { kind: 'force_advance' }, basis: 'budget' };
    }
    if (input.depth >= this.settings.maxDepth) {
      return { decision: { kind: 'advance' }, basis: 'depth' };
    }

    const outcome = await runCancellable(this.clock, { timeoutMs: this.settings.scoringTimeoutMs, signal }, (s) =>
      this.scorer.score({ question: input.question, transcript: input.transcript, rubric: input.item.rubric }, s)
    );

    switch (outcome.status) {
      case 'timeout':
      case 'failed':
      case 'cancelled': {
        const scoringError =
          outcome.status === 'timeout'
            ? `scoring timed out after ${outcome.timeoutMs}ms`
            : outcome.status === 'failed'
              ? outcome.error.message
              : 'scoring cancelled';
        if (outcome.status !== 'cancelled') {
          logger.warn('Coverage scoring unavailable; advancing', { itemId: input.item.id, reason: scoringError });
        }
        return { decision: { kind: 'advance' }, basis: 'scoring_failed', scoringError };
      }
      case 'ok': {
        const { coverage, followUpText } = outcome.value;
        if (coverage < this.settings.coverageThreshold) {
          const text = followUpText || input.item.followUpPrompt || GENERIC_FOLLOW_UP;
          return { decision: { kind: 'follow_up', text }, basis: 'coverage', coverage };
        }
        return { decision: { kind: 'advance' }, basis: 'coverage', coverage };
      }
    }
  }
}
