/**
 * Shared domain types for the interview orchestrator.
 * Keeps the state machine, gateway, API and archive aligned on the same shapes.
 */

export type PlanItemStatus = 'pending' | 'active' | 'answered' | 'skipped';

/** Literal question text, or a topic the question generator turns into text at delivery time. */
export type QuestionPrompt = { kind: 'text'; text: string } | { kind: 'generated'; topic: string; hint?: string };

export interface Rubric {
  /** Points a complete answer is expected to touch on. */
  expectedPoints: string[];
  competencyIds: string[];
}

export interface PlanItem {
  id: string;
  topic: string;
  prompt: QuestionPrompt;
  rubric: Rubric;
  /** Used instead of a generic probe when the scorer suggests none */
  followUpPrompt?: string;
  minMs: number;
  targetMs: number;
  maxMs: number;
  weight: number;
  status: PlanItemStatus;
}

/** Plan item as handed over by the matching subsystem; missing fields take config defaults. */
export interface PlanItemInput {
  id?: string;
  topic: string;
  question?: string;
  generate?: boolean;
  hint?: string;
  expectedPoints?: string[];
  competencyIds?: string[];
  followUpPrompt?: string;
  minMs?: number;
  targetMs?: number;
  maxMs?: number;
  weight?: number;
}

export type Decision = { kind: 'advance' } | { kind: 'follow_up'; text: string } | { kind: 'force_advance' };

export interface Exchange {
  readonly itemId: string;
  readonly question: string;
  readonly transcript: string;
  readonly decision: Decision;
  /** Follow-ups already asked for this item when the question went out (0 = main question) */
  readonly depth: number;
  readonly coverage?: number;
  readonly elapsedMs: number;
  readonly timestamp: string;
}

export interface BudgetState {
  remainingTotalMs: number;
  remainingItemCount: number;
  /** Sum of minimums of items that have not started yet */
  pendingFloorMs: number;
}

export type SessionPhase =
  | { name: 'created' }
  | { name: 'greeting' }
  | { name: 'delivering'; itemId: string }
  | { name: 'listening'; itemId: string }
  | { name: 'deciding'; itemId: string }
  | { name: 'following_up'; itemId: string; text: string }
  | { name: 'advancing'; itemId: string }
  | { name: 'closing' }
  | { name: 'completed' }
  | { name: 'aborted'; reason: AbortReason };

export type SessionPhaseName = SessionPhase['name'];

export type AbortReasonCode = 'candidate_requested' | 'operator_requested' | 'channel_closed' | 'downstream_failure';

export interface AbortReason {
  code: AbortReasonCode;
  message: string;
}

export type SessionWarning =
  | { code: 'budget_exhausted'; skippedItemIds: string[]; remainingMs: number; at: string }
  | { code: 'speech_timeout'; operation: 'synthesize' | 'transcribe'; itemId?: string; at: string }
  | { code: 'speech_failure'; operation: 'synthesize' | 'transcribe'; itemId?: string; message: string; at: string }
  | { code: 'scoring_failure'; itemId: string; message: string; at: string }
  | { code: 'generation_failure'; itemId: string; message: string; at: string };

export interface Interruption {
  kind: 'pause' | 'resume';
  at: string;
}

export interface TransitionLogEntry {
  from: SessionPhaseName;
  to: SessionPhaseName;
  itemId?: string;
  atMs: number;
}

export type CloseCause = 'plan_exhausted' | 'deadline';

export interface SessionSummary {
  sessionId: string;
  candidateId: string;
  jobId: string;
  finalPhase: 'completed' | 'aborted';
  closeCause?: CloseCause;
  abortReason?: AbortReason;
  history: Exchange[];
  warnings: SessionWarning[];
  skippedItemIds: string[];
  interruptions: Interruption[];
  startedAt: string;
  endedAt: string;
  totalElapsedMs: number;
}

/** Live view of a session, served while it runs. */
export interface SessionSnapshot {
  sessionId: string;
  candidateId: string;
  jobId: string;
  phase: SessionPhase;
  paused: boolean;
  remainingMs: number;
  plan: PlanItem[];
  history: Exchange[];
  warnings: SessionWarning[];
}
