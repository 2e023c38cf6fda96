/**
 * Session State Machine: the one writer of a session's state. Drives
 * greeting → delivering → listening → deciding → (following_up | advancing)
 * → … → closing → completed, with `aborted` reachable from anywhere live.
 *
 * Control is cooperative and single-threaded per session. Each suspend point
 * (generation, synthesis, transcription, scoring) runs on the session's
 * in-flight token; the deadline and abort cancel that token and transition
 * without waiting for the outstanding call. After every await the driver
 * re-checks the phase, so a late result for a phase already left is dropped.
 */

import { v4 as uuidv4 } from 'uuid';
import { logger } from '../../config/logger';
import type {
  AbortReason,
  BudgetState,
  CloseCause,
  Decision,
  Exchange,
  Interruption,
  PlanItem,
  SessionPhase,
  SessionPhaseName,
  SessionSnapshot,
  SessionSummary,
  SessionWarning,
  TransitionLogEntry,
} from '../../types';
import type { BudgetAllocator } from './BudgetAllocator';
import type { CandidateChannel, OutboundEvent } from './channel';
import type { Clock, Timer } from './Clock';
import { DeadlineExceededError, InvalidPlanError, SessionAbortedError, SessionNotStartedError } from './errors';
import { FollowUpDecisionEngine, NO_ANSWER, isNoAnswer } from './FollowUpDecisionEngine';
import type { QuestionGenerator } from './QuestionGenerator';
import type { QuestionPlan } from './QuestionPlan';
import type { SessionSink } from './SessionArchive';
import type { SpeechAdapter } from './SpeechAdapter';

export interface SessionTimeouts {
  synthesisMs: number;
  transcriptionMs: number;
  closingMs: number;
}

export interface SessionDeps {
  clock: Clock;
  channel: CandidateChannel;
  speech: SpeechAdapter;
  decisionEngine: FollowUpDecisionEngine;
  allocator: BudgetAllocator;
  questionGenerator: QuestionGenerator;
  timeouts: SessionTimeouts;
  sink?: SessionSink;
}

export interface SessionIdentity {
  id?: string;
  candidateId: string;
  jobId: string;
}

/** One question (or follow-up) and the answer to it, while still open. */
interface Round {
  itemId: string;
  question: string;
  depth: number;
  startedAt: number;
  transcript: string | null;
}

const ENDED_MESSAGE = 'The interview has ended. Thank you for your time.';

function closingText(cause: CloseCause): string {
  return cause === 'deadline'
    ? "We're out of time, so let's stop here. Thank you for your time today; you'll hear from us soon."
    : "That's all the questions I have. Thank you for your time today; you'll hear from us soon.";
}

export class InterviewSession {
  readonly id: string;
  readonly candidateId: string;
  readonly jobId: string;
  /** Resolves once, with the summary, when the session reaches completed or aborted. */
  readonly finished: Promise<SessionSummary>;

  private phase: SessionPhase = { name: 'created' };
  private plan: QuestionPlan | null = null;
  private readonly history: Exchange[] = [];
  private readonly warnings: SessionWarning[] = [];
  private readonly interruptions: Interruption[] = [];
  private readonly transitions: TransitionLogEntry[] = [];

  private startedAtMs = 0;
  private startedAt = '';
  private deadlineAt = 0;
  private deadlineTimer: Timer | null = null;
  private deadlineHandled = false;
  private closeCause: CloseCause | undefined;
  private budget: BudgetState = { remainingTotalMs: 0, remainingItemCount: 0, pendingFloorMs: 0 };

  private readonly lifetime = new AbortController();
  private inflight = new AbortController();
  private round: Round | null = null;
  private itemStartedAt = 0;
  private followUps = 0;
  private pendingDecision: Promise<Decision | null> | null = null;
  private closing: Promise<void> | null = null;
  private running = false;

  private paused = false;
  private resumeWaiters: (() => void)[] = [];

  private resolveFinished: (summary: SessionSummary) => void = () => undefined;
  private summary: SessionSummary | null = null;

  constructor(
    identity: SessionIdentity,
    private readonly deps: SessionDeps
  ) {
    this.id = identity.id ?? uuidv4();
    this.candidateId = identity.candidateId;
    this.jobId = identity.jobId;
    this.finished = new Promise((resolve) => {
      this.resolveFinished = resolve;
    });
  }

  get currentPhase(): SessionPhase {
    return this.phase;
  }

  get deadline(): number {
    return this.deadlineAt;
  }

  get exchanges(): readonly Exchange[] {
    return this.history;
  }

  get transitionLog(): readonly TransitionLogEntry[] {
    return this.transitions;
  }

  get sessionWarnings(): readonly SessionWarning[] {
    return this.warnings;
  }

  get budgetState(): BudgetState {
    return { ...this.budget };
  }

  get result(): SessionSummary | null {
    return this.summary;
  }

  isTerminal(): boolean {
    return this.phase.name === 'completed' || this.phase.name === 'aborted';
  }

  isPaused(): boolean {
    return this.paused;
  }

  /**
   * Validates the plan, moves to greeting, schedules the global deadline and
   * runs the first allocation, so items that cannot fit are skipped before
   * anything is delivered.
   */
  start(plan: QuestionPlan, deadlineAt: number): void {
    if (this.phase.name !== 'created') {
      throw new Error(`Session ${this.id} has already started`);
    }
    const issues = plan.validate();
    if (issues.length > 0) throw new InvalidPlanError(issues);

    const now = this.deps.clock.now();
    this.plan = plan;
    this.startedAtMs = now;
    this.startedAt = this.deps.clock.timestamp();
    this.deadlineAt = deadlineAt;
    this.transition({ name: 'greeting' });
    this.deadlineTimer = this.deps.clock.setTimer(deadlineAt - now, () => this.onDeadline());
    this.reallocate();

    logger.info('Interview session started', {
      sessionId: this.id,
      candidateId: this.candidateId,
      items: plan.size(),
      deadlineInMs: deadlineAt - now,
    });
  }

  /** Drives the session until it is terminal. Safe to call once; later calls just wait. */
  async run(): Promise<SessionSummary> {
    if (this.phase.name === 'created') throw new SessionNotStartedError(this.id);
    if (this.running) return this.finished;
    this.running = true;

    if (this.phase.name === 'greeting') await this.greet();

    while (this.isLive()) {
      const phase = this.phase;
      switch (phase.name) {
        case 'greeting':
        case 'advancing':
          this.advance();
          break;
        case 'delivering':
          await this.deliverQuestion(phase.itemId);
          break;
        case 'following_up':
          await this.deliverFollowUp(phase.itemId, phase.text);
          break;
        case 'listening':
          await this.listen(phase.itemId);
          break;
        case 'deciding':
          await (this.pendingDecision ?? Promise.resolve(null));
          break;
        case 'closing':
        case 'completed':
        case 'aborted':
          break;
      }
    }
    return this.finished;
  }

  /**
   * Closes the active item (answered if an answer was captured, skipped
   * otherwise) and activates the next pending one, or closes the session
   * when none is left. Leaving listening/deciding this way records the round
   * as force_advance.
   */
  advance(): PlanItem | undefined {
    const plan = this.plan;
    if (!plan || !this.isLive() || this.phase.name === 'created') return undefined;

    if (this.phase.name === 'listening' || this.phase.name === 'deciding') {
      this.commitExchange({ kind: 'force_advance' });
    }
    if (this.phase.name !== 'greeting' && this.phase.name !== 'advancing') {
      this.cancelInflight(new Error('Item advanced'));
    }
    this.finishActiveItem();
    this.round = null;

    const next = plan.activateNext();
    if (!next) {
      this.beginClosing('plan_exhausted');
      return undefined;
    }
    this.itemStartedAt = this.deps.clock.now();
    this.followUps = 0;
    this.transition({ name: 'delivering', itemId: next.id });
    return next;
  }

  /**
   * Hands an answer to the decision engine. Only valid while listening;
   * anywhere else the transcript is dropped and null returned.
   */
  onTranscript(text: string): Promise<Decision | null> {
    const phase = this.phase;
    const round = this.round;
    if (phase.name !== 'listening' || !round || round.itemId !== phase.itemId) {
      logger.warn('Transcript ignored outside a listening window', { sessionId: this.id, phase: phase.name });
      return Promise.resolve(null);
    }
    // Stops the listening call if the transcript arrived from outside it.
    this.cancelInflight(new Error('Transcript received'));
    round.transcript = isNoAnswer(text) ? NO_ANSWER : text.trim();
    this.transition({ name: 'deciding', itemId: phase.itemId });

    this.pendingDecision = this.decide(phase.itemId, round).finally(() => {
      this.pendingDecision = null;
    });
    return this.pendingDecision;
  }

  /**
   * Forces closing, whatever the plan says. The round in progress is recorded
   * as force_advance; outstanding calls are cancelled without waiting.
   * Only the first call has any effect.
   */
  onDeadline(): void {
    if (this.deadlineHandled || this.phase.name === 'created' || !this.isLive()) return;
    this.deadlineHandled = true;
    this.deadlineTimer?.cancel();

    logger.info('Interview deadline reached', { sessionId: this.id, phase: this.phase.name });
    if (this.phase.name === 'listening' || this.phase.name === 'deciding') {
      this.commitExchange({ kind: 'force_advance' });
    }
    this.cancelInflight(new DeadlineExceededError());
    this.beginClosing('deadline');
  }

  /** Ends the session from any live phase. Returns false when it was already terminal. */
  abort(reason: AbortReason): boolean {
    if (this.isTerminal()) return false;

    if (this.phase.name === 'deciding' && this.round?.transcript) {
      this.commitExchange({ kind: 'force_advance' });
    }
    const error = new SessionAbortedError(reason);
    this.lifetime.abort(error);
    this.inflight.abort(error);
    this.finishActiveItem();
    this.round = null;

    logger.warn('Interview session aborted', { sessionId: this.id, phase: this.phase.name, reason });
    this.transition({ name: 'aborted', reason });
    this.send({ type: 'ended', message: ENDED_MESSAGE });
    this.releasePause();
    this.finalize();
    return true;
  }

  /** Holds the session before its next question or follow-up. The deadline keeps running. */
  pause(): boolean {
    if (!this.isLive() || this.paused) return false;
    this.paused = true;
    this.interruptions.push({ kind: 'pause', at: this.deps.clock.timestamp() });
    logger.info('Interview session paused', { sessionId: this.id });
    return true;
  }

  resume(): boolean {
    if (!this.paused) return false;
    this.paused = false;
    this.interruptions.push({ kind: 'resume', at: this.deps.clock.timestamp() });
    logger.info('Interview session resumed', { sessionId: this.id });
    this.releasePause();
    return true;
  }

  snapshot(): SessionSnapshot {
    return {
      sessionId: this.id,
      candidateId: this.candidateId,
      jobId: this.jobId,
      phase: this.phase,
      paused: this.paused,
      remainingMs: this.phase.name === 'created' ? 0 : Math.max(0, this.deadlineAt - this.deps.clock.now()),
      plan: this.plan?.snapshot() ?? [],
      history: [...this.history],
      warnings: [...this.warnings],
    };
  }

  private async greet(): Promise<void> {
    const minutes = Math.max(1, Math.round((this.deadlineAt - this.deps.clock.now()) / 60000));
    const text = `Hello, and thank you for joining. We have about ${minutes} minute${minutes === 1 ? '' : 's'} together, so let's get started.`;
    this.send({ type: 'greeting', text });
    await this.play(text, this.inflight.signal, this.deps.timeouts.synthesisMs);
    if (this.phase.name === 'greeting') this.advance();
  }

  private async deliverQuestion(itemId: string): Promise<void> {
    if (this.paused) {
      await this.waitWhilePaused();
      if (!this.isAt('delivering', itemId)) return;
      // Time spent paused is not charged to the item, but later items absorb it.
      this.itemStartedAt = this.deps.clock.now();
      this.reallocate();
    }
    const item = this.plan?.get(itemId);
    if (!item) {
      this.advance();
      return;
    }

    const generated = await this.deps.questionGenerator.questionFor(item, this.inflight.signal);
    if (!this.isAt('delivering', itemId)) return;
    if (generated.error) {
      this.warn({ code: 'generation_failure', itemId, message: generated.error, at: this.deps.clock.timestamp() });
    }

    this.round = { itemId, question: generated.text, depth: 0, startedAt: this.itemStartedAt, transcript: null };
    const current = this.plan?.get(itemId) ?? item;
    this.send({ type: 'question', itemId, text: generated.text, targetMs: current.targetMs, maxMs: current.maxMs });
    await this.play(generated.text, this.inflight.signal, this.deps.timeouts.synthesisMs, itemId);
    if (!this.isAt('delivering', itemId)) return;
    this.transition({ name: 'listening', itemId });
  }

  private async deliverFollowUp(itemId: string, text: string): Promise<void> {
    if (this.paused) {
      const heldFrom = this.deps.clock.now();
      await this.waitWhilePaused();
      if (!this.isAt('following_up', itemId)) return;
      // The item is already under way, so the pause comes off its elapsed time.
      this.itemStartedAt += this.deps.clock.now() - heldFrom;
      this.reallocate();
    }
    this.round = { itemId, question: text, depth: this.followUps, startedAt: this.deps.clock.now(), transcript: null };
    this.send({ type: 'follow_up', itemId, text });
    await this.play(text, this.inflight.signal, this.deps.timeouts.synthesisMs, itemId);
    if (!this.isAt('following_up', itemId)) return;
    this.transition({ name: 'listening', itemId });
  }

  private async listen(itemId: string): Promise<void> {
    const item = this.plan?.get(itemId);
    if (!item) {
      this.advance();
      return;
    }
    const now = this.deps.clock.now();
    const cutoffMs = Math.min(item.maxMs - (now - this.itemStartedAt), this.deadlineAt - now);
    if (cutoffMs <= 0) {
      if (this.deadlinePassed()) {
        this.onDeadline();
        return;
      }
      await this.onTranscript(NO_ANSWER);
      return;
    }

    this.send({ type: 'listening', itemId, cutoffMs });
    const signal = this.inflight.signal;
    const outcome = await this.deps.speech.transcribe(this.deps.channel.listen(signal), {
      timeoutMs: this.deps.timeouts.transcriptionMs,
      cutoffMs,
      signal,
    });
    if (!this.isAt('listening', itemId)) return;
    if (this.deadlinePassed()) {
      this.onDeadline();
      return;
    }

    let transcript = NO_ANSWER;
    switch (outcome.status) {
      case 'ok':
        transcript = outcome.text || NO_ANSWER;
        break;
      case 'timeout':
        this.warn({ code: 'speech_timeout', operation: 'transcribe', itemId, at: this.deps.clock.timestamp() });
        break;
      case 'failed':
        this.warn({
          code: 'speech_failure',
          operation: 'transcribe',
          itemId,
          message: outcome.error.message,
          at: this.deps.clock.timestamp(),
        });
        break;
      case 'cancelled':
        return;
    }
    await this.onTranscript(transcript);
  }

  private async decide(itemId: string, round: Round): Promise<Decision | null> {
    const plan = this.plan;
    const item = plan?.get(itemId);
    if (!plan || !item) return null;
    if (this.deadlinePassed()) {
      this.onDeadline();
      return { kind: 'force_advance' };
    }

    const now = this.deps.clock.now();
    const result = await this.deps.decisionEngine.decide(
      {
        item,
        question: round.question,
        transcript: round.transcript ?? NO_ANSWER,
        depth: this.followUps,
        itemElapsedMs: now - this.itemStartedAt,
        budget: this.deps.allocator.snapshot({ plan: plan.snapshot(), now, deadlineAt: this.deadlineAt }),
      },
      this.inflight.signal
    );
    if (!this.isAt('deciding', itemId)) return null;
    // The deadline outranks whatever the engine said, follow-ups included.
    if (this.deadlinePassed()) {
      this.onDeadline();
      return { kind: 'force_advance' };
    }

    if (result.basis === 'scoring_failed' && result.scoringError) {
      this.warn({ code: 'scoring_failure', itemId, message: result.scoringError, at: this.deps.clock.timestamp() });
    }
    const decision = result.decision;
    this.commitExchange(decision, result.coverage);

    switch (decision.kind) {
      case 'follow_up':
        this.followUps += 1;
        this.transition({ name: 'following_up', itemId, text: decision.text });
        break;
      case 'advance':
      case 'force_advance':
        this.transition({ name: 'advancing', itemId });
        break;
    }
    return decision;
  }

  /** Appends the open round to history as an immutable Exchange. */
  private commitExchange(decision: Decision, coverage?: number): void {
    const round = this.round;
    if (!round) return;
    const now = this.deps.clock.now();
    const exchange: Exchange = Object.freeze({
      itemId: round.itemId,
      question: round.question,
      transcript: round.transcript ?? NO_ANSWER,
      decision: Object.freeze({ ...decision }),
      depth: round.depth,
      coverage,
      elapsedMs: Math.max(0, now - round.startedAt),
      timestamp: this.deps.clock.timestamp(),
    });
    this.history.push(exchange);
    this.round = null;

    this.deps.sink?.onExchange(this.id, exchange).catch((error: unknown) => {
      logger.warn('Failed to publish exchange', { sessionId: this.id, error });
    });
    if (!this.deadlineHandled && !this.lifetime.signal.aborted) this.reallocate();
  }

  private reallocate(): void {
    const plan = this.plan;
    if (!plan) return;
    const now = this.deps.clock.now();
    const active = plan.active();
    const result = this.deps.allocator.allocate({
      plan: plan.snapshot(),
      now,
      deadlineAt: this.deadlineAt,
      activeElapsedMs: active ? now - this.itemStartedAt : undefined,
    });
    for (const id of result.skippedItemIds) plan.skip(id);
    plan.setTargets(result.targets);
    this.budget = result.budget;

    if (result.budgetExhausted) {
      logger.warn('Time budget exhausted; skipping items', {
        sessionId: this.id,
        skippedItemIds: result.skippedItemIds,
        remainingMs: result.budget.remainingTotalMs,
      });
      this.warnings.push({
        code: 'budget_exhausted',
        skippedItemIds: result.skippedItemIds,
        remainingMs: result.budget.remainingTotalMs,
        at: this.deps.clock.timestamp(),
      });
    }
  }

  private beginClosing(cause: CloseCause): void {
    if (!this.isLive()) return;
    const plan = this.plan;
    this.closeCause = cause;
    this.finishActiveItem();
    this.round = null;
    if (plan) {
      for (const id of plan.idsWithStatus('pending')) plan.skip(id);
    }
    this.transition({ name: 'closing' });
    this.releasePause();

    this.closing = this.close(cause).catch((error: unknown) => {
      logger.error('Closing statement failed', { sessionId: this.id, error });
      if (this.phase.name === 'closing') this.complete();
    });
  }

  private async close(cause: CloseCause): Promise<void> {
    const text = closingText(cause);
    this.send({ type: 'closing', text });
    await this.play(text, this.lifetime.signal, this.deps.timeouts.closingMs);
    if (this.phase.name === 'closing') this.complete();
  }

  private complete(): void {
    this.transition({ name: 'completed' });
    this.finalize();
  }

  private finalize(): void {
    if (this.summary) return;
    this.deadlineTimer?.cancel();
    const plan = this.plan;
    const summary: SessionSummary = {
      sessionId: this.id,
      candidateId: this.candidateId,
      jobId: this.jobId,
      finalPhase: this.phase.name === 'aborted' ? 'aborted' : 'completed',
      closeCause: this.closeCause,
      abortReason: this.phase.name === 'aborted' ? this.phase.reason : undefined,
      history: [...this.history],
      warnings: [...this.warnings],
      skippedItemIds: plan ? plan.idsWithStatus('skipped') : [],
      interruptions: [...this.interruptions],
      startedAt: this.startedAt || this.deps.clock.timestamp(),
      endedAt: this.deps.clock.timestamp(),
      totalElapsedMs: this.startedAt ? Math.max(0, this.deps.clock.now() - this.startedAtMs) : 0,
    };
    this.summary = summary;

    logger.info('Interview session finished', {
      sessionId: this.id,
      finalPhase: summary.finalPhase,
      exchanges: summary.history.length,
      skipped: summary.skippedItemIds.length,
      warnings: summary.warnings.length,
    });
    this.deps.sink?.onSummary(summary).catch((error: unknown) => {
      logger.warn('Failed to publish session summary', { sessionId: this.id, error });
    });
    this.resolveFinished(summary);
  }

  private finishActiveItem(): void {
    const plan = this.plan;
    const active = plan?.active();
    if (!plan || !active) return;
    const answered = this.history.some((e) => e.itemId === active.id && !isNoAnswer(e.transcript));
    plan.finishActive(answered ? 'answered' : 'skipped');
  }

  /** Streams synthesized audio to the candidate. The text has already been sent, so failures only warn. */
  private async play(text: string, signal: AbortSignal, timeoutMs: number, itemId?: string): Promise<void> {
    for await (const event of this.deps.speech.synthesize(text, { timeoutMs, signal })) {
      if (event.kind === 'audio') {
        this.send({ type: 'audio', chunk: event.chunk });
      } else if (event.reason === 'timeout') {
        this.warn({ code: 'speech_timeout', operation: 'synthesize', itemId, at: this.deps.clock.timestamp() });
      } else if (event.reason === 'error') {
        this.warn({
          code: 'speech_failure',
          operation: 'synthesize',
          itemId,
          message: event.error?.message ?? 'synthesis failed',
          at: this.deps.clock.timestamp(),
        });
      }
    }
  }

  private send(event: OutboundEvent): void {
    try {
      this.deps.channel.send(event);
    } catch (error) {
      logger.warn('Failed to send event to candidate', { sessionId: this.id, type: event.type, error });
    }
  }

  private warn(warning: SessionWarning): void {
    this.warnings.push(warning);
  }

  private cancelInflight(reason: Error): void {
    this.inflight.abort(reason);
    this.inflight = new AbortController();
  }

  private waitWhilePaused(): Promise<void> {
    if (!this.paused) return Promise.resolve();
    return new Promise((resolve) => this.resumeWaiters.push(resolve));
  }

  private releasePause(): void {
    const waiters = this.resumeWaiters;
    this.resumeWaiters = [];
    for (const resume of waiters) resume();
  }

  private deadlinePassed(): boolean {
    return this.deps.clock.now() >= this.deadlineAt;
  }

  private isLive(): boolean {
    return this.phase.name !== 'closing' && !this.isTerminal();
  }

  private isAt(name: SessionPhaseName, itemId: string): boolean {
    const phase = this.phase;
    return phase.name === name && 'itemId' in phase && phase.itemId === itemId;
  }

  private transition(next: SessionPhase): void {
    const from = this.phase.name;
    this.phase = next;
    const itemId = 'itemId' in next ? next.itemId : undefined;
    this.transitions.push({ from, to: next.name, itemId, atMs: Math.max(0, this.deps.clock.now() - this.startedAtMs) });
    logger.debug('Session transition', { sessionId: this.id, from, to: next.name, itemId });
  }
}
