/**
 * Owns every live session in the process: wires each one to its own speech
 * adapter, decision engine and question generator, runs it, and forgets it
 * once it is terminal (the archive keeps the summary).
 */

import type { ILLMService } from '../../ai/llm';
import type { ISTTService } from '../../ai/stt';
import type { ITTSService } from '../../ai/tts';
import type { InterviewSettings } from '../../config';
import { logger } from '../../config/logger';
import type { AbortReason, PlanItemInput, SessionSnapshot, SessionSummary } from '../../types';
import { budgetAllocator } from './BudgetAllocator';
import type { CandidateChannel } from './channel';
import type { Clock } from './Clock';
import type { CoverageScorer } from './CoverageScorer';
import { FollowUpDecisionEngine } from './FollowUpDecisionEngine';
import { InterviewSession } from './InterviewSession';
import type { PlanSource } from './PlanSource';
import { QuestionGenerator } from './QuestionGenerator';
import { QuestionPlan } from './QuestionPlan';
import type { SessionArchive } from './SessionArchive';
import { SpeechAdapter } from './SpeechAdapter';

export interface RegistryDeps {
  clock: Clock;
  stt: ISTTService;
  tts: ITTSService;
  llm: ILLMService | null;
  scorer: CoverageScorer;
  planSource: PlanSource;
  archive: SessionArchive;
  settings: InterviewSettings;
}

export interface LaunchRequest {
  sessionId?: string;
  candidateId: string;
  jobId: string;
  /** Inline plan; fetched from the plan source when absent */
  plan?: PlanItemInput[];
  /** Overrides the configured session length, up to the configured maximum */
  deadlineMs?: number;
}

export type SessionView =
  | { status: 'live'; snapshot: SessionSnapshot }
  | { status: 'finished'; summary: SessionSummary };

export class SessionRegistry {
  private readonly sessions = new Map<string, InterviewSession>();
  /** Ids claimed by a launch that is still fetching its plan */
  private readonly launching = new Set<string>();

  constructor(private readonly deps: RegistryDeps) {}

  /** Validates the plan, starts the session and runs it in the background. */
  async launch(request: LaunchRequest, channel: CandidateChannel): Promise<InterviewSession> {
    const reserved = request.sessionId;
    if (reserved !== undefined) {
      if (this.sessions.has(reserved) || this.launching.has(reserved)) {
        throw new Error(`Session ${reserved} is already running`);
      }
      this.launching.add(reserved);
    }

    let session: InterviewSession;
    try {
      session = await this.prepare(request, channel);
    } finally {
      if (reserved !== undefined) this.launching.delete(reserved);
    }
    this.sessions.set(session.id, session);

    void session
      .run()
      .catch((error: unknown) => {
        logger.error('Interview session driver failed', { sessionId: session.id, error });
        session.abort({ code: 'downstream_failure', message: 'The interview could not continue' });
      })
      .finally(() => {
        if (this.sessions.get(session.id) === session) this.sessions.delete(session.id);
      });
    return session;
  }

  get(sessionId: string): InterviewSession | undefined {
    return this.sessions.get(sessionId);
  }

  /** A live snapshot, or the archived summary of a session that has ended. */
  async view(sessionId: string): Promise<SessionView | null> {
    const live = this.sessions.get(sessionId);
    if (live) {
      const summary = live.result;
      return summary ? { status: 'finished', summary } : { status: 'live', snapshot: live.snapshot() };
    }
    const summary = await this.deps.archive.getSummary(sessionId);
    return summary ? { status: 'finished', summary } : null;
  }

  abort(sessionId: string, reason: AbortReason): boolean {
    const session = this.sessions.get(sessionId);
    return session ? session.abort(reason) : false;
  }

  abortAll(reason: AbortReason): void {
    for (const session of this.sessions.values()) session.abort(reason);
  }

  size(): number {
    return this.sessions.size;
  }

  private async prepare(request: LaunchRequest, channel: CandidateChannel): Promise<InterviewSession> {
    const { settings, clock } = this.deps;
    const inputs =
      request.plan ?? (await this.deps.planSource.fetchPlan({ candidateId: request.candidateId, jobId: request.jobId }));
    const plan = QuestionPlan.fromInput(inputs, settings.item);

    const session = this.create(request, channel);
    const lengthMs = Math.min(request.deadlineMs ?? settings.deadlineMs, settings.maxDeadlineMs);
    session.start(plan, clock.now() + lengthMs);
    return session;
  }

  private create(request: LaunchRequest, channel: CandidateChannel): InterviewSession {
    const { clock, settings } = this.deps;
    return new InterviewSession(
      { id: request.sessionId, candidateId: request.candidateId, jobId: request.jobId },
      {
        clock,
        channel,
        speech: new SpeechAdapter(this.deps.stt, this.deps.tts, clock, settings.speech),
        decisionEngine: new FollowUpDecisionEngine(this.deps.scorer, clock, {
          ...settings.followUp,
          scoringTimeoutMs: settings.timeouts.scoringMs,
        }),
        allocator: budgetAllocator,
        questionGenerator: new QuestionGenerator(this.deps.llm, clock, settings.timeouts.generationMs),
        timeouts: settings.timeouts,
        sink: this.deps.archive,
      }
    );
  }
}
