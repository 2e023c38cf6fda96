import { vi } from 'vitest';
import type { ISTTService, STTOptions } from '../ai/stt';
import type { ITTSService } from '../ai/tts';
import { config } from '../config';
import { createMemoryStore } from '../redis/client';
import { budgetAllocator } from '../services/interview/BudgetAllocator';
import type { AudioInput, CandidateChannel, OutboundEvent } from '../services/interview/channel';
import type { ManualClock } from '../services/interview/Clock';
import type { CoverageScorer } from '../services/interview/CoverageScorer';
import { KeywordCoverageScorer } from '../services/interview/CoverageScorer';
import { FollowUpDecisionEngine } from '../services/interview/FollowUpDecisionEngine';
import { InterviewSession } from '../services/interview/InterviewSession';
import type { PlanSource } from '../services/interview/PlanSource';
import type { SessionSink } from '../services/interview/SessionArchive';
import { SessionArchive } from '../services/interview/SessionArchive';
import { SessionRegistry } from '../services/interview/SessionRegistry';
import { QuestionGenerator } from '../services/interview/QuestionGenerator';
import { SpeechAdapter } from '../services/interview/SpeechAdapter';
import { whenAborted } from '../services/interview/cancellation';
import type { Exchange, PlanItemInput } from '../types';

export const MINUTE = 60_000;

export const SPEECH = { silenceMs: 1500, voiceAmplitudeThreshold: 500, sampleRate: 16000, chunkBytes: 4 };
export const TIMEOUTS = { synthesisMs: 10_000, transcriptionMs: 15_000, closingMs: 10_000 };
export const FOLLOW_UP = { coverageThreshold: 0.6, maxDepth: 1, minCostMs: MINUTE, scoringTimeoutMs: 8_000 };
export const ITEM_DEFAULTS = { minMs: 3 * MINUTE, targetMs: 8 * MINUTE, maxMs: 12 * MINUTE, weight: 1 };

/** PCM16 samples all at `amplitude`. */
export function pcm(amplitude: number, samples = 160): Buffer {
  const buffer = Buffer.alloc(samples * 2);
  for (let i = 0; i < samples; i++) buffer.writeInt16LE(amplitude, i * 2);
  return buffer;
}

export type Turn =
  /** Speaks for `durationMs`, then signals end of turn; STT returns `text`. */
  | { kind: 'answer'; text: string; durationMs: number }
  /** Speaks, but the STT engine never answers. */
  | { kind: 'stt_hangs'; durationMs: number }
  /** Stays connected and silent until the listening window is cancelled. */
  | { kind: 'silent_until_cancelled' };

/**
 * Scripted candidate: plays one Turn per listening window and doubles as the
 * STT engine, so the transcript always matches the turn just spoken.
 */
export class ScriptedCandidate implements CandidateChannel, ISTTService {
  readonly events: OutboundEvent[] = [];
  private speaking: Turn | null = null;

  constructor(
    private readonly clock: ManualClock,
    private readonly turns: Turn[]
  ) {}

  send(event: OutboundEvent): void {
    this.events.push(event);
  }

  eventsOfType<T extends OutboundEvent['type']>(type: T): Extract<OutboundEvent, { type: T }>[] {
    return this.events.filter((e): e is Extract<OutboundEvent, { type: T }> => e.type === type);
  }

  listen(signal: AbortSignal): AsyncIterable<AudioInput> {
    const turn = this.turns.shift();
    this.speaking = turn ?? null;
    const clock = this.clock;
    return (async function* (): AsyncGenerator<AudioInput> {
      if (!turn) return;
      if (turn.kind === 'silent_until_cancelled') {
        await whenAborted(signal);
        return;
      }
      clock.advance(turn.durationMs);
      if (signal.aborted) return;
      yield { kind: 'chunk', data: pcm(1000) };
      yield { kind: 'end_of_turn' };
    })();
  }

  async transcribe(_pcm: Buffer, options: STTOptions): Promise<string> {
    const turn = this.speaking;
    if (turn?.kind === 'stt_hangs') {
      return new Promise<string>((_resolve, reject) => {
        options.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
        setImmediate(() => this.clock.advance(TIMEOUTS.transcriptionMs + 1_000));
      });
    }
    return turn?.kind === 'answer' ? turn.text : '';
  }
}

export class InstantTTS implements ITTSService {
  readonly spoken: string[] = [];

  async synthesize(text: string): Promise<Buffer> {
    this.spoken.push(text);
    return Buffer.from('mp3-bytes');
  }
}

export class RecordingSink implements SessionSink {
  readonly exchanges: string[] = [];
  summaries = 0;

  async onExchange(_sessionId: string, exchange: Exchange): Promise<void> {
    this.exchanges.push(exchange.itemId);
  }

  async onSummary(): Promise<void> {
    this.summaries += 1;
  }
}

export function planInputs(count: number, overrides: Partial<PlanItemInput> = {}): PlanItemInput[] {
  return Array.from({ length: count }, (_, i) => ({
    id: `q${i + 1}`,
    topic: `Topic ${i + 1}`,
    question: `Question ${i + 1}: tell me about caching strategy.`,
    expectedPoints: ['caching strategy'],
    ...overrides,
  }));
}

export interface Harness {
  clock: ManualClock;
  candidate: ScriptedCandidate;
  tts: InstantTTS;
  sink: RecordingSink;
  session: InterviewSession;
}

export function buildSession(
  clock: ManualClock,
  turns: Turn[],
  options: { scorer?: CoverageScorer; maxDepth?: number } = {}
): Harness {
  const candidate = new ScriptedCandidate(clock, turns);
  const tts = new InstantTTS();
  const sink = new RecordingSink();
  const session = new InterviewSession(
    { id: 'session-1', candidateId: 'candidate-1', jobId: 'job-1' },
    {
      clock,
      channel: candidate,
      speech: new SpeechAdapter(candidate, tts, clock, SPEECH),
      decisionEngine: new FollowUpDecisionEngine(options.scorer ?? new KeywordCoverageScorer(5), clock, {
        ...FOLLOW_UP,
        maxDepth: options.maxDepth ?? FOLLOW_UP.maxDepth,
      }),
      allocator: budgetAllocator,
      questionGenerator: new QuestionGenerator(null, clock, 8_000),
      timeouts: TIMEOUTS,
      sink,
    }
  );
  return { clock, candidate, tts, sink, session };
}

/** Registry over a scripted candidate and an in-memory archive. */
export function buildRegistry(
  clock: ManualClock,
  turns: Turn[],
  fetchPlan: PlanSource['fetchPlan'] = async () => planInputs(1)
) {
  const candidate = new ScriptedCandidate(clock, turns);
  const planSource = { fetchPlan: vi.fn(fetchPlan) };
  const registry = new SessionRegistry({
    clock,
    stt: candidate,
    tts: new InstantTTS(),
    llm: null,
    scorer: new KeywordCoverageScorer(5),
    planSource,
    archive: new SessionArchive(createMemoryStore(), 60),
    settings: config.interview,
  });
  return { registry, candidate, planSource };
}
