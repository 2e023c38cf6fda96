/**
 * Central configuration. All env vars are read here so the rest of the app
 * stays env-agnostic and testable.
 */
import dotenv from 'dotenv';

dotenv.config();

function intFromEnv(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] || '', 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function floatFromEnv(name: string, fallback: number): number {
  const parsed = parseFloat(process.env[name] || '');
  return Number.isFinite(parsed) ? parsed : fallback;
}

const SECOND = 1000;
const MINUTE = 60 * SECOND;

export const config = {
  env: process.env.NODE_ENV || 'development',
  port: intFromEnv('PORT', 4000),
  apiPrefix: process.env.API_PREFIX || '/api/v1',
  logLevel: process.env.LOG_LEVEL || 'info',

  /** Base URL of the candidate frontend (CORS origin for the socket). No trailing slash. */
  frontendUrl: process.env.FRONTEND_URL || 'http://localhost:3000',

  redis: {
    // Default to in-memory so the app runs without Redis. Set REDIS_URL (e.g. redis://localhost:6379) to use Redis.
    url: process.env.REDIS_URL || 'memory',
  },

  ai: {
    openaiApiKey: process.env.OPENAI_API_KEY || '',
    /** Open Router API key – used for scoring and question generation when set. https://openrouter.ai */
    openRouterApiKey: process.env.OPENROUTER_API_KEY || '',
    /** Open Router model (e.g. openai/gpt-4o, anthropic/claude-3-haiku). */
    openRouterModel: process.env.OPENROUTER_MODEL || 'openai/gpt-4o-mini',
    openaiModel: process.env.OPENAI_MODEL || 'gpt-4o-mini',
    sttModel: process.env.OPENAI_STT_MODEL || 'whisper-1',
    ttsModel: process.env.OPENAI_TTS_MODEL || 'tts-1',
    ttsVoice: process.env.OPENAI_TTS_VOICE || 'nova',
    defaultTemperature: 0.3,
  },

  /** JD/CV matching subsystem that hands out the initial question plan. Empty = bundled default plan. */
  planService: {
    url: (process.env.PLAN_SERVICE_URL || '').replace(/\/+$/, ''),
    timeoutMs: intFromEnv('PLAN_SERVICE_TIMEOUT_MS', 5 * SECOND),
  },

  interview: {
    deadlineMs: intFromEnv('INTERVIEW_DEADLINE_MINUTES', 30) * MINUTE,
    /** Upper bound on a session length requested by a client. */
    maxDeadlineMs: intFromEnv('INTERVIEW_MAX_DEADLINE_MINUTES', 180) * MINUTE,
    item: {
      minMs: intFromEnv('INTERVIEW_ITEM_MIN_SECONDS', 180) * SECOND,
      targetMs: intFromEnv('INTERVIEW_ITEM_TARGET_SECONDS', 480) * SECOND,
      maxMs: intFromEnv('INTERVIEW_ITEM_MAX_SECONDS', 720) * SECOND,
      weight: floatFromEnv('INTERVIEW_ITEM_WEIGHT', 1),
    },
    followUp: {
      /** Coverage below this (0-1) asks for a follow-up when budget allows. */
      coverageThreshold: floatFromEnv('INTERVIEW_COVERAGE_THRESHOLD', 0.6),
      maxDepth: intFromEnv('INTERVIEW_MAX_FOLLOW_UPS', 1),
      /** Item time that must remain for one more question/answer round. */
      minCostMs: intFromEnv('INTERVIEW_FOLLOW_UP_COST_SECONDS', 60) * SECOND,
    },
    timeouts: {
      synthesisMs: intFromEnv('INTERVIEW_SYNTHESIS_TIMEOUT_MS', 10 * SECOND),
      transcriptionMs: intFromEnv('INTERVIEW_TRANSCRIPTION_TIMEOUT_MS', 15 * SECOND),
      scoringMs: intFromEnv('INTERVIEW_SCORING_TIMEOUT_MS', 8 * SECOND),
      generationMs: intFromEnv('INTERVIEW_GENERATION_TIMEOUT_MS', 8 * SECOND),
      closingMs: intFromEnv('INTERVIEW_CLOSING_TIMEOUT_MS', 10 * SECOND),
    },
    speech: {
      /** Trailing silence after speech that ends the candidate's turn. */
      silenceMs: intFromEnv('INTERVIEW_SILENCE_MS', 1800),
      /** Mean absolute PCM16 amplitude at or above which a chunk counts as speech. */
      voiceAmplitudeThreshold: intFromEnv('INTERVIEW_VOICE_AMPLITUDE', 500),
      sampleRate: intFromEnv('INTERVIEW_SAMPLE_RATE', 16000),
      /** Size of synthesized audio chunks pushed to the candidate channel. */
      chunkBytes: intFromEnv('INTERVIEW_AUDIO_CHUNK_BYTES', 16 * 1024),
    },
    /** Answers shorter than this score proportionally lower when an item has no rubric. */
    minAnswerWords: intFromEnv('INTERVIEW_MIN_ANSWER_WORDS', 25),
    /** How long archived session summaries stay readable. */
    archiveTtlSeconds: intFromEnv('INTERVIEW_ARCHIVE_TTL_SECONDS', 24 * 60 * 60),
  },
} as const;

export type InterviewSettings = typeof config.interview;
