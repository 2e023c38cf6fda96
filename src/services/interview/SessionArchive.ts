/**
 * Where exchanges and summaries go once a session produces them. The archive
 * streams each Exchange onto a Redis list as it is committed and stores the
 * summary when the session ends; both expire after the configured TTL.
 */

import { z } from 'zod';
import type { RedisLike } from '../../redis/client';
import { exchangesKey, getRedis, summaryKey } from '../../redis/client';
import { config } from '../../config';
import { logger } from '../../config/logger';
import type { Exchange, SessionSummary } from '../../types';

const decisionSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('advance') }),
  z.object({ kind: z.literal('follow_up'), text: z.string() }),
  z.object({ kind: z.literal('force_advance') }),
]);

const exchangeSchema: z.ZodType<Exchange> = z.object({
  itemId: z.string(),
  question: z.string(),
  transcript: z.string(),
  decision: decisionSchema,
  depth: z.number(),
  coverage: z.number().optional(),
  elapsedMs: z.number(),
  timestamp: z.string(),
});

const speechOperation = z.enum(['synthesize', 'transcribe']);

const warningSchema = z.discriminatedUnion('code', [
  z.object({
    code: z.literal('budget_exhausted'),
    skippedItemIds: z.array(z.string()),
    remainingMs: z.number(),
    at: z.string(),
  }),
  z.object({ code: z.literal('speech_timeout'), operation: speechOperation, itemId: z.string().optional(), at: z.string() }),
  z.object({
    code: z.literal('speech_failure'),
    operation: speechOperation,
    itemId: z.string().optional(),
    message: z.string(),
    at: z.string(),
  }),
  z.object({ code: z.literal('scoring_failure'), itemId: z.string(), message: z.string(), at: z.string() }),
  z.object({ code: z.literal('generation_failure'), itemId: z.string(), message: z.string(), at: z.string() }),
]);

const summarySchema: z.ZodType<SessionSummary> = z.object({
  sessionId: z.string(),
  candidateId: z.string(),
  jobId: z.string(),
  finalPhase: z.enum(['completed', 'aborted']),
  closeCause: z.enum(['plan_exhausted', 'deadline']).optional(),
  abortReason: z
    .object({
      code: z.enum(['candidate_requested', 'operator_requested', 'channel_closed', 'downstream_failure']),
      message: z.string(),
    })
    .optional(),
  history: z.array(exchangeSchema),
  warnings: z.array(warningSchema),
  skippedItemIds: z.array(z.string()),
  interruptions: z.array(z.object({ kind: z.enum(['pause', 'resume']), at: z.string() })),
  startedAt: z.string(),
  endedAt: z.string(),
  totalElapsedMs: z.number(),
});

/** Records that are not JSON or not of the expected shape are logged and treated as missing. */
function decode<T>(schema: z.ZodType<T>, raw: string, key: string): T | null {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    logger.warn('Archived record is not JSON', { key, error });
    return null;
  }
  const result = schema.safeParse(value);
  if (!result.success) {
    logger.warn('Archived record has an unexpected shape', {
      key,
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
    return null;
  }
  return result.data;
}

/** Receives a session's output. Failures are logged by the session, never retried. */
export interface SessionSink {
  onExchange(sessionId: string, exchange: Exchange): Promise<void>;
  onSummary(summary: SessionSummary): Promise<void>;
}

export class SessionArchive implements SessionSink {
  constructor(
    private readonly redis: RedisLike = getRedis(),
    private readonly ttlSeconds: number = config.interview.archiveTtlSeconds
  ) {}

  async onExchange(sessionId: string, exchange: Exchange): Promise<void> {
    const key = exchangesKey(sessionId);
    await this.redis.rpush(key, JSON.stringify(exchange));
    await this.redis.expire(key, this.ttlSeconds);
  }

  async onSummary(summary: SessionSummary): Promise<void> {
    await this.redis.setex(summaryKey(summary.sessionId), this.ttlSeconds, JSON.stringify(summary));
  }

  async getSummary(sessionId: string): Promise<SessionSummary | null> {
    const key = summaryKey(sessionId);
    const raw = await this.redis.get(key);
    return raw ? decode(summarySchema, raw, key) : null;
  }

  async getExchanges(sessionId: string): Promise<Exchange[]> {
    const key = exchangesKey(sessionId);
    const rows = await this.redis.lrange(key, 0, -1);
    return rows.flatMap((row) => {
      const exchange = decode(exchangeSchema, row, key);
      return exchange ? [exchange] : [];
    });
  }
}
