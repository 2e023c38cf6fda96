/**
 * Redis client for finished-session archives and live exchange streams. When
 * REDIS_URL is empty or "memory", uses an in-memory store so the app runs
 * without Redis (local dev, tests).
 */
import Redis from 'ioredis';
import { config } from '../config';
import { logger } from '../config/logger';

const KEY_PREFIX = 'interview_orchestrator:';

/** The subset of Redis the archive uses */
export type RedisLike = {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<string>;
  rpush(key: string, value: string): Promise<number>;
  lrange(key: string, start: number, stop: number): Promise<string[]>;
  expire(key: string, seconds: number): Promise<number>;
  quit(): Promise<void>;
};

type Entry = { value: string | string[]; expiryTs: number };

export function createMemoryStore(now: () => number = Date.now): RedisLike {
  const store = new Map<string, Entry>();

  const live = (key: string): Entry | undefined => {
    const entry = store.get(key);
    if (entry && now() > entry.expiryTs) {
      store.delete(key);
      return undefined;
    }
    return entry;
  };

  return {
    async get(key) {
      const entry = live(key);
      return entry && typeof entry.value === 'string' ? entry.value : null;
    },
    async setex(key, seconds, value) {
      store.set(key, { value, expiryTs: now() + seconds * 1000 });
      return 'OK';
    },
    async rpush(key, value) {
      const entry = live(key);
      const list = entry && Array.isArray(entry.value) ? entry.value : [];
      list.push(value);
      store.set(key, { value: list, expiryTs: entry?.expiryTs ?? Number.POSITIVE_INFINITY });
      return list.length;
    },
    async lrange(key, start, stop) {
      const entry = live(key);
      if (!entry || !Array.isArray(entry.value)) return [];
      const end = stop < 0 ? entry.value.length + stop + 1 : stop + 1;
      return entry.value.slice(start, end);
    },
    async expire(key, seconds) {
      const entry = live(key);
      if (!entry) return 0;
      entry.expiryTs = now() + seconds * 1000;
      return 1;
    },
    async quit() {
      store.clear();
    },
  };
}

function wrapRedis(r: Redis): RedisLike {
  return {
    get: (key) => r.get(key),
    setex: (key, seconds, value) => r.setex(key, seconds, value),
    rpush: (key, value) => r.rpush(key, value),
    lrange: (key, start, stop) => r.lrange(key, start, stop),
    expire: (key, seconds) => r.expire(key, seconds),
    quit: async () => {
      await r.quit();
    },
  };
}

let client: RedisLike | null = null;

export function getRedis(): RedisLike {
  if (!client) {
    const url = (config.redis.url || '').trim();
    if (url === '' || url.toLowerCase() === 'memory') {
      logger.info('Using in-memory store for session archives (no Redis). Set REDIS_URL to use Redis.');
      client = createMemoryStore();
    } else {
      const r = new Redis(url, {
        maxRetriesPerRequest: 3,
        retryStrategy(times) {
          return Math.min(times * 100, 3000);
        },
      });
      r.on('error', (err) => {
        logger.error('Redis error', { error: err.message });
      });
      client = wrapRedis(r);
    }
  }
  return client;
}

export function summaryKey(sessionId: string): string {
  return `${KEY_PREFIX}summary:${sessionId}`;
}

export function exchangesKey(sessionId: string): string {
  return `${KEY_PREFIX}exchanges:${sessionId}`;
}

export async function closeRedis(): Promise<void> {
  if (client) await client.quit();
  client = null;
}
