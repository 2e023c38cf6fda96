/**
 * Entry point: HTTP server with Socket.io for real-time voice interviews.
 */
import { createServer } from 'http';
import { Server as SocketIOServer } from 'socket.io';
import { createApp } from './api/app';
import { config } from './config';
import { logger } from './config/logger';
import { getLLMService } from './ai/llm';
import { getSTTService } from './ai/stt';
import { getTTSService } from './ai/tts';
import { closeRedis } from './redis/client';
import { SignalingService } from './services/signaling.service';
import {
  SessionArchive,
  SessionRegistry,
  SystemClock,
  createCoverageScorer,
  createPlanSource,
} from './services/interview';

async function start() {
  logger.info('Initializing services...');
  const llm = getLLMService();
  if (!llm) {
    logger.warn('No LLM configured; questions use fallbacks and coverage uses keyword matching');
  }

  const registry = new SessionRegistry({
    clock: new SystemClock(),
    stt: getSTTService(),
    tts: getTTSService(),
    llm,
    scorer: createCoverageScorer(config.interview.minAnswerWords),
    planSource: createPlanSource(),
    archive: new SessionArchive(),
    settings: config.interview,
  });

  const httpServer = createServer(createApp(registry));
  const io = new SocketIOServer(httpServer, {
    cors: {
      origin: config.frontendUrl,
      methods: ['GET', 'POST'],
      credentials: true,
    },
    maxHttpBufferSize: 1e7, // 10 MB for audio chunks
  });
  new SignalingService(io, registry);
  logger.info('All services initialized');

  const host = process.env.HOST || '0.0.0.0';
  const server = httpServer.listen(config.port, host, () => {
    logger.info(`Server listening on ${host}:${config.port} (env: ${config.env})`);
  });

  const shutdown = (signal: string): void => {
    logger.info('Shutting down', { signal, liveSessions: registry.size() });
    registry.abortAll({ code: 'operator_requested', message: 'Server shutting down' });
    io.close();
    void closeRedis()
      .catch((e: unknown) => logger.warn('Redis did not close cleanly', { error: e }))
      .finally(() => process.exit(0));
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  return server;
}

const serverPromise = start().catch((e: unknown) => {
  logger.error('Startup failed', { error: e });
  process.exit(1);
});

export default serverPromise;
