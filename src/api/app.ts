/**
 * Express app: CORS, JSON body, health check and the session routes.
 */

import express from 'express';
import cors from 'cors';
import { config } from '../config';
import type { SessionRegistry } from '../services/interview/SessionRegistry';
import { sessionRoutes } from './routes/sessions';

export function createApp(registry: SessionRegistry): express.Express {
  const app = express();

  app.use(cors({ origin: config.frontendUrl, credentials: true }));
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', liveSessions: registry.size(), ts: new Date().toISOString() });
  });

  app.use(`${config.apiPrefix}/sessions`, sessionRoutes(registry));

  return app;
}
