/**
 * Session API for operators: GET /sessions/:id returns a live snapshot or the
 * archived summary, POST /sessions/:id/abort ends a running session.
 */

import { Router, Request, Response } from 'express';
import { body, param } from 'express-validator';
import { logger } from '../../config/logger';
import type { SessionRegistry } from '../../services/interview/SessionRegistry';
import { validate } from '../middleware/validate';

export function sessionRoutes(registry: SessionRegistry): Router {
  const router = Router();

  /** GET /sessions/:id - Live state while running, summary once finished */
  router.get(
    '/:id',
    validate([param('id').isString().trim().notEmpty()]),
    async (req: Request, res: Response) => {
      try {
        const view = await registry.view(req.params.id);
        if (!view) {
          res.status(404).json({ error: 'Session not found' });
          return;
        }
        res.json(view);
      } catch (e) {
        logger.error('Session lookup failed', { sessionId: req.params.id, error: e });
        res.status(500).json({ error: 'Failed to load session' });
      }
    }
  );

  /** POST /sessions/:id/abort - Operator-initiated stop */
  router.post(
    '/:id/abort',
    validate([param('id').isString().trim().notEmpty(), body('message').optional().isString().isLength({ max: 500 })]),
    (req: Request, res: Response) => {
      const message: unknown = req.body?.message;
      const aborted = registry.abort(req.params.id, {
        code: 'operator_requested',
        message: typeof message === 'string' && message ? message : 'Stopped by an operator',
      });
      if (!aborted) {
        res.status(404).json({ error: 'No running session with that id' });
        return;
      }
      logger.info('Session aborted by operator', { sessionId: req.params.id });
      res.json({ sessionId: req.params.id, status: 'aborted' });
    }
  );

  return router;
}
