import { Request, Response, NextFunction } from 'express';
import { validationResult, ValidationChain } from 'express-validator';
import { logger } from '../../config/logger';

/** Runs the chains, then answers 400 with one entry per failing field. */
export function validate(validations: ValidationChain[]) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    await Promise.all(validations.map((v) => v.run(req)));
    const errors = validationResult(req);
    if (errors.isEmpty()) {
      next();
      return;
    }
    const details = errors.array().map((e) => ({ field: e.type === 'field' ? e.path : e.type, message: String(e.msg) }));
    logger.debug('Request validation failed', { path: req.path, details });
    res.status(400).json({ error: 'Validation failed', details });
  };
}
