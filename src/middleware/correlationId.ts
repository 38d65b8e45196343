import '../types/express';
import { Request, Response, NextFunction } from 'express';
import { getCorrelationId } from '../utils/errors';

/**
 * Gives every request a correlation ID, reusing the caller's x-request-id
 * or x-correlation-id when present. Mount before the request logger.
 */
export const correlationIdMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const correlationId = getCorrelationId(req);

  req.correlationId = correlationId;
  res.setHeader('x-request-id', correlationId);
  res.setHeader('x-correlation-id', correlationId);

  next();
};

export const getRequestCorrelationId = (req: Request): string => {
  return req.correlationId || getCorrelationId(req);
};
