import '../types/express';
import { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger';
import { getRequestCorrelationId } from './correlationId';

export const requestLogger = (req: Request, res: Response, next: NextFunction): void => {
  const startTime = Date.now();
  const requestId = getRequestCorrelationId(req);

  logger.http('Request started', {
    method: req.method,
    url: req.originalUrl,
    userAgent: req.headers['user-agent'],
    ip: req.ip,
    requestId,
    contentLength: req.headers['content-length'],
    contentType: req.headers['content-type']
  });

  res.on('finish', () => {
    logger.http('Request completed', {
      method: req.method,
      url: req.originalUrl,
      statusCode: res.statusCode,
      duration: `${Date.now() - startTime}ms`,
      requestId,
      contentLength: res.getHeader('content-length'),
      actorId: req.actor?.id
    });
  });

  next();
};
