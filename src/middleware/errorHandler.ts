import '../types/express';
import { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger';
import { AppError, ErrorResponse, NotFoundError, mapJWTError } from '../utils/errors';
import { getRequestCorrelationId } from './correlationId';

function bodyParserErrorType(error: unknown): unknown {
  return typeof error === 'object' && error !== null && 'type' in error ? error.type : undefined;
}

/**
 * Normalizes anything thrown by a handler into an AppError
 */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  const parserErrorType = bodyParserErrorType(error);
  if (parserErrorType === 'entity.parse.failed') {
    return new AppError('Invalid JSON in request body', 'INVALID_JSON', 400);
  }
  if (parserErrorType === 'entity.too.large') {
    return new AppError('Request payload is too large', 'PAYLOAD_TOO_LARGE', 413);
  }

  if (error instanceof Error && ['JsonWebTokenError', 'TokenExpiredError', 'NotBeforeError'].includes(error.name)) {
    return mapJWTError(error);
  }

  const message = process.env.NODE_ENV === 'production' || !(error instanceof Error)
    ? 'An unexpected error occurred'
    : error.message;
  const details = process.env.NODE_ENV === 'development' && error instanceof Error
    ? { stack: error.stack, name: error.name }
    : undefined;

  return new AppError(message, 'INTERNAL_SERVER_ERROR', 500, details, false);
}

export const notFoundHandler = (req: Request, _res: Response, next: NextFunction): void => {
  next(new NotFoundError(`Route ${req.method} ${req.originalUrl}`));
};

export const errorHandler = (
  error: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const requestId = getRequestCorrelationId(req);
  const appError = toAppError(error);

  const context = {
    code: appError.code,
    error: appError.message,
    requestId,
    method: req.method,
    url: req.originalUrl,
    actorId: req.actor?.id
  };

  if (appError.isOperational && appError.statusCode < 500) {
    logger.warn('Request rejected', context);
  } else {
    logger.error('Request error occurred', {
      ...context,
      stack: error instanceof Error ? error.stack : undefined
    });
  }

  const response: ErrorResponse = {
    error: {
      code: appError.code,
      message: appError.message,
      details: appError.details,
      timestamp: new Date().toISOString(),
      requestId
    }
  };

  res.status(appError.statusCode).json(response);
};
