import { Request } from 'express';

export type ErrorDetails = Record<string, unknown>;

// Base error interface
export interface BaseError extends Error {
  code: string;
  statusCode: number;
  details?: ErrorDetails;
  isOperational?: boolean;
}

// Custom error classes
export class AppError extends Error implements BaseError {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details?: ErrorDetails;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string,
    statusCode: number,
    details?: ErrorDetails,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }
}

// Specific error types
export class ValidationError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'VALIDATION_ERROR', 400, details);
  }
}

export class AuthenticationError extends AppError {
  constructor(message: string = 'Authentication failed') {
    super(message, 'AUTHENTICATION_ERROR', 401);
  }
}

export class AuthorizationError extends AppError {
  constructor(message: string = 'Insufficient permissions') {
    super(message, 'AUTHORIZATION_ERROR', 403);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string = 'Resource') {
    super(`${resource} not found`, 'NOT_FOUND', 404);
  }
}

export class ConflictError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'CONFLICT', 409, details);
  }
}

export class DatabaseError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'DATABASE_ERROR', 500, details);
  }
}

// Error response interface
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: ErrorDetails;
    timestamp: string;
    requestId: string;
  };
}

// Correlation ID utilities
export function generateCorrelationId(): string {
  return `req_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export function getCorrelationId(req: Request): string {
  return (
    firstHeader(req.headers['x-request-id']) ||
    firstHeader(req.headers['x-correlation-id']) ||
    generateCorrelationId()
  );
}

interface DriverError {
  code?: string;
  constraint?: string;
  detail?: string;
  column?: string;
  table?: string;
  message?: string;
}

function asDriverError(error: unknown): DriverError {
  if (typeof error !== 'object' || error === null) {
    return { message: String(error) };
  }
  const record: Record<string, unknown> = { ...error };
  const pick = (key: string): string | undefined =>
    typeof record[key] === 'string' ? String(record[key]) : undefined;

  return {
    code: pick('code'),
    constraint: pick('constraint'),
    detail: pick('detail'),
    column: pick('column'),
    table: pick('table'),
    message: error instanceof Error ? error.message : pick('message')
  };
}

// Database error mapping
export function mapDatabaseError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  const driverError = asDriverError(error);

  switch (driverError.code) {
    case '23505': // Unique constraint violation
      return new ConflictError('A record with this information already exists', {
        constraint: driverError.constraint,
        detail: driverError.detail
      });

    case '23503': // Foreign key constraint violation
      return new ValidationError('Referenced record does not exist', {
        constraint: driverError.constraint,
        detail: driverError.detail
      });

    case '23502': // Not null constraint violation
      return new ValidationError('Required field is missing', {
        column: driverError.column,
        table: driverError.table
      });

    case '23514': // Check constraint violation
      return new ValidationError('Invalid data format', {
        constraint: driverError.constraint,
        detail: driverError.detail
      });

    case '40001': // Serialization failure
    case '40P01': // Deadlock detected
      return new ConflictError('The record was modified concurrently, retry the request', {
        code: driverError.code
      });

    case 'ECONNREFUSED':
    case 'ENOTFOUND':
    case 'ETIMEDOUT':
      return new DatabaseError('Database connection failed', {
        code: driverError.code
      });

    default:
      return new DatabaseError('Database operation failed', {
        code: driverError.code,
        message: driverError.message
      });
  }
}

// JWT error mapping
export function mapJWTError(error: unknown): AppError {
  const name = error instanceof Error ? error.name : undefined;

  switch (name) {
    case 'JsonWebTokenError':
      return new AuthenticationError('Invalid authentication token');

    case 'TokenExpiredError':
      return new AuthenticationError('Authentication token has expired');

    case 'NotBeforeError':
      return new AuthenticationError('Token not active yet');

    default:
      return new AuthenticationError('Token validation failed');
  }
}
