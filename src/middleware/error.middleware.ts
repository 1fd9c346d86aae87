import { Request, Response, NextFunction } from 'express';
import { config } from '../config/config';
import { logger, logError } from '../utils/logger';

/**
 * Custom error class with status code
 */
export class AppError extends Error {
  statusCode: number;
  isOperational: boolean;

  constructor(message: string, statusCode: number = 500) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = true; // Operational errors vs programming errors

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Common error types
 */
export class BadRequestError extends AppError {
  constructor(message: string = 'Bad Request') {
    super(message, 400);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message: string = 'Unauthorized') {
    super(message, 401);
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string = 'Forbidden') {
    super(message, 403);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string = 'Not Found') {
    super(message, 404);
  }
}

export class PayloadTooLargeError extends AppError {
  constructor(message: string = 'Payload Too Large') {
    super(message, 413);
  }
}

export class InternalServerError extends AppError {
  constructor(message: string = 'Internal Server Error') {
    super(message, 500);
  }
}

export interface ErrorResponse {
  error: string;
  message: string;
  statusCode: number;
  stack?: string;
}

/**
 * Status carried by errors raised outside our own hierarchy
 * (body-parser sets `statusCode`/`status` on parse and size errors)
 */
function resolveStatusCode(err: Error): number {
  if (err instanceof AppError) {
    return err.statusCode;
  }

  const candidate: unknown =
    'statusCode' in err ? err.statusCode : 'status' in err ? err.status : undefined;

  if (typeof candidate === 'number' && candidate >= 400 && candidate < 600) {
    return candidate;
  }

  return 500;
}

/**
 * Error response formatter
 */
function formatErrorResponse(
  error: Error,
  statusCode: number,
  includeStack: boolean = false
): ErrorResponse {
  // Never leak internals of unexpected failures
  const exposeMessage = error instanceof AppError || statusCode < 500;

  const response: ErrorResponse = {
    error: exposeMessage ? error.name : 'InternalServerError',
    message: exposeMessage ? error.message : 'Internal Server Error',
    statusCode,
  };

  if (includeStack && error.stack) {
    response.stack = error.stack;
  }

  return response;
}

/**
 * Global error handling middleware
 * Must be registered after all routes
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  // Express recognises error handlers by arity
  _next: NextFunction
): void {
  const statusCode = resolveStatusCode(err);

  const meta = {
    method: req.method,
    url: req.url,
    statusCode,
    message: err.message,
  };

  if (statusCode >= 500) {
    logger.error('Error handling request:', { ...meta, stack: err.stack });
  } else {
    logger.warn('Request rejected:', meta);
  }

  // Determine if we should include stack trace
  const includeStack = config.nodeEnv === 'development';

  res.status(statusCode).json(formatErrorResponse(err, statusCode, includeStack));
}

/**
 * Async error wrapper
 * Wraps async route handlers to catch errors
 *
 * Usage:
 *   router.get('/path', asyncHandler(async (req, res) => {
 *     // async code
 *   }));
 */
export function asyncHandler<Req extends Request = Request>(
  fn: (req: Req, res: Response, next: NextFunction) => Promise<unknown>
) {
  return (req: Req, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

/**
 * 404 Not Found handler
 * Catches all unmatched routes
 */
export function notFoundHandler(req: Request, res: Response, next: NextFunction): void {
  const error = new NotFoundError(`Route not found: ${req.method} ${req.url}`);
  next(error);
}

/**
 * PostgreSQL error shape (subset)
 */
function pgErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Database error handler
 * Converts database errors to appropriate HTTP errors
 */
export function handleDatabaseError(error: unknown): never {
  if (error instanceof AppError) {
    throw error;
  }

  // Check for specific PostgreSQL error codes
  const code = pgErrorCode(error);

  if (error instanceof Error) {
    logError(error, { source: 'database', code });
  } else {
    logger.error('Database error:', { error });
  }

  if (code === '23505') {
    // Unique violation
    throw new BadRequestError('Resource already exists');
  } else if (code === '23503') {
    // Foreign key violation
    throw new BadRequestError('Referenced resource does not exist');
  } else if (code === '23502') {
    // Not null violation
    throw new BadRequestError('Required field is missing');
  }

  // Generic database error
  throw new InternalServerError('Database operation failed');
}
