/**
 * Centralized error handling middleware
 */

import { Request, Response, NextFunction } from 'express';
import { Server } from 'http';
import { ZodError } from 'zod';
import { StoreError } from '../database/errors';
import logger, { Logger } from '../utils/logger';

// Base error classes
export class AppError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public code?: string,
    public isOperational = true,
    public details?: unknown,
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(400, message, 'VALIDATION_ERROR', true, details);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(404, `${resource} not found`, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

// Request logging middleware
export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const start = Date.now();

  logger.info('Incoming request', {
    method: req.method,
    url: req.url,
    userAgent: req.get('User-Agent'),
    ip: req.ip,
  });

  res.on('finish', () => {
    logger.info('Response sent', {
      method: req.method,
      url: req.url,
      statusCode: res.statusCode,
      duration: `${Date.now() - start}ms`,
    });
  });

  next();
};

// Validation error handler
const handleValidationError = (error: ZodError): AppError => {
  const messages = error.errors.map((err) => {
    const path = err.path.join('.');
    return `${path}: ${err.message}`;
  });

  return new ValidationError(`Validation failed: ${messages.join(', ')}`, error.errors);
};

const storeErrorStatus: Record<StoreError['code'], number> = {
  NOT_FOUND: 404,
  UNIQUE_CONSTRAINT_VIOLATION: 409,
  FOREIGN_KEY_VIOLATION: 422,
  INVALID_ENUM: 422,
  MISSING_FIELD: 400,
  LOCK_CONTENTION: 503,
  STORAGE_UNAVAILABLE: 503,
  CORRUPT_VALUE: 500,
};

// Store error handler; keeps the entity, field and id for the client
const handleStoreError = (error: StoreError): AppError =>
  new AppError(storeErrorStatus[error.code], error.message, error.code, true, {
    entity: error.entity,
    field: error.field,
    id: error.id,
    retryable: error.retryable,
  });

// express.json() failures carry the client status and a body-parser type
interface BodyParserError extends Error {
  status: number;
  type?: unknown;
}

const isBodyParserError = (error: Error): error is BodyParserError =>
  'status' in error && typeof error.status === 'number' && error.status < 500;

const handleBodyParserError = (error: BodyParserError): AppError => {
  if (error.type === 'entity.too.large') {
    return new AppError(413, 'Request body too large', 'PAYLOAD_TOO_LARGE');
  }
  if (error.type === 'entity.parse.failed') {
    return new ValidationError(`Malformed JSON body: ${error.message}`);
  }
  return new AppError(error.status, error.message, 'BAD_REQUEST');
};

// Main error handling middleware
export const errorHandler = (
  error: Error,
  req: Request,
  res: Response,
  // Express recognises error middleware by its four parameters
  next: NextFunction,
) => {
  let appError: AppError;

  if (error instanceof AppError) {
    appError = error;
  } else if (error instanceof ZodError) {
    appError = handleValidationError(error);
  } else if (error instanceof StoreError) {
    appError = handleStoreError(error);
  } else if (isBodyParserError(error)) {
    appError = handleBodyParserError(error);
  } else {
    // Unknown error - don't leak details in production
    appError = new AppError(
      500,
      process.env.NODE_ENV === 'production' ? 'Something went wrong' : error.message,
      'INTERNAL_ERROR',
      false,
    );
  }

  const logData = {
    error: {
      name: appError.name,
      message: appError.message,
      code: appError.code,
      statusCode: appError.statusCode,
      stack: appError.stack,
    },
    request: {
      method: req.method,
      url: req.url,
      body: req.body,
    },
  };

  if (appError.statusCode >= 500) {
    logger.error('Server error', logData);
  } else {
    logger.warn('Client error', logData);
  }

  const response: {
    error: { message: string; code: string; details?: unknown; stack?: string };
  } = {
    error: {
      message: appError.message,
      code: appError.code || 'UNKNOWN_ERROR',
    },
  };

  if (appError.details !== undefined) {
    response.error.details = appError.details;
  }
  if (process.env.NODE_ENV === 'development' && !appError.isOperational) {
    response.error.stack = appError.stack;
  }

  res.status(appError.statusCode).json(response);
};

// 404 handler for unmatched routes
export const notFoundHandler = (req: Request, res: Response, next: NextFunction) => {
  next(new NotFoundError(`Route ${req.method} ${req.path}`));
};

// Graceful shutdown handler
export const gracefulShutdown = (server: Server, release: () => void, log: Logger) => {
  return (signal: string) => {
    log.info(`Received ${signal}. Starting graceful shutdown...`);

    server.close((err?: Error) => {
      release();

      if (err) {
        log.error('Error during server shutdown:', err);
        process.exit(1);
      }

      log.info('Server shut down gracefully');
      process.exit(0);
    });

    // Force shutdown after timeout
    setTimeout(() => {
      log.error('Forcing shutdown after timeout');
      release();
      process.exit(1);
    }, 10000).unref();
  };
};
