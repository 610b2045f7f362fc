import logger from '../utils/logger';
import {Request, Response, NextFunction, RequestHandler} from 'express';
import {BridgeError, errorMessage} from '../utils/errors';

/**
 * Error handling middleware
 */
interface ErrorResponse {
  error: string;
  code: string;
  timestamp: string;
  path: string;
  method: string;
  details?: unknown;
}

const errorHandler = (err: Error, req: Request, res: Response, _next: NextFunction) => {
  // Log the error
  logger.error('Application error:', {
    error: err.message,
    stack: err.stack,
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
    timestamp: new Date().toISOString()
  });

  let status = 500;
  let message = 'Internal server error';
  let code = 'INTERNAL_ERROR';
  let details: unknown = null;

  if (err.name === 'SyntaxError' && err.message.includes('JSON')) {
    status = 400;
    message = 'Invalid JSON';
    code = 'INVALID_JSON';
  }

  // Application errors carry their own code
  if (err instanceof BridgeError) {
    status = 503;
    message = err.message;
    code = err.code;
    details = err.details;
  }

  // Don't expose internal errors in production
  if (process.env.NODE_ENV === 'production' && status === 500) {
    message = 'Internal server error';
    details = null;
  }

  const errorResponse: ErrorResponse = {
    error: message,
    code,
    timestamp: new Date().toISOString(),
    path: req.originalUrl,
    method: req.method
  };

  if (details) {
    errorResponse.details = details;
  }

  res.status(status).json(errorResponse);
};

/**
 * 404 handler for unmatched routes
 */
const notFoundHandler = (req: Request, res: Response) => {
  logger.warn(`Route not found: ${req.method} ${req.originalUrl}`);

  res.status(404).json({
    error: 'Endpoint not found',
    code: 'ENDPOINT_NOT_FOUND',
    path: req.originalUrl,
    method: req.method,
    timestamp: new Date().toISOString(),
    availableEndpoints: {
      health: '/health',
      status: '/status'
    }
  });
};

/**
 * Async error wrapper
 * Wraps async route handlers to catch errors
 */
const asyncHandler = (fn: (req: Request, res: Response, next: NextFunction) => Promise<void>): RequestHandler => {
  return (req, res, next) => {
    void fn(req, res, next).catch(next);
  };
};

/**
 * Global error handlers for uncaught exceptions. Signals are left to the
 * worker, which drains its loops before exiting.
 */
const setupGlobalErrorHandlers = (): void => {
  process.on('uncaughtException', (err) => {
    logger.error('Uncaught Exception:', {error: err.message, stack: err.stack});
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error(`Unhandled Rejection: ${errorMessage(reason)}`);
    process.exit(1);
  });
};

export {
  errorHandler,
  notFoundHandler,
  asyncHandler,
  setupGlobalErrorHandlers
};
