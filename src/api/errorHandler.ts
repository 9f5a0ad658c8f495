import type { Request, Response, NextFunction } from 'express';
import { isAppError } from '../domain/errors.js';
import { logger } from '../infra/logger.js';
import type { Env } from '../infra/env.js';

/**
 * Global error handler middleware
 * Maps AppError subclasses to their HTTP status and stable error code
 */
export function createErrorHandler(env: Pick<Env, 'NODE_ENV'>) {
  return (err: Error, req: Request, res: Response, _next: NextFunction): void => {
    const context = {
      method: req.method,
      path: req.path,
      ip: req.ip,
      userAgent: req.get('user-agent'),
    };

    if (isAppError(err)) {
      const meta = {
        code: err.code,
        message: err.message,
        details: redactSecrets(err.details),
        stack: env.NODE_ENV === 'development' ? err.stack : undefined,
        ...context,
      };
      // 4xx are logged as warnings
      if (err.statusCode >= 500) {
        logger.error('Application error', meta);
      } else {
        logger.warn('Application error', meta);
      }

      res.status(err.statusCode).json({
        error: err.code,
        message: err.message,
        ...(err.details ? { details: redactSecrets(err.details) } : {}),
      });
    } else if (err.name === 'SyntaxError' && 'body' in err) {
      logger.warn('Invalid JSON in request', {
        message: err.message,
        ...context,
      });

      res.status(400).json({
        error: 'INVALID_JSON',
        message: 'Invalid JSON in request body',
      });
    } else {
      logger.error('Unexpected error', {
        message: err.message,
        name: err.name,
        stack: err.stack,
        ...context,
      });

      res.status(500).json({
        error: 'INTERNAL_SERVER_ERROR',
        message: env.NODE_ENV === 'development' ? err.message : 'An unexpected error occurred',
      });
    }
  };
}

const SENSITIVE_KEY_PATTERNS = [/password/i, /secret/i, /token/i, /api[_-]?key/i, /credential/i];

/**
 * Masks sensitive keys before error details leave the process
 */
export function redactSecrets(obj: unknown): unknown {
  if (Array.isArray(obj)) {
    return obj.map(redactSecrets);
  }
  if (!obj || typeof obj !== 'object') {
    return obj;
  }

  const redacted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (SENSITIVE_KEY_PATTERNS.some((pattern) => pattern.test(key))) {
      redacted[key] = '[REDACTED]';
    } else {
      redacted[key] = redactSecrets(value);
    }
  }
  return redacted;
}

/**
 * 404 Not Found handler
 */
export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({
    error: 'NOT_FOUND',
    message: 'The requested resource was not found',
  });
}
