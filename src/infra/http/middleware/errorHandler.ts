import type { ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { ConcurrencyError, NotFoundError } from '../../../application/errors.js';
import type { Logger } from '../../logging/logger.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

/**
 * Maps thrown errors to responses. Domain failures never reach this
 * handler: they travel inside an Outcome and are answered by sendOutcome.
 */
export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  return (err: Error, _req, res, _next) => {
    if (err instanceof ZodError) {
      const response: ErrorResponse = {
        code: 'VALIDATION_ERROR',
        message: 'Validation failed',
        details: {
          issues: err.errors.map((e) => ({
            path: e.path.join('.'),
            message: e.message,
          })),
        },
      };
      res.status(400).json(response);
      return;
    }

    if (err instanceof ConcurrencyError) {
      logger.warn('Concurrency conflict not resolved by retries', {
        expectedVersion: err.expectedVersion,
        actualVersion: err.actualVersion,
      });
      const response: ErrorResponse = {
        code: 'CONCURRENCY_CONFLICT',
        message: err.message,
        details: {
          expectedVersion: err.expectedVersion,
          actualVersion: err.actualVersion,
        },
      };
      res.status(409).json(response);
      return;
    }

    if (err.name === 'AbortError') {
      logger.info('Request aborted by client');
      if (!res.headersSent) {
        res.status(499).json({ code: 'REQUEST_ABORTED', message: 'Request aborted' });
      }
      return;
    }

    logger.error('Unhandled error', { name: err.name, error: err.message, stack: err.stack });

    if (err instanceof NotFoundError) {
      const response: ErrorResponse = { code: 'NOT_FOUND', message: err.message };
      res.status(404).json(response);
      return;
    }

    const response: ErrorResponse = {
      code: 'INTERNAL_ERROR',
      message: 'Internal server error',
    };
    res.status(500).json(response);
  };
}
