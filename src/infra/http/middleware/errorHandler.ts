import type { ErrorRequestHandler } from 'express';
import type { Logger } from 'pino';

export interface ErrorResponse {
  code: string;
  message: string;
}

/**
 * Last middleware in the chain. The side-channel has no client-facing
 * errors of its own, so anything that reaches here is a 500.
 */
export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    logger.error({ err, method: req.method, path: req.path }, 'Unhandled HTTP error');

    const response: ErrorResponse = {
      code: 'INTERNAL_ERROR',
      message: 'Internal server error',
    };
    res.status(500).json(response);
  };
}
