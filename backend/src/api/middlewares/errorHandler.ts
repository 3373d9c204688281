import type { NextFunction, Request, Response } from 'express';
import { config } from '../../config/index.js';
import { isAppError } from '../../utils/errors.js';

// body-parser and friends attach an HTTP status to the errors they raise.
const clientStatusOf = (err: unknown): number | null => {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status >= 400 && err.status < 500 ? err.status : null;
  }
  return null;
};

export function notFoundHandler(_req: Request, res: Response) {
  res.status(404).json({ error: 'Route not found', code: 'ROUTE_NOT_FOUND' });
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (isAppError(err)) {
    res.status(err.statusCode).json({
      error: err.name,
      code: err.code,
      message: err.message,
      details: err.details,
    });
    return;
  }

  const clientStatus = clientStatusOf(err);
  if (clientStatus !== null) {
    res.status(clientStatus).json({
      error: 'Bad request',
      code: 'BAD_REQUEST',
      message: err instanceof Error ? err.message : undefined,
    });
    return;
  }

  console.error('Error:', err);
  res.status(500).json({
    error: 'Internal server error',
    code: 'INTERNAL_ERROR',
    message: config.env === 'development' && err instanceof Error ? err.message : undefined,
  });
}
