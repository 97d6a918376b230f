import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import { AppError, logger } from '@makerspace/shared';

interface ErrorResponseBody {
  error: string;
  message: string;
  details?: Record<string, unknown>;
}

function mapStatusCode(error: unknown): number {
  if (error instanceof ZodError) return 422;
  if (error instanceof AppError) return error.status;
  return 500;
}

export function errorMapper(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const status = mapStatusCode(err);
  const requestLogger = res.locals.logger ?? logger.withContext(res.locals.logContext ?? {});

  if (status >= 500) {
    requestLogger.error({ err, status, path: req.path, method: req.method }, 'Request failed');
  } else {
    requestLogger.warn({ err, status, path: req.path, method: req.method }, 'Request refused');
  }

  if (res.headersSent) {
    return;
  }

  const message =
    err instanceof AppError || err instanceof ZodError
      ? err.message
      : 'Unexpected error while processing request';
  const body: ErrorResponseBody = {
    error:
      err instanceof AppError
        ? err.name
        : err instanceof ZodError
          ? 'ValidationError'
          : 'InternalServerError',
    message
  };

  if (err instanceof AppError && err.details) {
    body.details = err.details;
  }

  if (err instanceof ZodError) {
    body.details = { issues: err.issues };
  }

  res.status(status).json(body);
}
