import type { RequestHandler, Response } from 'express';

import { UnauthorizedError, logger } from '@makerspace/shared';

import { identifierSchema } from '../../dtos';

export const REQUESTER_HEADER = 'x-requester-id';

/**
 * The requester id is opaque here; an upstream gateway is trusted to have
 * authenticated it.
 */
export const requireRequester: RequestHandler = (req, res, next) => {
  const parsed = identifierSchema.safeParse(req.header(REQUESTER_HEADER) ?? '');
  if (!parsed.success) {
    next(new UnauthorizedError(`Missing or invalid ${REQUESTER_HEADER} header`));
    return;
  }

  res.locals.requesterId = parsed.data;
  updateLoggerContext(res, { requesterId: parsed.data });
  next();
};

/** Same as `requireRequester` but lets anonymous requests through. */
export const optionalRequester: RequestHandler = (req, res, next) => {
  const header = req.header(REQUESTER_HEADER);
  if (header === undefined) {
    next();
    return;
  }
  requireRequester(req, res, next);
};

export function requesterOf(res: Response): string {
  const requesterId = res.locals.requesterId;
  if (!requesterId) {
    throw new UnauthorizedError('Requester identity not established');
  }
  return requesterId;
}

function updateLoggerContext(res: Response, extra: { requesterId: string }): void {
  const merged = {
    ...(res.locals.logContext ?? {}),
    ...extra
  };
  res.locals.logContext = merged;
  res.locals.logger = logger.withContext(merged);
}
