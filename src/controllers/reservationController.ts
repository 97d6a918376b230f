import type { Response } from 'express';
import { Router } from 'express';

import { logger, runWithSpan } from '@makerspace/shared';

import type { ReservationService } from '../application/services/reservationService';
import type { Reservation } from '../domain/reservation';
import type { RejectionReason } from '../dtos';
import {
  createReservationRequestSchema,
  listReservationsQuerySchema,
  rescheduleReservationBodySchema,
  reservationParamsSchema,
  resourceParamsSchema,
  userParamsSchema
} from '../dtos';
import { requesterOf, requireRequester } from '../infrastructure/http/requesterIdentity';

export interface ReservationControllerDependencies {
  service: ReservationService;
}

export const REJECTION_STATUS: Record<RejectionReason, number> = {
  NotFound: 404,
  InvalidSlot: 422,
  NotCertified: 403,
  CapacityExceeded: 409
};

/** Aborts when the client goes away before a response was written. */
function abortOnDisconnect(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
}

function sendRejection(res: Response, reason: RejectionReason, reservation?: Reservation): void {
  res.status(REJECTION_STATUS[reason]).json({
    outcome: 'rejected',
    reason,
    reservation: reservation?.toDTO()
  });
}

export function createReservationController({ service }: ReservationControllerDependencies): Router {
  const router = Router();

  router.post('/reservations', requireRequester, async (req, res, next) => {
    try {
      await runWithSpan('Controller:POST /reservations', async () => {
        const payload = createReservationRequestSchema.parse(req.body);
        const requesterId = requesterOf(res);

        const requestLogger = res.locals.logger ?? logger.withContext({ requesterId });
        requestLogger.info({ route: '/reservations', payload }, 'Booking reservation');

        const result = await service.book(
          payload.resourceId,
          requesterId,
          { start: payload.start, end: payload.end },
          { signal: abortOnDisconnect(res) }
        );

        if (result.outcome === 'rejected') {
          sendRejection(res, result.reason, result.reservation);
          return;
        }

        res.status(201).json({ outcome: 'confirmed', reservation: result.reservation.toDTO() });
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/reservations/:id', async (req, res, next) => {
    try {
      await runWithSpan('Controller:GET /reservations/:id', async () => {
        const params = reservationParamsSchema.parse(req.params);

        const reservation = await service.get(params.id);
        if (!reservation) {
          res.status(404).json({ error: 'NotFoundError', message: 'Reservation not found' });
          return;
        }

        res.status(200).json(reservation.toDTO());
      });
    } catch (error) {
      next(error);
    }
  });

  router.post('/reservations/:id/cancel', requireRequester, async (req, res, next) => {
    try {
      await runWithSpan('Controller:POST /reservations/:id/cancel', async () => {
        const params = reservationParamsSchema.parse(req.params);

        const requestLogger = res.locals.logger ?? logger;
        requestLogger.info(
          { route: '/reservations/:id/cancel', reservationId: params.id },
          'Cancelling reservation'
        );

        const result = await service.cancel(params.id, { signal: abortOnDisconnect(res) });
        if (result.outcome === 'not_found') {
          res.status(404).json({ outcome: 'not_found' });
          return;
        }

        res.status(200).json({ outcome: result.outcome, reservation: result.reservation.toDTO() });
      });
    } catch (error) {
      next(error);
    }
  });

  router.post('/reservations/:id/reschedule', requireRequester, async (req, res, next) => {
    try {
      await runWithSpan('Controller:POST /reservations/:id/reschedule', async () => {
        const params = reservationParamsSchema.parse(req.params);
        const body = rescheduleReservationBodySchema.parse(req.body);

        const requestLogger = res.locals.logger ?? logger;
        requestLogger.info(
          { route: '/reservations/:id/reschedule', reservationId: params.id, body },
          'Rescheduling reservation'
        );

        const result = await service.reschedule(params.id, body, {
          signal: abortOnDisconnect(res)
        });
        if (result.outcome === 'rejected') {
          sendRejection(res, result.reason);
          return;
        }

        res.status(200).json({
          outcome: 'rescheduled',
          reservation: result.reservation.toDTO(),
          previous: result.previous.toDTO()
        });
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/resources/:id/reservations', async (req, res, next) => {
    try {
      await runWithSpan('Controller:GET /resources/:id/reservations', async () => {
        const params = resourceParamsSchema.parse(req.params);
        const query = listReservationsQuerySchema.parse(req.query);

        const reservations = await service.listForResource(params.id, {
          from: query.from ? new Date(query.from) : undefined,
          to: query.to ? new Date(query.to) : undefined,
          includeCancelled: query.includeCancelled
        });
        res.status(200).json(reservations.map((reservation) => reservation.toDTO()));
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/users/:userId/reservations', async (req, res, next) => {
    try {
      await runWithSpan('Controller:GET /users/:userId/reservations', async () => {
        const params = userParamsSchema.parse(req.params);

        const reservations = await service.listForRequester(params.userId);
        res.status(200).json(reservations.map((reservation) => reservation.toDTO()));
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
