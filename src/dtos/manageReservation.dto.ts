import { z } from 'zod';

import { slotBodySchema } from './createReservation.dto';
import { identifierSchema, isoDateTimeSchema } from './reservation.common';

export const reservationParamsSchema = z.object({
  id: identifierSchema
});

export const rescheduleReservationBodySchema = slotBodySchema;

export const listReservationsQuerySchema = z
  .object({
    from: isoDateTimeSchema.optional(),
    to: isoDateTimeSchema.optional(),
    includeCancelled: z
      .enum(['true', 'false'])
      .optional()
      .transform((value) => value === 'true')
  })
  .refine((query) => !query.from || !query.to || new Date(query.from) < new Date(query.to), {
    message: 'from must be before to',
    path: ['from']
  });

export const userParamsSchema = z.object({
  userId: identifierSchema
});

export type ReservationParams = z.infer<typeof reservationParamsSchema>;
export type RescheduleReservationBody = z.infer<typeof rescheduleReservationBodySchema>;
export type ListReservationsQuery = z.infer<typeof listReservationsQuerySchema>;
