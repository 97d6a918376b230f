import { z } from 'zod';

import {
  identifierSchema,
  isoDateTimeSchema,
  rejectionReasonSchema,
  reservationStatusSchema
} from './reservation.common';

export const reservationResourceSchema = z.object({
  reservationId: z.string().uuid(),
  resourceId: identifierSchema,
  requesterId: identifierSchema,
  start: isoDateTimeSchema,
  end: isoDateTimeSchema,
  status: reservationStatusSchema,
  rejectionReason: rejectionReasonSchema.optional(),
  supersedes: z.string().uuid().optional(),
  supersededBy: z.string().uuid().optional(),
  createdAt: isoDateTimeSchema,
  updatedAt: isoDateTimeSchema,
  cancelledAt: isoDateTimeSchema.optional()
});

export const slotBodySchema = z.object({
  start: isoDateTimeSchema,
  end: isoDateTimeSchema
});

export const createReservationRequestSchema = slotBodySchema.extend({
  resourceId: identifierSchema
});

export type ReservationResource = z.infer<typeof reservationResourceSchema>;
export type SlotBody = z.infer<typeof slotBodySchema>;
export type CreateReservationRequest = z.infer<typeof createReservationRequestSchema>;
