import { z } from 'zod';

import { RESOURCE_KINDS } from '../domain/resource';

export const reservationStatusSchema = z.enum(['pending', 'confirmed', 'cancelled']);

export const rejectionReasonSchema = z.enum([
  'NotFound',
  'InvalidSlot',
  'NotCertified',
  'CapacityExceeded'
]);

export const resourceKindSchema = z.enum(RESOURCE_KINDS);

export const identifierSchema = z.string().trim().min(1).max(128);

export const isoDateTimeSchema = z.string().datetime({ offset: true });

export type ReservationStatus = z.infer<typeof reservationStatusSchema>;
export type RejectionReason = z.infer<typeof rejectionReasonSchema>;
