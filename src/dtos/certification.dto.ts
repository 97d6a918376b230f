import { z } from 'zod';

import { identifierSchema, isoDateTimeSchema } from './reservation.common';

export const certificationParamsSchema = z.object({
  id: identifierSchema,
  userId: identifierSchema
});

export const grantCertificationBodySchema = z
  .object({
    expiresAt: isoDateTimeSchema.nullish()
  })
  .default({});

export const certificationResourceSchema = z.object({
  userId: identifierSchema,
  machineId: identifierSchema,
  grantedAt: isoDateTimeSchema,
  expiresAt: isoDateTimeSchema.nullable()
});

export type GrantCertificationBody = z.infer<typeof grantCertificationBodySchema>;
export type CertificationResource = z.infer<typeof certificationResourceSchema>;
