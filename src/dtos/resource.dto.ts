import { z } from 'zod';

import { identifierSchema, isoDateTimeSchema, resourceKindSchema } from './reservation.common';

export const resourceDescriptorSchema = z.object({
  id: identifierSchema,
  kind: resourceKindSchema,
  name: z.string(),
  capacity: z.number().int().positive(),
  certificationRequired: z.boolean(),
  createdAt: isoDateTimeSchema,
  updatedAt: isoDateTimeSchema
});

export const registerResourceRequestSchema = z.object({
  id: identifierSchema,
  kind: resourceKindSchema,
  name: z.string().trim().min(1).max(200).optional(),
  capacity: z.number().int().positive().optional(),
  certificationRequired: z.boolean().optional()
});

export const updateResourceRequestSchema = z
  .object({
    capacity: z.number().int().positive().optional(),
    certificationRequired: z.boolean().optional()
  })
  .refine((body) => body.capacity !== undefined || body.certificationRequired !== undefined, {
    message: 'Provide capacity or certificationRequired'
  });

export const resourceParamsSchema = z.object({
  id: identifierSchema
});

export const listResourcesQuerySchema = z.object({
  kind: resourceKindSchema.optional()
});

export const availabilityQuerySchema = z.object({
  start: isoDateTimeSchema,
  end: isoDateTimeSchema
});

export type ResourceDescriptor = z.infer<typeof resourceDescriptorSchema>;
export type RegisterResourceRequest = z.infer<typeof registerResourceRequestSchema>;
export type UpdateResourceRequest = z.infer<typeof updateResourceRequestSchema>;
export type AvailabilityQuery = z.infer<typeof availabilityQuerySchema>;
