import { describe, expect, it } from 'vitest';

import {
  createReservationRequestSchema,
  grantCertificationBodySchema,
  listReservationsQuerySchema,
  registerResourceRequestSchema,
  updateResourceRequestSchema
} from '../../src/dtos';

describe('reservation DTO schemas', () => {
  const baseRequest = {
    resourceId: 'laser-1',
    start: '2030-03-01T10:00:00Z',
    end: '2030-03-01T11:00:00+01:00'
  };

  it('accepts ISO timestamps with offsets', () => {
    expect(createReservationRequestSchema.parse(baseRequest)).toEqual(baseRequest);
  });

  it('rejects timestamps without a zone', () => {
    expect(
      createReservationRequestSchema.safeParse({ ...baseRequest, start: '2030-03-01 10:00' }).success
    ).toBe(false);
  });

  it('leaves slot ordering to the booking rules', () => {
    const inverted = { ...baseRequest, start: '2030-03-01T12:00:00Z' };

    expect(createReservationRequestSchema.safeParse(inverted).success).toBe(true);
  });

  it('parses includeCancelled as a boolean', () => {
    expect(listReservationsQuerySchema.parse({ includeCancelled: 'true' }).includeCancelled).toBe(true);
    expect(listReservationsQuerySchema.parse({}).includeCancelled).toBe(false);
  });

  it('rejects a listing range that ends before it starts', () => {
    const result = listReservationsQuerySchema.safeParse({
      from: '2030-03-02T00:00:00Z',
      to: '2030-03-01T00:00:00Z'
    });

    expect(result.success).toBe(false);
  });

  it('requires a known resource kind', () => {
    expect(registerResourceRequestSchema.safeParse({ id: 'x', kind: 'vehicle' }).success).toBe(false);
  });

  it('requires at least one field on update', () => {
    expect(updateResourceRequestSchema.safeParse({}).success).toBe(false);
    expect(updateResourceRequestSchema.parse({ certificationRequired: false })).toEqual({
      certificationRequired: false
    });
  });

  it('defaults an empty grant body', () => {
    expect(grantCertificationBodySchema.parse(undefined)).toEqual({});
    expect(grantCertificationBodySchema.parse({ expiresAt: null })).toEqual({ expiresAt: null });
  });
});
