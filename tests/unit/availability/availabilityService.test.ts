import { beforeEach, describe, expect, it } from 'vitest';

import { NotFoundError, ValidationError } from '@makerspace/shared';

import { buildTestCore, slot, type TestCore } from '../../setup/buildCore';

let ctx: TestCore;

beforeEach(async () => {
  ctx = await buildTestCore();
  await ctx.core.registry.register({ id: 'laser-1', kind: 'machine', certificationRequired: true });
  await ctx.core.registry.register({ id: 'studio', kind: 'space', capacity: 2 });
});

describe('AvailabilityService', () => {
  it('reports full capacity on an empty resource', () => {
    const report = ctx.core.availability.checkAvailability({
      resourceId: 'studio',
      slot: slot('10:00', '11:00')
    });

    expect(report).toEqual({
      resourceId: 'studio',
      start: '2030-03-01T10:00:00.000Z',
      end: '2030-03-01T11:00:00.000Z',
      capacity: 2,
      remainingCapacity: 2,
      available: true,
      certificationRequired: false,
      authorized: undefined,
      conflict: null
    });
  });

  it('names the earliest conflicting reservation', async () => {
    await ctx.core.reservations.book('studio', 'member-2', slot('10:30', '11:30'));
    const first = await ctx.core.reservations.book('studio', 'member-1', slot('09:30', '10:15'));
    if (first.outcome !== 'confirmed') throw new Error('booking failed');

    const report = ctx.core.availability.checkAvailability({
      resourceId: 'studio',
      slot: slot('10:00', '11:00')
    });

    expect(report.remainingCapacity).toBe(0);
    expect(report.available).toBe(false);
    expect(report.conflict).toEqual({
      reservationId: first.reservation.id,
      requesterId: 'member-1',
      start: '2030-03-01T09:30:00.000Z',
      end: '2030-03-01T10:15:00.000Z'
    });
  });

  it('tells a requester whether they may book a certified machine', async () => {
    expect(
      ctx.core.availability.checkAvailability({
        resourceId: 'laser-1',
        slot: slot('10:00', '11:00'),
        requesterId: 'member-1'
      }).authorized
    ).toBe(false);

    await ctx.core.gate.grant('member-1', 'laser-1');

    const report = ctx.core.availability.checkAvailability({
      resourceId: 'laser-1',
      slot: slot('10:00', '11:00'),
      requesterId: 'member-1'
    });
    expect(report.certificationRequired).toBe(true);
    expect(report.authorized).toBe(true);
  });

  it('throws for unknown resources and invalid windows', () => {
    expect(() =>
      ctx.core.availability.checkAvailability({ resourceId: 'ghost', slot: slot('10:00', '11:00') })
    ).toThrow(NotFoundError);
    expect(() => ctx.core.availability.isAvailable('studio', slot('11:00', '10:00'))).toThrow(
      ValidationError
    );
  });
});
