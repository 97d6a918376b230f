import { describe, expect, it } from 'vitest';

import { ConflictError, NotFoundError } from '@makerspace/shared';

import { Reservation } from '../../../src/domain/reservation';
import { TimeSlot } from '../../../src/domain/timeSlot';
import { InMemoryReservationRepository } from '../../../src/repository/InMemoryReservationRepository';

function reservation(id: string, start: string, end: string): Reservation {
  return Reservation.request({
    id,
    resourceId: 'studio',
    requesterId: 'member-1',
    slot: TimeSlot.of({ start, end })
  }).confirm();
}

describe('InMemoryReservationRepository', () => {
  it('applies nothing when one change in a commit fails', async () => {
    const repository = new InMemoryReservationRepository();
    const kept = reservation('a', '2030-03-01T10:00:00Z', '2030-03-01T11:00:00Z');
    await repository.commit([{ type: 'insert', reservation: kept }]);

    await expect(
      repository.commit([
        { type: 'update', reservation: kept.cancel() },
        { type: 'update', reservation: reservation('missing', '2030-03-01T12:00:00Z', '2030-03-01T13:00:00Z') }
      ])
    ).rejects.toBeInstanceOf(NotFoundError);

    expect((await repository.findById('a'))?.status).toBe('confirmed');
  });

  it('refuses to reuse an id', async () => {
    const repository = new InMemoryReservationRepository();
    const first = reservation('a', '2030-03-01T10:00:00Z', '2030-03-01T11:00:00Z');
    await repository.commit([{ type: 'insert', reservation: first }]);

    await expect(repository.commit([{ type: 'insert', reservation: first }])).rejects.toBeInstanceOf(
      ConflictError
    );
  });

  it('hands out copies that do not alias stored state', async () => {
    const repository = new InMemoryReservationRepository();
    await repository.commit([
      { type: 'insert', reservation: reservation('a', '2030-03-01T10:00:00Z', '2030-03-01T11:00:00Z') }
    ]);

    const first = await repository.findById('a');
    const second = await repository.findById('a');

    expect(first).not.toBe(second);
    expect(first?.toDTO()).toEqual(second?.toDTO());
  });

  it('returns only active reservations for the index rebuild', async () => {
    const repository = new InMemoryReservationRepository();
    const active = reservation('b', '2030-03-01T10:00:00Z', '2030-03-01T11:00:00Z');
    const cancelled = reservation('a', '2030-03-01T09:00:00Z', '2030-03-01T10:00:00Z').cancel();
    await repository.commit([
      { type: 'insert', reservation: active },
      { type: 'insert', reservation: cancelled }
    ]);

    expect((await repository.findActive()).map((r) => r.id)).toEqual(['b']);
  });
});
