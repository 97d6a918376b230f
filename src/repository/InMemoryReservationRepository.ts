import { ConflictError, NotFoundError } from '@makerspace/shared';

import type { UserId } from '../domain/certification';
import { Reservation, type ReservationDatabaseRow } from '../domain/reservation';
import type { ResourceId } from '../domain/resource';
import type {
  ReservationChange,
  ReservationRangeFilter,
  ReservationRepository
} from './IReservationRepository';

/**
 * Keeps rows in their persisted shape so callers never share instances with the
 * store, mirroring what a round-trip through PostgreSQL gives.
 */
export class InMemoryReservationRepository implements ReservationRepository {
  private readonly rows = new Map<string, ReservationDatabaseRow>();

  async commit(changes: ReservationChange[]): Promise<void> {
    const staged = new Map<string, ReservationDatabaseRow>();

    for (const change of changes) {
      const id = change.reservation.id;
      const exists = this.rows.has(id) || staged.has(id);

      if (change.type === 'insert' && exists) {
        throw new ConflictError('Reservation id already used', { reservationId: id });
      }
      if (change.type === 'update' && !exists) {
        throw new NotFoundError('Reservation not found', { reservationId: id });
      }

      staged.set(id, change.reservation.toPersistence());
    }

    for (const [id, row] of staged) {
      this.rows.set(id, row);
    }
  }

  async findById(id: string): Promise<Reservation | null> {
    const row = this.rows.get(id);
    return row ? Reservation.fromPersistence(row) : null;
  }

  async findActive(): Promise<Reservation[]> {
    return this.select((row) => row.status !== 'cancelled');
  }

  async findByResource(
    resourceId: ResourceId,
    filter: ReservationRangeFilter = {}
  ): Promise<Reservation[]> {
    const from = filter.from?.getTime();
    const to = filter.to?.getTime();

    return this.select((row) => {
      if (row.resource_id !== resourceId) return false;
      if (!filter.includeCancelled && row.status === 'cancelled') return false;
      if (to !== undefined && new Date(row.start_ts).getTime() >= to) return false;
      if (from !== undefined && new Date(row.end_ts).getTime() <= from) return false;
      return true;
    });
  }

  async findByRequester(requesterId: UserId): Promise<Reservation[]> {
    return this.select((row) => row.requester_id === requesterId);
  }

  /** Rows in start order, ties broken by id. */
  private select(predicate: (row: ReservationDatabaseRow) => boolean): Reservation[] {
    return Array.from(this.rows.values())
      .filter(predicate)
      .map((row) => Reservation.fromPersistence(row))
      .sort(
        (a, b) => a.slot.startMs - b.slot.startMs || a.id.localeCompare(b.id)
      );
  }
}
