import { ConflictError, NotFoundError, getDb, withTransaction } from '@makerspace/shared';
import type { Pool, PoolClient } from 'pg';
import { z } from 'zod';

import type { UserId } from '../domain/certification';
import { Reservation, type ReservationDatabaseRow } from '../domain/reservation';
import type { ResourceId } from '../domain/resource';
import type {
  ReservationChange,
  ReservationRangeFilter,
  ReservationRepository
} from './IReservationRepository';

const RESERVATION_COLUMNS = `
  id,
  resource_id,
  requester_id,
  start_ts,
  end_ts,
  status,
  rejection_reason,
  supersedes,
  superseded_by,
  created_at,
  updated_at,
  cancelled_at
`;

const UNIQUE_VIOLATION = '23505';

const reservationIdSchema = z.string().uuid();

function mapReservationRow(row: ReservationDatabaseRow): Reservation {
  return Reservation.fromPersistence(row);
}

function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}

export class PostgresReservationRepository implements ReservationRepository {
  constructor(private readonly db: Pick<Pool, 'query' | 'connect'> = getDb()) {}

  async commit(changes: ReservationChange[]): Promise<void> {
    await withTransaction(async (client) => {
      for (const change of changes) {
        if (change.type === 'insert') {
          await this.insert(change.reservation, client);
        } else {
          await this.update(change.reservation, client);
        }
      }
    }, this.db);
  }

  async findById(id: string): Promise<Reservation | null> {
    // The column is a UUID; anything else cannot match and would fail the cast.
    if (!reservationIdSchema.safeParse(id).success) {
      return null;
    }

    const { rows } = await this.db.query<ReservationDatabaseRow>(
      `SELECT ${RESERVATION_COLUMNS} FROM reservations WHERE id = $1`,
      [id]
    );
    return rows[0] ? mapReservationRow(rows[0]) : null;
  }

  async findActive(): Promise<Reservation[]> {
    const { rows } = await this.db.query<ReservationDatabaseRow>(
      `SELECT ${RESERVATION_COLUMNS}
         FROM reservations
        WHERE status IN ('pending', 'confirmed')
        ORDER BY resource_id, start_ts, id`
    );
    return rows.map(mapReservationRow);
  }

  async findByResource(
    resourceId: ResourceId,
    filter: ReservationRangeFilter = {}
  ): Promise<Reservation[]> {
    const { rows } = await this.db.query<ReservationDatabaseRow>(
      `SELECT ${RESERVATION_COLUMNS}
         FROM reservations
        WHERE resource_id = $1
          AND ($2::timestamptz IS NULL OR start_ts < $2)
          AND ($3::timestamptz IS NULL OR end_ts > $3)
          AND ($4::boolean OR status <> 'cancelled')
        ORDER BY start_ts, id`,
      [
        resourceId,
        filter.to?.toISOString() ?? null,
        filter.from?.toISOString() ?? null,
        filter.includeCancelled ?? false
      ]
    );
    return rows.map(mapReservationRow);
  }

  async findByRequester(requesterId: UserId): Promise<Reservation[]> {
    const { rows } = await this.db.query<ReservationDatabaseRow>(
      `SELECT ${RESERVATION_COLUMNS}
         FROM reservations
        WHERE requester_id = $1
        ORDER BY start_ts, id`,
      [requesterId]
    );
    return rows.map(mapReservationRow);
  }

  private async insert(reservation: Reservation, client: PoolClient): Promise<void> {
    const row = reservation.toPersistence();

    try {
      await client.query(
        `INSERT INTO reservations (${RESERVATION_COLUMNS})
         VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12)`,
        [
          row.id,
          row.resource_id,
          row.requester_id,
          row.start_ts,
          row.end_ts,
          row.status,
          row.rejection_reason,
          row.supersedes,
          row.superseded_by,
          row.created_at,
          row.updated_at,
          row.cancelled_at
        ]
      );
    } catch (error) {
      if (hasErrorCode(error, UNIQUE_VIOLATION)) {
        throw new ConflictError('Reservation id already used', { reservationId: row.id });
      }
      throw error;
    }
  }

  private async update(reservation: Reservation, client: PoolClient): Promise<void> {
    const row = reservation.toPersistence();
    const result = await client.query(
      `UPDATE reservations
          SET status = $2,
              rejection_reason = $3,
              superseded_by = $4,
              updated_at = $5,
              cancelled_at = $6
        WHERE id = $1`,
      [row.id, row.status, row.rejection_reason, row.superseded_by, row.updated_at, row.cancelled_at]
    );

    if (!result.rowCount) {
      throw new NotFoundError('Reservation not found', { reservationId: row.id });
    }
  }
}
