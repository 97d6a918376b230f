import type { UserId } from '../domain/certification';
import type { Reservation } from '../domain/reservation';
import type { ResourceId } from '../domain/resource';

export type ReservationChange =
  | { type: 'insert'; reservation: Reservation }
  | { type: 'update'; reservation: Reservation };

export interface ReservationRangeFilter {
  from?: Date;
  to?: Date;
  includeCancelled?: boolean;
}

export interface ReservationRepository {
  /** Applies every change or none of them. */
  commit(changes: ReservationChange[]): Promise<void>;
  findById(id: string): Promise<Reservation | null>;
  /** Pending and confirmed reservations across all resources, for rebuilding the index. */
  findActive(): Promise<Reservation[]>;
  findByResource(resourceId: ResourceId, filter?: ReservationRangeFilter): Promise<Reservation[]>;
  findByRequester(requesterId: UserId): Promise<Reservation[]>;
}
