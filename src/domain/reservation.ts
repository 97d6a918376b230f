import { randomUUID } from 'node:crypto';

import { ValidationError } from '@makerspace/shared';

import {
  rejectionReasonSchema,
  reservationStatusSchema,
  type RejectionReason,
  type ReservationResource,
  type ReservationStatus
} from '../dtos';
import { TimeSlot } from './timeSlot';
import type { ResourceId } from './resource';
import type { UserId } from './certification';

export interface ReservationProps {
  id: string;
  resourceId: ResourceId;
  requesterId: UserId;
  slot: TimeSlot;
  status: ReservationStatus;
  rejectionReason: RejectionReason | null;
  supersedes: string | null;
  supersededBy: string | null;
  createdAt: Date;
  updatedAt: Date;
  cancelledAt: Date | null;
}

export interface RequestReservationProperties {
  id?: string;
  resourceId: ResourceId;
  requesterId: UserId;
  slot: TimeSlot;
  supersedes?: string | null;
  requestedAt?: Date;
}

/**
 * A booking record. Instances are immutable: every status transition returns a
 * new instance, so copies held by the availability index or by callers never
 * change underneath them.
 */
export class Reservation {
  private constructor(private readonly props: Readonly<ReservationProps>) {}

  static request(properties: RequestReservationProperties): Reservation {
    const now = properties.requestedAt ?? new Date();

    return new Reservation({
      id: properties.id ?? randomUUID(),
      resourceId: properties.resourceId,
      requesterId: properties.requesterId,
      slot: properties.slot,
      status: 'pending',
      rejectionReason: null,
      supersedes: properties.supersedes ?? null,
      supersededBy: null,
      createdAt: now,
      updatedAt: now,
      cancelledAt: null
    });
  }

  static fromPersistence(row: ReservationDatabaseRow): Reservation {
    return new Reservation({
      id: row.id,
      resourceId: row.resource_id,
      requesterId: row.requester_id,
      slot: TimeSlot.of({ start: row.start_ts, end: row.end_ts }),
      status: reservationStatusSchema.parse(row.status),
      rejectionReason: rejectionReasonSchema.nullable().parse(row.rejection_reason),
      supersedes: row.supersedes,
      supersededBy: row.superseded_by,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
      cancelledAt: row.cancelled_at === null ? null : new Date(row.cancelled_at)
    });
  }

  get id(): string {
    return this.props.id;
  }

  get resourceId(): ResourceId {
    return this.props.resourceId;
  }

  get requesterId(): UserId {
    return this.props.requesterId;
  }

  get slot(): TimeSlot {
    return this.props.slot;
  }

  get status(): ReservationStatus {
    return this.props.status;
  }

  get rejectionReason(): RejectionReason | null {
    return this.props.rejectionReason;
  }

  get supersedes(): string | null {
    return this.props.supersedes;
  }

  get supersededBy(): string | null {
    return this.props.supersededBy;
  }

  get createdAt(): Date {
    return this.props.createdAt;
  }

  get updatedAt(): Date {
    return this.props.updatedAt;
  }

  get cancelledAt(): Date | null {
    return this.props.cancelledAt;
  }

  /** Pending and confirmed reservations occupy capacity. */
  get isActive(): boolean {
    return this.props.status !== 'cancelled';
  }

  confirm(at: Date = new Date()): Reservation {
    if (this.props.status !== 'pending') {
      throw new ValidationError('Only pending reservations can be confirmed', {
        reservationId: this.props.id,
        status: this.props.status
      });
    }

    return this.with({ status: 'confirmed', updatedAt: at });
  }

  reject(reason: RejectionReason, at: Date = new Date()): Reservation {
    if (this.props.status !== 'pending') {
      throw new ValidationError('Only pending reservations can be rejected', {
        reservationId: this.props.id,
        status: this.props.status
      });
    }

    return this.with({ status: 'cancelled', rejectionReason: reason, updatedAt: at, cancelledAt: at });
  }

  cancel(at: Date = new Date()): Reservation {
    if (this.props.status === 'cancelled') {
      return this;
    }

    return this.with({ status: 'cancelled', updatedAt: at, cancelledAt: at });
  }

  supersede(replacementId: string, at: Date = new Date()): Reservation {
    if (this.props.status !== 'confirmed') {
      throw new ValidationError('Only confirmed reservations can be rescheduled', {
        reservationId: this.props.id,
        status: this.props.status
      });
    }

    return this.with({
      status: 'cancelled',
      supersededBy: replacementId,
      updatedAt: at,
      cancelledAt: at
    });
  }

  toPersistence(): ReservationDatabaseRow {
    return {
      id: this.props.id,
      resource_id: this.props.resourceId,
      requester_id: this.props.requesterId,
      start_ts: this.props.slot.start.toISOString(),
      end_ts: this.props.slot.end.toISOString(),
      status: this.props.status,
      rejection_reason: this.props.rejectionReason,
      supersedes: this.props.supersedes,
      superseded_by: this.props.supersededBy,
      created_at: this.props.createdAt.toISOString(),
      updated_at: this.props.updatedAt.toISOString(),
      cancelled_at: this.props.cancelledAt?.toISOString() ?? null
    };
  }

  toDTO(): ReservationResource {
    return {
      reservationId: this.props.id,
      resourceId: this.props.resourceId,
      requesterId: this.props.requesterId,
      start: this.props.slot.start.toISOString(),
      end: this.props.slot.end.toISOString(),
      status: this.props.status,
      rejectionReason: this.props.rejectionReason ?? undefined,
      supersedes: this.props.supersedes ?? undefined,
      supersededBy: this.props.supersededBy ?? undefined,
      createdAt: this.props.createdAt.toISOString(),
      updatedAt: this.props.updatedAt.toISOString(),
      cancelledAt: this.props.cancelledAt?.toISOString()
    };
  }

  private with(changes: Partial<ReservationProps>): Reservation {
    return new Reservation({ ...this.props, ...changes });
  }
}

export type ReservationDatabaseRow = {
  id: string;
  resource_id: string;
  requester_id: string;
  start_ts: string | Date;
  end_ts: string | Date;
  status: string;
  rejection_reason: string | null;
  supersedes: string | null;
  superseded_by: string | null;
  created_at: string | Date;
  updated_at: string | Date;
  cancelled_at: string | Date | null;
};
