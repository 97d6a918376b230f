import {
  LockTimeoutError,
  RESERVATION_CANCELLED_EVENT,
  RESERVATION_CONFIRMED_EVENT,
  RESERVATION_RESCHEDULED_EVENT,
  getEventBus,
  logger,
  reservationMetrics,
  runWithSpan,
  type IEventBus,
  type ReservationEventMap,
  type ReservationEventName
} from '@makerspace/shared';

import type { UserId } from '../../domain/certification';
import { Reservation } from '../../domain/reservation';
import type { ResourceId } from '../../domain/resource';
import { TimeSlot, type TimeSlotInput } from '../../domain/timeSlot';
import type { RejectionReason } from '../../dtos';
import type { AvailabilityIndex } from '../../modules/availability/domain/availabilityIndex';
import type { CertificationGate } from '../../modules/certification/application/certificationGate';
import {
  evaluate,
  type BookingRequest,
  type ConflictContext
} from '../../modules/conflicts/domain/conflictDetector';
import type { ResourceRegistry } from '../../modules/registry/application/resourceRegistry';
import type {
  ReservationChange,
  ReservationRangeFilter,
  ReservationRepository
} from '../../repository/IReservationRepository';
import { persist } from '../persistence';
import type { LockOptions, ResourceLockManager } from '../resourceLock';

export type BookingResult =
  | { outcome: 'confirmed'; reservation: Reservation }
  | { outcome: 'rejected'; reason: RejectionReason; reservation?: Reservation };

export type CancelResult =
  | { outcome: 'cancelled' | 'already_cancelled'; reservation: Reservation }
  | { outcome: 'not_found' };

export type RescheduleResult =
  | { outcome: 'rescheduled'; reservation: Reservation; previous: Reservation }
  | { outcome: 'rejected'; reason: RejectionReason };

export interface ReservationServiceDependencies {
  registry: ResourceRegistry;
  gate: CertificationGate;
  index: AvailabilityIndex;
  repository: ReservationRepository;
  locks: ResourceLockManager;
  eventBus?: IEventBus;
  clock?: () => Date;
}

/** Rejections that reference a known resource and a well-formed slot keep an audit record. */
const AUDITED_REJECTIONS: ReadonlySet<RejectionReason> = new Set(['NotCertified', 'CapacityExceeded']);

/**
 * Owns the reservation lifecycle. Each booking, cancellation and reschedule
 * runs evaluate-then-commit under the resource's lock; the repository commit
 * comes first and the index is only touched once it succeeds. Notifications go
 * out after the lock is released.
 */
export class ReservationService {
  private readonly registry: ResourceRegistry;
  private readonly index: AvailabilityIndex;
  private readonly repository: ReservationRepository;
  private readonly locks: ResourceLockManager;
  private readonly eventBus: IEventBus;
  private readonly clock: () => Date;
  private readonly context: ConflictContext;

  constructor(dependencies: ReservationServiceDependencies) {
    this.registry = dependencies.registry;
    this.index = dependencies.index;
    this.repository = dependencies.repository;
    this.locks = dependencies.locks;
    this.eventBus = dependencies.eventBus ?? getEventBus();
    this.clock = dependencies.clock ?? (() => new Date());

    const { registry, gate, index } = dependencies;
    this.context = {
      findResource: (id) => registry.find(id),
      isAuthorized: (userId, machineId, at) => gate.isAuthorized(userId, machineId, at),
      countOverlapping: (resourceId, slot, options) => index.countOverlapping(resourceId, slot, options)
    };
  }

  async book(
    resourceId: ResourceId,
    requesterId: UserId,
    slot: TimeSlotInput,
    options: LockOptions = {}
  ): Promise<BookingResult> {
    return runWithSpan<BookingResult>(
      'ReservationService.book',
      async () => {
        const result = await this.withResourceLock<BookingResult>(resourceId, options, async () => {
          const at = this.clock();
          const parsed = TimeSlot.tryCreate(slot);
          const pending = parsed
            ? Reservation.request({ resourceId, requesterId, slot: parsed, requestedAt: at })
            : null;

          const decision = evaluate({ resourceId, requesterId, slot }, this.context, at);

          if (decision.verdict === 'reject') {
            if (!pending || !AUDITED_REJECTIONS.has(decision.reason)) {
              return { outcome: 'rejected', reason: decision.reason };
            }

            const rejected = pending.reject(decision.reason, at);
            await this.commit([{ type: 'insert', reservation: rejected }], 'book.reject');
            return {
              outcome: 'rejected',
              reason: decision.reason,
              reservation: rejected
            };
          }

          const confirmed = (
            pending ??
            Reservation.request({ resourceId, requesterId, slot: decision.slot, requestedAt: at })
          ).confirm(at);

          await this.commit([{ type: 'insert', reservation: confirmed }], 'book.confirm');
          this.index.insert(confirmed);

          return { outcome: 'confirmed', reservation: confirmed };
        });

        const log = logger.withContext({ resourceId, requesterId });
        if (result.outcome === 'confirmed') {
          reservationMetrics.confirmed.inc();
          log.info({ reservationId: result.reservation.id }, 'Reservation confirmed');
          await this.notify(RESERVATION_CONFIRMED_EVENT, this.confirmedPayload(result.reservation));
        } else {
          reservationMetrics.rejected.inc({ reason: result.reason });
          log.info({ reason: result.reason }, 'Booking rejected');
        }

        return result;
      },
      { resourceId, requesterId }
    );
  }

  async cancel(reservationId: string, options: LockOptions = {}): Promise<CancelResult> {
    return runWithSpan<CancelResult>(
      'ReservationService.cancel',
      async () => {
        const existing = await this.findById(reservationId);
        if (!existing) {
          return { outcome: 'not_found' };
        }

        const result = await this.withResourceLock<CancelResult>(existing.resourceId, options, async () => {
          const current = await this.findById(reservationId);
          if (!current) {
            return { outcome: 'not_found' };
          }

          if (!current.isActive) {
            return { outcome: 'already_cancelled', reservation: current };
          }

          const cancelled = current.cancel(this.clock());
          await this.commit([{ type: 'update', reservation: cancelled }], 'cancel');
          this.index.remove(reservationId);

          return { outcome: 'cancelled', reservation: cancelled };
        });

        if (result.outcome === 'cancelled') {
          reservationMetrics.cancelled.inc();
          logger
            .withContext({ reservationId, resourceId: existing.resourceId })
            .info('Reservation cancelled');
          await this.notify(RESERVATION_CANCELLED_EVENT, {
            reservationId,
            resourceId: result.reservation.resourceId,
            requesterId: result.reservation.requesterId,
            start: result.reservation.slot.start.toISOString(),
            end: result.reservation.slot.end.toISOString(),
            cancelledAt: (result.reservation.cancelledAt ?? this.clock()).toISOString()
          });
        }

        return result;
      },
      { reservationId }
    );
  }

  /**
   * Moves a confirmed reservation to `slot` by cancelling it and confirming a
   * replacement in one commit. The reservation being replaced does not count
   * against capacity. On rejection nothing changes.
   */
  async reschedule(
    reservationId: string,
    slot: TimeSlotInput,
    options: LockOptions = {}
  ): Promise<RescheduleResult> {
    return runWithSpan<RescheduleResult>(
      'ReservationService.reschedule',
      async () => {
        const existing = await this.findById(reservationId);
        if (!existing) {
          return { outcome: 'rejected', reason: 'NotFound' };
        }

        const result = await this.withResourceLock<RescheduleResult>(existing.resourceId, options, async () => {
          const current = await this.findById(reservationId);
          if (!current || current.status !== 'confirmed') {
            return { outcome: 'rejected', reason: 'NotFound' };
          }

          const at = this.clock();
          const request: BookingRequest = {
            resourceId: current.resourceId,
            requesterId: current.requesterId,
            slot,
            replacing: current.id
          };
          const decision = evaluate(request, this.context, at);
          if (decision.verdict === 'reject') {
            return { outcome: 'rejected', reason: decision.reason };
          }

          const replacement = Reservation.request({
            resourceId: current.resourceId,
            requesterId: current.requesterId,
            slot: decision.slot,
            supersedes: current.id,
            requestedAt: at
          }).confirm(at);
          const previous = current.supersede(replacement.id, at);

          await this.commit(
            [
              { type: 'update', reservation: previous },
              { type: 'insert', reservation: replacement }
            ],
            'reschedule'
          );
          this.index.remove(previous.id);
          this.index.insert(replacement);

          return { outcome: 'rescheduled', reservation: replacement, previous };
        });

        if (result.outcome === 'rescheduled') {
          reservationMetrics.rescheduled.inc();
          logger
            .withContext({ reservationId: result.reservation.id, resourceId: existing.resourceId })
            .info({ previousReservationId: reservationId }, 'Reservation rescheduled');
          await this.notify(RESERVATION_RESCHEDULED_EVENT, {
            previousReservationId: result.previous.id,
            reservationId: result.reservation.id,
            resourceId: result.reservation.resourceId,
            requesterId: result.reservation.requesterId,
            previousStart: result.previous.slot.start.toISOString(),
            previousEnd: result.previous.slot.end.toISOString(),
            start: result.reservation.slot.start.toISOString(),
            end: result.reservation.slot.end.toISOString()
          });
        } else {
          reservationMetrics.rejected.inc({ reason: result.reason });
        }

        return result;
      },
      { reservationId }
    );
  }

  async get(reservationId: string): Promise<Reservation | null> {
    return this.findById(reservationId);
  }

  async listForResource(
    resourceId: ResourceId,
    filter: ReservationRangeFilter = {}
  ): Promise<Reservation[]> {
    this.registry.get(resourceId);
    return persist('reservations.findByResource', () =>
      this.repository.findByResource(resourceId, filter)
    );
  }

  async listForRequester(requesterId: UserId): Promise<Reservation[]> {
    return persist('reservations.findByRequester', () =>
      this.repository.findByRequester(requesterId)
    );
  }

  private async findById(reservationId: string): Promise<Reservation | null> {
    return persist('reservations.findById', () => this.repository.findById(reservationId), {
      reservationId
    });
  }

  private async commit(changes: ReservationChange[], operation: string): Promise<void> {
    await persist(`reservations.commit(${operation})`, () => this.repository.commit(changes), {
      reservationIds: changes.map((change) => change.reservation.id)
    });
  }

  private async withResourceLock<T>(
    resourceId: ResourceId,
    options: LockOptions,
    work: () => Promise<T>
  ): Promise<T> {
    const waitStarted = process.hrtime.bigint();
    const release = await this.locks.acquire(resourceId, options).catch((error: unknown) => {
      if (error instanceof LockTimeoutError) {
        reservationMetrics.lockTimeouts.inc();
        logger.warn({ resourceId }, 'Gave up waiting for resource lock');
      }
      throw error;
    });
    reservationMetrics.lockWait.observe(Number(process.hrtime.bigint() - waitStarted) / 1_000_000_000);

    try {
      return await work();
    } finally {
      release();
    }
  }

  private confirmedPayload(reservation: Reservation): ReservationEventMap[typeof RESERVATION_CONFIRMED_EVENT] {
    const resource = this.registry.find(reservation.resourceId);
    return {
      reservationId: reservation.id,
      resourceId: reservation.resourceId,
      requesterId: reservation.requesterId,
      start: reservation.slot.start.toISOString(),
      end: reservation.slot.end.toISOString(),
      capacityTotal: resource?.capacity ?? 1,
      capacityUsed: this.index.countOverlapping(reservation.resourceId, reservation.slot)
    };
  }

  private async notify<K extends ReservationEventName>(
    eventName: K,
    payload: ReservationEventMap[K]
  ): Promise<void> {
    try {
      await this.eventBus.publish(eventName, payload);
    } catch (error) {
      logger.warn({ error, event: eventName }, `Failed to publish ${eventName} event`);
    }
  }
}
