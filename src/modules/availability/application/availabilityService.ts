import type { UserId } from '../../../domain/certification';
import { requiresCertification, type ResourceId } from '../../../domain/resource';
import { TimeSlot, type TimeSlotInput } from '../../../domain/timeSlot';
import type { CertificationGate } from '../../certification/application/certificationGate';
import type { ResourceRegistry } from '../../registry/application/resourceRegistry';
import type { AvailabilityIndex } from '../domain/availabilityIndex';
import type { AvailabilityReport } from '../domain/models';

export interface CheckAvailabilityParams {
  resourceId: ResourceId;
  slot: TimeSlotInput;
  requesterId?: UserId;
}

/**
 * Lock-free reads over the availability index. Answers are a snapshot that an
 * in-flight booking may invalidate; only `ReservationService.book` decides.
 */
export class AvailabilityService {
  constructor(
    private readonly registry: ResourceRegistry,
    private readonly gate: CertificationGate,
    private readonly index: AvailabilityIndex,
    private readonly clock: () => Date = () => new Date()
  ) {}

  checkAvailability(params: CheckAvailabilityParams): AvailabilityReport {
    const resource = this.registry.get(params.resourceId);
    const slot = TimeSlot.of(params.slot);
    const overlapping = this.index.overlapping(resource.id, slot);
    const remainingCapacity = Math.max(resource.capacity - overlapping.length, 0);
    const first = overlapping[0];

    return {
      resourceId: resource.id,
      start: slot.start.toISOString(),
      end: slot.end.toISOString(),
      capacity: resource.capacity,
      remainingCapacity,
      available: remainingCapacity > 0,
      certificationRequired: requiresCertification(resource),
      authorized:
        params.requesterId === undefined
          ? undefined
          : this.gate.isAuthorized(params.requesterId, resource.id, this.clock()),
      conflict: first
        ? {
            reservationId: first.id,
            requesterId: first.requesterId,
            start: first.slot.start.toISOString(),
            end: first.slot.end.toISOString()
          }
        : null
    };
  }

  isAvailable(resourceId: ResourceId, slot: TimeSlotInput): boolean {
    return this.checkAvailability({ resourceId, slot }).available;
  }
}
