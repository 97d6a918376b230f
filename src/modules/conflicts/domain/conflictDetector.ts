import type { UserId } from '../../../domain/certification';
import { reject, type Decision } from '../../../domain/decision';
import { requiresCertification, type Resource, type ResourceId } from '../../../domain/resource';
import { TimeSlot, type TimeSlotInput } from '../../../domain/timeSlot';
import type { OverlapOptions } from '../../availability/domain/availabilityIndex';

export interface BookingRequest {
  resourceId: ResourceId;
  requesterId: UserId;
  slot: TimeSlotInput;
  /** Reservation being replaced by a reschedule; it does not count against capacity. */
  replacing?: string;
}

/** Read-only view over the registry, the certification gate and the index. */
export interface ConflictContext {
  findResource(id: ResourceId): Readonly<Resource> | undefined;
  isAuthorized(userId: UserId, machineId: ResourceId, at: Date): boolean;
  countOverlapping(resourceId: ResourceId, slot: TimeSlot, options?: OverlapOptions): number;
}

/**
 * Decides whether a booking is admissible as of `at`. Checks run in a fixed
 * order and the first failure names the rejection:
 * NotFound, InvalidSlot, NotCertified, CapacityExceeded.
 */
export function evaluate(
  request: BookingRequest,
  context: ConflictContext,
  at: Date = new Date()
): Decision {
  const resource = context.findResource(request.resourceId);
  if (!resource) {
    return reject('NotFound');
  }

  const slot = TimeSlot.tryCreate(request.slot);
  if (!slot) {
    return reject('InvalidSlot');
  }

  if (requiresCertification(resource) && !context.isAuthorized(request.requesterId, resource.id, at)) {
    return reject('NotCertified');
  }

  const overlapping = context.countOverlapping(resource.id, slot, { excludeId: request.replacing });
  if (overlapping >= resource.capacity) {
    return reject('CapacityExceeded');
  }

  return { verdict: 'admit', resource, slot, overlapping };
}
