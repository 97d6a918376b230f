export interface AvailabilityConflict {
  reservationId: string;
  requesterId: string;
  start: string;
  end: string;
}

export interface AvailabilityReport {
  resourceId: string;
  start: string;
  end: string;
  capacity: number;
  remainingCapacity: number;
  available: boolean;
  certificationRequired: boolean;
  /** Present when the query names a requester. */
  authorized?: boolean;
  /** Earliest overlapping reservation, if any. */
  conflict: AvailabilityConflict | null;
}
