import type { RejectionReason } from '../dtos';
import type { Resource } from './resource';
import type { TimeSlot } from './timeSlot';

export interface Admit {
  verdict: 'admit';
  resource: Resource;
  slot: TimeSlot;
  /** Active reservations overlapping the slot when the decision was taken. */
  overlapping: number;
}

export interface Reject {
  verdict: 'reject';
  reason: RejectionReason;
}

export type Decision = Admit | Reject;

export function reject(reason: RejectionReason): Reject {
  return { verdict: 'reject', reason };
}
