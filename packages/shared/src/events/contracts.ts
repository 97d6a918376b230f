export const RESERVATION_CONFIRMED_EVENT = 'reservation.confirmed';
export const RESERVATION_CANCELLED_EVENT = 'reservation.cancelled';
export const RESERVATION_RESCHEDULED_EVENT = 'reservation.rescheduled';

export interface ReservationConfirmedEvent {
  reservationId: string;
  resourceId: string;
  requesterId: string;
  start: string;
  end: string;
  capacityTotal: number;
  capacityUsed: number;
}

export interface ReservationCancelledEvent {
  reservationId: string;
  resourceId: string;
  requesterId: string;
  start: string;
  end: string;
  cancelledAt: string;
}

export interface ReservationRescheduledEvent {
  previousReservationId: string;
  reservationId: string;
  resourceId: string;
  requesterId: string;
  previousStart: string;
  previousEnd: string;
  start: string;
  end: string;
}

export interface ReservationEventMap {
  [RESERVATION_CONFIRMED_EVENT]: ReservationConfirmedEvent;
  [RESERVATION_CANCELLED_EVENT]: ReservationCancelledEvent;
  [RESERVATION_RESCHEDULED_EVENT]: ReservationRescheduledEvent;
}

export type ReservationEventName = keyof ReservationEventMap;
