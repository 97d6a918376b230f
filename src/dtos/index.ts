export * from './reservation.common';
export * from './createReservation.dto';
export * from './manageReservation.dto';
export * from './resource.dto';
export * from './certification.dto';
