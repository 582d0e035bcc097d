import type { Booking } from './types';

export const FAILURE_STATUS_CODES = {
  SLOT_TAKEN: 409,
  DAY_CLOSED: 422,
  OUTSIDE_WORKING_HOURS: 422,
  BREAK_CONFLICT: 422,
  SLOT_IN_PAST: 422,
  DAILY_LIMIT_REACHED: 429,
  NOT_FOUND: 404,
  INVALID_TRANSITION: 409,
} as const;

export type BookingFailureCode = keyof typeof FAILURE_STATUS_CODES;

export interface BookingFailure {
  success: false;
  code: BookingFailureCode;
  error: string;
  statusCode: number;
  conflictingBookingId?: number;
}

export interface BookingSuccess {
  success: true;
  booking: Booking;
}

export type BookingResult = BookingSuccess | BookingFailure;

export function bookingFailure(
  code: BookingFailureCode,
  error: string,
  extra: { conflictingBookingId?: number } = {}
): BookingFailure {
  return { success: false, code, error, statusCode: FAILURE_STATUS_CODES[code], ...extra };
}
