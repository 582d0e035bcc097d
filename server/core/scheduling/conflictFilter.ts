import { occupiedInterval } from './occupancy';
import { hasTimeOverlap } from './timeUtils';
import type { Booking, ShopSettings, TimeInterval } from './types';

export function findOverlap(start: number, end: number, intervals: readonly TimeInterval[]): TimeInterval | null {
  for (const interval of intervals) {
    if (hasTimeOverlap(start, end, interval.start, interval.end)) {
      return interval;
    }
  }
  return null;
}

/**
 * A candidate is free when [start, start + durationMinutes) touches neither an occupied
 * interval nor a break.
 */
export function isFree(
  candidateStart: number,
  durationMinutes: number,
  busy: readonly TimeInterval[],
  breaks: readonly TimeInterval[]
): boolean {
  const end = candidateStart + durationMinutes;
  return findOverlap(candidateStart, end, busy) === null && findOverlap(candidateStart, end, breaks) === null;
}

/**
 * First active booking whose occupied span overlaps `candidate`, skipping `excludeId`.
 */
export function findConflictingBooking(
  candidate: TimeInterval,
  active: readonly Booking[],
  settings: ShopSettings,
  excludeId?: number
): Booking | null {
  for (const booking of active) {
    if (booking.id === excludeId) continue;
    const busy = occupiedInterval(booking, settings);
    if (findOverlap(candidate.start, candidate.end, [busy])) {
      return booking;
    }
  }
  return null;
}
