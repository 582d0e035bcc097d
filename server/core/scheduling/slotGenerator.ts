import { isFree } from './conflictFilter';
import { isShortService, occupiedInterval, occupy } from './occupancy';
import type { Booking, DayContext, ShopSettings } from './types';

export interface FreeStartsInput {
  day: DayContext;
  durationMinutes: number;
  activeBookings: readonly Pick<Booking, 'startTime' | 'durationMinutes' | 'occupancy'>[];
  settings: ShopSettings;
  isToday: boolean;
  nowMinute: number;
}

/**
 * Earliest start the shop still offers on the date: the window opening, pushed forward by
 * the current minute plus lead time when the date is today.
 */
export function computeCutoff(
  workStart: number,
  settings: Pick<ShopSettings, 'minLeadMinutes'>,
  isToday: boolean,
  nowMinute: number
): number {
  return isToday ? Math.max(workStart, nowMinute + settings.minLeadMinutes) : workStart;
}

/**
 * Grid points from the first multiple of the base grid at or after the window opening,
 * plus one extra start per grid cell for short services.
 */
export function generateCandidates(
  workStart: number,
  workEnd: number,
  durationMinutes: number,
  settings: ShopSettings
): number[] {
  const grid = settings.baseGridMinutes;
  const candidates: number[] = [];
  const short = isShortService(durationMinutes, settings);
  const extraOffset = occupy(durationMinutes, settings);

  for (let t = Math.ceil(workStart / grid) * grid; t < workEnd; t += grid) {
    candidates.push(t);
    if (short) {
      const extraStart = t + extraOffset;
      if (extraStart < t + grid && extraStart + durationMinutes <= workEnd) {
        candidates.push(extraStart);
      }
    }
  }

  return candidates;
}

/**
 * Offerable start minutes for a service on a resolved day, ascending and unique.
 * The candidate is measured by its nominal duration; existing bookings by what they occupy.
 */
export function freeStarts(input: FreeStartsInput): number[] {
  const { day, durationMinutes, settings } = input;
  if (!day.isWorking || durationMinutes <= 0) return [];

  const { workStart, workEnd, breaks } = day;
  const busy = input.activeBookings.map(b => occupiedInterval(b, settings));
  const cutoff = computeCutoff(workStart, settings, input.isToday, input.nowMinute);

  const eligible = generateCandidates(workStart, workEnd, durationMinutes, settings)
    .filter(t => t >= cutoff && t + durationMinutes <= workEnd);

  return Array.from(new Set(eligible))
    .sort((a, b) => a - b)
    .filter(t => isFree(t, durationMinutes, busy, breaks));
}
