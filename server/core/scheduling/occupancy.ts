import { ceilToStep } from './timeUtils';
import type { Booking, Occupancy, ShopSettings, TimeInterval } from './types';

type OccupancySettings = Pick<ShopSettings, 'shortServiceThresholdMinutes' | 'restMinutesAfterShort' | 'extraRoundMinutes'>;

export function isShortService(durationMinutes: number, settings: OccupancySettings): boolean {
  return durationMinutes < settings.shortServiceThresholdMinutes;
}

/**
 * Calendar time a service reserves. Short services carry the mandatory rest and are
 * rounded up to the extra-slot step; everything else reserves exactly its duration.
 */
export function occupy(durationMinutes: number, settings: OccupancySettings): number {
  if (isShortService(durationMinutes, settings)) {
    return ceilToStep(durationMinutes + settings.restMinutesAfterShort, settings.extraRoundMinutes);
  }
  return durationMinutes;
}

export function fromStoredOccupancy(occupyMinutes: number | null): Occupancy {
  return occupyMinutes === null ? { kind: 'derived' } : { kind: 'explicit', minutes: occupyMinutes };
}

export function resolveOccupancy(
  occupancy: Occupancy,
  durationMinutes: number,
  settings: OccupancySettings
): number {
  switch (occupancy.kind) {
    case 'explicit':
      return occupancy.minutes;
    case 'derived':
      return occupy(durationMinutes, settings);
  }
}

export function occupiedInterval(
  booking: Pick<Booking, 'startTime' | 'durationMinutes' | 'occupancy'>,
  settings: OccupancySettings
): TimeInterval {
  const minutes = resolveOccupancy(booking.occupancy, booking.durationMinutes, settings);
  return { start: booking.startTime, end: booking.startTime + minutes };
}
