import { describe, it, expect } from 'vitest';
import { findConflictingBooking, findOverlap, isFree } from '../../server/core/scheduling/conflictFilter';
import { DEFAULT_SHOP_SETTINGS } from '../../server/core/scheduling/shopSettings';
import type { Booking, Occupancy } from '../../server/core/scheduling/types';

function booking(id: number, startTime: number, durationMinutes: number, occupancy: Occupancy = { kind: 'derived' }): Booking {
  const createdAt = new Date(2026, 10, 1, 12, 0);
  return {
    id,
    clientId: `client-${id}`,
    date: '2026-11-02',
    startTime,
    durationMinutes,
    occupancy,
    serviceCode: null,
    serviceName: 'Haircut',
    clientName: 'Test Client',
    phone: '555-0100',
    status: 'pending',
    createdAt,
    updatedAt: createdAt,
  };
}

describe('Conflict Filter', () => {
  it('should return the first overlapping interval', () => {
    const intervals = [{ start: 540, end: 600 }, { start: 620, end: 680 }];
    expect(findOverlap(590, 630, intervals)).toEqual({ start: 540, end: 600 });
    expect(findOverlap(600, 620, intervals)).toBeNull();
  });

  it('should check both busy intervals and breaks', () => {
    const busy = [{ start: 600, end: 640 }];
    const breaks = [{ start: 780, end: 840 }];
    expect(isFree(540, 60, busy, breaks)).toBe(true);
    expect(isFree(620, 30, busy, breaks)).toBe(false);
    expect(isFree(760, 30, busy, breaks)).toBe(false);
    expect(isFree(840, 60, busy, breaks)).toBe(true);
  });

  it('should find a booking whose derived occupancy overlaps', () => {
    // 15 minutes derive to 30 occupied minutes: 10:00-10:30
    const active = [booking(1, 600, 15)];
    expect(findConflictingBooking({ start: 620, end: 650 }, active, DEFAULT_SHOP_SETTINGS)?.id).toBe(1);
    expect(findConflictingBooking({ start: 630, end: 660 }, active, DEFAULT_SHOP_SETTINGS)).toBeNull();
  });

  it('should honour an explicit occupancy over the derived one', () => {
    const active = [booking(1, 600, 15, { kind: 'explicit', minutes: 60 })];
    expect(findConflictingBooking({ start: 630, end: 660 }, active, DEFAULT_SHOP_SETTINGS)?.id).toBe(1);
  });

  it('should skip the excluded booking', () => {
    const active = [booking(1, 600, 40), booking(2, 660, 40)];
    expect(findConflictingBooking({ start: 600, end: 640 }, active, DEFAULT_SHOP_SETTINGS, 1)).toBeNull();
    expect(findConflictingBooking({ start: 600, end: 680 }, active, DEFAULT_SHOP_SETTINGS, 1)?.id).toBe(2);
  });
});
