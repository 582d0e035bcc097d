import { describe, it, expect } from 'vitest';
import { DEFAULT_SHOP_SETTINGS } from '../../server/core/scheduling/shopSettings';
import { computeCutoff, freeStarts, generateCandidates, type FreeStartsInput } from '../../server/core/scheduling/slotGenerator';
import { minutesToTime } from '../../server/core/scheduling/timeUtils';
import type { DayContext, ShopSettings } from '../../server/core/scheduling/types';

const WORKDAY: DayContext = { isWorking: true, workStart: 540, workEnd: 1140, breaks: [] };

type SlotOverrides = Partial<Omit<FreeStartsInput, 'settings'>> & { settings?: Partial<ShopSettings> };

function slots(overrides: SlotOverrides = {}): string[] {
  const { settings, ...rest } = overrides;
  const input: FreeStartsInput = {
    day: WORKDAY,
    durationMinutes: 40,
    activeBookings: [],
    isToday: false,
    nowMinute: 0,
    ...rest,
    settings: { ...DEFAULT_SHOP_SETTINGS, ...settings },
  };
  return freeStarts(input).map(minutesToTime);
}

const HOURLY = ['09:00', '10:00', '11:00', '12:00', '13:00', '14:00', '15:00', '16:00', '17:00', '18:00'];

describe('Slot Generator - base grid', () => {
  it('should offer every hour from 09:00 to 18:00 for a 40 minute service', () => {
    expect(slots()).toEqual(HOURLY);
  });

  it('should offer 18:00 for a 60 minute service that ends exactly at closing', () => {
    expect(slots({ durationMinutes: 60 })).toEqual(HOURLY);
  });

  it('should drop candidates that would run past closing', () => {
    expect(slots({ durationMinutes: 90 })).toEqual(HOURLY.slice(0, -1));
  });

  it('should start from the first grid point at or after an off-grid opening', () => {
    const day: DayContext = { isWorking: true, workStart: 570, workEnd: 720, breaks: [] };
    expect(slots({ day })).toEqual(['10:00', '11:00']);
  });

  it('should follow a 30 minute grid', () => {
    const day: DayContext = { isWorking: true, workStart: 540, workEnd: 660, breaks: [] };
    expect(slots({ day, settings: { baseGridMinutes: 30 } })).toEqual(['09:00', '09:30', '10:00']);
  });

  it('should return nothing on a closed day', () => {
    expect(slots({ day: { isWorking: false } })).toEqual([]);
  });
});

describe('Slot Generator - short services', () => {
  it('should add one extra start per hour at the occupied offset (round 10)', () => {
    const result = slots({ durationMinutes: 15, settings: { extraRoundMinutes: 10 } });
    expect(result.slice(0, 4)).toEqual(['09:00', '09:20', '10:00', '10:20']);
    expect(result).toHaveLength(20);
    expect(result.slice(-2)).toEqual(['18:00', '18:20']);
  });

  it('should place the extra start at 09:30 when the step is 15', () => {
    const result = slots({ durationMinutes: 15 });
    expect(result.slice(0, 4)).toEqual(['09:00', '09:30', '10:00', '10:30']);
  });

  it('should skip the extra start when it falls outside the grid cell', () => {
    expect(generateCandidates(540, 720, 35, { ...DEFAULT_SHOP_SETTINGS, restMinutesAfterShort: 30 }))
      .toEqual([540, 600, 660]);
  });

  it('should skip the extra start when it would run past closing', () => {
    expect(generateCandidates(540, 610, 15, DEFAULT_SHOP_SETTINGS)).toEqual([540, 570, 600]);
    expect(generateCandidates(540, 600, 15, DEFAULT_SHOP_SETTINGS)).toEqual([540, 570]);
  });
});

describe('Slot Generator - conflicts', () => {
  it('should block 10:00 behind an existing 10:00 booking of 40 minutes', () => {
    const result = slots({
      activeBookings: [{ startTime: 600, durationMinutes: 40, occupancy: { kind: 'derived' } }],
    });
    expect(result).toEqual(HOURLY.filter(t => t !== '10:00'));
  });

  it('should block 10:00 and 10:20 for a short service behind the same booking', () => {
    const result = slots({
      durationMinutes: 15,
      settings: { extraRoundMinutes: 10 },
      activeBookings: [{ startTime: 600, durationMinutes: 40, occupancy: { kind: 'derived' } }],
    });
    expect(result.slice(0, 4)).toEqual(['09:00', '09:20', '11:00', '11:20']);
  });

  it('should measure existing bookings by their stored occupancy', () => {
    const result = slots({
      activeBookings: [{ startTime: 600, durationMinutes: 15, occupancy: { kind: 'explicit', minutes: 80 } }],
    });
    expect(result.slice(0, 3)).toEqual(['09:00', '12:00', '13:00']);
  });

  it('should measure the candidate by its nominal duration', () => {
    // the 09:00 booking occupies 09:00-09:30; a 15 minute start at 09:30 fits
    const result = slots({
      durationMinutes: 15,
      activeBookings: [{ startTime: 540, durationMinutes: 15, occupancy: { kind: 'derived' } }],
    });
    expect(result.slice(0, 3)).toEqual(['09:30', '10:00', '10:30']);
  });

  it('should remove candidates intersecting a 13:00-14:00 break', () => {
    const day: DayContext = { ...WORKDAY, breaks: [{ start: 780, end: 840 }] };
    expect(slots({ day })).toEqual(HOURLY.filter(t => t !== '13:00'));
  });

  it('should remove a candidate that runs into a break', () => {
    const day: DayContext = { ...WORKDAY, breaks: [{ start: 750, end: 780 }] };
    expect(slots({ day, durationMinutes: 60 })).toEqual(HOURLY.filter(t => t !== '12:00'));
  });
});

describe('Slot Generator - today', () => {
  it('should push the cutoff to the current minute', () => {
    expect(slots({ isToday: true, nowMinute: 615 })).toEqual(HOURLY.slice(2));
  });

  it('should add the lead time to the current minute', () => {
    expect(slots({ isToday: true, nowMinute: 615, settings: { minLeadMinutes: 60 } })).toEqual(HOURLY.slice(3));
  });

  it('should keep a candidate equal to the cutoff', () => {
    expect(slots({ isToday: true, nowMinute: 600 })).toEqual(HOURLY.slice(1));
  });

  it('should ignore the clock on other dates', () => {
    expect(computeCutoff(540, { minLeadMinutes: 60 }, false, 900)).toBe(540);
    expect(computeCutoff(540, { minLeadMinutes: 60 }, true, 400)).toBe(540);
    expect(computeCutoff(540, { minLeadMinutes: 60 }, true, 615)).toBe(675);
  });
});
