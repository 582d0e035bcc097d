import { describe, it, expect } from 'vitest';
import {
  addDaysToDate,
  formatDateDisplayWithDay,
  getMinuteOfDay,
  getTodayLocal,
  getWeekday,
  isValidDateString,
  toLocalDateTime,
} from '../../server/utils/dateUtils';

describe('Date Utils', () => {
  it('should accept real calendar dates only', () => {
    expect(isValidDateString('2026-11-02')).toBe(true);
    expect(isValidDateString('2028-02-29')).toBe(true);
    expect(isValidDateString('2026-02-29')).toBe(false);
    expect(isValidDateString('2026-13-01')).toBe(false);
    expect(isValidDateString('2026-1-5')).toBe(false);
  });

  it('should read the local date and minute of a moment', () => {
    const moment = new Date(2026, 0, 5, 7, 45);
    expect(getTodayLocal(moment)).toBe('2026-01-05');
    expect(getMinuteOfDay(moment)).toBe(465);
  });

  it('should add days across month and year ends', () => {
    expect(addDaysToDate('2026-01-31', 1)).toBe('2026-02-01');
    expect(addDaysToDate('2026-12-31', 1)).toBe('2027-01-01');
    expect(addDaysToDate('2026-03-01', -1)).toBe('2026-02-28');
  });

  it('should number weekdays from Monday', () => {
    expect(getWeekday('2026-11-02')).toBe(0);
    expect(getWeekday('2026-11-07')).toBe(5);
    expect(getWeekday('2026-11-08')).toBe(6);
    expect(getWeekday('2024-02-29')).toBe(3);
  });

  it('should build a local moment from a date and minute offset', () => {
    expect(toLocalDateTime('2026-11-02', 570)).toEqual(new Date(2026, 10, 2, 9, 30));
    expect(toLocalDateTime('2026-11-02', -30)).toEqual(new Date(2026, 10, 1, 23, 30));
  });

  it('should format a date with its weekday', () => {
    expect(formatDateDisplayWithDay('2026-11-02')).toBe('Mon, Nov 2');
    expect(formatDateDisplayWithDay('2026-01-01')).toBe('Thu, Jan 1');
  });
});
