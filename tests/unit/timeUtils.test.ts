import { describe, it, expect } from 'vitest';
import {
  ceilToStep,
  hasTimeOverlap,
  minutesToTime,
  parseTimeString,
  parseTimeToMinutes,
} from '../../server/core/scheduling/timeUtils';

describe('Time Utils - parsing', () => {
  it('should parse HH:MM to minutes since midnight', () => {
    expect(parseTimeString('09:30')).toBe(570);
    expect(parseTimeString('00:00')).toBe(0);
    expect(parseTimeString('7:05')).toBe(425);
  });

  it('should accept the HH:MM:SS form PostgreSQL returns', () => {
    expect(parseTimeString('10:00:00')).toBe(600);
  });

  it('should accept 24:00 as the end of the day only', () => {
    expect(parseTimeString('24:00')).toBe(1440);
    expect(parseTimeString('24:01')).toBeNull();
    expect(parseTimeString('25:00')).toBeNull();
  });

  it('should reject malformed values', () => {
    expect(parseTimeString('')).toBeNull();
    expect(parseTimeString(null)).toBeNull();
    expect(parseTimeString('9:5')).toBeNull();
    expect(parseTimeString('10:60')).toBeNull();
    expect(parseTimeString('ten')).toBeNull();
  });

  it('should fall back to zero in parseTimeToMinutes', () => {
    expect(parseTimeToMinutes(undefined)).toBe(0);
    expect(parseTimeToMinutes('13:15')).toBe(795);
  });

  it('should format minutes as zero-padded HH:MM', () => {
    expect(minutesToTime(570)).toBe('09:30');
    expect(minutesToTime(0)).toBe('00:00');
    expect(minutesToTime(1440)).toBe('24:00');
  });
});

describe('Time Utils - overlap', () => {
  it('should treat touching intervals as free', () => {
    expect(hasTimeOverlap(540, 600, 600, 660)).toBe(false);
    expect(hasTimeOverlap(600, 660, 540, 600)).toBe(false);
  });

  it('should detect a one-minute overlap', () => {
    expect(hasTimeOverlap(540, 601, 600, 660)).toBe(true);
  });

  it('should detect containment in both directions', () => {
    expect(hasTimeOverlap(600, 700, 620, 640)).toBe(true);
    expect(hasTimeOverlap(620, 640, 600, 700)).toBe(true);
  });
});

describe('Time Utils - ceilToStep', () => {
  it('should round up to the next multiple of the step', () => {
    expect(ceilToStep(20, 15)).toBe(30);
    expect(ceilToStep(44, 15)).toBe(45);
    expect(ceilToStep(20, 10)).toBe(20);
  });

  it('should leave exact multiples alone', () => {
    expect(ceilToStep(45, 15)).toBe(45);
  });

  it('should return the value unchanged for a non-positive step', () => {
    expect(ceilToStep(7, 0)).toBe(7);
  });
});
