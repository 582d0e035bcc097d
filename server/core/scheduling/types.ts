import type { BookingStatus, ReminderStatus } from '../../../shared/constants/statuses';

export type Weekday = 0 | 1 | 2 | 3 | 4 | 5 | 6;

export const WEEKDAYS: readonly Weekday[] = [0, 1, 2, 3, 4, 5, 6];

export function isWeekday(value: number): value is Weekday {
  return Number.isInteger(value) && value >= 0 && value <= 6;
}

export interface ShopSettings {
  baseGridMinutes: number;
  shortServiceThresholdMinutes: number;
  restMinutesAfterShort: number;
  extraRoundMinutes: number;
  minLeadMinutes: number;
}

export type ShopSettingKey = keyof ShopSettings;

export interface WeeklyScheduleEntry {
  weekday: Weekday;
  isWorking: boolean;
  workStart: number;
  workEnd: number;
}

export interface ScheduleBreak {
  id: number;
  weekday: Weekday | null;
  startTime: number;
  endTime: number;
  isEnabled: boolean;
}

export interface NewScheduleBreak {
  weekday: Weekday | null;
  startTime: number;
  endTime: number;
}

/** Half-open minute interval [start, end). */
export interface TimeInterval {
  start: number;
  end: number;
}

export type DayContext =
  | { isWorking: false }
  | { isWorking: true; workStart: number; workEnd: number; breaks: TimeInterval[] };

/** Persisted shape of a date's working context. */
export interface WorkContext {
  isWorking: boolean;
  workStart: string | null;
  workEnd: string | null;
  breaks: { startTime: string; endTime: string }[];
}

/**
 * How much calendar time a booking reserves. Rows written before occupancy was stored
 * carry no value and derive it from their duration under the current settings.
 */
export type Occupancy =
  | { kind: 'explicit'; minutes: number }
  | { kind: 'derived' };

export interface Booking {
  id: number;
  clientId: string;
  date: string;
  startTime: number;
  durationMinutes: number;
  occupancy: Occupancy;
  serviceCode: string | null;
  serviceName: string;
  clientName: string;
  phone: string;
  status: BookingStatus;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewBooking {
  clientId: string;
  date: string;
  startTime: number;
  durationMinutes: number;
  occupyMinutes: number;
  serviceCode: string | null;
  serviceName: string;
  clientName: string;
  phone: string;
}

export interface Reminder {
  id: number;
  bookingId: number | null;
  clientId: string;
  remindAt: Date;
  type: string;
  status: ReminderStatus;
  attempts: number;
  lastError: string | null;
  createdAt: Date;
}

export interface NewReminder {
  bookingId: number;
  clientId: string;
  remindAt: Date;
  type: string;
}
