import type { BookingStatus } from '../../../shared/constants/statuses';
import type {
  Booking,
  NewBooking,
  NewReminder,
  NewScheduleBreak,
  Reminder,
  ScheduleBreak,
  ShopSettings,
  Weekday,
  WeeklyScheduleEntry,
} from './types';

export interface DaySchedulePatch {
  isWorking?: boolean;
  workStart?: number;
  workEnd?: number;
}

export interface CalendarStore {
  getShopSettings(): Promise<ShopSettings>;
  updateShopSettings(patch: Partial<ShopSettings>): Promise<ShopSettings>;
  getWeeklySchedule(): Promise<WeeklyScheduleEntry[]>;
  getDaySchedule(weekday: Weekday): Promise<WeeklyScheduleEntry | null>;
  updateDaySchedule(weekday: Weekday, patch: DaySchedulePatch): Promise<WeeklyScheduleEntry | null>;
  listBreaks(): Promise<ScheduleBreak[]>;
  /** Enabled breaks tagged with the weekday plus the global ones. */
  listBreaksForWeekday(weekday: Weekday): Promise<ScheduleBreak[]>;
  addBreak(input: NewScheduleBreak): Promise<ScheduleBreak>;
  removeBreak(id: number): Promise<boolean>;
  setBreakEnabled(id: number, isEnabled: boolean): Promise<ScheduleBreak | null>;
  listDaysOff(): Promise<string[]>;
  addDayOff(date: string): Promise<void>;
  removeDayOff(date: string): Promise<boolean>;
  isDayOff(date: string): Promise<boolean>;
}

export interface BookingReader {
  /** Pending and approved bookings of a date, ordered by start. */
  listActiveBookings(date: string): Promise<Booking[]>;
  getBooking(id: number): Promise<Booking | null>;
}

export interface StatusUpdate {
  id: number;
  from: readonly BookingStatus[];
  to: BookingStatus;
  clientId?: string;
}

/**
 * Operations available while the per-date lock is held. The lock and the writes commit
 * together, so a check made here stays true until the transaction ends.
 */
export interface BookingTransaction extends BookingReader {
  insertBooking(input: NewBooking): Promise<Booking>;
  /** Conditional update: returns null when the row is missing or not in one of `from`. */
  updateStatus(update: StatusUpdate): Promise<Booking | null>;
}

export interface BookingStore extends BookingReader {
  listBookingsForDate(date: string): Promise<Booking[]>;
  listPendingBookings(): Promise<Booking[]>;
  listClientBookings(clientId: string, limit: number): Promise<Booking[]>;
  countActiveCreatedBetween(clientId: string, from: Date, to: Date): Promise<number>;
  updateStatus(update: StatusUpdate): Promise<Booking | null>;
  withDateLock<T>(date: string, work: (tx: BookingTransaction) => Promise<T>): Promise<T>;
}

/** Longest error text kept on a failed reminder. */
export const MAX_REMINDER_ERROR_LENGTH = 500;

export interface ReminderStore {
  insertReminders(rows: NewReminder[]): Promise<Reminder[]>;
  cancelPendingForBooking(bookingId: number): Promise<number>;
  getDueReminders(now: Date, limit: number): Promise<Reminder[]>;
  markSent(id: number): Promise<void>;
  markFailed(id: number, error: string): Promise<void>;
}

export interface SchedulingStore {
  calendar: CalendarStore;
  bookings: BookingStore;
  reminders: ReminderStore;
}
