import {
  ACTIVE_BOOKING_STATUSES,
  type BookingStatus,
} from '../../shared/constants/statuses';
import { fromStoredOccupancy } from '../../server/core/scheduling/occupancy';
import { DEFAULT_SHOP_SETTINGS } from '../../server/core/scheduling/shopSettings';
import {
  MAX_REMINDER_ERROR_LENGTH,
  type BookingStore,
  type BookingTransaction,
  type CalendarStore,
  type DaySchedulePatch,
  type ReminderStore,
  type SchedulingStore,
  type StatusUpdate,
} from '../../server/core/scheduling/store';
import {
  WEEKDAYS,
  type Booking,
  type NewBooking,
  type NewReminder,
  type NewScheduleBreak,
  type Reminder,
  type ScheduleBreak,
  type ShopSettings,
  type Weekday,
  type WeeklyScheduleEntry,
} from '../../server/core/scheduling/types';

/** Monday to Saturday 09:00-19:00, Sunday closed. */
export function defaultWeeklySchedule(): WeeklyScheduleEntry[] {
  return WEEKDAYS.map(weekday => ({
    weekday,
    isWorking: weekday !== 6,
    workStart: 9 * 60,
    workEnd: 19 * 60,
  }));
}

export class MemoryCalendarStore implements CalendarStore {
  settings: ShopSettings;
  schedule: Map<Weekday, WeeklyScheduleEntry>;
  breaks: ScheduleBreak[] = [];
  daysOff = new Set<string>();
  private nextBreakId = 1;

  constructor(settings: Partial<ShopSettings> = {}, schedule: WeeklyScheduleEntry[] = defaultWeeklySchedule()) {
    this.settings = { ...DEFAULT_SHOP_SETTINGS, ...settings };
    this.schedule = new Map(schedule.map(entry => [entry.weekday, { ...entry }]));
  }

  async getShopSettings(): Promise<ShopSettings> {
    return { ...this.settings };
  }

  async updateShopSettings(patch: Partial<ShopSettings>): Promise<ShopSettings> {
    this.settings = { ...this.settings, ...patch };
    return { ...this.settings };
  }

  async getWeeklySchedule(): Promise<WeeklyScheduleEntry[]> {
    return Array.from(this.schedule.values())
      .sort((a, b) => a.weekday - b.weekday)
      .map(entry => ({ ...entry }));
  }

  async getDaySchedule(weekday: Weekday): Promise<WeeklyScheduleEntry | null> {
    const entry = this.schedule.get(weekday);
    return entry ? { ...entry } : null;
  }

  async updateDaySchedule(weekday: Weekday, patch: DaySchedulePatch): Promise<WeeklyScheduleEntry | null> {
    const entry = this.schedule.get(weekday);
    if (!entry) return null;
    const updated = { ...entry, ...patch };
    this.schedule.set(weekday, updated);
    return { ...updated };
  }

  async listBreaks(): Promise<ScheduleBreak[]> {
    return this.breaks.map(b => ({ ...b }));
  }

  async listBreaksForWeekday(weekday: Weekday): Promise<ScheduleBreak[]> {
    return this.breaks
      .filter(b => b.isEnabled && (b.weekday === null || b.weekday === weekday))
      .sort((a, b) => a.startTime - b.startTime || a.endTime - b.endTime)
      .map(b => ({ ...b }));
  }

  async addBreak(input: NewScheduleBreak): Promise<ScheduleBreak> {
    const created: ScheduleBreak = { id: this.nextBreakId++, ...input, isEnabled: true };
    this.breaks.push(created);
    return { ...created };
  }

  async removeBreak(id: number): Promise<boolean> {
    const before = this.breaks.length;
    this.breaks = this.breaks.filter(b => b.id !== id);
    return this.breaks.length < before;
  }

  async setBreakEnabled(id: number, isEnabled: boolean): Promise<ScheduleBreak | null> {
    const found = this.breaks.find(b => b.id === id);
    if (!found) return null;
    found.isEnabled = isEnabled;
    return { ...found };
  }

  async listDaysOff(): Promise<string[]> {
    return Array.from(this.daysOff).sort();
  }

  async addDayOff(date: string): Promise<void> {
    this.daysOff.add(date);
  }

  async removeDayOff(date: string): Promise<boolean> {
    return this.daysOff.delete(date);
  }

  async isDayOff(date: string): Promise<boolean> {
    return this.daysOff.has(date);
  }
}

interface StoredBooking {
  id: number;
  clientId: string;
  date: string;
  startTime: number;
  durationMinutes: number;
  occupyMinutes: number | null;
  serviceCode: string | null;
  serviceName: string;
  clientName: string;
  phone: string;
  status: BookingStatus;
  createdAt: Date;
  updatedAt: Date;
}

function toBooking(row: StoredBooking): Booking {
  return {
    id: row.id,
    clientId: row.clientId,
    date: row.date,
    startTime: row.startTime,
    durationMinutes: row.durationMinutes,
    occupancy: fromStoredOccupancy(row.occupyMinutes),
    serviceCode: row.serviceCode,
    serviceName: row.serviceName,
    clientName: row.clientName,
    phone: row.phone,
    status: row.status,
    createdAt: new Date(row.createdAt),
    updatedAt: new Date(row.updatedAt),
  };
}

function byStart(a: StoredBooking, b: StoredBooking): number {
  return a.startTime - b.startTime || a.id - b.id;
}

export type SeedBooking = Partial<Omit<StoredBooking, 'id'>> & Pick<StoredBooking, 'date' | 'startTime' | 'durationMinutes'>;

/**
 * Bookings held in a Map. withDateLock chains callers per date, so work for one date runs
 * strictly one after another while other dates proceed.
 */
export class MemoryBookingStore implements BookingStore {
  rows = new Map<number, StoredBooking>();
  lockAcquisitions: string[] = [];
  private nextId = 1;
  private readonly locks = new Map<string, Promise<void>>();

  constructor(private readonly clock: () => Date = () => new Date()) {}

  /** Inserts a row directly, bypassing admission. Omitted occupancy stays derived. */
  seed(input: SeedBooking): Booking {
    const now = this.clock();
    const row: StoredBooking = {
      id: this.nextId++,
      clientId: 'seed-client',
      occupyMinutes: null,
      serviceCode: null,
      serviceName: 'Haircut',
      clientName: 'Seed Client',
      phone: '000',
      status: 'pending',
      createdAt: now,
      updatedAt: now,
      ...input,
    };
    this.rows.set(row.id, row);
    return toBooking(row);
  }

  async listActiveBookings(date: string): Promise<Booking[]> {
    return Array.from(this.rows.values())
      .filter(row => row.date === date && ACTIVE_BOOKING_STATUSES.includes(row.status))
      .sort(byStart)
      .map(toBooking);
  }

  async getBooking(id: number): Promise<Booking | null> {
    const row = this.rows.get(id);
    return row ? toBooking(row) : null;
  }

  async listBookingsForDate(date: string): Promise<Booking[]> {
    return Array.from(this.rows.values())
      .filter(row => row.date === date)
      .sort(byStart)
      .map(toBooking);
  }

  async listPendingBookings(): Promise<Booking[]> {
    return Array.from(this.rows.values())
      .filter(row => row.status === 'pending')
      .sort((a, b) => a.date.localeCompare(b.date) || byStart(a, b))
      .map(toBooking);
  }

  async listClientBookings(clientId: string, limit: number): Promise<Booking[]> {
    return Array.from(this.rows.values())
      .filter(row => row.clientId === clientId)
      .sort((a, b) => b.date.localeCompare(a.date) || byStart(b, a))
      .slice(0, limit)
      .map(toBooking);
  }

  async countActiveCreatedBetween(clientId: string, from: Date, to: Date): Promise<number> {
    return Array.from(this.rows.values()).filter(row =>
      row.clientId === clientId &&
      ACTIVE_BOOKING_STATUSES.includes(row.status) &&
      row.createdAt.getTime() >= from.getTime() &&
      row.createdAt.getTime() < to.getTime()
    ).length;
  }

  async updateStatus(update: StatusUpdate): Promise<Booking | null> {
    const row = this.rows.get(update.id);
    if (!row || !update.from.includes(row.status)) return null;
    if (update.clientId !== undefined && row.clientId !== update.clientId) return null;
    row.status = update.to;
    row.updatedAt = this.clock();
    return toBooking(row);
  }

  async insertBooking(input: NewBooking): Promise<Booking> {
    const now = this.clock();
    const row: StoredBooking = { id: this.nextId++, ...input, status: 'pending', createdAt: now, updatedAt: now };
    this.rows.set(row.id, row);
    return toBooking(row);
  }

  async withDateLock<T>(date: string, work: (tx: BookingTransaction) => Promise<T>): Promise<T> {
    const previous = this.locks.get(date) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.locks.set(date, tail);

    await previous;
    this.lockAcquisitions.push(date);
    try {
      return await work(this);
    } finally {
      release();
      if (this.locks.get(date) === tail) {
        this.locks.delete(date);
      }
    }
  }
}

export class MemoryReminderStore implements ReminderStore {
  rows = new Map<number, Reminder>();
  private nextId = 1;

  async insertReminders(rows: NewReminder[]): Promise<Reminder[]> {
    return rows.map(input => {
      const reminder: Reminder = {
        id: this.nextId++,
        ...input,
        status: 'pending',
        attempts: 0,
        lastError: null,
        createdAt: new Date(),
      };
      this.rows.set(reminder.id, reminder);
      return { ...reminder };
    });
  }

  async cancelPendingForBooking(bookingId: number): Promise<number> {
    let canceled = 0;
    for (const reminder of this.rows.values()) {
      if (reminder.bookingId === bookingId && reminder.status === 'pending') {
        reminder.status = 'canceled';
        canceled += 1;
      }
    }
    return canceled;
  }

  async getDueReminders(now: Date, limit: number): Promise<Reminder[]> {
    return Array.from(this.rows.values())
      .filter(r => r.status === 'pending' && r.remindAt.getTime() <= now.getTime())
      .sort((a, b) => a.remindAt.getTime() - b.remindAt.getTime() || a.id - b.id)
      .slice(0, limit)
      .map(r => ({ ...r }));
  }

  async markSent(id: number): Promise<void> {
    const reminder = this.rows.get(id);
    if (reminder) reminder.status = 'sent';
  }

  async markFailed(id: number, error: string): Promise<void> {
    const reminder = this.rows.get(id);
    if (!reminder) return;
    reminder.status = 'failed';
    reminder.attempts += 1;
    reminder.lastError = error.slice(0, MAX_REMINDER_ERROR_LENGTH);
  }

  list(): Reminder[] {
    return Array.from(this.rows.values()).sort((a, b) => a.id - b.id);
  }
}

export interface MemorySchedulingStore extends SchedulingStore {
  calendar: MemoryCalendarStore;
  bookings: MemoryBookingStore;
  reminders: MemoryReminderStore;
}

export function createMemorySchedulingStore(
  options: { settings?: Partial<ShopSettings>; clock?: () => Date } = {}
): MemorySchedulingStore {
  return {
    calendar: new MemoryCalendarStore(options.settings),
    bookings: new MemoryBookingStore(options.clock),
    reminders: new MemoryReminderStore(),
  };
}
