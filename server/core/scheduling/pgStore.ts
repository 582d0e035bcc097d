import { and, asc, count, desc, eq, gte, inArray, isNull, lt, lte, or, sql } from 'drizzle-orm';
import type { DbExecutor } from '../../db';
import {
  bookings,
  daysOff,
  reminders,
  scheduleBreaks,
  shopSettings,
  weeklySchedule,
  type BookingRow,
  type ReminderRow,
  type ScheduleBreakRow,
  type ShopSettingsRow,
  type WeeklyScheduleRow,
} from '../../../shared/schema';
import { ACTIVE_BOOKING_STATUSES } from '../../../shared/constants/statuses';
import { logger } from '../logger';
import { fromStoredOccupancy } from './occupancy';
import { DEFAULT_SHOP_SETTINGS } from './shopSettings';
import {
  MAX_REMINDER_ERROR_LENGTH,
  type BookingStore,
  type BookingTransaction,
  type CalendarStore,
  type DaySchedulePatch,
  type ReminderStore,
  type SchedulingStore,
  type StatusUpdate,
} from './store';
import { minutesToTime, parseTimeToMinutes } from './timeUtils';
import {
  isWeekday,
  type Booking,
  type NewBooking,
  type NewReminder,
  type NewScheduleBreak,
  type Reminder,
  type ScheduleBreak,
  type ShopSettings,
  type Weekday,
  type WeeklyScheduleEntry,
} from './types';

const SETTINGS_ROW_ID = 1;

export function mapRowToShopSettings(row: ShopSettingsRow): ShopSettings {
  return {
    baseGridMinutes: row.baseGridMinutes,
    shortServiceThresholdMinutes: row.shortServiceThresholdMinutes,
    restMinutesAfterShort: row.restMinutesAfterShort,
    extraRoundMinutes: row.extraRoundMinutes,
    minLeadMinutes: row.minLeadMinutes,
  };
}

export function mapRowToSchedule(row: WeeklyScheduleRow): WeeklyScheduleEntry | null {
  if (!isWeekday(row.weekday)) return null;
  return {
    weekday: row.weekday,
    isWorking: row.isWorking,
    workStart: parseTimeToMinutes(row.workStart),
    workEnd: parseTimeToMinutes(row.workEnd),
  };
}

export function mapRowToBreak(row: ScheduleBreakRow): ScheduleBreak | null {
  let weekday: Weekday | null = null;
  if (row.weekday !== null) {
    if (!isWeekday(row.weekday)) return null;
    weekday = row.weekday;
  }
  return {
    id: row.id,
    weekday,
    startTime: parseTimeToMinutes(row.startTime),
    endTime: parseTimeToMinutes(row.endTime),
    isEnabled: row.isEnabled,
  };
}

export function mapRowToBooking(row: BookingRow): Booking {
  return {
    id: row.id,
    clientId: row.clientId,
    date: row.bookingDate,
    startTime: parseTimeToMinutes(row.startTime),
    durationMinutes: row.durationMinutes,
    occupancy: fromStoredOccupancy(row.occupyMinutes),
    serviceCode: row.serviceCode,
    serviceName: row.serviceName,
    clientName: row.clientName,
    phone: row.phone,
    status: row.status,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export function mapRowToReminder(row: ReminderRow): Reminder {
  return {
    id: row.id,
    bookingId: row.bookingId,
    clientId: row.clientId,
    remindAt: row.remindAt,
    type: row.type,
    status: row.status,
    attempts: row.attempts,
    lastError: row.lastError,
    createdAt: row.createdAt,
  };
}

function compact<T>(values: (T | null)[]): T[] {
  return values.filter((value): value is T => value !== null);
}

export class PgCalendarStore implements CalendarStore {
  constructor(private readonly db: DbExecutor) {}

  async getShopSettings(): Promise<ShopSettings> {
    const [row] = await this.db.select().from(shopSettings).where(eq(shopSettings.id, SETTINGS_ROW_ID));
    if (!row) {
      logger.warn('[Calendar] Shop settings row missing, using defaults');
      return { ...DEFAULT_SHOP_SETTINGS };
    }
    return mapRowToShopSettings(row);
  }

  async updateShopSettings(patch: Partial<ShopSettings>): Promise<ShopSettings> {
    const [row] = await this.db.insert(shopSettings)
      .values({ id: SETTINGS_ROW_ID, ...DEFAULT_SHOP_SETTINGS, ...patch, updatedAt: new Date() })
      .onConflictDoUpdate({
        target: shopSettings.id,
        set: { ...patch, updatedAt: new Date() },
      })
      .returning();
    return mapRowToShopSettings(row);
  }

  async getWeeklySchedule(): Promise<WeeklyScheduleEntry[]> {
    const rows = await this.db.select().from(weeklySchedule).orderBy(asc(weeklySchedule.weekday));
    return compact(rows.map(mapRowToSchedule));
  }

  async getDaySchedule(weekday: Weekday): Promise<WeeklyScheduleEntry | null> {
    const [row] = await this.db.select().from(weeklySchedule).where(eq(weeklySchedule.weekday, weekday));
    return row ? mapRowToSchedule(row) : null;
  }

  async updateDaySchedule(weekday: Weekday, patch: DaySchedulePatch): Promise<WeeklyScheduleEntry | null> {
    const set: Partial<typeof weeklySchedule.$inferInsert> = {};
    if (patch.isWorking !== undefined) set.isWorking = patch.isWorking;
    if (patch.workStart !== undefined) set.workStart = minutesToTime(patch.workStart);
    if (patch.workEnd !== undefined) set.workEnd = minutesToTime(patch.workEnd);
    if (Object.keys(set).length === 0) return this.getDaySchedule(weekday);

    const [row] = await this.db.update(weeklySchedule)
      .set(set)
      .where(eq(weeklySchedule.weekday, weekday))
      .returning();
    return row ? mapRowToSchedule(row) : null;
  }

  async listBreaks(): Promise<ScheduleBreak[]> {
    const rows = await this.db.select().from(scheduleBreaks)
      .orderBy(asc(scheduleBreaks.weekday), asc(scheduleBreaks.startTime), asc(scheduleBreaks.id));
    return compact(rows.map(mapRowToBreak));
  }

  async listBreaksForWeekday(weekday: Weekday): Promise<ScheduleBreak[]> {
    const rows = await this.db.select().from(scheduleBreaks)
      .where(and(
        eq(scheduleBreaks.isEnabled, true),
        or(isNull(scheduleBreaks.weekday), eq(scheduleBreaks.weekday, weekday))
      ))
      .orderBy(asc(scheduleBreaks.startTime), asc(scheduleBreaks.endTime));
    return compact(rows.map(mapRowToBreak));
  }

  async addBreak(input: NewScheduleBreak): Promise<ScheduleBreak> {
    const [row] = await this.db.insert(scheduleBreaks)
      .values({
        weekday: input.weekday,
        startTime: minutesToTime(input.startTime),
        endTime: minutesToTime(input.endTime),
      })
      .returning();
    const mapped = mapRowToBreak(row);
    if (!mapped) {
      throw new Error(`Break ${row.id} was stored with an invalid weekday`);
    }
    return mapped;
  }

  async removeBreak(id: number): Promise<boolean> {
    const removed = await this.db.delete(scheduleBreaks)
      .where(eq(scheduleBreaks.id, id))
      .returning({ id: scheduleBreaks.id });
    return removed.length > 0;
  }

  async setBreakEnabled(id: number, isEnabled: boolean): Promise<ScheduleBreak | null> {
    const [row] = await this.db.update(scheduleBreaks)
      .set({ isEnabled })
      .where(eq(scheduleBreaks.id, id))
      .returning();
    return row ? mapRowToBreak(row) : null;
  }

  async listDaysOff(): Promise<string[]> {
    const rows = await this.db.select({ date: daysOff.date }).from(daysOff).orderBy(asc(daysOff.date));
    return rows.map(r => r.date);
  }

  async addDayOff(date: string): Promise<void> {
    await this.db.insert(daysOff).values({ date }).onConflictDoNothing();
  }

  async removeDayOff(date: string): Promise<boolean> {
    const removed = await this.db.delete(daysOff)
      .where(eq(daysOff.date, date))
      .returning({ date: daysOff.date });
    return removed.length > 0;
  }

  async isDayOff(date: string): Promise<boolean> {
    const [row] = await this.db.select({ date: daysOff.date }).from(daysOff).where(eq(daysOff.date, date));
    return row !== undefined;
  }
}

async function selectActiveBookings(db: DbExecutor, date: string): Promise<Booking[]> {
  const rows = await db.select().from(bookings)
    .where(and(
      eq(bookings.bookingDate, date),
      inArray(bookings.status, [...ACTIVE_BOOKING_STATUSES])
    ))
    .orderBy(asc(bookings.startTime), asc(bookings.id));
  return rows.map(mapRowToBooking);
}

async function selectBooking(db: DbExecutor, id: number): Promise<Booking | null> {
  const [row] = await db.select().from(bookings).where(eq(bookings.id, id));
  return row ? mapRowToBooking(row) : null;
}

async function applyStatusUpdate(db: DbExecutor, update: StatusUpdate): Promise<Booking | null> {
  if (update.from.length === 0) return null;
  const conditions = [
    eq(bookings.id, update.id),
    inArray(bookings.status, [...update.from]),
  ];
  if (update.clientId !== undefined) {
    conditions.push(eq(bookings.clientId, update.clientId));
  }
  const [row] = await db.update(bookings)
    .set({ status: update.to, updatedAt: new Date() })
    .where(and(...conditions))
    .returning();
  return row ? mapRowToBooking(row) : null;
}

class PgBookingTransaction implements BookingTransaction {
  constructor(private readonly tx: DbExecutor) {}

  listActiveBookings(date: string): Promise<Booking[]> {
    return selectActiveBookings(this.tx, date);
  }

  getBooking(id: number): Promise<Booking | null> {
    return selectBooking(this.tx, id);
  }

  async insertBooking(input: NewBooking): Promise<Booking> {
    const [row] = await this.tx.insert(bookings)
      .values({
        clientId: input.clientId,
        bookingDate: input.date,
        startTime: minutesToTime(input.startTime),
        durationMinutes: input.durationMinutes,
        occupyMinutes: input.occupyMinutes,
        serviceCode: input.serviceCode,
        serviceName: input.serviceName,
        clientName: input.clientName,
        phone: input.phone,
        status: 'pending',
      })
      .returning();
    return mapRowToBooking(row);
  }

  updateStatus(update: StatusUpdate): Promise<Booking | null> {
    return applyStatusUpdate(this.tx, update);
  }
}

export class PgBookingStore implements BookingStore {
  constructor(private readonly db: DbExecutor) {}

  listActiveBookings(date: string): Promise<Booking[]> {
    return selectActiveBookings(this.db, date);
  }

  getBooking(id: number): Promise<Booking | null> {
    return selectBooking(this.db, id);
  }

  async listBookingsForDate(date: string): Promise<Booking[]> {
    const rows = await this.db.select().from(bookings)
      .where(eq(bookings.bookingDate, date))
      .orderBy(asc(bookings.startTime), asc(bookings.id));
    return rows.map(mapRowToBooking);
  }

  async listPendingBookings(): Promise<Booking[]> {
    const rows = await this.db.select().from(bookings)
      .where(eq(bookings.status, 'pending'))
      .orderBy(asc(bookings.bookingDate), asc(bookings.startTime), asc(bookings.id));
    return rows.map(mapRowToBooking);
  }

  async listClientBookings(clientId: string, limit: number): Promise<Booking[]> {
    const rows = await this.db.select().from(bookings)
      .where(eq(bookings.clientId, clientId))
      .orderBy(desc(bookings.bookingDate), desc(bookings.startTime), desc(bookings.id))
      .limit(limit);
    return rows.map(mapRowToBooking);
  }

  async countActiveCreatedBetween(clientId: string, from: Date, to: Date): Promise<number> {
    const [row] = await this.db.select({ total: count() }).from(bookings)
      .where(and(
        eq(bookings.clientId, clientId),
        inArray(bookings.status, [...ACTIVE_BOOKING_STATUSES]),
        gte(bookings.createdAt, from),
        lt(bookings.createdAt, to)
      ));
    return row?.total ?? 0;
  }

  updateStatus(update: StatusUpdate): Promise<Booking | null> {
    return applyStatusUpdate(this.db, update);
  }

  /**
   * Runs `work` in a transaction holding a transaction-scoped advisory lock keyed by the
   * date, so every writer for the same date is serialized while other dates proceed.
   */
  async withDateLock<T>(date: string, work: (tx: BookingTransaction) => Promise<T>): Promise<T> {
    return this.db.transaction(async (tx) => {
      const lockKey = `bookings:${date}`;
      await tx.execute(sql`SELECT pg_advisory_xact_lock(hashtext(${lockKey}::text))`);
      return work(new PgBookingTransaction(tx));
    });
  }
}

export class PgReminderStore implements ReminderStore {
  constructor(private readonly db: DbExecutor) {}

  async insertReminders(rows: NewReminder[]): Promise<Reminder[]> {
    if (rows.length === 0) return [];
    const inserted = await this.db.insert(reminders)
      .values(rows.map(r => ({
        bookingId: r.bookingId,
        clientId: r.clientId,
        remindAt: r.remindAt,
        type: r.type,
      })))
      .returning();
    return inserted.map(mapRowToReminder);
  }

  async cancelPendingForBooking(bookingId: number): Promise<number> {
    const canceled = await this.db.update(reminders)
      .set({ status: 'canceled' })
      .where(and(eq(reminders.bookingId, bookingId), eq(reminders.status, 'pending')))
      .returning({ id: reminders.id });
    return canceled.length;
  }

  async getDueReminders(now: Date, limit: number): Promise<Reminder[]> {
    const rows = await this.db.select().from(reminders)
      .where(and(eq(reminders.status, 'pending'), lte(reminders.remindAt, now)))
      .orderBy(asc(reminders.remindAt), asc(reminders.id))
      .limit(limit);
    return rows.map(mapRowToReminder);
  }

  async markSent(id: number): Promise<void> {
    await this.db.update(reminders)
      .set({ status: 'sent' })
      .where(eq(reminders.id, id));
  }

  async markFailed(id: number, error: string): Promise<void> {
    await this.db.update(reminders)
      .set({ status: 'failed', attempts: sql`${reminders.attempts} + 1`, lastError: error.slice(0, MAX_REMINDER_ERROR_LENGTH) })
      .where(eq(reminders.id, id));
  }
}

export function createPgSchedulingStore(db: DbExecutor): SchedulingStore {
  return {
    calendar: new PgCalendarStore(db),
    bookings: new PgBookingStore(db),
    reminders: new PgReminderStore(db),
  };
}
