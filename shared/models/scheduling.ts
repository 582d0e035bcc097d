import { sql } from "drizzle-orm";
import { BOOKING_STATUSES, REMINDER_STATUSES } from "../constants/statuses";
import { index, pgTable, timestamp, varchar, serial, boolean, text, date, time, integer, check } from "drizzle-orm/pg-core";

// Shop settings - single row (id = 1) governing the slot grid and occupancy rules
export const shopSettings = pgTable("shop_settings", {
  id: integer("id").primaryKey().default(1),
  baseGridMinutes: integer("base_grid_minutes").notNull().default(60),
  shortServiceThresholdMinutes: integer("short_service_threshold_minutes").notNull().default(40),
  restMinutesAfterShort: integer("rest_minutes_after_short").notNull().default(5),
  extraRoundMinutes: integer("extra_round_minutes").notNull().default(15),
  minLeadMinutes: integer("min_lead_minutes").notNull().default(0),
  updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow(),
}, (table) => [
  check("shop_settings_singleton", sql`${table.id} = 1`),
]);

// Weekly schedule - exactly one row per weekday (0 = Monday ... 6 = Sunday)
export const weeklySchedule = pgTable("weekly_schedule", {
  weekday: integer("weekday").primaryKey(),
  isWorking: boolean("is_working").notNull().default(true),
  workStart: time("work_start").notNull().default('09:00'),
  workEnd: time("work_end").notNull().default('19:00'),
});

// Days off - explicit non-working dates overriding the weekly schedule
export const daysOff = pgTable("days_off", {
  date: date("date").primaryKey(),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow(),
});

// Schedule breaks - weekday NULL applies to every day
export const scheduleBreaks = pgTable("schedule_breaks", {
  id: serial("id").primaryKey(),
  weekday: integer("weekday"),
  startTime: time("start_time").notNull(),
  endTime: time("end_time").notNull(),
  isEnabled: boolean("is_enabled").notNull().default(true),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow(),
}, (table) => [
  index("idx_schedule_breaks_weekday").on(table.weekday),
]);

// Bookings - occupy_minutes NULL means "derive from duration" for rows written before it existed
export const bookings = pgTable("bookings", {
  id: serial("id").primaryKey(),
  clientId: varchar("client_id").notNull(),
  bookingDate: date("booking_date").notNull(),
  startTime: time("start_time").notNull(),
  durationMinutes: integer("duration_minutes").notNull(),
  occupyMinutes: integer("occupy_minutes"),
  serviceCode: varchar("service_code"),
  serviceName: varchar("service_name").notNull(),
  clientName: varchar("client_name").notNull(),
  phone: varchar("phone").notNull(),
  status: varchar("status", { enum: BOOKING_STATUSES }).notNull().default("pending"),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  index("idx_bookings_date_status_time").on(table.bookingDate, table.status, table.startTime),
  index("idx_bookings_client").on(table.clientId),
  index("idx_bookings_created").on(table.createdAt),
]);

// Reminders - due queue consumed by the reminder scheduler
export const reminders = pgTable("reminders", {
  id: serial("id").primaryKey(),
  bookingId: integer("booking_id").references(() => bookings.id),
  clientId: varchar("client_id").notNull(),
  remindAt: timestamp("remind_at", { withTimezone: true }).notNull(),
  type: varchar("type").notNull(),
  status: varchar("status", { enum: REMINDER_STATUSES }).notNull().default("pending"),
  attempts: integer("attempts").notNull().default(0),
  lastError: text("last_error"),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  index("idx_reminders_status_time").on(table.status, table.remindAt),
  index("idx_reminders_booking").on(table.bookingId),
]);

export type ShopSettingsRow = typeof shopSettings.$inferSelect;
export type WeeklyScheduleRow = typeof weeklySchedule.$inferSelect;
export type ScheduleBreakRow = typeof scheduleBreaks.$inferSelect;
export type BookingRow = typeof bookings.$inferSelect;
export type ReminderRow = typeof reminders.$inferSelect;
