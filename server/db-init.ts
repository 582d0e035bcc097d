import { sql } from 'drizzle-orm';
import { db } from './db';
import { getErrorMessage } from './utils/errorUtils';
import { logger } from './core/logger';
import { DEFAULT_SHOP_SETTINGS } from './core/scheduling/shopSettings';
import { WEEKDAYS } from './core/scheduling/types';

const SUNDAY = 6;

export async function createSchedulingTables(): Promise<void> {
  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS shop_settings (
      id INTEGER PRIMARY KEY DEFAULT 1 CONSTRAINT shop_settings_singleton CHECK (id = 1),
      base_grid_minutes INTEGER NOT NULL DEFAULT 60,
      short_service_threshold_minutes INTEGER NOT NULL DEFAULT 40,
      rest_minutes_after_short INTEGER NOT NULL DEFAULT 5,
      extra_round_minutes INTEGER NOT NULL DEFAULT 15,
      min_lead_minutes INTEGER NOT NULL DEFAULT 0,
      updated_at TIMESTAMPTZ DEFAULT NOW()
    )
  `);

  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS weekly_schedule (
      weekday INTEGER PRIMARY KEY CHECK (weekday BETWEEN 0 AND 6),
      is_working BOOLEAN NOT NULL DEFAULT TRUE,
      work_start TIME NOT NULL DEFAULT '09:00',
      work_end TIME NOT NULL DEFAULT '19:00'
    )
  `);

  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS days_off (
      date DATE PRIMARY KEY,
      created_at TIMESTAMPTZ DEFAULT NOW()
    )
  `);

  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS schedule_breaks (
      id SERIAL PRIMARY KEY,
      weekday INTEGER CHECK (weekday IS NULL OR weekday BETWEEN 0 AND 6),
      start_time TIME NOT NULL,
      end_time TIME NOT NULL,
      is_enabled BOOLEAN NOT NULL DEFAULT TRUE,
      created_at TIMESTAMPTZ DEFAULT NOW(),
      CHECK (end_time > start_time)
    )
  `);
  await db.execute(sql`CREATE INDEX IF NOT EXISTS idx_schedule_breaks_weekday ON schedule_breaks (weekday)`);

  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS bookings (
      id SERIAL PRIMARY KEY,
      client_id VARCHAR NOT NULL,
      booking_date DATE NOT NULL,
      start_time TIME NOT NULL,
      duration_minutes INTEGER NOT NULL CHECK (duration_minutes > 0),
      occupy_minutes INTEGER CHECK (occupy_minutes IS NULL OR occupy_minutes > 0),
      service_code VARCHAR,
      service_name VARCHAR NOT NULL,
      client_name VARCHAR NOT NULL,
      phone VARCHAR NOT NULL,
      status VARCHAR NOT NULL DEFAULT 'pending',
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
  await db.execute(sql`CREATE INDEX IF NOT EXISTS idx_bookings_date_status_time ON bookings (booking_date, status, start_time)`);
  await db.execute(sql`CREATE INDEX IF NOT EXISTS idx_bookings_client ON bookings (client_id)`);
  await db.execute(sql`CREATE INDEX IF NOT EXISTS idx_bookings_created ON bookings (created_at)`);

  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS reminders (
      id SERIAL PRIMARY KEY,
      booking_id INTEGER REFERENCES bookings(id),
      client_id VARCHAR NOT NULL,
      remind_at TIMESTAMPTZ NOT NULL,
      type VARCHAR NOT NULL,
      status VARCHAR NOT NULL DEFAULT 'pending',
      attempts INTEGER NOT NULL DEFAULT 0,
      last_error TEXT,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
  await db.execute(sql`CREATE INDEX IF NOT EXISTS idx_reminders_status_time ON reminders (status, remind_at)`);
  await db.execute(sql`CREATE INDEX IF NOT EXISTS idx_reminders_booking ON reminders (booking_id)`);

  logger.info('[DB Init] Scheduling tables ready');
}

export async function ensureDatabaseConstraints(): Promise<void> {
  const constraints = [
    {
      name: 'bookings_status_check',
      ddl: sql`ALTER TABLE bookings ADD CONSTRAINT bookings_status_check CHECK (status IN ('pending', 'approved', 'completed', 'rejected', 'cancelled_by_client', 'cancelled_by_admin'))`,
    },
    {
      name: 'reminders_status_check',
      ddl: sql`ALTER TABLE reminders ADD CONSTRAINT reminders_status_check CHECK (status IN ('pending', 'sent', 'canceled', 'failed'))`,
    },
  ];

  for (const constraint of constraints) {
    try {
      const existing = await db.execute(sql`SELECT 1 FROM pg_constraint WHERE conname = ${constraint.name}`);
      if (existing.rows.length > 0) continue;
      await db.execute(constraint.ddl);
      logger.info(`[DB Init] Added constraint ${constraint.name}`);
    } catch (error: unknown) {
      logger.warn(`[DB Init] Skipping constraint ${constraint.name}: ${getErrorMessage(error)}`);
    }
  }
}

/**
 * Seeds the settings singleton and one weekly row per weekday (Monday to Saturday
 * 09:00-19:00, Sunday off). Rows an administrator already changed are left alone.
 */
export async function seedSchedulingDefaults(): Promise<void> {
  await db.execute(sql`
    INSERT INTO shop_settings (id, base_grid_minutes, short_service_threshold_minutes, rest_minutes_after_short, extra_round_minutes, min_lead_minutes)
    VALUES (1, ${DEFAULT_SHOP_SETTINGS.baseGridMinutes}, ${DEFAULT_SHOP_SETTINGS.shortServiceThresholdMinutes},
            ${DEFAULT_SHOP_SETTINGS.restMinutesAfterShort}, ${DEFAULT_SHOP_SETTINGS.extraRoundMinutes},
            ${DEFAULT_SHOP_SETTINGS.minLeadMinutes})
    ON CONFLICT (id) DO NOTHING
  `);

  for (const weekday of WEEKDAYS) {
    await db.execute(sql`
      INSERT INTO weekly_schedule (weekday, is_working, work_start, work_end)
      VALUES (${weekday}, ${weekday !== SUNDAY}, '09:00', '19:00')
      ON CONFLICT (weekday) DO NOTHING
    `);
  }

  logger.info('[DB Init] Scheduling defaults seeded');
}

export async function initializeDatabase(): Promise<void> {
  try {
    await createSchedulingTables();
    await ensureDatabaseConstraints();
    await seedSchedulingDefaults();
  } catch (error: unknown) {
    logger.error('[DB Init] Database initialization failed:', { extra: { errorMessage: getErrorMessage(error) } });
    throw error;
  }
}
