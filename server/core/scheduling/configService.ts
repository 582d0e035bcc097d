import { getWeekday, isValidDateString } from '../../utils/dateUtils';
import { logger } from '../logger';
import { resolveDay, type CalendarSnapshot } from './calendarResolver';
import { ValidationError, validateShopSetting, validateShopSettingsPatch } from './shopSettings';
import type { CalendarStore, DaySchedulePatch } from './store';
import {
  isWeekday,
  type DayContext,
  type NewScheduleBreak,
  type ScheduleBreak,
  type ShopSettingKey,
  type ShopSettings,
  type Weekday,
  type WeeklyScheduleEntry,
} from './types';

const MINUTES_PER_DAY = 24 * 60;

export function assertValidDate(date: string, field: string = 'date'): void {
  if (!isValidDateString(date)) {
    throw new ValidationError(field, `${field} must be a calendar date in YYYY-MM-DD form`);
  }
}

export function assertWeekday(value: number, field: string = 'weekday'): Weekday {
  if (!isWeekday(value)) {
    throw new ValidationError(field, `${field} must be an integer between 0 (Monday) and 6 (Sunday)`);
  }
  return value;
}

function assertMinuteOfDay(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 0 || value > MINUTES_PER_DAY) {
    throw new ValidationError(field, `${field} must be a time between 00:00 and 24:00`);
  }
}

/**
 * Single owner of administrator configuration. Settings are cached and the cache is
 * refreshed by every write that goes through here, so a reader always sees the last
 * write it made.
 */
export class ShopConfigService {
  private settingsCache: ShopSettings | null = null;

  constructor(private readonly calendar: CalendarStore) {}

  async getShopSettings(): Promise<ShopSettings> {
    if (this.settingsCache) return { ...this.settingsCache };
    const settings = await this.calendar.getShopSettings();
    this.settingsCache = settings;
    return { ...settings };
  }

  invalidateSettingsCache(): void {
    this.settingsCache = null;
  }

  async setShopSetting(key: string, value: number): Promise<ShopSettings> {
    const checked = validateShopSetting(key, value);
    const patch: Partial<ShopSettings> = {};
    patch[checked.key] = checked.value;
    return this.persistSettings(patch);
  }

  async updateShopSettings(patch: Partial<ShopSettings>): Promise<ShopSettings> {
    const validated = validateShopSettingsPatch(patch);
    if (Object.keys(validated).length === 0) return this.getShopSettings();
    return this.persistSettings(validated);
  }

  async getShopSetting(key: ShopSettingKey): Promise<number> {
    const settings = await this.getShopSettings();
    return settings[key];
  }

  private async persistSettings(patch: Partial<ShopSettings>): Promise<ShopSettings> {
    this.invalidateSettingsCache();
    const updated = await this.calendar.updateShopSettings(patch);
    this.settingsCache = updated;
    logger.info('[ShopConfig] Settings updated', { extra: { ...patch } });
    return { ...updated };
  }

  getWeeklySchedule(): Promise<WeeklyScheduleEntry[]> {
    return this.calendar.getWeeklySchedule();
  }

  async getDaySchedule(weekday: number): Promise<WeeklyScheduleEntry | null> {
    return this.calendar.getDaySchedule(assertWeekday(weekday));
  }

  /**
   * Updates a weekday's entry, merging the patch over the stored row before checking that
   * the resulting window is non-empty. Returns null when the weekday row does not exist.
   */
  async setDaySchedule(weekday: number, patch: DaySchedulePatch): Promise<WeeklyScheduleEntry | null> {
    const day = assertWeekday(weekday);
    if (patch.workStart !== undefined) assertMinuteOfDay(patch.workStart, 'workStart');
    if (patch.workEnd !== undefined) assertMinuteOfDay(patch.workEnd, 'workEnd');

    const current = await this.calendar.getDaySchedule(day);
    if (!current) return null;

    const workStart = patch.workStart ?? current.workStart;
    const workEnd = patch.workEnd ?? current.workEnd;
    const isWorking = patch.isWorking ?? current.isWorking;
    if (isWorking && workEnd <= workStart) {
      throw new ValidationError('workEnd', 'workEnd must be later than workStart');
    }

    const updated = await this.calendar.updateDaySchedule(day, patch);
    logger.info(`[ShopConfig] Weekday ${day} schedule updated`, { extra: { ...patch } });
    return updated;
  }

  listBreaks(): Promise<ScheduleBreak[]> {
    return this.calendar.listBreaks();
  }

  async addBreak(input: { weekday: number | null; startTime: number; endTime: number }): Promise<ScheduleBreak> {
    const weekday = input.weekday === null ? null : assertWeekday(input.weekday);
    assertMinuteOfDay(input.startTime, 'startTime');
    assertMinuteOfDay(input.endTime, 'endTime');
    if (input.endTime <= input.startTime) {
      throw new ValidationError('endTime', 'endTime must be later than startTime');
    }
    const created: NewScheduleBreak = { weekday, startTime: input.startTime, endTime: input.endTime };
    const stored = await this.calendar.addBreak(created);
    logger.info(`[ShopConfig] Break ${stored.id} added`, { extra: { ...created } });
    return stored;
  }

  removeBreak(id: number): Promise<boolean> {
    return this.calendar.removeBreak(id);
  }

  setBreakEnabled(id: number, isEnabled: boolean): Promise<ScheduleBreak | null> {
    return this.calendar.setBreakEnabled(id, isEnabled);
  }

  listDaysOff(): Promise<string[]> {
    return this.calendar.listDaysOff();
  }

  async addDayOff(date: string): Promise<void> {
    assertValidDate(date);
    await this.calendar.addDayOff(date);
    logger.info(`[ShopConfig] Day off added: ${date}`);
  }

  async removeDayOff(date: string): Promise<boolean> {
    assertValidDate(date);
    return this.calendar.removeDayOff(date);
  }

  async getCalendarSnapshot(date: string): Promise<CalendarSnapshot> {
    assertValidDate(date);
    const weekday = assertWeekday(getWeekday(date));
    const [isDayOff, schedule, breaks] = await Promise.all([
      this.calendar.isDayOff(date),
      this.calendar.getDaySchedule(weekday),
      this.calendar.listBreaksForWeekday(weekday),
    ]);
    if (!schedule) {
      logger.warn(`[ShopConfig] No weekly schedule row for weekday ${weekday}, treating ${date} as closed`);
    }
    return { isDayOff, schedule, breaks };
  }

  async resolveDay(date: string): Promise<DayContext> {
    return resolveDay(date, await this.getCalendarSnapshot(date));
  }
}
