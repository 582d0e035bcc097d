import { addDaysToDate, getMinuteOfDay, getTodayLocal } from '../../utils/dateUtils';
import { toWorkContext } from './calendarResolver';
import type { ShopConfigService } from './configService';
import { assertValidDate } from './configService';
import { ValidationError } from './shopSettings';
import { freeStarts } from './slotGenerator';
import type { BookingReader } from './store';
import type { WorkContext } from './types';

const MAX_DURATION_MINUTES = 24 * 60;

export function assertDuration(durationMinutes: number, field: string = 'durationMinutes'): void {
  if (!Number.isInteger(durationMinutes) || durationMinutes <= 0 || durationMinutes > MAX_DURATION_MINUTES) {
    throw new ValidationError(field, `${field} must be a positive whole number of minutes`);
  }
}

/**
 * Read side of booking: what a client may pick. Nothing here takes the per-date lock, so
 * results can be stale by the time a request is admitted.
 */
export class AvailabilityService {
  constructor(
    private readonly config: ShopConfigService,
    private readonly bookings: BookingReader
  ) {}

  async getFreeStarts(date: string, durationMinutes: number, now: Date = new Date()): Promise<number[]> {
    assertValidDate(date);
    assertDuration(durationMinutes);

    const today = getTodayLocal(now);
    if (date < today) return [];

    const [settings, day, activeBookings] = await Promise.all([
      this.config.getShopSettings(),
      this.config.resolveDay(date),
      this.bookings.listActiveBookings(date),
    ]);

    return freeStarts({
      day,
      durationMinutes,
      activeBookings,
      settings,
      isToday: date === today,
      nowMinute: getMinuteOfDay(now),
    });
  }

  async getWorkContext(date: string): Promise<WorkContext> {
    return toWorkContext(await this.config.resolveDay(date));
  }

  /**
   * Working dates from today through `days - 1` days ahead, in calendar order.
   */
  async listBookableDates(days: number, now: Date = new Date()): Promise<string[]> {
    if (!Number.isInteger(days) || days < 1) {
      throw new ValidationError('days', 'days must be a positive integer');
    }
    const today = getTodayLocal(now);
    const dates = Array.from({ length: days }, (_, offset) => addDaysToDate(today, offset));
    const contexts = await Promise.all(dates.map(date => this.config.resolveDay(date)));
    return dates.filter((_, i) => contexts[i].isWorking);
  }
}
