import { getMinuteOfDay, getTodayLocal, addDaysToDate, toLocalDateTime } from '../../utils/dateUtils';
import type { BookingEventBus } from '../bookingEvents';
import { logger } from '../logger';
import { assertDuration } from './availabilityService';
import type { ShopConfigService } from './configService';
import { assertValidDate } from './configService';
import { findConflictingBooking, findOverlap } from './conflictFilter';
import { occupy } from './occupancy';
import { bookingFailure, type BookingResult } from './results';
import { ValidationError } from './shopSettings';
import type { BookingStore } from './store';
import { minutesToTime } from './timeUtils';
import type { DayContext, ShopSettings, TimeInterval } from './types';

export interface AdmissionRequest {
  clientId: string;
  date: string;
  startTime: number;
  durationMinutes: number;
  /** Reserved span to use instead of the derived one; never shorter than the derived span. */
  occupyMinutesOverride?: number | null;
  serviceCode?: string | null;
  serviceName: string;
  clientName: string;
  phone: string;
}

export interface AdmissionOptions {
  /** Active requests a client may create per calendar day; 0 disables the limit. */
  maxActiveRequestsPerDay: number;
}

function requireText(value: string, field: string): string {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new ValidationError(field, `${field} is required`);
  }
  return trimmed;
}

function validateRequest(request: AdmissionRequest): void {
  requireText(request.clientId, 'clientId');
  assertValidDate(request.date);
  if (!Number.isInteger(request.startTime) || request.startTime < 0 || request.startTime >= 24 * 60) {
    throw new ValidationError('startTime', 'startTime must be a time between 00:00 and 23:59');
  }
  assertDuration(request.durationMinutes);
  if (request.occupyMinutesOverride !== undefined && request.occupyMinutesOverride !== null) {
    assertDuration(request.occupyMinutesOverride, 'occupyMinutesOverride');
  }
  requireText(request.serviceName, 'serviceName');
  requireText(request.clientName, 'clientName');
  requireText(request.phone, 'phone');
}

/**
 * Atomic reserve-or-reject. The calendar and the daily limit are checked first without the
 * lock; the overlap check and the insert then run together under the date's exclusive lock
 * against the bookings as they are at that moment.
 */
export class AdmissionController {
  constructor(
    private readonly config: ShopConfigService,
    private readonly bookings: BookingStore,
    private readonly events: BookingEventBus,
    private readonly options: AdmissionOptions
  ) {}

  async admit(request: AdmissionRequest, now: Date = new Date()): Promise<BookingResult> {
    validateRequest(request);

    const settings = await this.config.getShopSettings();
    const derivedMinutes = occupy(request.durationMinutes, settings);
    const override = request.occupyMinutesOverride ?? null;
    if (override !== null && override < derivedMinutes) {
      throw new ValidationError(
        'occupyMinutesOverride',
        `occupyMinutesOverride must be at least ${derivedMinutes} minutes for a ${request.durationMinutes}-minute service`
      );
    }
    const day = await this.config.resolveDay(request.date);

    const calendarFailure = this.checkCalendar(request, day, settings, now);
    if (calendarFailure) return calendarFailure;

    const limitFailure = await this.checkDailyLimit(request.clientId, now);
    if (limitFailure) return limitFailure;

    const occupyMinutes = override ?? derivedMinutes;
    const candidate: TimeInterval = { start: request.startTime, end: request.startTime + occupyMinutes };

    const result = await this.bookings.withDateLock(request.date, async (tx): Promise<BookingResult> => {
      const active = await tx.listActiveBookings(request.date);
      const conflict = findConflictingBooking(candidate, active, settings);
      if (conflict) {
        return bookingFailure('SLOT_TAKEN', 'This time slot has already been taken', {
          conflictingBookingId: conflict.id,
        });
      }

      const booking = await tx.insertBooking({
        clientId: request.clientId.trim(),
        date: request.date,
        startTime: request.startTime,
        durationMinutes: request.durationMinutes,
        occupyMinutes,
        serviceCode: request.serviceCode ?? null,
        serviceName: request.serviceName.trim(),
        clientName: request.clientName.trim(),
        phone: request.phone.trim(),
      });
      return { success: true, booking };
    });

    if (!result.success) {
      logger.info(`[Admission] Rejected ${request.date} ${minutesToTime(request.startTime)}: ${result.code}`, {
        bookingDate: request.date,
        clientId: request.clientId,
        extra: { conflictingBookingId: result.conflictingBookingId },
      });
      return result;
    }

    logger.info(`[Admission] Booking ${result.booking.id} created for ${request.date} ${minutesToTime(request.startTime)}`, {
      bookingId: result.booking.id,
      bookingDate: request.date,
      clientId: request.clientId,
    });
    await this.events.publish('booking_created', { booking: result.booking, actionBy: 'client' });
    return result;
  }

  private checkCalendar(
    request: AdmissionRequest,
    day: DayContext,
    settings: ShopSettings,
    now: Date
  ): BookingResult | null {
    const today = getTodayLocal(now);
    if (request.date < today) {
      return bookingFailure('SLOT_IN_PAST', 'The requested date is in the past');
    }
    if (!day.isWorking) {
      return bookingFailure('DAY_CLOSED', 'The shop is closed on the requested date');
    }

    const end = request.startTime + request.durationMinutes;
    if (request.startTime < day.workStart || end > day.workEnd) {
      return bookingFailure(
        'OUTSIDE_WORKING_HOURS',
        `Working hours are ${minutesToTime(day.workStart)}-${minutesToTime(day.workEnd)}`
      );
    }
    if (request.date === today && request.startTime < getMinuteOfDay(now) + settings.minLeadMinutes) {
      return bookingFailure('SLOT_IN_PAST', 'The requested time is too soon to book');
    }

    const blockingBreak = findOverlap(request.startTime, end, day.breaks);
    if (blockingBreak) {
      return bookingFailure(
        'BREAK_CONFLICT',
        `The requested time overlaps a break (${minutesToTime(blockingBreak.start)}-${minutesToTime(blockingBreak.end)})`
      );
    }
    return null;
  }

  private async checkDailyLimit(clientId: string, now: Date): Promise<BookingResult | null> {
    const limit = this.options.maxActiveRequestsPerDay;
    if (limit <= 0) return null;

    const today = getTodayLocal(now);
    const count = await this.bookings.countActiveCreatedBetween(
      clientId.trim(),
      toLocalDateTime(today, 0),
      toLocalDateTime(addDaysToDate(today, 1), 0)
    );
    if (count >= limit) {
      return bookingFailure('DAILY_LIMIT_REACHED', `At most ${limit} active request(s) can be made per day`);
    }
    return null;
  }
}
