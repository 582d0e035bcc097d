import pLimit from 'p-limit';
import { safeErrorDetail } from '../../utils/errorUtils';
import { toLocalDateTime } from '../../utils/dateUtils';
import type { BookingEventBus, BookingEventType } from '../bookingEvents';
import { logger } from '../logger';
import { MAX_REMINDER_ERROR_LENGTH, type ReminderStore } from '../scheduling/store';
import type { Booking, NewReminder, Reminder } from '../scheduling/types';
import type { ReminderDispatcher } from './reminderDispatcher';

export interface ReminderServiceOptions {
  /** Minutes before the booking start at which a reminder is due. */
  offsetsMinutes: readonly number[];
  batchSize: number;
  concurrency?: number;
}

export interface ReminderRunSummary {
  due: number;
  sent: number;
  failed: number;
}

const RELEASING_EVENTS: readonly BookingEventType[] = ['booking_declined', 'booking_cancelled', 'booking_completed'];

export function reminderType(offsetMinutes: number): string {
  return `before_${offsetMinutes}m`;
}

/**
 * Reminder times for a booking, skipping any that would already be due at `now`.
 */
export function planReminders(booking: Booking, offsetsMinutes: readonly number[], now: Date): NewReminder[] {
  return offsetsMinutes
    .map(offset => ({
      bookingId: booking.id,
      clientId: booking.clientId,
      remindAt: toLocalDateTime(booking.date, booking.startTime - offset),
      type: reminderType(offset),
    }))
    .filter(reminder => reminder.remindAt.getTime() > now.getTime())
    .sort((a, b) => a.remindAt.getTime() - b.remindAt.getTime());
}

export class ReminderService {
  private readonly concurrency: number;

  constructor(
    private readonly store: ReminderStore,
    private readonly dispatcher: ReminderDispatcher,
    private readonly options: ReminderServiceOptions,
    private readonly clock: () => Date = () => new Date()
  ) {
    this.concurrency = options.concurrency ?? 5;
  }

  /** Schedules on admission; releases pending reminders when a booking stops being active. */
  attach(events: BookingEventBus): () => void {
    return events.subscribe(async (eventType, { booking }) => {
      if (eventType === 'booking_created') {
        await this.scheduleForBooking(booking);
      } else if (RELEASING_EVENTS.includes(eventType)) {
        await this.cancelForBooking(booking.id);
      }
    });
  }

  async scheduleForBooking(booking: Booking): Promise<Reminder[]> {
    const planned = planReminders(booking, this.options.offsetsMinutes, this.clock());
    if (planned.length === 0) return [];
    const created = await this.store.insertReminders(planned);
    logger.info(`[Reminders] Scheduled ${created.length} reminder(s) for booking ${booking.id}`, {
      bookingId: booking.id,
    });
    return created;
  }

  async cancelForBooking(bookingId: number): Promise<number> {
    const canceled = await this.store.cancelPendingForBooking(bookingId);
    if (canceled > 0) {
      logger.info(`[Reminders] Canceled ${canceled} pending reminder(s) for booking ${bookingId}`, { bookingId });
    }
    return canceled;
  }

  async processDueReminders(): Promise<ReminderRunSummary> {
    const due = await this.store.getDueReminders(this.clock(), this.options.batchSize);
    if (due.length === 0) return { due: 0, sent: 0, failed: 0 };

    const limit = pLimit(this.concurrency);
    const outcomes = await Promise.all(due.map(reminder => limit(() => this.deliver(reminder))));
    const sent = outcomes.filter(Boolean).length;

    const summary = { due: due.length, sent, failed: due.length - sent };
    logger.info(`[Reminders] Processed ${summary.due} due reminder(s)`, { extra: { ...summary } });
    return summary;
  }

  private async deliver(reminder: Reminder): Promise<boolean> {
    try {
      await this.dispatcher.dispatch(reminder);
      await this.store.markSent(reminder.id);
      return true;
    } catch (error: unknown) {
      logger.error(`[Reminders] Delivery failed for reminder ${reminder.id}`, {
        bookingId: reminder.bookingId ?? undefined,
        error,
      });
      await this.store.markFailed(reminder.id, safeErrorDetail(error, MAX_REMINDER_ERROR_LENGTH));
      return false;
    }
  }
}
