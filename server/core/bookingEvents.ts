import type { BookingStatus } from '../../shared/constants/statuses';
import type { Booking } from './scheduling/types';
import { minutesToTime } from './scheduling/timeUtils';
import { formatDateDisplayWithDay } from '../utils/dateUtils';
import { logger } from './logger';

export type BookingEventType =
  | 'booking_created'
  | 'booking_approved'
  | 'booking_declined'
  | 'booking_cancelled'
  | 'booking_completed';

export interface BookingEventData {
  booking: Booking;
  previousStatus?: BookingStatus;
  actionBy: 'client' | 'admin' | 'system';
}

export type BookingEventListener = (eventType: BookingEventType, data: BookingEventData) => Promise<void> | void;

function formatBookingDateTime(booking: Booking): string {
  return `${formatDateDisplayWithDay(booking.date)} at ${minutesToTime(booking.startTime)}`;
}

/**
 * Post-commit fan-out for booking state changes. Listeners run in registration order; a
 * failing listener is logged and never fails the operation that published the event.
 */
export class BookingEventBus {
  private listeners: BookingEventListener[] = [];

  subscribe(listener: BookingEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }

  async publish(eventType: BookingEventType, data: BookingEventData): Promise<void> {
    const { booking } = data;
    logger.info(`[BookingEvents] Publishing ${eventType} for booking ${booking.id}`, {
      bookingId: booking.id,
      bookingDate: booking.date,
      extra: {
        when: formatBookingDateTime(booking),
        status: booking.status,
        previousStatus: data.previousStatus,
        actionBy: data.actionBy,
      },
    });

    for (const listener of this.listeners) {
      try {
        await listener(eventType, data);
      } catch (err: unknown) {
        logger.error(`[BookingEvents] Listener failed for ${eventType}`, {
          bookingId: booking.id,
          error: err,
        });
      }
    }
  }
}
