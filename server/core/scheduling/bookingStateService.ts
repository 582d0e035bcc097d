import { canTransition, type BookingStatus } from '../../../shared/constants/statuses';
import type { BookingEventBus, BookingEventData, BookingEventType } from '../bookingEvents';
import { logger } from '../logger';
import { findConflictingBooking } from './conflictFilter';
import type { ShopConfigService } from './configService';
import { occupiedInterval } from './occupancy';
import { bookingFailure, type BookingResult } from './results';
import type { BookingStore } from './store';
import type { Booking } from './types';

type ActionBy = BookingEventData['actionBy'];

const EVENT_FOR_STATUS: Partial<Record<BookingStatus, BookingEventType>> = {
  approved: 'booking_approved',
  rejected: 'booking_declined',
  cancelled_by_client: 'booking_cancelled',
  cancelled_by_admin: 'booking_cancelled',
  completed: 'booking_completed',
};

interface PendingEvent {
  booking: Booking;
  previousStatus: BookingStatus;
  actionBy: ActionBy;
}

interface LockedOutcome {
  result: BookingResult;
  committed: PendingEvent | null;
}

/**
 * Status transitions after admission. Events are published only once the change has
 * committed.
 */
export class BookingStateService {
  constructor(
    private readonly config: ShopConfigService,
    private readonly bookings: BookingStore,
    private readonly events: BookingEventBus
  ) {}

  /**
   * Approves a pending booking after re-checking it against every other active booking of
   * its date under the date lock. A booking that now overlaps is rejected and the caller
   * receives SLOT_TAKEN.
   */
  async approve(bookingId: number): Promise<BookingResult> {
    const existing = await this.bookings.getBooking(bookingId);
    if (!existing) return notFound(bookingId);

    const settings = await this.config.getShopSettings();

    const { result, committed } = await this.bookings.withDateLock(existing.date, async (tx): Promise<LockedOutcome> => {
      const booking = await tx.getBooking(bookingId);
      if (!booking) return { result: notFound(bookingId), committed: null };
      if (!canTransition(booking.status, 'approved')) {
        return { result: invalidTransition(booking.status, 'approved'), committed: null };
      }

      const active = await tx.listActiveBookings(booking.date);
      const conflict = findConflictingBooking(occupiedInterval(booking, settings), active, settings, booking.id);
      if (conflict) {
        const rejected = await tx.updateStatus({ id: booking.id, from: [booking.status], to: 'rejected' });
        return {
          result: bookingFailure('SLOT_TAKEN', 'The booking overlaps another active booking and was rejected', {
            conflictingBookingId: conflict.id,
          }),
          committed: rejected ? { booking: rejected, previousStatus: booking.status, actionBy: 'system' } : null,
        };
      }

      const approved = await tx.updateStatus({ id: booking.id, from: [booking.status], to: 'approved' });
      if (!approved) return { result: invalidTransition(booking.status, 'approved'), committed: null };
      return {
        result: { success: true, booking: approved },
        committed: { booking: approved, previousStatus: booking.status, actionBy: 'admin' },
      };
    });

    if (committed) {
      await this.announce(committed);
    }
    if (!result.success && result.code === 'SLOT_TAKEN') {
      logger.warn(`[BookingState] Booking ${bookingId} rejected on approval: overlaps booking ${result.conflictingBookingId}`, {
        bookingId,
        bookingDate: existing.date,
      });
    }
    return result;
  }

  reject(bookingId: number): Promise<BookingResult> {
    return this.transition(bookingId, 'rejected', 'admin');
  }

  complete(bookingId: number): Promise<BookingResult> {
    return this.transition(bookingId, 'completed', 'admin');
  }

  cancelByAdmin(bookingId: number): Promise<BookingResult> {
    return this.transition(bookingId, 'cancelled_by_admin', 'admin');
  }

  /** Cancels an active booking owned by `clientId`; other clients' bookings read as missing. */
  cancelByClient(bookingId: number, clientId: string): Promise<BookingResult> {
    return this.transition(bookingId, 'cancelled_by_client', 'client', clientId);
  }

  private async transition(
    bookingId: number,
    to: BookingStatus,
    actionBy: ActionBy,
    clientId?: string
  ): Promise<BookingResult> {
    const existing = await this.bookings.getBooking(bookingId);
    if (!existing || (clientId !== undefined && existing.clientId !== clientId)) {
      return notFound(bookingId);
    }
    if (!canTransition(existing.status, to)) {
      return invalidTransition(existing.status, to);
    }

    const updated = await this.bookings.updateStatus({ id: bookingId, from: [existing.status], to, clientId });
    if (!updated) {
      // status moved between the read and the conditional update
      const current = await this.bookings.getBooking(bookingId);
      return invalidTransition(current?.status ?? existing.status, to);
    }

    await this.announce({ booking: updated, previousStatus: existing.status, actionBy });
    return { success: true, booking: updated };
  }

  private async announce(change: PendingEvent): Promise<void> {
    logger.info(`[BookingState] Booking ${change.booking.id}: ${change.previousStatus} -> ${change.booking.status}`, {
      bookingId: change.booking.id,
      bookingDate: change.booking.date,
      extra: { actionBy: change.actionBy },
    });
    const eventType = EVENT_FOR_STATUS[change.booking.status];
    if (eventType) {
      await this.events.publish(eventType, change);
    }
  }
}

function notFound(bookingId: number): BookingResult {
  return bookingFailure('NOT_FOUND', `Booking ${bookingId} not found`);
}

function invalidTransition(from: BookingStatus, to: BookingStatus): BookingResult {
  return bookingFailure('INVALID_TRANSITION', `Cannot move a booking from ${from} to ${to}`);
}
