import { logger } from '../logger';
import type { Reminder } from '../scheduling/types';

/**
 * Delivery channel for due reminders. Throwing marks the reminder failed.
 */
export interface ReminderDispatcher {
  dispatch(reminder: Reminder): Promise<void>;
}

export class LoggingReminderDispatcher implements ReminderDispatcher {
  async dispatch(reminder: Reminder): Promise<void> {
    logger.info(`[Reminders] Reminder ${reminder.id} (${reminder.type}) due for client ${reminder.clientId}`, {
      bookingId: reminder.bookingId ?? undefined,
      clientId: reminder.clientId,
      extra: { remindAt: reminder.remindAt.toISOString() },
    });
  }
}
