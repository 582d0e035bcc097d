import { schedulerTracker } from '../core/schedulerTracker';
import type { ReminderService } from '../core/reminders/reminderService';
import { logger } from '../core/logger';
import { getErrorMessage } from '../utils/errorUtils';

export const REMINDER_SCHEDULER_NAME = 'Reminder Delivery';

let intervalId: NodeJS.Timeout | null = null;
let isRunning = false;

export async function runReminderCycle(service: ReminderService): Promise<void> {
  if (isRunning) {
    logger.info('[Reminders] Previous cycle still running, skipping');
    return;
  }

  isRunning = true;
  const startedAt = Date.now();
  try {
    const summary = await service.processDueReminders();
    schedulerTracker.recordRun(REMINDER_SCHEDULER_NAME, summary.failed === 0, undefined, Date.now() - startedAt);
  } catch (error: unknown) {
    logger.error('[Reminders] Cycle failed:', { error });
    schedulerTracker.recordRun(REMINDER_SCHEDULER_NAME, false, getErrorMessage(error), Date.now() - startedAt);
  } finally {
    isRunning = false;
  }
}

export function startReminderScheduler(service: ReminderService, intervalMs: number): void {
  if (intervalId) {
    logger.info('[Reminders] Scheduler already running');
    return;
  }

  logger.info(`[Startup] Reminder scheduler enabled (runs every ${Math.round(intervalMs / 1000)}s)`);

  intervalId = setInterval(() => {
    runReminderCycle(service).catch((err: unknown) => {
      logger.error('[Reminders] Uncaught error:', { error: err });
    });
  }, intervalMs);
}

export function stopReminderScheduler(): void {
  if (intervalId) {
    clearInterval(intervalId);
    intervalId = null;
    logger.info('[Reminders] Scheduler stopped');
  }
}
