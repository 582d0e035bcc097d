import type { ReminderService } from '../core/reminders/reminderService';
import { schedulerTracker } from '../core/schedulerTracker';
import { REMINDER_SCHEDULER_NAME, startReminderScheduler, stopReminderScheduler } from './reminderScheduler';

export interface SchedulerDependencies {
  reminderService: ReminderService;
  reminderPollIntervalMs: number;
}

export function initSchedulers(deps: SchedulerDependencies): void {
  schedulerTracker.registerScheduler(REMINDER_SCHEDULER_NAME, deps.reminderPollIntervalMs);

  startReminderScheduler(deps.reminderService, deps.reminderPollIntervalMs);
}

export function stopSchedulers(): void {
  stopReminderScheduler();
}
