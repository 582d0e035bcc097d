import { BookingEventBus } from '../bookingEvents';
import type { AppConfig } from '../config';
import type { ReminderDispatcher } from '../reminders/reminderDispatcher';
import { ReminderService } from '../reminders/reminderService';
import { AdmissionController } from './admissionController';
import { AvailabilityService } from './availabilityService';
import { BookingStateService } from './bookingStateService';
import { ShopConfigService } from './configService';
import type { BookingStore, SchedulingStore } from './store';

export { AdmissionController, type AdmissionRequest } from './admissionController';
export { AvailabilityService } from './availabilityService';
export { BookingStateService } from './bookingStateService';
export { ShopConfigService } from './configService';
export { resolveDay, toWorkContext } from './calendarResolver';
export { occupy, resolveOccupancy } from './occupancy';
export { freeStarts } from './slotGenerator';
export { isFree } from './conflictFilter';
export { ValidationError } from './shopSettings';
export type { BookingResult, BookingFailure, BookingFailureCode } from './results';
export type * from './types';
export type * from './store';

export interface SchedulingServices {
  config: ShopConfigService;
  availability: AvailabilityService;
  admission: AdmissionController;
  bookingState: BookingStateService;
  reminders: ReminderService;
  bookings: BookingStore;
  events: BookingEventBus;
  clock: () => Date;
}

export type SchedulingOptions = Pick<AppConfig, 'maxActiveRequestsPerDay' | 'reminderOffsetsMinutes' | 'reminderBatchSize'>;

/**
 * Wires every scheduling service over one store. Reminders are subscribed to booking events
 * here, so admission and cancellation schedule and release them without knowing about them.
 */
export function createSchedulingServices(
  store: SchedulingStore,
  options: SchedulingOptions,
  dispatcher: ReminderDispatcher,
  clock: () => Date = () => new Date()
): SchedulingServices {
  const events = new BookingEventBus();
  const config = new ShopConfigService(store.calendar);
  const reminders = new ReminderService(store.reminders, dispatcher, {
    offsetsMinutes: options.reminderOffsetsMinutes,
    batchSize: options.reminderBatchSize,
  }, clock);
  reminders.attach(events);

  return {
    config,
    availability: new AvailabilityService(config, store.bookings),
    admission: new AdmissionController(config, store.bookings, events, {
      maxActiveRequestsPerDay: options.maxActiveRequestsPerDay,
    }),
    bookingState: new BookingStateService(config, store.bookings, events),
    reminders,
    bookings: store.bookings,
    events,
    clock,
  };
}
