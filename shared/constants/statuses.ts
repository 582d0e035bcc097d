export const BOOKING_STATUSES = [
  'pending',
  'approved',
  'completed',
  'rejected',
  'cancelled_by_client',
  'cancelled_by_admin'
] as const;

export type BookingStatus = typeof BOOKING_STATUSES[number];

export const ACTIVE_BOOKING_STATUSES: readonly BookingStatus[] = ['pending', 'approved'];

export const BOOKING_TRANSITIONS: Record<BookingStatus, readonly BookingStatus[]> = {
  pending: ['approved', 'rejected', 'cancelled_by_client'],
  approved: ['completed', 'cancelled_by_client', 'cancelled_by_admin'],
  completed: [],
  rejected: [],
  cancelled_by_client: [],
  cancelled_by_admin: []
};

export function canTransition(from: BookingStatus, to: BookingStatus): boolean {
  return BOOKING_TRANSITIONS[from].includes(to);
}

export const REMINDER_STATUSES = ['pending', 'sent', 'canceled', 'failed'] as const;

export type ReminderStatus = typeof REMINDER_STATUSES[number];
