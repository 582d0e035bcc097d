import { describe, it, expect, beforeEach, vi, type MockInstance } from 'vitest';
import { BookingEventBus, type BookingEventType } from '../../server/core/bookingEvents';
import type { Booking } from '../../server/core/scheduling/types';

const createdAt = new Date(2026, 10, 1, 12, 0);

const booking: Booking = {
  id: 3,
  clientId: 'client-a',
  date: '2026-11-02',
  startTime: 600,
  durationMinutes: 40,
  occupancy: { kind: 'explicit', minutes: 40 },
  serviceCode: null,
  serviceName: 'Haircut',
  clientName: 'Alex Doe',
  phone: '555-0100',
  status: 'pending',
  createdAt,
  updatedAt: createdAt,
};

describe('Booking Events Bus', () => {
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  it('should deliver events to listeners in registration order', async () => {
    const bus = new BookingEventBus();
    const order: string[] = [];
    bus.subscribe(async () => {
      await new Promise(resolve => setTimeout(resolve, 5));
      order.push('first');
    });
    bus.subscribe(() => {
      order.push('second');
    });

    await bus.publish('booking_created', { booking, actionBy: 'client' });

    expect(order).toEqual(['first', 'second']);
  });

  it('should keep publishing after a listener throws', async () => {
    const bus = new BookingEventBus();
    const received: BookingEventType[] = [];
    bus.subscribe(() => {
      throw new Error('listener down');
    });
    bus.subscribe(eventType => {
      received.push(eventType);
    });

    await expect(bus.publish('booking_approved', { booking, actionBy: 'admin' })).resolves.toBeUndefined();
    expect(received).toEqual(['booking_approved']);
  });

  it('should stop delivering to an unsubscribed listener', async () => {
    const bus = new BookingEventBus();
    const listener = vi.fn();
    const unsubscribe = bus.subscribe(listener);
    unsubscribe();

    await bus.publish('booking_cancelled', { booking, actionBy: 'client' });

    expect(listener).not.toHaveBeenCalled();
  });

  it('should log the booking slot with each event', async () => {
    const bus = new BookingEventBus();
    await bus.publish('booking_created', { booking, actionBy: 'client' });

    const entry = JSON.parse(String(logSpy.mock.calls[0][0]));
    expect(entry).toMatchObject({
      level: 'INFO',
      message: '[BookingEvents] Publishing booking_created for booking 3',
      bookingId: 3,
      bookingDate: '2026-11-02',
      extra: { when: 'Mon, Nov 2 at 10:00', status: 'pending', actionBy: 'client' },
    });
  });
});
