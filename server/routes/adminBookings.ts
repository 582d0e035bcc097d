import { Router, type RequestHandler } from 'express';
import { z } from 'zod';
import type { BookingResult, SchedulingServices } from '../core/scheduling';
import { getTodayLocal } from '../utils/dateUtils';
import {
  dateSchema,
  handleRouteError,
  idParamSchema,
  respondInvalid,
  sendBookingResult,
  serializeBooking,
} from './helpers';

const dateQuerySchema = z.object({ date: dateSchema.optional() });
const clientQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export function createAdminBookingsRouter(services: SchedulingServices, requireAdmin: RequestHandler): Router {
  const router = Router();

  router.get('/api/admin/bookings', requireAdmin, async (req, res) => {
    const parsed = dateQuerySchema.safeParse(req.query);
    if (!parsed.success) return respondInvalid(req, res, parsed.error);

    try {
      const date = parsed.data.date ?? getTodayLocal(services.clock());
      const bookings = await services.bookings.listBookingsForDate(date);
      res.json({ date, bookings: bookings.map(serializeBooking) });
    } catch (error: unknown) {
      handleRouteError(req, res, error, 'Failed to fetch bookings', 'ADMIN_BOOKINGS_FETCH_ERROR');
    }
  });

  router.get('/api/admin/bookings/pending', requireAdmin, async (req, res) => {
    try {
      const bookings = await services.bookings.listPendingBookings();
      res.json({ bookings: bookings.map(serializeBooking) });
    } catch (error: unknown) {
      handleRouteError(req, res, error, 'Failed to fetch pending bookings', 'PENDING_BOOKINGS_FETCH_ERROR');
    }
  });

  router.get('/api/admin/clients/:clientId/bookings', requireAdmin, async (req, res) => {
    const parsed = clientQuerySchema.safeParse(req.query);
    if (!parsed.success) return respondInvalid(req, res, parsed.error);

    try {
      const bookings = await services.bookings.listClientBookings(req.params.clientId, parsed.data.limit);
      res.json({ clientId: req.params.clientId, bookings: bookings.map(serializeBooking) });
    } catch (error: unknown) {
      handleRouteError(req, res, error, 'Failed to fetch client bookings', 'CLIENT_BOOKINGS_FETCH_ERROR');
    }
  });

  const actions: Record<string, (id: number) => Promise<BookingResult>> = {
    approve: id => services.bookingState.approve(id),
    reject: id => services.bookingState.reject(id),
    complete: id => services.bookingState.complete(id),
    cancel: id => services.bookingState.cancelByAdmin(id),
  };

  for (const [action, run] of Object.entries(actions)) {
    router.post(`/api/admin/bookings/:id/${action}`, requireAdmin, async (req, res) => {
      const id = idParamSchema.safeParse(req.params.id);
      if (!id.success) return respondInvalid(req, res, id.error);

      try {
        sendBookingResult(req, res, await run(id.data));
      } catch (error: unknown) {
        handleRouteError(req, res, error, `Failed to ${action} booking`, 'BOOKING_STATUS_ERROR');
      }
    });
  }

  return router;
}
