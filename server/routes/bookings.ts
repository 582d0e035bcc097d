import { Router } from 'express';
import { z } from 'zod';
import type { SchedulingServices } from '../core/scheduling';
import { isClient } from '../middleware/auth';
import { bookingRateLimiter } from '../middleware/rateLimiting';
import {
  dateSchema,
  handleRouteError,
  idParamSchema,
  respondInvalid,
  sendBookingResult,
  serializeBooking,
  timeSchema,
} from './helpers';

const createBookingSchema = z.object({
  date: dateSchema,
  startTime: timeSchema,
  durationMinutes: z.number().int().positive().max(24 * 60),
  serviceCode: z.string().trim().max(64).nullish(),
  serviceName: z.string().trim().min(1).max(200),
  clientName: z.string().trim().min(1).max(100),
  phone: z.string().trim().min(3).max(30),
});

const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10),
});

export function createBookingsRouter(services: SchedulingServices): Router {
  const router = Router();

  router.post('/api/bookings', isClient, bookingRateLimiter, async (req, res) => {
    const parsed = createBookingSchema.safeParse(req.body);
    if (!parsed.success) return respondInvalid(req, res, parsed.error);
    const clientId = req.clientId;
    if (!clientId) return respondInvalid(req, res, 'X-Client-Id header required');

    try {
      const body = parsed.data;
      const result = await services.admission.admit({
        clientId,
        date: body.date,
        startTime: body.startTime,
        durationMinutes: body.durationMinutes,
        serviceCode: body.serviceCode,
        serviceName: body.serviceName,
        clientName: body.clientName,
        phone: body.phone,
      }, services.clock());
      sendBookingResult(req, res, result, 201);
    } catch (error: unknown) {
      handleRouteError(req, res, error, 'Failed to create booking', 'BOOKING_CREATE_ERROR');
    }
  });

  router.get('/api/bookings/mine', isClient, async (req, res) => {
    const parsed = listQuerySchema.safeParse(req.query);
    if (!parsed.success) return respondInvalid(req, res, parsed.error);
    const clientId = req.clientId;
    if (!clientId) return respondInvalid(req, res, 'X-Client-Id header required');

    try {
      const bookings = await services.bookings.listClientBookings(clientId, parsed.data.limit);
      res.json({ bookings: bookings.map(serializeBooking) });
    } catch (error: unknown) {
      handleRouteError(req, res, error, 'Failed to fetch bookings', 'BOOKINGS_FETCH_ERROR');
    }
  });

  router.post('/api/bookings/:id/cancel', isClient, async (req, res) => {
    const id = idParamSchema.safeParse(req.params.id);
    if (!id.success) return respondInvalid(req, res, id.error);
    const clientId = req.clientId;
    if (!clientId) return respondInvalid(req, res, 'X-Client-Id header required');

    try {
      const result = await services.bookingState.cancelByClient(id.data, clientId);
      sendBookingResult(req, res, result);
    } catch (error: unknown) {
      handleRouteError(req, res, error, 'Failed to cancel booking', 'BOOKING_CANCEL_ERROR');
    }
  });

  return router;
}
