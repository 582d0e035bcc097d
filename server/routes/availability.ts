import { Router } from 'express';
import { z } from 'zod';
import type { SchedulingServices } from '../core/scheduling';
import { minutesToTime } from '../core/scheduling/timeUtils';
import { dateSchema, handleRouteError, respondInvalid } from './helpers';

const MAX_WINDOW_DAYS = 60;

const durationQuerySchema = z.object({
  duration: z.coerce.number().int().positive().max(24 * 60),
});

export function createAvailabilityRouter(services: SchedulingServices, bookingWindowDays: number): Router {
  const router = Router();

  const datesQuerySchema = z.object({
    days: z.coerce.number().int().min(1).max(MAX_WINDOW_DAYS).default(bookingWindowDays),
  });

  router.get('/api/availability/dates', async (req, res) => {
    const parsed = datesQuerySchema.safeParse(req.query);
    if (!parsed.success) return respondInvalid(req, res, parsed.error);

    try {
      const dates = await services.availability.listBookableDates(parsed.data.days, services.clock());
      res.json({ dates });
    } catch (error: unknown) {
      handleRouteError(req, res, error, 'Failed to list bookable dates', 'AVAILABILITY_DATES_ERROR');
    }
  });

  router.get('/api/availability/:date/context', async (req, res) => {
    const date = dateSchema.safeParse(req.params.date);
    if (!date.success) return respondInvalid(req, res, date.error);

    try {
      const context = await services.availability.getWorkContext(date.data);
      res.json({ date: date.data, ...context });
    } catch (error: unknown) {
      handleRouteError(req, res, error, 'Failed to resolve working day', 'WORK_CONTEXT_ERROR');
    }
  });

  router.get('/api/availability/:date', async (req, res) => {
    const date = dateSchema.safeParse(req.params.date);
    if (!date.success) return respondInvalid(req, res, date.error);
    const query = durationQuerySchema.safeParse(req.query);
    if (!query.success) return respondInvalid(req, res, query.error);

    try {
      const starts = await services.availability.getFreeStarts(date.data, query.data.duration, services.clock());
      res.json({
        date: date.data,
        durationMinutes: query.data.duration,
        slots: starts.map(minutesToTime),
      });
    } catch (error: unknown) {
      handleRouteError(req, res, error, 'Failed to compute availability', 'AVAILABILITY_ERROR');
    }
  });

  return router;
}
