import { Router, type RequestHandler } from 'express';
import { z } from 'zod';
import type { SchedulingServices } from '../core/scheduling';
import { minutesToTime } from '../core/scheduling/timeUtils';
import type { ScheduleBreak, WeeklyScheduleEntry } from '../core/scheduling/types';
import { dateSchema, handleRouteError, idParamSchema, respondInvalid, timeSchema } from './helpers';

const weekdayParamSchema = z.coerce.number().int();

const dayScheduleSchema = z.object({
  isWorking: z.boolean().optional(),
  workStart: timeSchema.optional(),
  workEnd: timeSchema.optional(),
}).strict();

const newBreakSchema = z.object({
  weekday: z.number().int().nullable().default(null),
  startTime: timeSchema,
  endTime: timeSchema,
});

const breakToggleSchema = z.object({ isEnabled: z.boolean() });

function serializeSchedule(entry: WeeklyScheduleEntry) {
  return {
    weekday: entry.weekday,
    isWorking: entry.isWorking,
    workStart: minutesToTime(entry.workStart),
    workEnd: minutesToTime(entry.workEnd),
  };
}

function serializeBreak(entry: ScheduleBreak) {
  return {
    id: entry.id,
    weekday: entry.weekday,
    startTime: minutesToTime(entry.startTime),
    endTime: minutesToTime(entry.endTime),
    isEnabled: entry.isEnabled,
  };
}

export function createScheduleRouter(services: SchedulingServices, requireAdmin: RequestHandler): Router {
  const router = Router();
  const { config } = services;

  router.get('/api/admin/schedule', requireAdmin, async (req, res) => {
    try {
      const schedule = await config.getWeeklySchedule();
      res.json({ schedule: schedule.map(serializeSchedule) });
    } catch (error: unknown) {
      handleRouteError(req, res, error, 'Failed to fetch weekly schedule', 'SCHEDULE_FETCH_ERROR');
    }
  });

  router.get('/api/admin/schedule/:weekday', requireAdmin, async (req, res) => {
    const weekday = weekdayParamSchema.safeParse(req.params.weekday);
    if (!weekday.success) return respondInvalid(req, res, weekday.error);

    try {
      const entry = await config.getDaySchedule(weekday.data);
      if (!entry) {
        return res.status(404).json({ error: `No schedule for weekday ${weekday.data}`, code: 'NOT_FOUND', requestId: req.requestId });
      }
      res.json(serializeSchedule(entry));
    } catch (error: unknown) {
      handleRouteError(req, res, error, 'Failed to fetch day schedule', 'SCHEDULE_FETCH_ERROR');
    }
  });

  router.put('/api/admin/schedule/:weekday', requireAdmin, async (req, res) => {
    const weekday = weekdayParamSchema.safeParse(req.params.weekday);
    if (!weekday.success) return respondInvalid(req, res, weekday.error);
    const parsed = dayScheduleSchema.safeParse(req.body);
    if (!parsed.success) return respondInvalid(req, res, parsed.error);

    try {
      const entry = await config.setDaySchedule(weekday.data, parsed.data);
      if (!entry) {
        return res.status(404).json({ error: `No schedule for weekday ${weekday.data}`, code: 'NOT_FOUND', requestId: req.requestId });
      }
      res.json(serializeSchedule(entry));
    } catch (error: unknown) {
      handleRouteError(req, res, error, 'Failed to update day schedule', 'SCHEDULE_UPDATE_ERROR');
    }
  });

  router.get('/api/admin/breaks', requireAdmin, async (req, res) => {
    try {
      const breaks = await config.listBreaks();
      res.json({ breaks: breaks.map(serializeBreak) });
    } catch (error: unknown) {
      handleRouteError(req, res, error, 'Failed to fetch breaks', 'BREAKS_FETCH_ERROR');
    }
  });

  router.post('/api/admin/breaks', requireAdmin, async (req, res) => {
    const parsed = newBreakSchema.safeParse(req.body);
    if (!parsed.success) return respondInvalid(req, res, parsed.error);

    try {
      const created = await config.addBreak(parsed.data);
      res.status(201).json(serializeBreak(created));
    } catch (error: unknown) {
      handleRouteError(req, res, error, 'Failed to add break', 'BREAK_CREATE_ERROR');
    }
  });

  router.patch('/api/admin/breaks/:id', requireAdmin, async (req, res) => {
    const id = idParamSchema.safeParse(req.params.id);
    if (!id.success) return respondInvalid(req, res, id.error);
    const parsed = breakToggleSchema.safeParse(req.body);
    if (!parsed.success) return respondInvalid(req, res, parsed.error);

    try {
      const updated = await config.setBreakEnabled(id.data, parsed.data.isEnabled);
      if (!updated) {
        return res.status(404).json({ error: `Break ${id.data} not found`, code: 'NOT_FOUND', requestId: req.requestId });
      }
      res.json(serializeBreak(updated));
    } catch (error: unknown) {
      handleRouteError(req, res, error, 'Failed to update break', 'BREAK_UPDATE_ERROR');
    }
  });

  router.delete('/api/admin/breaks/:id', requireAdmin, async (req, res) => {
    const id = idParamSchema.safeParse(req.params.id);
    if (!id.success) return respondInvalid(req, res, id.error);

    try {
      const removed = await config.removeBreak(id.data);
      if (!removed) {
        return res.status(404).json({ error: `Break ${id.data} not found`, code: 'NOT_FOUND', requestId: req.requestId });
      }
      res.json({ success: true });
    } catch (error: unknown) {
      handleRouteError(req, res, error, 'Failed to remove break', 'BREAK_DELETE_ERROR');
    }
  });

  router.get('/api/admin/days-off', requireAdmin, async (req, res) => {
    try {
      res.json({ daysOff: await config.listDaysOff() });
    } catch (error: unknown) {
      handleRouteError(req, res, error, 'Failed to fetch days off', 'DAYS_OFF_FETCH_ERROR');
    }
  });

  router.post('/api/admin/days-off', requireAdmin, async (req, res) => {
    const parsed = z.object({ date: dateSchema }).safeParse(req.body);
    if (!parsed.success) return respondInvalid(req, res, parsed.error);

    try {
      await config.addDayOff(parsed.data.date);
      res.status(201).json({ date: parsed.data.date });
    } catch (error: unknown) {
      handleRouteError(req, res, error, 'Failed to add day off', 'DAY_OFF_CREATE_ERROR');
    }
  });

  router.delete('/api/admin/days-off/:date', requireAdmin, async (req, res) => {
    const date = dateSchema.safeParse(req.params.date);
    if (!date.success) return respondInvalid(req, res, date.error);

    try {
      const removed = await config.removeDayOff(date.data);
      if (!removed) {
        return res.status(404).json({ error: `${date.data} is not a day off`, code: 'NOT_FOUND', requestId: req.requestId });
      }
      res.json({ success: true });
    } catch (error: unknown) {
      handleRouteError(req, res, error, 'Failed to remove day off', 'DAY_OFF_DELETE_ERROR');
    }
  });

  return router;
}
