import { getWeekday } from '../../utils/dateUtils';
import { minutesToTime } from './timeUtils';
import type { DayContext, ScheduleBreak, WeeklyScheduleEntry, WorkContext } from './types';

/** Everything the resolver needs to know about one date, as read from configuration. */
export interface CalendarSnapshot {
  isDayOff: boolean;
  schedule: WeeklyScheduleEntry | null;
  breaks: ScheduleBreak[];
}

const CLOSED: DayContext = { isWorking: false };

/**
 * Effective working context of a date: a day off wins, then the weekly entry for the
 * weekday. A missing, non-working or empty entry closes the day. Breaks are the enabled
 * ones tagged with this weekday plus the global ones, kept as independent intervals.
 */
export function resolveDay(date: string, snapshot: CalendarSnapshot): DayContext {
  if (snapshot.isDayOff) return CLOSED;

  const weekday = getWeekday(date);
  const day = snapshot.schedule;
  if (!day || day.weekday !== weekday || !day.isWorking) return CLOSED;
  if (day.workEnd <= day.workStart) return CLOSED;

  const breaks = snapshot.breaks
    .filter(b => b.isEnabled && (b.weekday === null || b.weekday === weekday) && b.endTime > b.startTime)
    .sort((a, b) => a.startTime - b.startTime || a.endTime - b.endTime)
    .map(b => ({ start: b.startTime, end: b.endTime }));

  return { isWorking: true, workStart: day.workStart, workEnd: day.workEnd, breaks };
}

export function toWorkContext(context: DayContext): WorkContext {
  if (!context.isWorking) {
    return { isWorking: false, workStart: null, workEnd: null, breaks: [] };
  }
  return {
    isWorking: true,
    workStart: minutesToTime(context.workStart),
    workEnd: minutesToTime(context.workEnd),
    breaks: context.breaks.map(b => ({ startTime: minutesToTime(b.start), endTime: minutesToTime(b.end) })),
  };
}
