/**
 * Local calendar utilities.
 *
 * The shop runs on one implicit local zone: dates are YYYY-MM-DD strings and times of day
 * are whole minutes since local midnight. Nothing here converts between zones.
 */

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

function pad2(value: number): string {
  return value.toString().padStart(2, '0');
}

/**
 * True for a real calendar date in YYYY-MM-DD form (rejects 2026-02-30 and friends)
 */
export function isValidDateString(value: string): boolean {
  const match = DATE_PATTERN.exec(value);
  if (!match) return false;
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const probe = new Date(Date.UTC(year, month - 1, day));
  return probe.getUTCFullYear() === year && probe.getUTCMonth() === month - 1 && probe.getUTCDate() === day;
}

/**
 * Get today's local date as YYYY-MM-DD
 */
export function getTodayLocal(now: Date = new Date()): string {
  return `${now.getFullYear()}-${pad2(now.getMonth() + 1)}-${pad2(now.getDate())}`;
}

/**
 * Minutes elapsed since local midnight
 */
export function getMinuteOfDay(now: Date = new Date()): number {
  return now.getHours() * 60 + now.getMinutes();
}

/**
 * Add days to a YYYY-MM-DD date string, returning a new YYYY-MM-DD string
 */
export function addDaysToDate(dateStr: string, days: number): string {
  const [year, month, day] = dateStr.split('-').map(Number);
  const date = new Date(Date.UTC(year, month - 1, day + days));
  return date.toISOString().split('T')[0];
}

/**
 * Get day of week (0-6) for a YYYY-MM-DD date using Zeller's algorithm (timezone-agnostic)
 */
function getDayOfWeek(year: number, month: number, day: number): number {
  // Adjust for Zeller's algorithm (January = 13, February = 14 of previous year)
  if (month < 3) {
    month += 12;
    year -= 1;
  }
  const k = year % 100;
  const j = Math.floor(year / 100);
  const h = (day + Math.floor(13 * (month + 1) / 5) + k + Math.floor(k / 4) + Math.floor(j / 4) - 2 * j) % 7;
  // Convert from Zeller (0=Saturday) to JS convention (0=Sunday)
  return ((h + 6) % 7);
}

/**
 * Weekday of a YYYY-MM-DD date with Monday = 0 ... Sunday = 6, the key of the weekly schedule
 */
export function getWeekday(dateStr: string): number {
  const [year, month, day] = dateStr.split('-').map(Number);
  return (getDayOfWeek(year, month, day) + 6) % 7;
}

/**
 * Local Date for a calendar date plus a minute offset (offsets past midnight roll over)
 */
export function toLocalDateTime(dateStr: string, minuteOfDay: number): Date {
  const [year, month, day] = dateStr.split('-').map(Number);
  return new Date(year, month - 1, day, 0, minuteOfDay, 0, 0);
}

/**
 * Format a YYYY-MM-DD date string for display with weekday (e.g., "Wed, Jan 15")
 */
export function formatDateDisplayWithDay(dateStr: string): string {
  const [year, month, day] = dateStr.split('-').map(Number);
  const days = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];
  const months = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];
  const dayOfWeek = getDayOfWeek(year, month, day);
  return `${days[dayOfWeek]}, ${months[month - 1]} ${day}`;
}
