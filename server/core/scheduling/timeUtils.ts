const TIME_PATTERN = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;

/**
 * Strict HH:MM (or HH:MM:SS, as PostgreSQL returns `time` columns) to minutes since midnight.
 * "24:00" is accepted so a window can close at midnight. Returns null when malformed.
 */
export function parseTimeString(value: string | null | undefined): number | null {
  if (!value) return null;
  const match = TIME_PATTERN.exec(value.trim());
  if (!match) return null;
  const hours = Number.parseInt(match[1], 10);
  const minutes = Number.parseInt(match[2], 10);
  const seconds = match[3] === undefined ? 0 : Number.parseInt(match[3], 10);
  if (minutes > 59 || seconds > 59) return null;
  if (hours > 24 || (hours === 24 && (minutes > 0 || seconds > 0))) return null;
  return hours * 60 + minutes;
}

export function parseTimeToMinutes(time: string | null | undefined): number {
  return parseTimeString(time) ?? 0;
}

export function minutesToTime(minutes: number): string {
  const hours = Math.floor(minutes / 60);
  const mins = minutes % 60;
  return `${hours.toString().padStart(2, '0')}:${mins.toString().padStart(2, '0')}`;
}

/** Half-open [start1, end1) against [start2, end2). Touching intervals do not overlap. */
export function hasTimeOverlap(start1: number, end1: number, start2: number, end2: number): boolean {
  return start1 < end2 && start2 < end1;
}

export function ceilToStep(value: number, step: number): number {
  if (step <= 0) return value;
  return step * Math.ceil(value / step);
}
