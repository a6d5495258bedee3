/**
 * Window Selector
 *
 * Computes the calendar day to digest ("yesterday" by default) as an inclusive
 * instant range in the target timezone.
 */

import type { TimeWindow } from '../types/index.js';

interface ZonedParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hourCycle: 'h23',
    });
    formatterCache.set(timeZone, formatter);
  }
  return formatter;
}

/**
 * Wall-clock fields of an instant in a timezone
 */
export function getZonedParts(date: Date, timeZone: string): ZonedParts {
  const parts: Record<string, number> = {};
  for (const part of getFormatter(timeZone).formatToParts(date)) {
    if (part.type !== 'literal') {
      parts[part.type] = Number(part.value);
    }
  }

  return {
    year: parts['year'] ?? 0,
    month: parts['month'] ?? 1,
    day: parts['day'] ?? 1,
    hour: parts['hour'] ?? 0,
    minute: parts['minute'] ?? 0,
    second: parts['second'] ?? 0,
  };
}

/**
 * Offset of the timezone from UTC at the given instant, in milliseconds
 */
function getTimeZoneOffset(date: Date, timeZone: string): number {
  const p = getZonedParts(date, timeZone);
  const asUtc = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
  return asUtc - Math.floor(date.getTime() / 1000) * 1000;
}

/**
 * Instant at which the wall clock of the timezone shows the given fields
 */
export function zonedTimeToInstant(parts: ZonedParts, timeZone: string): Date {
  const guess = Date.UTC(parts.year, parts.month - 1, parts.day, parts.hour, parts.minute, parts.second);
  const offset = getTimeZoneOffset(new Date(guess), timeZone);
  const candidate = guess - offset;

  // The offset may differ on the other side of a DST transition
  const correctedOffset = getTimeZoneOffset(new Date(candidate), timeZone);
  return new Date(correctedOffset === offset ? candidate : guess - correctedOffset);
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function selectWindow(now: Date, timeZone: string, dayOffset = -1): TimeWindow {
  const today = getZonedParts(now, timeZone);

  // Calendar arithmetic in UTC handles month and year boundaries
  const target = new Date(Date.UTC(today.year, today.month - 1, today.day + dayOffset));
  const year = target.getUTCFullYear();
  const month = target.getUTCMonth() + 1;
  const day = target.getUTCDate();

  const start = zonedTimeToInstant({ year, month, day, hour: 0, minute: 0, second: 0 }, timeZone);
  const end = zonedTimeToInstant({ year, month, day, hour: 23, minute: 59, second: 59 }, timeZone);

  return {
    start,
    end,
    date: `${year}-${pad(month)}-${pad(day)}`,
    timeZone,
  };
}

export function isWithinWindow(date: Date, window: TimeWindow): boolean {
  const time = date.getTime();
  return time >= window.start.getTime() && time <= window.end.getTime();
}

/**
 * "2024년 03월 09일"
 */
export function formatDateLabel(window: TimeWindow): string {
  const [year, month, day] = window.date.split('-');
  return `${year}년 ${month}월 ${day}일`;
}

/**
 * "HH:MM" (24-hour) in the timezone
 */
export function formatTimeOfDay(date: Date, timeZone: string): string {
  const p = getZonedParts(date, timeZone);
  return `${pad(p.hour)}:${pad(p.minute)}`;
}
