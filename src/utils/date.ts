/**
 * Calendar-day helpers. Run dates are plain YYYY-MM-DD strings in UTC.
 */

import { ConfigError } from './errors.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export function formatDate(date: Date): string {
  const y = date.getUTCFullYear();
  const m = String(date.getUTCMonth() + 1).padStart(2, '0');
  const d = String(date.getUTCDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

/**
 * Parse a YYYY-MM-DD string, rejecting impossible dates such as 2024-02-30.
 */
export function parseRunDate(value: string): Date {
  const match = DATE_PATTERN.exec(value.trim());
  if (!match) {
    throw new ConfigError(`Target date must be in YYYY-MM-DD format, got "${value}"`);
  }

  const date = new Date(`${match[0]}T00:00:00Z`);
  if (Number.isNaN(date.getTime()) || formatDate(date) !== match[0]) {
    throw new ConfigError(`Target date is not a valid calendar day: "${value}"`);
  }
  return date;
}

export function isWeekend(day: string): boolean {
  const weekday = parseRunDate(day).getUTCDay();
  return weekday === 0 || weekday === 6;
}

export function addDays(day: string, delta: number): string {
  return formatDate(new Date(parseRunDate(day).getTime() + delta * DAY_MS));
}

/**
 * Most recent weekday strictly before `now` (UTC). Papers announced on a
 * given day carry the previous working day as their publication date.
 */
export function previousWeekday(now: Date): string {
  let candidate = addDays(formatDate(now), -1);
  while (isWeekend(candidate)) {
    candidate = addDays(candidate, -1);
  }
  return candidate;
}

export function resolveTargetDate(targetDate: string | undefined, now: Date): string {
  if (targetDate !== undefined) {
    return formatDate(parseRunDate(targetDate));
  }
  return previousWeekday(now);
}

/**
 * `days` consecutive dates ending at `today`, newest first.
 */
export function recentDates(today: string, days: number): string[] {
  const dates: string[] = [];
  for (let i = 0; i < days; i += 1) {
    dates.push(addDays(today, -i));
  }
  return dates;
}
