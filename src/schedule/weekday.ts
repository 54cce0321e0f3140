import { InvalidScheduleError } from '../errors.js';

export const WEEKDAYS = [
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
  'Sunday',
] as const;

export type Weekday = (typeof WEEKDAYS)[number];

export function isWeekday(value: string): value is Weekday {
  const names: readonly string[] = WEEKDAYS;
  return names.includes(value);
}

export function parseWeekday(value: string): Weekday {
  const trimmed = value.trim();
  if (!isWeekday(trimmed)) {
    throw new InvalidScheduleError(`Unknown weekday '${value}'`);
  }
  return trimmed;
}

/** Sorts days Monday-first and removes duplicates. */
export function normalizeWeekdays(days: Iterable<Weekday>): Weekday[] {
  const unique = new Set(days);
  return WEEKDAYS.filter((day) => unique.has(day));
}
