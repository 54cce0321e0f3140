import { InvalidScheduleError } from '../errors.js';

/** Half-open interval [start, end) in minutes after midnight. */
export interface TimeRange {
  readonly start: number;
  readonly end: number;
}

const MINUTES_PER_DAY = 24 * 60;

// 24-hour clock, zero-padded: "08:00-09:30". 24:00 is allowed only as an end time.
const TIME_RANGE_PATTERN = /^(\d{2}):(\d{2})-(\d{2}):(\d{2})$/;

function toMinutes(hours: string, minutes: string, source: string): number {
  const h = Number(hours);
  const m = Number(minutes);
  if (m > 59 || h > 24 || (h === 24 && m !== 0)) {
    throw new InvalidScheduleError(`Invalid time in '${source}'`);
  }
  return h * 60 + m;
}

export function createTimeRange(start: number, end: number): TimeRange {
  if (!Number.isInteger(start) || !Number.isInteger(end)) {
    throw new InvalidScheduleError(`Time range bounds must be whole minutes, got ${start}-${end}`);
  }
  if (start < 0 || end > MINUTES_PER_DAY) {
    throw new InvalidScheduleError(`Time range ${start}-${end} falls outside the day`);
  }
  if (start >= end) {
    throw new InvalidScheduleError(`Time range must start before it ends, got ${start}-${end}`);
  }
  return Object.freeze({ start, end });
}

export function parseTimeRange(value: string): TimeRange {
  const match = TIME_RANGE_PATTERN.exec(value);
  if (match === null) {
    throw new InvalidScheduleError(`Malformed time range '${value}', expected HH:MM-HH:MM`);
  }
  const [, startH = '', startM = '', endH = '', endM = ''] = match;
  const start = toMinutes(startH, startM, value);
  if (start === MINUTES_PER_DAY) {
    throw new InvalidScheduleError(`Invalid time in '${value}'`);
  }
  return createTimeRange(start, toMinutes(endH, endM, value));
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

function formatMinutes(total: number): string {
  return `${pad(Math.floor(total / 60))}:${pad(total % 60)}`;
}

export function formatTimeRange(range: TimeRange): string {
  return `${formatMinutes(range.start)}-${formatMinutes(range.end)}`;
}

// Touching endpoints (a.end === b.start) do not overlap.
export function rangesOverlap(a: TimeRange, b: TimeRange): boolean {
  return a.start < b.end && b.start < a.end;
}
