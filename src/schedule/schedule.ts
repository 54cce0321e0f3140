import { InvalidScheduleError } from '../errors.js';
import type { ScheduleRecord } from '../records/schema.js';
import { normalizeWeekdays, parseWeekday } from './weekday.js';
import type { Weekday } from './weekday.js';
import { createTimeRange, formatTimeRange, parseTimeRange, rangesOverlap } from './time-range.js';
import type { TimeRange } from './time-range.js';

export interface ScheduleInput {
  days: Iterable<Weekday | string>;
  time: TimeRange | string;
  room: string;
}

/**
 * A weekly meeting slot: the days a course meets, the time of day and the room.
 * Values are immutable; replacing a course's slot means building a new Schedule.
 */
export class Schedule {
  private constructor(
    readonly days: readonly Weekday[],
    readonly time: TimeRange,
    readonly room: string,
  ) {
    Object.freeze(this);
  }

  static create(input: ScheduleInput): Schedule {
    const days = normalizeWeekdays(Array.from(input.days, (day) => parseWeekday(day)));
    if (days.length === 0) {
      throw new InvalidScheduleError('A schedule needs at least one meeting day');
    }
    const room = input.room.trim();
    if (room === '') {
      throw new InvalidScheduleError('A schedule needs a room');
    }
    const time = typeof input.time === 'string'
      ? parseTimeRange(input.time)
      : createTimeRange(input.time.start, input.time.end);
    return new Schedule(Object.freeze(days), time, room);
  }

  static fromRecord(record: ScheduleRecord): Schedule {
    return Schedule.create(record);
  }

  meetsOn(day: Weekday): boolean {
    return this.days.includes(day);
  }

  /** True when both slots share a day and their time ranges overlap. Room is ignored. */
  overlaps(other: Schedule): boolean {
    const sharesDay = this.days.some((day) => other.meetsOn(day));
    return sharesDay && rangesOverlap(this.time, other.time);
  }

  toRecord(): ScheduleRecord {
    return {
      days: [...this.days],
      time: formatTimeRange(this.time),
      room: this.room,
    };
  }
}
