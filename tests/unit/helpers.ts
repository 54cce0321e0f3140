import type { Clock } from '../../src/clock.js';
import { Course } from '../../src/course/course.js';
import type { CourseInput } from '../../src/course/course.js';
import { Schedule } from '../../src/schedule/schedule.js';

export const DAY_MS = 24 * 60 * 60 * 1000;

export interface TestClock extends Clock {
  advance(ms: number): void;
  set(iso: string): void;
}

export function makeClock(start = '2026-01-05T09:00:00.000Z'): TestClock {
  let current = new Date(start).getTime();
  return {
    now: () => new Date(current),
    advance: (ms) => {
      current += ms;
    },
    set: (iso) => {
      current = new Date(iso).getTime();
    },
  };
}

export function makeCourse(overrides: Partial<CourseInput> = {}, clock?: Clock): Course {
  return new Course(
    {
      id: 'CS101',
      name: 'Introduction to Computer Science',
      description: 'Programming fundamentals',
      credits: 3,
      instructor: 'Dr. Rivera',
      capacity: 30,
      ...overrides,
    },
    clock,
  );
}

export function slot(days: string[], time: string, room = 'Room 101'): Schedule {
  return Schedule.create({ days, time, room });
}
