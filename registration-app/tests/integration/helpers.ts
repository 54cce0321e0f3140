import type { FastifyInstance } from 'fastify';
import { RecordStoreError } from 'enrollment-engine';
import type { Clock, CourseRecord, RecordStore, RegistrationRecord } from 'enrollment-engine';
import { Catalog } from '../../src/catalog.js';
import type { EnrollmentPolicy } from '../../src/config.js';
import { buildServer } from '../../src/api/server.js';

export const DAY_MS = 24 * 60 * 60 * 1000;
export const START = '2026-01-05T09:00:00.000Z';

/** Keeps records as JSON text, the way a JSONB column hands them back. */
export class InMemoryRecordStore implements RecordStore {
  courses: unknown[] = [];
  registrations: unknown[] = [];
  failSaves = false;
  closed = false;

  async loadCourses(): Promise<unknown[]> {
    return this.courses.map(copy);
  }

  async saveCourses(records: CourseRecord[]): Promise<void> {
    this.check();
    this.courses = records.map(copy);
  }

  async loadRegistrations(): Promise<unknown[]> {
    return this.registrations.map(copy);
  }

  async saveRegistrations(records: RegistrationRecord[]): Promise<void> {
    this.check();
    this.registrations = records.map(copy);
  }

  async initializeSchema(): Promise<void> {}

  async close(): Promise<void> {
    this.closed = true;
  }

  private check(): void {
    if (this.failSaves) {
      throw new RecordStoreError('Failed to save records', new Error('connection refused'));
    }
  }
}

function copy(record: unknown): unknown {
  return JSON.parse(JSON.stringify(record));
}

export interface TestClock extends Clock {
  advance(ms: number): void;
}

export function makeClock(start = START): TestClock {
  let current = new Date(start).getTime();
  return {
    now: () => new Date(current),
    advance: (ms) => {
      current += ms;
    },
  };
}

export interface TestApp {
  app: FastifyInstance;
  catalog: Catalog;
  store: InMemoryRecordStore;
  clock: TestClock;
}

export async function buildTestApp(
  options: { policy?: Partial<EnrollmentPolicy>; cleanupDaysOld?: number; store?: InMemoryRecordStore } = {},
): Promise<TestApp> {
  const store = options.store ?? new InMemoryRecordStore();
  const clock = makeClock();
  const catalog = await Catalog.load(store, clock);
  const app = buildServer(catalog, {
    policy: { maxCoursesPerStudent: 6, maxCreditsPerStudent: 18, ...options.policy },
    cleanupDaysOld: options.cleanupDaysOld ?? 365,
    logger: false,
  });
  await app.ready();
  return { app, catalog, store, clock };
}

export const BASE_COURSE = {
  id: 'CS101',
  name: 'Introduction to Computer Science',
  credits: 3,
  instructor: 'Dr. Rivera',
};

export async function postCourse(app: FastifyInstance, overrides: Record<string, unknown> = {}) {
  const res = await app.inject({ method: 'POST', url: '/api/v1/courses', payload: { ...BASE_COURSE, ...overrides } });
  if (res.statusCode !== 201) {
    throw new Error(`Course setup failed with ${res.statusCode}: ${res.body}`);
  }
  return res.json();
}

export function enroll(app: FastifyInstance, courseId: string, studentId: string, completedCourseIds?: string[]) {
  return app.inject({
    method: 'POST',
    url: `/api/v1/courses/${courseId}/enrollments`,
    payload: completedCourseIds === undefined ? { studentId } : { studentId, completedCourseIds },
  });
}

export function drop(app: FastifyInstance, courseId: string, studentId: string) {
  return app.inject({ method: 'POST', url: `/api/v1/courses/${courseId}/enrollments/${studentId}/drop` });
}
