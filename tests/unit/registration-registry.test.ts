import { describe, it, expect, beforeEach } from 'vitest';
import { CourseRegistry } from '../../src/course/course-registry.js';
import { RegistrationRegistry } from '../../src/registration/registration-registry.js';
import { RecordDecodeError } from '../../src/errors.js';
import { DAY_MS, makeClock, makeCourse } from './helpers.js';
import type { TestClock } from './helpers.js';

describe('RegistrationRegistry', () => {
  let clock: TestClock;
  let courses: CourseRegistry;
  let registry: RegistrationRegistry;

  beforeEach(() => {
    clock = makeClock('2026-01-05T09:00:00.000Z');
    courses = new CourseRegistry(clock);
    courses.add(makeCourse({ id: 'CS101', capacity: 2 }, clock));
    courses.add(makeCourse({ id: 'CS201', capacity: 1 }, clock));
    registry = new RegistrationRegistry(courses, clock);
  });

  describe('create', () => {
    it('enrolls the student and takes a seat', () => {
      const registration = registry.create('STU001', 'CS101');
      expect(registration?.status).toBe('enrolled');
      expect(registration?.studentId).toBe('STU001');
      expect(courses.get('CS101')?.enrolled).toBe(1);
    });

    it('refuses a second active registration for the same pair', () => {
      const first = registry.create('STU001', 'CS101');
      expect(registry.create('STU001', 'CS101')).toBeNull();
      expect(first?.status).toBe('enrolled');
      expect(registry.size).toBe(1);
      expect(courses.get('CS101')?.enrolled).toBe(1);
    });

    it('returns null for an unknown course', () => {
      expect(registry.create('STU001', 'GHOST')).toBeNull();
      expect(registry.size).toBe(0);
    });

    it('returns null when the course is full', () => {
      registry.create('STU001', 'CS201');
      expect(registry.create('STU002', 'CS201')).toBeNull();
      expect(registry.listForCourse('CS201')).toHaveLength(1);
    });

    it('returns null when the course is inactive', () => {
      courses.remove('CS101');
      expect(registry.create('STU001', 'CS101')).toBeNull();
    });

    it('adds a new record after a drop and keeps the dropped one as history', () => {
      const first = registry.create('STU001', 'CS101');
      registry.dropFor('STU001', 'CS101');
      const second = registry.create('STU001', 'CS101');
      expect(second).not.toBeNull();
      expect(second?.id).not.toBe(first?.id);
      expect(registry.listForStudent('STU001').map((r) => r.status)).toEqual(['dropped', 'enrolled']);
      expect(registry.findByStudentAndCourse('STU001', 'CS101')?.id).toBe(second?.id);
    });

    it('lets several dropped records for one pair coexist', () => {
      for (let i = 0; i < 3; i++) {
        registry.create('STU001', 'CS101');
        registry.dropFor('STU001', 'CS101');
      }
      expect(registry.listForStudent('STU001').filter((r) => r.isDropped())).toHaveLength(3);
      expect(courses.get('CS101')?.enrolled).toBe(0);
    });
  });

  describe('dropFor', () => {
    it('drops the active registration and frees the seat', () => {
      registry.create('STU001', 'CS201');
      expect(registry.dropFor('STU001', 'CS201')).toBe(true);
      expect(registry.findByStudentAndCourse('STU001', 'CS201')?.status).toBe('dropped');
      expect(courses.get('CS201')?.enrolled).toBe(0);
      expect(registry.create('STU002', 'CS201')).not.toBeNull();
    });

    it('returns false when nothing is active for the pair', () => {
      expect(registry.dropFor('STU001', 'CS101')).toBe(false);
      registry.create('STU001', 'CS101');
      registry.dropFor('STU001', 'CS101');
      expect(registry.dropFor('STU001', 'CS101')).toBe(false);
      expect(courses.get('CS101')?.enrolled).toBe(0);
    });

    it('leaves the registration active when the course holds no seat to release', () => {
      const registration = registry.create('STU001', 'CS101');
      courses.get('CS101')?.drop();
      expect(registry.dropFor('STU001', 'CS101')).toBe(false);
      expect(registration?.status).toBe('enrolled');
      expect(courses.get('CS101')?.enrolled).toBe(0);
    });
  });

  describe('reEnroll', () => {
    it('restores a dropped registration and retakes the seat', () => {
      const registration = registry.create('STU001', 'CS101');
      registry.dropFor('STU001', 'CS101');
      const restored = registry.reEnroll(registration?.id ?? '');
      expect(restored?.status).toBe('enrolled');
      expect(restored?.dropDate).toBeNull();
      expect(courses.get('CS101')?.enrolled).toBe(1);
      expect(registry.activeFor('STU001', 'CS101')?.id).toBe(registration?.id);
    });

    it('refuses when another registration for the pair is already active', () => {
      const old = registry.create('STU001', 'CS101');
      registry.dropFor('STU001', 'CS101');
      registry.create('STU001', 'CS101');
      expect(registry.reEnroll(old?.id ?? '')).toBeNull();
      expect(courses.get('CS101')?.enrolled).toBe(1);
    });

    it('refuses when the course has filled up', () => {
      const registration = registry.create('STU001', 'CS201');
      registry.dropFor('STU001', 'CS201');
      registry.create('STU002', 'CS201');
      expect(registry.reEnroll(registration?.id ?? '')).toBeNull();
      expect(registration?.status).toBe('dropped');
    });

    it('refuses an enrolled or unknown registration', () => {
      const registration = registry.create('STU001', 'CS101');
      expect(registry.reEnroll(registration?.id ?? '')).toBeNull();
      expect(registry.reEnroll('missing')).toBeNull();
    });
  });

  describe('queries', () => {
    beforeEach(() => {
      registry.create('STU001', 'CS101');
      registry.create('STU001', 'CS201');
      registry.create('STU002', 'CS101');
      registry.dropFor('STU001', 'CS201');
    });

    it('lists by student and by course', () => {
      expect(registry.listForStudent('STU001').map((r) => r.courseId)).toEqual(['CS101', 'CS201']);
      expect(registry.listForCourse('CS101').map((r) => r.studentId)).toEqual(['STU001', 'STU002']);
    });

    it('lists only active registrations', () => {
      expect(registry.listActiveForStudent('STU001').map((r) => r.courseId)).toEqual(['CS101']);
      expect(registry.listActiveForCourse('CS201')).toEqual([]);
    });

    it('finds by id', () => {
      const [first] = registry.list();
      expect(registry.get(first?.id ?? '')).toBe(first);
      expect(registry.get('missing')).toBeNull();
    });

    it('returns null for a pair with no history', () => {
      expect(registry.findByStudentAndCourse('STU002', 'CS201')).toBeNull();
    });

    it('builds the student history', () => {
      expect(registry.studentHistory('STU001')).toEqual([
        {
          courseId: 'CS101',
          status: 'enrolled',
          enrollmentDate: '2026-01-05T09:00:00.000Z',
          dropDate: null,
          grade: null,
          notes: '',
        },
        {
          courseId: 'CS201',
          status: 'dropped',
          enrollmentDate: '2026-01-05T09:00:00.000Z',
          dropDate: '2026-01-05T09:00:00.000Z',
          grade: null,
          notes: '',
        },
      ]);
    });
  });

  describe('statistics', () => {
    it('is all zeros for an empty registry', () => {
      expect(registry.statistics()).toEqual({ total: 0, active: 0, dropped: 0, enrollmentRate: 0 });
    });

    it('computes the enrollment rate over all registrations', () => {
      registry.create('STU001', 'CS101');
      registry.create('STU002', 'CS101');
      registry.create('STU003', 'CS201');
      registry.dropFor('STU003', 'CS201');
      expect(registry.statistics()).toEqual({ total: 3, active: 2, dropped: 1, enrollmentRate: (2 / 3) * 100 });
    });
  });

  describe('courseEnrollmentSummary', () => {
    it('returns a zero retention rate for a course without registrations', () => {
      expect(registry.courseEnrollmentSummary('CS101')).toEqual({
        courseId: 'CS101',
        total: 0,
        active: 0,
        dropped: 0,
        retentionRate: 0,
      });
    });

    it('computes retention for the course', () => {
      registry.create('STU001', 'CS101');
      registry.create('STU002', 'CS101');
      registry.dropFor('STU002', 'CS101');
      expect(registry.courseEnrollmentSummary('CS101')).toEqual({
        courseId: 'CS101',
        total: 2,
        active: 1,
        dropped: 1,
        retentionRate: 50,
      });
    });
  });

  describe('cleanup', () => {
    it('removes only dropped registrations older than the cutoff', () => {
      const longEnrolled = registry.create('STU001', 'CS101');
      registry.create('STU002', 'CS101');
      registry.dropFor('STU002', 'CS101');

      clock.advance(30 * DAY_MS);
      registry.create('STU003', 'CS201');
      registry.dropFor('STU003', 'CS201');

      clock.advance(340 * DAY_MS);

      expect(registry.cleanup(365)).toBe(1);
      expect(registry.list().map((r) => r.studentId)).toEqual(['STU001', 'STU003']);
      expect(registry.get(longEnrolled?.id ?? '')?.status).toBe('enrolled');
      expect(registry.listForStudent('STU002')).toEqual([]);
      expect(registry.findByStudentAndCourse('STU002', 'CS101')).toBeNull();
    });

    it('keeps a dropped registration exactly at the cutoff', () => {
      registry.create('STU001', 'CS101');
      registry.dropFor('STU001', 'CS101');
      clock.advance(365 * DAY_MS);
      expect(registry.cleanup(365)).toBe(0);
    });

    it('never removes enrolled registrations however old', () => {
      registry.create('STU001', 'CS101');
      clock.advance(400 * DAY_MS);
      expect(registry.cleanup(365)).toBe(0);
      expect(registry.size).toBe(1);
    });
  });

  describe('records', () => {
    it('round-trips through records without touching course counters', () => {
      registry.create('STU001', 'CS101');
      registry.create('STU002', 'CS101');
      registry.dropFor('STU002', 'CS101');
      const records = registry.toRecords();

      const restored = RegistrationRegistry.fromRecords(records, courses, clock);
      expect(restored.toRecords()).toEqual(records);
      expect(restored.activeFor('STU001', 'CS101')?.status).toBe('enrolled');
      expect(courses.get('CS101')?.enrolled).toBe(1);
    });

    it('rejects two active records for the same pair', () => {
      registry.create('STU001', 'CS101');
      const [record] = registry.toRecords();
      const twin = { ...record, id: 'other-id' };
      expect(() => RegistrationRegistry.fromRecords([record, twin], courses, clock)).toThrow(RecordDecodeError);
    });

    it('rejects a course counting a seat no active registration holds', () => {
      const stored = new CourseRegistry(clock);
      stored.add(makeCourse({ id: 'CS101', capacity: 1 }, clock));
      stored.get('CS101')?.enroll();
      const loaded = CourseRegistry.fromRecords(stored.toRecords(), clock);

      expect(() => RegistrationRegistry.fromRecords([], loaded, clock)).toThrow(
        "Invalid registration record: status: Course 'CS101' records 1 enrolled but has 0 active registration(s)",
      );
    });

    it('rejects active registrations the course counter does not include', () => {
      registry.create('STU001', 'CS101');
      registry.create('STU002', 'CS101');
      const records = registry.toRecords();
      const loaded = CourseRegistry.fromRecords(
        courses.toRecords().map((course) => (course.id === 'CS101' ? { ...course, enrolled: 1 } : course)),
        clock,
      );

      expect(() => RegistrationRegistry.fromRecords(records, loaded, clock)).toThrow(
        "Invalid registration record: status: Course 'CS101' records 1 enrolled but has 2 active registration(s)",
      );
    });

    it('rejects active registrations for a course missing from the catalog', () => {
      registry.create('STU001', 'CS101');
      const records = registry.toRecords();

      expect(() => RegistrationRegistry.fromRecords(records, new CourseRegistry(clock), clock)).toThrow(
        "Invalid registration record: course_id: 1 active registration(s) reference unknown course 'CS101'",
      );
    });

    it('accepts dropped registrations without a matching seat', () => {
      registry.create('STU001', 'CS101');
      registry.dropFor('STU001', 'CS101');
      const loaded = CourseRegistry.fromRecords(courses.toRecords(), clock);

      const restored = RegistrationRegistry.fromRecords(registry.toRecords(), loaded, clock);
      expect(restored.size).toBe(1);
      expect(loaded.get('CS101')?.enrolled).toBe(0);
    });
  });
});
