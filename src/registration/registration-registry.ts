import type { Clock } from '../clock.js';
import { systemClock } from '../clock.js';
import type { CourseRegistry } from '../course/course-registry.js';
import { RecordDecodeError } from '../errors.js';
import type { RecordIssue } from '../errors.js';
import { decodeRegistration, encodeRegistration } from '../records/codec.js';
import type { RegistrationRecord } from '../records/schema.js';
import { Registration } from './registration.js';
import type { RegistrationStatus } from './registration.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export interface RegistrationStatistics {
  total: number;
  active: number;
  dropped: number;
  /** active / total * 100, or 0 for an empty registry. */
  enrollmentRate: number;
}

export interface CourseEnrollmentSummary {
  courseId: string;
  total: number;
  active: number;
  dropped: number;
  /** active / total * 100, or 0 when the course has no registrations. */
  retentionRate: number;
}

export interface CourseHistoryEntry {
  courseId: string;
  status: RegistrationStatus;
  enrollmentDate: string;
  dropDate: string | null;
  grade: string | null;
  notes: string;
}

function pairKey(studentId: string, courseId: string): string {
  return JSON.stringify([studentId, courseId]);
}

function percentage(part: number, whole: number): number {
  return whole === 0 ? 0 : (part / whole) * 100;
}

function addToIndex(index: Map<string, Set<string>>, key: string, id: string): void {
  let ids = index.get(key);
  if (ids === undefined) {
    ids = new Set();
    index.set(key, ids);
  }
  ids.add(id);
}

function removeFromIndex(index: Map<string, Set<string>>, key: string, id: string): void {
  const ids = index.get(key);
  if (ids === undefined) return;
  ids.delete(id);
  if (ids.size === 0) index.delete(key);
}

/**
 * Owns every Registration and keeps at most one active (enrolled) registration
 * per (student, course) pair. Seats are taken and released on the Course
 * through the CourseRegistry, so course counters and registrations move together.
 *
 * Every method is synchronous: a check and the write that depends on it run
 * without yielding to other callers.
 */
export class RegistrationRegistry {
  private readonly byId = new Map<string, Registration>();
  private readonly byPair = new Map<string, Set<string>>();
  private readonly activeByPair = new Map<string, string>();
  private readonly byStudent = new Map<string, Set<string>>();
  private readonly byCourse = new Map<string, Set<string>>();

  constructor(
    private readonly courses: CourseRegistry,
    private readonly clock: Clock = systemClock,
  ) {}

  static fromRecords(
    records: readonly unknown[],
    courses: CourseRegistry,
    clock: Clock = systemClock,
  ): RegistrationRegistry {
    const registry = new RegistrationRegistry(courses, clock);
    for (const record of records) {
      const registration = decodeRegistration(record, clock);
      if (registry.byId.has(registration.id)) {
        throw new RecordDecodeError('registration', [
          { path: 'id', message: `Duplicate registration id '${registration.id}'` },
        ]);
      }
      if (registration.isActive() && registry.activeFor(registration.studentId, registration.courseId)) {
        throw new RecordDecodeError('registration', [
          {
            path: 'status',
            message: `Student '${registration.studentId}' has more than one active registration for course '${registration.courseId}'`,
          },
        ]);
      }
      registry.index(registration);
    }
    registry.verifySeatCounts();
    return registry;
  }

  get size(): number {
    return this.byId.size;
  }

  /**
   * Enrolls the student. Returns null, changing nothing, when the student
   * already holds an active registration for the course, when the course is
   * unknown, or when the course refuses the seat (inactive or full).
   * Dropped registrations for the same pair are kept as history.
   */
  create(studentId: string, courseId: string): Registration | null {
    if (this.activeFor(studentId, courseId) !== null) return null;

    const course = this.courses.get(courseId);
    if (course === null || !course.enroll()) return null;

    const registration = new Registration({ studentId, courseId }, this.clock);
    this.index(registration);
    return registration;
  }

  /**
   * Drops the active registration for the pair and frees its seat. Returns
   * false, changing nothing, when there is no active registration or the
   * course holds no seat to release.
   */
  dropFor(studentId: string, courseId: string): boolean {
    const registration = this.activeFor(studentId, courseId);
    const course = this.courses.get(courseId);
    if (registration === null || course === null || course.enrolled === 0) return false;
    if (!registration.drop()) return false;
    course.drop();
    this.activeByPair.delete(pairKey(studentId, courseId));
    return true;
  }

  /**
   * Moves a dropped registration back to enrolled. Refused when the record is
   * not dropped, when the pair already has another active registration, or
   * when the course has no seat to give.
   */
  reEnroll(registrationId: string): Registration | null {
    const registration = this.byId.get(registrationId);
    if (registration === undefined || !registration.isDropped()) return null;
    if (this.activeFor(registration.studentId, registration.courseId) !== null) return null;

    const course = this.courses.get(registration.courseId);
    if (course === null || !course.enroll()) return null;

    registration.reEnroll();
    this.activeByPair.set(pairKey(registration.studentId, registration.courseId), registration.id);
    return registration;
  }

  get(id: string): Registration | null {
    return this.byId.get(id) ?? null;
  }

  list(): Registration[] {
    return [...this.byId.values()];
  }

  /** The active registration for the pair, or else the most recent historical one. */
  findByStudentAndCourse(studentId: string, courseId: string): Registration | null {
    const active = this.activeFor(studentId, courseId);
    if (active !== null) return active;
    const history = this.resolve(this.byPair.get(pairKey(studentId, courseId)));
    return history.at(-1) ?? null;
  }

  activeFor(studentId: string, courseId: string): Registration | null {
    const id = this.activeByPair.get(pairKey(studentId, courseId));
    return id === undefined ? null : this.byId.get(id) ?? null;
  }

  listForStudent(studentId: string): Registration[] {
    return this.resolve(this.byStudent.get(studentId));
  }

  listForCourse(courseId: string): Registration[] {
    return this.resolve(this.byCourse.get(courseId));
  }

  listActiveForStudent(studentId: string): Registration[] {
    return this.listForStudent(studentId).filter((r) => r.isActive());
  }

  listActiveForCourse(courseId: string): Registration[] {
    return this.listForCourse(courseId).filter((r) => r.isActive());
  }

  studentHistory(studentId: string): CourseHistoryEntry[] {
    return this.listForStudent(studentId).map((r) => ({
      courseId: r.courseId,
      status: r.status,
      enrollmentDate: r.enrollmentDate.toISOString(),
      dropDate: r.dropDate?.toISOString() ?? null,
      grade: r.grade,
      notes: r.notes,
    }));
  }

  statistics(): RegistrationStatistics {
    const all = this.list();
    const active = all.filter((r) => r.isActive()).length;
    return {
      total: all.length,
      active,
      dropped: all.filter((r) => r.isDropped()).length,
      enrollmentRate: percentage(active, all.length),
    };
  }

  courseEnrollmentSummary(courseId: string): CourseEnrollmentSummary {
    const registrations = this.listForCourse(courseId);
    const active = registrations.filter((r) => r.isActive()).length;
    return {
      courseId,
      total: registrations.length,
      active,
      dropped: registrations.filter((r) => r.isDropped()).length,
      retentionRate: percentage(active, registrations.length),
    };
  }

  /**
   * Deletes dropped registrations whose drop date is more than `daysOld` days
   * in the past. Records in any other state are kept whatever their age.
   */
  cleanup(daysOld: number): number {
    const cutoff = this.clock.now().getTime() - daysOld * MS_PER_DAY;
    const stale = this.list().filter(
      (r) => r.isDropped() && r.dropDate !== null && r.dropDate.getTime() < cutoff,
    );
    for (const registration of stale) {
      this.unindex(registration);
    }
    return stale.length;
  }

  toRecords(): RegistrationRecord[] {
    return this.list().map(encodeRegistration);
  }

  // A course's enrolled counter must equal its active registrations; saves of
  // the two collections are separate, so a partial write shows up here.
  private verifySeatCounts(): void {
    const active = new Map<string, number>();
    for (const id of this.activeByPair.values()) {
      const registration = this.byId.get(id);
      if (registration === undefined) continue;
      active.set(registration.courseId, (active.get(registration.courseId) ?? 0) + 1);
    }

    const issues: RecordIssue[] = [];
    for (const [courseId, count] of active) {
      if (!this.courses.has(courseId)) {
        issues.push({
          path: 'course_id',
          message: `${count} active registration(s) reference unknown course '${courseId}'`,
        });
      }
    }
    for (const course of this.courses.list()) {
      const count = active.get(course.id) ?? 0;
      if (count !== course.enrolled) {
        issues.push({
          path: 'status',
          message: `Course '${course.id}' records ${course.enrolled} enrolled but has ${count} active registration(s)`,
        });
      }
    }
    if (issues.length > 0) {
      throw new RecordDecodeError('registration', issues);
    }
  }

  private index(registration: Registration): void {
    const key = pairKey(registration.studentId, registration.courseId);
    this.byId.set(registration.id, registration);
    addToIndex(this.byPair, key, registration.id);
    addToIndex(this.byStudent, registration.studentId, registration.id);
    addToIndex(this.byCourse, registration.courseId, registration.id);
    if (registration.isActive()) this.activeByPair.set(key, registration.id);
  }

  private unindex(registration: Registration): void {
    const key = pairKey(registration.studentId, registration.courseId);
    this.byId.delete(registration.id);
    removeFromIndex(this.byPair, key, registration.id);
    removeFromIndex(this.byStudent, registration.studentId, registration.id);
    removeFromIndex(this.byCourse, registration.courseId, registration.id);
    if (this.activeByPair.get(key) === registration.id) this.activeByPair.delete(key);
  }

  private resolve(ids: Set<string> | undefined): Registration[] {
    if (ids === undefined) return [];
    const found: Registration[] = [];
    for (const id of ids) {
      const registration = this.byId.get(id);
      if (registration !== undefined) found.push(registration);
    }
    return found;
  }
}
