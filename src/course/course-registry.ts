import type { Clock } from '../clock.js';
import { systemClock } from '../clock.js';
import { RecordDecodeError } from '../errors.js';
import type { CourseRecord } from '../records/schema.js';
import { decodeCourse, encodeCourse } from '../records/codec.js';
import { Course } from './course.js';
import type { CourseChanges, CourseInput } from './course.js';

export interface CourseConflict {
  courseA: string;
  courseB: string;
  kind: 'schedule';
}

export interface CatalogStatistics {
  totalCourses: number;
  activeCourses: number;
  availableCourses: number;
  fullCourses: number;
  /** Seats taken across the catalog as a percentage of all seats, one decimal. */
  averageUtilization: number;
  totalCreditsOffered: number;
}

/**
 * Owns every Course in the catalog. Lookups go through the registry; callers
 * outside it hold course ids, never Course references.
 */
export class CourseRegistry {
  // Map iteration follows insertion order, which keeps listings deterministic
  private readonly courses = new Map<string, Course>();

  constructor(private readonly clock: Clock = systemClock) {}

  static fromRecords(records: readonly unknown[], clock: Clock = systemClock): CourseRegistry {
    const registry = new CourseRegistry(clock);
    for (const record of records) {
      const course = decodeCourse(record, clock);
      if (!registry.add(course)) {
        throw new RecordDecodeError('course', [{ path: 'id', message: `Duplicate course id '${course.id}'` }]);
      }
    }
    return registry;
  }

  get size(): number {
    return this.courses.size;
  }

  /** Returns false, leaving the existing course untouched, when the id is taken. */
  add(course: Course): boolean {
    if (this.courses.has(course.id)) return false;
    this.courses.set(course.id, course);
    return true;
  }

  has(id: string): boolean {
    return this.courses.has(id);
  }

  get(id: string): Course | null {
    return this.courses.get(id) ?? null;
  }

  list(): Course[] {
    return [...this.courses.values()];
  }

  listActive(): Course[] {
    return this.list().filter((course) => course.active);
  }

  update(id: string, changes: CourseChanges): Course | null {
    const course = this.courses.get(id);
    if (course === undefined) return null;
    course.update(changes);
    return course;
  }

  /** Soft delete; unknown ids are ignored. Returns whether a course was found. */
  remove(id: string): boolean {
    const course = this.courses.get(id);
    if (course === undefined) return false;
    course.deactivate();
    return true;
  }

  findByInstructor(instructor: string): Course[] {
    const wanted = instructor.toLowerCase();
    return this.list().filter((course) => course.instructor.toLowerCase() === wanted);
  }

  findByCreditRange(minCredits: number, maxCredits?: number): Course[] {
    return this.list().filter(
      (course) =>
        course.credits >= minCredits && (maxCredits === undefined || course.credits <= maxCredits),
    );
  }

  /**
   * Pairwise schedule conflicts among the given courses. Ids that do not resolve
   * are skipped. Each pair is reported once, in (i < j) input order.
   */
  findConflicts(courseIds: readonly string[]): CourseConflict[] {
    const resolved: Course[] = [];
    for (const id of courseIds) {
      const course = this.courses.get(id);
      if (course !== undefined) resolved.push(course);
    }

    const conflicts: CourseConflict[] = [];
    resolved.forEach((first, i) => {
      for (const second of resolved.slice(i + 1)) {
        if (first.conflictsWith(second)) {
          conflicts.push({ courseA: first.id, courseB: second.id, kind: 'schedule' });
        }
      }
    });
    return conflicts;
  }

  catalogStatistics(): CatalogStatistics {
    const all = this.list();
    const active = all.filter((course) => course.active);
    const seats = all.reduce((sum, course) => sum + course.capacity, 0);
    const taken = all.reduce((sum, course) => sum + course.enrolled, 0);
    return {
      totalCourses: all.length,
      activeCourses: active.length,
      availableCourses: active.filter((course) => !course.isFull()).length,
      fullCourses: all.filter((course) => course.isFull()).length,
      averageUtilization: seats === 0 ? 0 : Math.round((taken / seats) * 1000) / 10,
      totalCreditsOffered: active.reduce((sum, course) => sum + course.credits, 0),
    };
  }

  toRecords(): CourseRecord[] {
    return this.list().map(encodeCourse);
  }

  /** Builds a course bound to this registry's clock. Does not add it. */
  createCourse(input: CourseInput): Course {
    return new Course(input, this.clock);
  }
}
