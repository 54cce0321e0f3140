import type { Registration } from 'enrollment-engine';
import type { Catalog } from '../../catalog.js';
import type { EnrollmentPolicy } from '../../config.js';
import {
  CourseNotFoundError,
  CourseInactiveError,
  StudentAlreadyEnrolledError,
  PrerequisiteNotSatisfiedError,
  CourseLimitExceededError,
  CreditLimitExceededError,
  ScheduleConflictError,
  CourseFullError,
  EnrollmentRejectedError,
} from '../../domain/errors.js';

export interface EnrollStudentInput {
  studentId: string;
  courseId: string;
  completedCourseIds?: string[] | undefined;
}

/**
 * Checks every enrollment rule and reports the first one broken, then takes
 * the seat through the registry. Nothing awaits between the checks and the
 * write, so no other request can slip in between.
 */
export async function enrollStudent(
  catalog: Catalog,
  policy: EnrollmentPolicy,
  input: EnrollStudentInput,
): Promise<Registration> {
  const { studentId, courseId } = input;
  const { courses, registrations } = catalog;

  const course = courses.get(courseId);
  if (course === null) {
    throw new CourseNotFoundError(`Course '${courseId}' not found`);
  }
  if (!course.active) {
    throw new CourseInactiveError(`Course '${courseId}' is no longer offered`);
  }
  if (registrations.activeFor(studentId, courseId) !== null) {
    throw new StudentAlreadyEnrolledError(
      `Student '${studentId}' is already enrolled in course '${courseId}'`,
    );
  }

  const missing = course.missingPrerequisites(input.completedCourseIds ?? []);
  if (missing.length > 0) {
    throw new PrerequisiteNotSatisfiedError(
      `Student '${studentId}' has not completed prerequisite(s) ${missing.map((id) => `'${id}'`).join(', ')}`,
    );
  }

  const current = registrations
    .listActiveForStudent(studentId)
    .flatMap((r) => courses.get(r.courseId) ?? []);
  if (current.length >= policy.maxCoursesPerStudent) {
    throw new CourseLimitExceededError(
      `Student '${studentId}' is already enrolled in ${current.length} courses (limit ${policy.maxCoursesPerStudent})`,
    );
  }
  const credits = current.reduce((sum, c) => sum + c.credits, 0) + course.credits;
  if (credits > policy.maxCreditsPerStudent) {
    throw new CreditLimitExceededError(
      `Enrolling in '${courseId}' would bring student '${studentId}' to ${credits} credits (limit ${policy.maxCreditsPerStudent})`,
    );
  }
  const clashes = current.filter((other) => course.conflictsWith(other)).map((c) => c.id);
  if (clashes.length > 0) {
    throw new ScheduleConflictError(
      `Course '${courseId}' clashes with ${clashes.map((id) => `'${id}'`).join(', ')}`,
    );
  }

  if (course.isFull()) {
    throw new CourseFullError(`Course '${courseId}' is full (${course.enrolled}/${course.capacity} students)`);
  }

  const registration = registrations.create(studentId, courseId);
  if (registration === null) {
    throw new EnrollmentRejectedError(`Enrollment of '${studentId}' in '${courseId}' was rejected`);
  }

  await catalog.saveAll();
  return registration;
}
