import type { Registration } from 'enrollment-engine';
import type { Catalog } from '../../catalog.js';
import {
  RegistrationNotFoundError,
  RegistrationNotDroppedError,
  StudentAlreadyEnrolledError,
  CourseNotFoundError,
  CourseInactiveError,
  CourseFullError,
  EnrollmentRejectedError,
} from '../../domain/errors.js';

export async function reEnrollStudent(catalog: Catalog, registrationId: string): Promise<Registration> {
  const { courses, registrations } = catalog;

  const registration = registrations.get(registrationId);
  if (registration === null) {
    throw new RegistrationNotFoundError(`Registration '${registrationId}' not found`);
  }
  if (!registration.isDropped()) {
    throw new RegistrationNotDroppedError(
      `Registration '${registrationId}' is ${registration.status}, only dropped registrations can be re-enrolled`,
    );
  }

  const { studentId, courseId } = registration;
  if (registrations.activeFor(studentId, courseId) !== null) {
    throw new StudentAlreadyEnrolledError(
      `Student '${studentId}' is already enrolled in course '${courseId}'`,
    );
  }
  const course = courses.get(courseId);
  if (course === null) {
    throw new CourseNotFoundError(`Course '${courseId}' not found`);
  }
  if (!course.active) {
    throw new CourseInactiveError(`Course '${courseId}' is no longer offered`);
  }
  if (course.isFull()) {
    throw new CourseFullError(`Course '${courseId}' is full (${course.enrolled}/${course.capacity} students)`);
  }

  if (registrations.reEnroll(registrationId) === null) {
    throw new EnrollmentRejectedError(`Re-enrollment of registration '${registrationId}' was rejected`);
  }

  await catalog.saveAll();
  return registration;
}
