import type { Registration } from 'enrollment-engine';
import type { Catalog } from '../../catalog.js';
import { CourseNotFoundError, StudentNotEnrolledError } from '../../domain/errors.js';

export interface DropStudentInput {
  studentId: string;
  courseId: string;
}

export async function dropStudent(catalog: Catalog, input: DropStudentInput): Promise<Registration> {
  const { studentId, courseId } = input;
  if (!catalog.courses.has(courseId)) {
    throw new CourseNotFoundError(`Course '${courseId}' not found`);
  }

  const registration = catalog.registrations.activeFor(studentId, courseId);
  if (registration === null || !catalog.registrations.dropFor(studentId, courseId)) {
    throw new StudentNotEnrolledError(
      `Student '${studentId}' is not enrolled in course '${courseId}'`,
    );
  }

  await catalog.saveAll();
  return registration;
}
