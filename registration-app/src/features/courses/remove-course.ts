import type { Course } from 'enrollment-engine';
import type { Catalog } from '../../catalog.js';
import { CourseNotFoundError } from '../../domain/errors.js';

// Soft delete: the course stays in the catalog, inactive, with its registrations.
export async function removeCourse(catalog: Catalog, courseId: string): Promise<Course> {
  const course = catalog.courses.get(courseId);
  if (course === null) {
    throw new CourseNotFoundError(`Course '${courseId}' not found`);
  }
  catalog.courses.remove(courseId);
  await catalog.saveCourses();
  return course;
}
