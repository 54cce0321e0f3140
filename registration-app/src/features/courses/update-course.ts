import { Schedule } from 'enrollment-engine';
import type { Course, CourseChanges, ScheduleRecord } from 'enrollment-engine';
import type { Catalog } from '../../catalog.js';
import { CourseNotFoundError } from '../../domain/errors.js';

export interface UpdateCourseInput {
  name?: string | undefined;
  description?: string | undefined;
  credits?: number | undefined;
  instructor?: string | undefined;
  capacity?: number | undefined;
  schedule?: ScheduleRecord | null | undefined;
}

export async function updateCourse(
  catalog: Catalog,
  courseId: string,
  input: UpdateCourseInput,
): Promise<Course> {
  const { schedule, ...fields } = input;
  const changes: CourseChanges = { ...fields };
  if (schedule !== undefined) {
    changes.schedule = schedule === null ? null : Schedule.fromRecord(schedule);
  }

  const course = catalog.courses.update(courseId, changes);
  if (course === null) {
    throw new CourseNotFoundError(`Course '${courseId}' not found`);
  }

  await catalog.saveCourses();
  return course;
}
