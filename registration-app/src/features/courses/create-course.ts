import { Schedule } from 'enrollment-engine';
import type { Course, ScheduleRecord } from 'enrollment-engine';
import type { Catalog } from '../../catalog.js';
import { CourseAlreadyExistsError } from '../../domain/errors.js';

export const DEFAULT_COURSE_CAPACITY = 30;

export interface CreateCourseInput {
  id: string;
  name: string;
  description?: string | undefined;
  credits: number;
  instructor: string;
  capacity?: number | undefined;
  prerequisites?: string[] | undefined;
  schedule?: ScheduleRecord | null | undefined;
}

export async function createCourse(catalog: Catalog, input: CreateCourseInput): Promise<Course> {
  if (catalog.courses.has(input.id)) {
    throw new CourseAlreadyExistsError(`Course '${input.id}' already exists`);
  }

  const course = catalog.courses.createCourse({
    id: input.id,
    name: input.name,
    description: input.description ?? '',
    credits: input.credits,
    instructor: input.instructor,
    capacity: input.capacity ?? DEFAULT_COURSE_CAPACITY,
    prerequisites: input.prerequisites ?? [],
    schedule: input.schedule ? Schedule.fromRecord(input.schedule) : null,
  });
  catalog.courses.add(course);

  await catalog.saveCourses();
  return course;
}
