import type { CourseConflict, ScheduleRecord } from 'enrollment-engine';
import type { Catalog } from '../../catalog.js';

export interface TimetableEntry {
  courseId: string;
  name: string;
  credits: number;
  schedule: ScheduleRecord;
}

export interface Timetable {
  studentId: string;
  totalCredits: number;
  entries: TimetableEntry[];
  conflicts: CourseConflict[];
}

/**
 * The student's active courses that meet at a fixed time. Credits count every
 * active course, scheduled or not. Conflicts can only appear for records
 * written before the schedule check existed or after a schedule was edited.
 */
export function studentTimetable(catalog: Catalog, studentId: string): Timetable {
  const courseIds = catalog.registrations.listActiveForStudent(studentId).map((r) => r.courseId);
  const courses = courseIds.flatMap((id) => catalog.courses.get(id) ?? []);

  const entries: TimetableEntry[] = [];
  for (const course of courses) {
    if (course.schedule === null) continue;
    entries.push({
      courseId: course.id,
      name: course.name,
      credits: course.credits,
      schedule: course.schedule.toRecord(),
    });
  }

  return {
    studentId,
    totalCredits: courses.reduce((sum, course) => sum + course.credits, 0),
    entries,
    conflicts: catalog.courses.findConflicts(courseIds),
  };
}
