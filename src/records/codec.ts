import type { ZodError } from 'zod';
import type { Clock } from '../clock.js';
import { systemClock } from '../clock.js';
import { Course } from '../course/course.js';
import { InvalidCourseError, InvalidScheduleError, RecordDecodeError } from '../errors.js';
import type { RecordIssue } from '../errors.js';
import { Registration } from '../registration/registration.js';
import { Schedule } from '../schedule/schedule.js';
import { RECORD_SCHEMA_VERSION, courseRecordSchema, registrationRecordSchema } from './schema.js';
import type { CourseRecord, RegistrationRecord } from './schema.js';

function toIssues(error: ZodError): RecordIssue[] {
  return error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
}

export function encodeCourse(course: Course): CourseRecord {
  return {
    schemaVersion: RECORD_SCHEMA_VERSION,
    id: course.id,
    name: course.name,
    description: course.description,
    credits: course.credits,
    instructor: course.instructor,
    capacity: course.capacity,
    enrolled: course.enrolled,
    prerequisites: course.prerequisites,
    schedule: course.schedule?.toRecord() ?? null,
    active: course.active,
    created_at: course.createdAt.toISOString(),
    updated_at: course.updatedAt.toISOString(),
  };
}

/**
 * Validates a stored course record and rebuilds the Course. Missing or
 * malformed fields, including an unparseable time range, raise RecordDecodeError.
 */
export function decodeCourse(raw: unknown, clock: Clock = systemClock): Course {
  const parsed = courseRecordSchema.safeParse(raw);
  if (!parsed.success) {
    throw new RecordDecodeError('course', toIssues(parsed.error));
  }
  const record = parsed.data;

  let schedule: Schedule | null = null;
  if (record.schedule !== null) {
    try {
      schedule = Schedule.fromRecord(record.schedule);
    } catch (err) {
      if (err instanceof InvalidScheduleError) {
        throw new RecordDecodeError('course', [{ path: 'schedule', message: err.message }]);
      }
      throw err;
    }
  }

  try {
    return Course.restore(
      {
        id: record.id,
        name: record.name,
        description: record.description,
        credits: record.credits,
        instructor: record.instructor,
        capacity: record.capacity,
        enrolled: record.enrolled,
        prerequisites: record.prerequisites,
        schedule,
        active: record.active,
        createdAt: new Date(record.created_at),
        updatedAt: new Date(record.updated_at),
      },
      clock,
    );
  } catch (err) {
    if (err instanceof InvalidCourseError) {
      throw new RecordDecodeError('course', [{ path: '', message: err.message }]);
    }
    throw err;
  }
}

export function encodeRegistration(registration: Registration): RegistrationRecord {
  return {
    schemaVersion: RECORD_SCHEMA_VERSION,
    id: registration.id,
    student_id: registration.studentId,
    course_id: registration.courseId,
    status: registration.status,
    enrollment_date: registration.enrollmentDate.toISOString(),
    drop_date: registration.dropDate?.toISOString() ?? null,
    grade: registration.grade,
    notes: registration.notes,
  };
}

export function decodeRegistration(raw: unknown, clock: Clock = systemClock): Registration {
  const parsed = registrationRecordSchema.safeParse(raw);
  if (!parsed.success) {
    throw new RecordDecodeError('registration', toIssues(parsed.error));
  }
  const record = parsed.data;
  return Registration.restore(
    {
      id: record.id,
      studentId: record.student_id,
      courseId: record.course_id,
      status: record.status,
      enrollmentDate: new Date(record.enrollment_date),
      dropDate: record.drop_date === null ? null : new Date(record.drop_date),
      grade: record.grade,
      notes: record.notes,
    },
    clock,
  );
}
