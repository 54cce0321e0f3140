export { systemClock } from './clock.js';
export type { Clock } from './clock.js';
export { WEEKDAYS, isWeekday, parseWeekday } from './schedule/weekday.js';
export type { Weekday } from './schedule/weekday.js';
export { createTimeRange, parseTimeRange, formatTimeRange, rangesOverlap } from './schedule/time-range.js';
export type { TimeRange } from './schedule/time-range.js';
export { Schedule } from './schedule/schedule.js';
export type { ScheduleInput } from './schedule/schedule.js';
export { Course } from './course/course.js';
export type { CourseInput, CourseSnapshot, CourseChanges } from './course/course.js';
export { CourseRegistry } from './course/course-registry.js';
export type { CourseConflict, CatalogStatistics } from './course/course-registry.js';
export { Registration } from './registration/registration.js';
export type { RegistrationStatus, RegistrationInput, RegistrationSnapshot } from './registration/registration.js';
export { RegistrationRegistry } from './registration/registration-registry.js';
export type {
  RegistrationStatistics,
  CourseEnrollmentSummary,
  CourseHistoryEntry,
} from './registration/registration-registry.js';
export {
  RECORD_SCHEMA_VERSION,
  REGISTRATION_STATUSES,
  scheduleRecordSchema,
  courseRecordSchema,
  registrationRecordSchema,
} from './records/schema.js';
export type { ScheduleRecord, CourseRecord, RegistrationRecord } from './records/schema.js';
export { encodeCourse, decodeCourse, encodeRegistration, decodeRegistration } from './records/codec.js';
export type { RecordStore } from './types.js';
export { PostgresRecordStore } from './store/record-store.js';
export type { RecordStoreConfig } from './store/record-store.js';
export { InvalidScheduleError, InvalidCourseError, RecordDecodeError, RecordStoreError } from './errors.js';
export type { RecordIssue } from './errors.js';
