import type { CourseRecord, RegistrationRecord } from './records/schema.js';

/**
 * Durable storage for catalog and registration records. Loads return records
 * as stored, to be checked by the codec; each save replaces the whole collection.
 */
export interface RecordStore {
  loadCourses(): Promise<unknown[]>;
  saveCourses(records: CourseRecord[]): Promise<void>;
  loadRegistrations(): Promise<unknown[]>;
  saveRegistrations(records: RegistrationRecord[]): Promise<void>;
  initializeSchema(): Promise<void>;
  close(): Promise<void>;
}
