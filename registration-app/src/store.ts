import pg from 'pg';
import { PostgresRecordStore } from 'enrollment-engine';
import type { RecordStore } from 'enrollment-engine';

export function createStore(connectionString: string): RecordStore {
  return new PostgresRecordStore({ pool: new pg.Pool({ connectionString }) });
}
