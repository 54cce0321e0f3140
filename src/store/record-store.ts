import pg from 'pg';
import { RecordStoreError } from '../errors.js';
import type { CourseRecord, RegistrationRecord } from '../records/schema.js';
import type { RecordStore } from '../types.js';
import { applySchema } from './schema.js';
import type { RecordTable } from './schema.js';

export interface RecordStoreConfig {
  pool: pg.Pool;
}

type RecordRow = {
  id: string;
  record: unknown; // pg auto-parses JSONB
};

export class PostgresRecordStore implements RecordStore {
  private readonly pool: pg.Pool;

  constructor(config: RecordStoreConfig) {
    this.pool = config.pool;
  }

  async initializeSchema(): Promise<void> {
    const client = await this.pool.connect();
    try {
      await applySchema(client);
    } finally {
      client.release();
    }
  }

  loadCourses(): Promise<unknown[]> {
    return this.load('course_records');
  }

  saveCourses(records: CourseRecord[]): Promise<void> {
    return this.replace('course_records', records);
  }

  loadRegistrations(): Promise<unknown[]> {
    return this.load('registration_records');
  }

  saveRegistrations(records: RegistrationRecord[]): Promise<void> {
    return this.replace('registration_records', records);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async load(table: RecordTable): Promise<unknown[]> {
    let result: pg.QueryResult<RecordRow>;
    try {
      result = await this.pool.query<RecordRow>(`SELECT id, record FROM ${table} ORDER BY position`);
    } catch (err) {
      throw new RecordStoreError(`Failed to load ${table}: ${String(err)}`, err);
    }
    return result.rows.map((row) => row.record);
  }

  /** Overwrites the whole table in one transaction. */
  private async replace(table: RecordTable, records: readonly { id: string }[]): Promise<void> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      await client.query("SET LOCAL lock_timeout = '5s'");
      // Writers to the same table queue behind each other until COMMIT
      await client.query('SELECT pg_advisory_xact_lock(hashtext($1))', [table]);
      await client.query(`DELETE FROM ${table}`);
      for (const [position, record] of records.entries()) {
        await client.query(
          `INSERT INTO ${table} (id, position, record) VALUES ($1, $2, $3::jsonb)`,
          [record.id, position, JSON.stringify(record)],
        );
      }
      await client.query('COMMIT');
    } catch (err) {
      await client.query('ROLLBACK').catch(() => undefined);
      throw new RecordStoreError(`Failed to save ${table}: ${String(err)}`, err);
    } finally {
      client.release();
    }
  }
}
