import type pg from 'pg';

export type RecordTable = 'course_records' | 'registration_records';

export const DDL_CREATE_COURSE_RECORDS = `
CREATE TABLE IF NOT EXISTS course_records (
  id        TEXT         PRIMARY KEY,
  position  INTEGER      NOT NULL,
  record    JSONB        NOT NULL,
  saved_at  TIMESTAMPTZ  NOT NULL DEFAULT NOW()
)
`.trim();

export const DDL_CREATE_REGISTRATION_RECORDS = `
CREATE TABLE IF NOT EXISTS registration_records (
  id        TEXT         PRIMARY KEY,
  position  INTEGER      NOT NULL,
  record    JSONB        NOT NULL,
  saved_at  TIMESTAMPTZ  NOT NULL DEFAULT NOW()
)
`.trim();

export const DDL_CREATE_REGISTRATION_PAIR_INDEX = `
CREATE INDEX IF NOT EXISTS idx_registration_records_pair
  ON registration_records ((record->>'student_id'), (record->>'course_id'))
`.trim();

export async function applySchema(client: pg.ClientBase): Promise<void> {
  await client.query(DDL_CREATE_COURSE_RECORDS);
  await client.query(DDL_CREATE_REGISTRATION_RECORDS);
  await client.query(DDL_CREATE_REGISTRATION_PAIR_INDEX);
}
