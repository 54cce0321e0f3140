import { z } from 'zod';

export const RECORD_SCHEMA_VERSION = 1;

const timestamp = z.string().datetime({ offset: true, message: 'Invalid ISO-8601 timestamp' });

export const scheduleRecordSchema = z.object({
  days: z.array(z.string()).min(1),
  time: z.string(),
  room: z.string().min(1),
});

export const courseRecordSchema = z.object({
  schemaVersion: z.literal(RECORD_SCHEMA_VERSION).optional(),
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string(),
  credits: z.number().int().positive(),
  instructor: z.string(),
  capacity: z.number().int().positive(),
  enrolled: z.number().int().nonnegative(),
  prerequisites: z.array(z.string()),
  schedule: scheduleRecordSchema.nullable(),
  active: z.boolean(),
  created_at: timestamp,
  updated_at: timestamp,
});

export const REGISTRATION_STATUSES = ['enrolled', 'dropped', 'waitlisted', 'pending'] as const;

export const registrationRecordSchema = z.object({
  schemaVersion: z.literal(RECORD_SCHEMA_VERSION).optional(),
  id: z.string().min(1),
  student_id: z.string().min(1),
  course_id: z.string().min(1),
  status: z.enum(REGISTRATION_STATUSES),
  enrollment_date: timestamp,
  drop_date: timestamp.nullable().default(null),
  grade: z.string().nullable().default(null),
  notes: z.string().default(''),
}).superRefine((record, ctx) => {
  // drop_date is present exactly when the registration is dropped
  if (record.status === 'dropped' && record.drop_date === null) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['drop_date'],
      message: 'A dropped registration needs a drop date',
    });
  }
  if (record.status !== 'dropped' && record.drop_date !== null) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['drop_date'],
      message: `A registration in status '${record.status}' cannot have a drop date`,
    });
  }
});

export type ScheduleRecord = z.infer<typeof scheduleRecordSchema>;
export type CourseRecord = z.infer<typeof courseRecordSchema>;
export type RegistrationRecord = z.infer<typeof registrationRecordSchema>;
