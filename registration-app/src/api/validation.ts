import { z } from 'zod';
import type { ZodTypeAny } from 'zod';
import { scheduleRecordSchema } from 'enrollment-engine';
import { InvalidRequestError } from '../domain/errors.js';

export function parseWith<S extends ZodTypeAny>(schema: S, value: unknown): z.output<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new InvalidRequestError(detail);
  }
  return parsed.data;
}

const positiveInt = z.number().int().positive();

export const courseParams = z.object({ courseId: z.string().min(1) });
export const enrollmentParams = z.object({ courseId: z.string().min(1), studentId: z.string().min(1) });
export const studentParams = z.object({ studentId: z.string().min(1) });
export const registrationParams = z.object({ registrationId: z.string().min(1) });

export const createCourseBody = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().optional(),
  credits: positiveInt,
  instructor: z.string(),
  capacity: positiveInt.optional(),
  prerequisites: z.array(z.string().min(1)).optional(),
  schedule: scheduleRecordSchema.nullable().optional(),
});

export const updateCourseBody = z
  .object({
    name: z.string().min(1),
    description: z.string(),
    credits: positiveInt,
    instructor: z.string(),
    capacity: positiveInt,
    schedule: scheduleRecordSchema.nullable(),
  })
  .partial()
  .strict();

export const listCoursesQuery = z.object({
  instructor: z.string().min(1).optional(),
  minCredits: z.coerce.number().int().nonnegative().optional(),
  maxCredits: z.coerce.number().int().nonnegative().optional(),
  includeInactive: z.enum(['true', 'false']).optional(),
});

export const enrollBody = z.object({
  studentId: z.string().min(1),
  completedCourseIds: z.array(z.string()).optional(),
});

export const activeOnlyQuery = z.object({
  active: z.enum(['true', 'false']).optional(),
});

export const gradeBody = z.object({ grade: z.string().min(1).nullable() });
export const noteBody = z.object({ note: z.string().min(1) });
export const cleanupBody = z.object({ daysOld: z.number().int().nonnegative().optional() }).default({});
