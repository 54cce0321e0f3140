import { z } from 'zod';

const envSchema = z.object({
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  MAX_COURSES_PER_STUDENT: z.coerce.number().int().positive().default(6),
  MAX_CREDITS_PER_STUDENT: z.coerce.number().int().positive().default(18),
  CLEANUP_DAYS_OLD: z.coerce.number().int().nonnegative().default(365),
});

export interface EnrollmentPolicy {
  maxCoursesPerStudent: number;
  maxCreditsPerStudent: number;
}

export interface AppConfig {
  databaseUrl: string;
  port: number;
  host: string;
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  enrollment: EnrollmentPolicy;
  cleanupDaysOld: number;
}

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  const e = parsed.data;
  return {
    databaseUrl: e.DATABASE_URL,
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
    enrollment: {
      maxCoursesPerStudent: e.MAX_COURSES_PER_STUDENT,
      maxCreditsPerStudent: e.MAX_CREDITS_PER_STUDENT,
    },
    cleanupDaysOld: e.CLEANUP_DAYS_OLD,
  };
}
