import Fastify from 'fastify';
import type { Catalog } from '../catalog.js';
import type { EnrollmentPolicy } from '../config.js';
import { registerErrorHandler } from './middleware/error-handler.js';
import { registerCourseRoutes } from '../features/courses/routes.js';
import { registerEnrollmentRoutes } from '../features/enrollments/routes.js';
import { registerStudentRoutes } from '../features/students/routes.js';
import { registerReportRoutes } from '../features/reports/routes.js';

export interface ServerOptions {
  policy: EnrollmentPolicy;
  cleanupDaysOld: number;
  logger?: boolean | { level: string };
}

export function buildServer(catalog: Catalog, options: ServerOptions) {
  const app = Fastify({ logger: options.logger ?? true });

  registerErrorHandler(app);

  const prefix = '/api/v1';

  app.register(async (instance) => {
    await registerCourseRoutes(instance, catalog);
    await registerEnrollmentRoutes(instance, catalog, options.policy);
    await registerStudentRoutes(instance, catalog);
    await registerReportRoutes(instance, catalog, options.cleanupDaysOld);
    instance.get('/health', async () => ({ status: 'ok' }));
  }, { prefix });

  return app;
}
