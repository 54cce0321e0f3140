import type { FastifyInstance } from 'fastify';
import type { Catalog } from '../../catalog.js';
import { parseWith, cleanupBody } from '../../api/validation.js';
import { cleanupRegistrations } from './cleanup.js';

export async function registerReportRoutes(
  app: FastifyInstance,
  catalog: Catalog,
  cleanupDaysOld: number,
): Promise<void> {
  app.get('/reports/statistics', async (_request, reply) => {
    return reply.status(200).send({
      registrations: catalog.registrations.statistics(),
      catalog: catalog.courses.catalogStatistics(),
    });
  });

  app.post('/maintenance/cleanup', async (request, reply) => {
    const { daysOld = cleanupDaysOld } = parseWith(cleanupBody, request.body);
    const removed = await cleanupRegistrations(catalog, daysOld);
    request.log.info({ daysOld, removed }, 'dropped registrations cleaned up');
    return reply.status(200).send({ removed });
  });
}
