import type { FastifyInstance } from 'fastify';
import type { Catalog } from '../../catalog.js';
import { registrationView } from '../../api/views.js';
import { parseWith, studentParams, activeOnlyQuery } from '../../api/validation.js';
import { studentTimetable } from './timetable.js';

// Students are identified by id only; an unknown student simply has no registrations.
export async function registerStudentRoutes(app: FastifyInstance, catalog: Catalog): Promise<void> {
  const { registrations } = catalog;

  app.get('/students/:studentId/registrations', async (request, reply) => {
    const { studentId } = parseWith(studentParams, request.params);
    const { active } = parseWith(activeOnlyQuery, request.query);
    const found =
      active === 'true'
        ? registrations.listActiveForStudent(studentId)
        : registrations.listForStudent(studentId);
    return reply.status(200).send(found.map(registrationView));
  });

  app.get('/students/:studentId/history', async (request, reply) => {
    const { studentId } = parseWith(studentParams, request.params);
    return reply.status(200).send(registrations.studentHistory(studentId));
  });

  app.get('/students/:studentId/timetable', async (request, reply) => {
    const { studentId } = parseWith(studentParams, request.params);
    return reply.status(200).send(studentTimetable(catalog, studentId));
  });
}
