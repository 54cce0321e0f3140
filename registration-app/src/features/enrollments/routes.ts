import type { FastifyInstance } from 'fastify';
import type { Catalog } from '../../catalog.js';
import type { EnrollmentPolicy } from '../../config.js';
import { registrationView } from '../../api/views.js';
import {
  parseWith,
  courseParams,
  enrollmentParams,
  registrationParams,
  enrollBody,
  gradeBody,
  noteBody,
} from '../../api/validation.js';
import { enrollStudent } from './enroll-student.js';
import { dropStudent } from './drop-student.js';
import { reEnrollStudent } from './re-enroll-student.js';
import { gradeStudent, addRegistrationNote } from './grade-student.js';

export async function registerEnrollmentRoutes(
  app: FastifyInstance,
  catalog: Catalog,
  policy: EnrollmentPolicy,
): Promise<void> {
  // POST /courses/:courseId/enrollments: enroll a student
  app.post('/courses/:courseId/enrollments', async (request, reply) => {
    const { courseId } = parseWith(courseParams, request.params);
    const body = parseWith(enrollBody, request.body);
    const registration = await enrollStudent(catalog, policy, { ...body, courseId });
    request.log.info(
      { studentId: body.studentId, courseId, registrationId: registration.id },
      'student enrolled',
    );
    return reply.status(201).send(registrationView(registration));
  });

  // POST /courses/:courseId/enrollments/:studentId/drop: drop the active registration
  app.post('/courses/:courseId/enrollments/:studentId/drop', async (request, reply) => {
    const { courseId, studentId } = parseWith(enrollmentParams, request.params);
    const registration = await dropStudent(catalog, { studentId, courseId });
    request.log.info({ studentId, courseId, registrationId: registration.id }, 'student dropped');
    return reply.status(200).send(registrationView(registration));
  });

  app.post('/registrations/:registrationId/re-enroll', async (request, reply) => {
    const { registrationId } = parseWith(registrationParams, request.params);
    const registration = await reEnrollStudent(catalog, registrationId);
    request.log.info(
      { studentId: registration.studentId, courseId: registration.courseId, registrationId },
      'student re-enrolled',
    );
    return reply.status(200).send(registrationView(registration));
  });

  app.put('/registrations/:registrationId/grade', async (request, reply) => {
    const { registrationId } = parseWith(registrationParams, request.params);
    const { grade } = parseWith(gradeBody, request.body);
    const registration = await gradeStudent(catalog, registrationId, grade);
    request.log.info({ registrationId }, 'grade recorded');
    return reply.status(200).send(registrationView(registration));
  });

  app.post('/registrations/:registrationId/notes', async (request, reply) => {
    const { registrationId } = parseWith(registrationParams, request.params);
    const { note } = parseWith(noteBody, request.body);
    const registration = await addRegistrationNote(catalog, registrationId, note);
    return reply.status(200).send(registrationView(registration));
  });
}
