import type { FastifyInstance } from 'fastify';
import type { Catalog } from '../../catalog.js';
import { CourseNotFoundError } from '../../domain/errors.js';
import { courseView, registrationView } from '../../api/views.js';
import {
  parseWith,
  courseParams,
  createCourseBody,
  updateCourseBody,
  listCoursesQuery,
} from '../../api/validation.js';
import { createCourse } from './create-course.js';
import { updateCourse } from './update-course.js';
import { removeCourse } from './remove-course.js';

export async function registerCourseRoutes(app: FastifyInstance, catalog: Catalog): Promise<void> {
  const { courses, registrations } = catalog;

  function requireCourse(courseId: string) {
    const course = courses.get(courseId);
    if (course === null) {
      throw new CourseNotFoundError(`Course '${courseId}' not found`);
    }
    return course;
  }

  // GET /courses: active courses by default, filtered by instructor and credit range
  app.get('/courses', async (request, reply) => {
    const query = parseWith(listCoursesQuery, request.query);
    let found = query.instructor !== undefined ? courses.findByInstructor(query.instructor) : courses.list();
    if (query.minCredits !== undefined || query.maxCredits !== undefined) {
      const inRange = new Set(courses.findByCreditRange(query.minCredits ?? 0, query.maxCredits));
      found = found.filter((course) => inRange.has(course));
    }
    if (query.includeInactive !== 'true') {
      found = found.filter((course) => course.active);
    }
    return reply.status(200).send(found.map(courseView));
  });

  app.get('/courses/:courseId', async (request, reply) => {
    const { courseId } = parseWith(courseParams, request.params);
    return reply.status(200).send(courseView(requireCourse(courseId)));
  });

  app.post('/courses', async (request, reply) => {
    const body = parseWith(createCourseBody, request.body);
    const course = await createCourse(catalog, body);
    request.log.info({ courseId: course.id }, 'course created');
    return reply.status(201).send(courseView(course));
  });

  app.put('/courses/:courseId', async (request, reply) => {
    const { courseId } = parseWith(courseParams, request.params);
    const body = parseWith(updateCourseBody, request.body);
    const course = await updateCourse(catalog, courseId, body);
    request.log.info({ courseId }, 'course updated');
    return reply.status(200).send(courseView(course));
  });

  app.delete('/courses/:courseId', async (request, reply) => {
    const { courseId } = parseWith(courseParams, request.params);
    const course = await removeCourse(catalog, courseId);
    request.log.info({ courseId }, 'course removed');
    return reply.status(200).send(courseView(course));
  });

  // GET /courses/:courseId/enrollments: every registration, dropped ones included
  app.get('/courses/:courseId/enrollments', async (request, reply) => {
    const { courseId } = parseWith(courseParams, request.params);
    requireCourse(courseId);
    return reply.status(200).send(registrations.listForCourse(courseId).map(registrationView));
  });

  app.get('/courses/:courseId/summary', async (request, reply) => {
    const { courseId } = parseWith(courseParams, request.params);
    requireCourse(courseId);
    return reply.status(200).send(registrations.courseEnrollmentSummary(courseId));
  });
}
