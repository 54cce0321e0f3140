import type { FastifyInstance } from 'fastify';
import { RecordStoreError } from 'enrollment-engine';
import {
  CourseNotFoundError,
  RegistrationNotFoundError,
  CourseAlreadyExistsError,
  InvalidRequestError,
} from '../../domain/errors.js';

function hasStatusCode(error: Error): error is Error & { statusCode: number } {
  return 'statusCode' in error && typeof error.statusCode === 'number';
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((unknownError, request, reply) => {
    const error = unknownError instanceof Error ? unknownError : new Error(String(unknownError));

    if (error instanceof CourseNotFoundError || error instanceof RegistrationNotFoundError) {
      return reply.status(404).send({ error: error.name, message: error.message });
    }

    if (error instanceof CourseAlreadyExistsError) {
      return reply.status(409).send({ error: error.name, message: error.message });
    }

    if (error instanceof InvalidRequestError) {
      return reply.status(400).send({ error: error.name, message: error.message });
    }

    // Storage failures are infrastructure, not rule violations
    if (error instanceof RecordStoreError) {
      request.log.error(error);
      return reply.status(500).send({ error: 'InternalError', message: 'Internal server error' });
    }

    // Fastify's own errors (bad JSON, unsupported media type) carry a status
    if (hasStatusCode(error)) {
      return reply.status(error.statusCode).send({ error: error.name, message: error.message });
    }

    // Rule violations: any named Error subclass
    if (error.constructor !== Error) {
      return reply.status(422).send({ error: error.name, message: error.message });
    }

    request.log.error(error);
    return reply.status(500).send({ error: 'InternalError', message: 'Internal server error' });
  });
}
