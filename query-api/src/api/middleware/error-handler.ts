import type { FastifyInstance } from 'fastify';
import { QuerySyntaxError } from '../../../../src/index.js';

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((unknownError, request, reply) => {
    // Ensure we always deal with an Error object
    const error = unknownError instanceof Error ? unknownError : new Error(String(unknownError));

    // Rejected query → 400, the caller can fix the input
    if (error instanceof QuerySyntaxError) {
      return reply.status(400).send({ error: error.name, message: error.message });
    }

    // Fastify built-in errors (schema validation, unsupported media type) carry their own status
    if ('statusCode' in error && typeof error.statusCode === 'number') {
      return reply.status(error.statusCode).send({ error: error.name, message: error.message });
    }

    request.log.error(error);
    return reply.status(500).send({ error: 'InternalError', message: 'Internal server error' });
  });
}
