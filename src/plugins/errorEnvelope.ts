import fp from 'fastify-plugin';
import type { FastifyPluginAsync } from 'fastify';
import { ZodError } from 'zod';
import { errorEnvelope, getCorrelationId, type ApiErrorCode } from '../lib/apiError.js';

const INTERNAL_ERROR_MESSAGE = 'An unexpected error occurred';

function readStatusCode(error: unknown): number {
  if (typeof error === 'object' && error !== null && 'statusCode' in error) {
    const { statusCode } = error;
    if (typeof statusCode === 'number' && statusCode >= 400 && statusCode < 600) {
      return statusCode;
    }
  }
  return 500;
}

function describeValidation(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

const errorHandlers: FastifyPluginAsync = async (app) => {
  app.setErrorHandler(async (error: unknown, req, reply) => {
    const correlationId = getCorrelationId(req, reply);

    if (error instanceof ZodError) {
      req.log.warn({ correlationId, issues: error.issues }, 'request.invalid');
      return reply.status(400).send(errorEnvelope(req, reply, 'VALIDATION_ERROR', describeValidation(error)));
    }

    const statusCode = readStatusCode(error);
    const code: ApiErrorCode = statusCode >= 500 ? 'INTERNAL_ERROR' : 'REQUEST_ERROR';
    const message =
      statusCode >= 500 || !(error instanceof Error) ? INTERNAL_ERROR_MESSAGE : error.message;

    req.log.error({ err: error, correlationId }, 'request.failed');
    return reply.status(statusCode).send(errorEnvelope(req, reply, code, message));
  });

  app.setNotFoundHandler(async (req, reply) => {
    return reply.status(404).send(errorEnvelope(req, reply, 'NOT_FOUND', 'Route not found'));
  });
};

export const errorEnvelopePlugin = fp(errorHandlers);
