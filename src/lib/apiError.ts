import type { FastifyReply, FastifyRequest } from 'fastify';

export type ApiErrorCode =
  | 'CALL_NOT_FOUND'
  | 'COMPLETION_FAILED'
  | 'UNAUTHORIZED'
  | 'AUTH_MISCONFIGURED'
  | 'VALIDATION_ERROR'
  | 'REQUEST_ERROR'
  | 'NOT_FOUND'
  | 'INTERNAL_ERROR';

export type ErrorEnvelope = {
  ok: false;
  error: {
    code: ApiErrorCode;
    message: string;
  };
  correlationId: string;
};

export function getCorrelationId(req: FastifyRequest, reply: FastifyReply): string {
  return String(reply.getHeader('x-correlation-id') ?? req.headers['x-correlation-id'] ?? '');
}

export function errorEnvelope(
  req: FastifyRequest,
  reply: FastifyReply,
  code: ApiErrorCode,
  message: string
): ErrorEnvelope {
  return {
    ok: false,
    error: { code, message },
    correlationId: getCorrelationId(req, reply)
  };
}

export function sendApiError(
  req: FastifyRequest,
  reply: FastifyReply,
  statusCode: number,
  code: ApiErrorCode,
  message: string
) {
  return reply.code(statusCode).send(errorEnvelope(req, reply, code, message));
}
