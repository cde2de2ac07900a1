import { randomUUID } from 'node:crypto';
import fp from 'fastify-plugin';
import type { FastifyPluginAsync } from 'fastify';

const HEADER = 'x-correlation-id';

function readIncoming(value: string | string[] | undefined): string | null {
  const first = Array.isArray(value) ? value[0] : value;
  const trimmed = first?.trim();
  return trimmed ? trimmed : null;
}

const correlationId: FastifyPluginAsync = async (app) => {
  app.addHook('onRequest', async (req, reply) => {
    const id = readIncoming(req.headers[HEADER]) ?? randomUUID();

    req.headers[HEADER] = id;
    req.log = req.log.child({ correlationId: id });
    reply.header(HEADER, id);
  });
};

export const correlationIdPlugin = fp(correlationId);
