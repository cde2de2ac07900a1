import type { FastifyPluginAsync, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { env } from '../../config/env.js';
import { sendApiError } from '../../lib/apiError.js';
import { requireMutationApiKey } from '../../plugins/apiKeyAuth.js';
import { CompletionError } from '../../services/callPersistence.js';

const callParamsSchema = z.object({
  callId: z.string().trim().min(1)
});

const agentSchema = z.object({
  agent: z.string().trim().min(1).optional()
});

function escapeXmlAttribute(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/"/g, '&quot;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

function publicHost(req: FastifyRequest): string {
  const configured = env.PUBLIC_HOST.replace(/^[a-z]+:\/\//i, '').replace(/\/+$/, '');
  return configured || req.headers.host || 'localhost';
}

export function buildStreamTwiml(host: string, callId: string, agent: string | null): string {
  const query = agent ? `?agent=${encodeURIComponent(agent)}` : '';
  const streamUrl = `wss://${host}/ws/${encodeURIComponent(callId)}${query}`;

  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<Response>',
    '  <Connect>',
    `    <Stream url="${escapeXmlAttribute(streamUrl)}"/>`,
    '  </Connect>',
    '</Response>'
  ].join('\n');
}

export const callsRoutes: FastifyPluginAsync = async (app) => {
  // Twilio fetches TwiML with form-encoded POST bodies.
  app.addContentTypeParser(
    'application/x-www-form-urlencoded',
    { parseAs: 'string' },
    (_req, body, done) => {
      done(null, Object.fromEntries(new URLSearchParams(typeof body === 'string' ? body : body.toString('utf8'))));
    }
  );

  app.route({
    method: ['GET', 'POST'],
    url: '/calls/twiml/outbound/:callId',
    handler: async (req, reply) => {
      const { callId } = callParamsSchema.parse(req.params);
      const fromQuery = agentSchema.safeParse(req.query);
      const fromBody = agentSchema.safeParse(req.body ?? {});

      const agent =
        (fromQuery.success ? fromQuery.data.agent : undefined) ??
        (fromBody.success ? fromBody.data.agent : undefined) ??
        null;

      return reply.type('application/xml').send(buildStreamTwiml(publicHost(req), callId, agent));
    }
  });

  app.post('/calls/:callId/complete', { preHandler: requireMutationApiKey }, async (req, reply) => {
    const { callId } = callParamsSchema.parse(req.params);

    try {
      const { jobId, result } = await app.callCompletionQueue.enqueue({ callId, trigger: 'api' });

      if (!result) {
        return reply.code(202).send({ ok: true, data: { callId, status: 'queued', jobId } });
      }
      if (result.outcome === 'not_found') {
        return sendApiError(req, reply, 404, 'CALL_NOT_FOUND', `call not found: ${callId}`);
      }

      return reply.send({
        ok: true,
        data: {
          callId,
          status: result.outcome,
          readingsStored: result.outcome === 'completed' ? result.readingsStored : 0
        }
      });
    } catch (error) {
      if (error instanceof CompletionError) {
        req.log.error({ callId, err: error }, 'calls.completion_failed');
        return sendApiError(req, reply, 500, 'COMPLETION_FAILED', `call completion failed: ${callId}`);
      }
      throw error;
    }
  });

  app.get('/calls/:callId/status', async (req, reply) => {
    const { callId } = callParamsSchema.parse(req.params);

    const call = await app.repositories.calls.getById(callId);
    if (!call) {
      return sendApiError(req, reply, 404, 'CALL_NOT_FOUND', `call not found: ${callId}`);
    }

    const [fragments, readings] = await Promise.all([
      app.repositories.fragments.countByCall(callId),
      app.repositories.readings.listByCall(callId)
    ]);

    return reply.send({
      ok: true,
      data: {
        callId,
        agent: call.agent,
        status: call.status,
        startTime: call.startTime,
        endTime: call.endTime,
        durationSeconds: call.durationSeconds,
        summary: call.summary,
        fragments,
        readings: readings.map((reading) => ({
          readingId: reading.readingId,
          readingType: reading.readingType,
          value: reading.value,
          units: reading.units,
          recordedAt: reading.recordedAt
        }))
      }
    });
  });
};
