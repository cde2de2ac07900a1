import fp from 'fastify-plugin';
import type { FastifyPluginAsync } from 'fastify';
import { redactSensitive } from '../lib/redaction.js';

const QUIET_ROUTES = new Set(['/health']);

const securityLogging: FastifyPluginAsync = async (app) => {
  app.addHook('preHandler', async (req) => {
    if (QUIET_ROUTES.has(req.routeOptions.url ?? '')) {
      return;
    }

    req.log.info(
      {
        request: redactSensitive({
          method: req.method,
          route: req.routeOptions.url,
          headers: req.headers,
          query: req.query,
          params: req.params,
          body: req.body
        })
      },
      'request.received'
    );
  });
};

export const securityLoggingPlugin = fp(securityLogging);
