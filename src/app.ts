import Fastify from 'fastify';
import cors from '@fastify/cors';
import { env } from './config/env.js';
import { callsRoutes } from './modules/calls/index.js';
import { correlationIdPlugin } from './plugins/correlationId.js';
import { dataLayerPlugin, type DataLayerOptions } from './plugins/dataLayer.js';
import { errorEnvelopePlugin } from './plugins/errorEnvelope.js';
import { mediaStreamPlugin, type MediaStreamOptions } from './plugins/mediaStream.js';
import { securityLoggingPlugin } from './plugins/securityLogging.js';

export type BuildAppOptions = DataLayerOptions & MediaStreamOptions;

export function buildApp(options: BuildAppOptions = {}) {
  const app = Fastify({
    logger: {
      level: env.LOG_LEVEL,
      transport:
        env.NODE_ENV === 'development'
          ? {
              target: 'pino-pretty',
              options: { colorize: true }
            }
          : undefined
    }
  });

  app.register(cors);
  app.register(correlationIdPlugin);
  app.register(securityLoggingPlugin);
  app.register(errorEnvelopePlugin);
  app.register(dataLayerPlugin, {
    readingsExtractor: options.readingsExtractor,
    callCompletionQueue: options.callCompletionQueue
  });
  app.register(mediaStreamPlugin, {
    agentConnector: options.agentConnector,
    promptResolver: options.promptResolver
  });

  app.get('/health', async () => ({ ok: true, service: 'vitals-call-bridge' }));

  app.register(callsRoutes, { prefix: '/api/v1' });

  return app;
}
