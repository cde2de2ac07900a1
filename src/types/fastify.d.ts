import 'fastify';
import type { CallCompletionQueue } from '../queue/callCompletionQueue.js';
import type { RepositoryBundle } from '../repositories/contracts.js';
import type { CallPersistence } from '../services/callPersistence.js';

declare module 'fastify' {
  interface FastifyInstance {
    repositories: RepositoryBundle;
    callPersistence: CallPersistence;
    callCompletionQueue: CallCompletionQueue;
  }
}
