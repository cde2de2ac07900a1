import fp from 'fastify-plugin';
import type { FastifyBaseLogger, FastifyPluginAsync } from 'fastify';
import { Redis } from 'ioredis';
import { env } from '../config/env.js';
import { runMigrations, type MigrationResult } from '../db/migrator.js';
import { closePool, getPool } from '../db/pool.js';
import { createCallCompletionQueue, type CallCompletionQueue } from '../queue/callCompletionQueue.js';
import { createRepositories } from '../repositories/index.js';
import { createCallPersistence } from '../services/callPersistence.js';
import {
  createOpenAiCompletion,
  createReadingsExtractor,
  noopReadingsExtractor,
  type ReadingsExtractor
} from '../services/readingsExtractor.js';
import { createCallCompletionWorker } from '../workers/callCompletionWorker.js';

export type DataLayerOptions = {
  readingsExtractor?: ReadingsExtractor;
  callCompletionQueue?: CallCompletionQueue;
};

async function canReachRedis(redisUrl: string, log: FastifyBaseLogger): Promise<boolean> {
  const client = new Redis(redisUrl, {
    lazyConnect: true,
    enableOfflineQueue: false,
    maxRetriesPerRequest: 0,
    connectTimeout: 500
  });
  client.on('error', (error) => {
    log.debug({ error: error.message }, 'redis.probe_error');
  });

  try {
    await client.connect();
    await client.ping();
    return true;
  } catch {
    return false;
  } finally {
    client.disconnect();
  }
}

function createExtractor(log: FastifyBaseLogger): ReadingsExtractor {
  if (!env.OPENAI_API_KEY) {
    log.warn('OPENAI_API_KEY is not configured; calls complete without readings extraction');
    return noopReadingsExtractor;
  }

  return createReadingsExtractor({
    complete: createOpenAiCompletion({ apiKey: env.OPENAI_API_KEY, model: env.OPENAI_MODEL }),
    log
  });
}

async function createQueue(log: FastifyBaseLogger): Promise<CallCompletionQueue> {
  const redisReachable = env.REDIS_URL ? await canReachRedis(env.REDIS_URL, log) : false;
  return createCallCompletionQueue({
    redisUrl: env.REDIS_URL,
    forceInMemory: Boolean(env.REDIS_URL) && !redisReachable,
    log
  });
}

const dataLayer: FastifyPluginAsync<DataLayerOptions> = async (app, options) => {
  let pool = getPool((error) => app.log.error({ err: error }, 'db.pool_error'));
  let migrationResult: MigrationResult = { applied: [] };

  if (pool) {
    try {
      migrationResult = await runMigrations(pool);
    } catch (error) {
      if (env.NODE_ENV === 'development' || env.NODE_ENV === 'test') {
        app.log.warn(
          {
            error: error instanceof Error ? error.message : String(error)
          },
          'database unavailable; falling back to in-memory repositories for this runtime'
        );
        await closePool();
        pool = null;
      } else {
        throw error;
      }
    }
  }

  const repositories = createRepositories(pool);
  const callPersistence = createCallPersistence({ calls: repositories.calls, log: app.log });
  const callCompletionQueue = options.callCompletionQueue ?? (await createQueue(app.log));
  callCompletionQueue.registerProcessor(
    createCallCompletionWorker({
      calls: repositories.calls,
      persistence: callPersistence,
      extractor: options.readingsExtractor ?? createExtractor(app.log),
      log: app.log
    })
  );

  if (!pool) {
    if (!env.DATABASE_URL) {
      app.log.warn('DATABASE_URL is not configured; running with in-memory repositories (non-persistent)');
    } else {
      app.log.warn('DATABASE_URL is configured but unavailable; running with in-memory repositories');
    }
  } else if (migrationResult.applied.length > 0) {
    app.log.info({ applied: migrationResult.applied }, 'database migrations applied');
  } else {
    app.log.info('database ready; no new migrations');
  }

  if (callCompletionQueue.mode === 'in_memory') {
    if (!env.REDIS_URL) {
      app.log.warn('REDIS_URL is not configured; running call completion in-process');
    } else {
      app.log.warn('REDIS_URL is configured but unavailable; running call completion in-process');
    }
  } else {
    app.log.info('call completion queue initialized with BullMQ');
  }

  app.decorate('repositories', repositories);
  app.decorate('callPersistence', callPersistence);
  app.decorate('callCompletionQueue', callCompletionQueue);

  app.addHook('onClose', async () => {
    await callCompletionQueue.close();
    await closePool();
  });
};

export const dataLayerPlugin = fp(dataLayer);
