import { buildApp } from './app.js';
import { env } from './config/env.js';

const app = buildApp();

async function shutdown(signal: string) {
  app.log.info({ signal }, 'server.shutting_down');
  try {
    await app.close();
  } catch (error) {
    app.log.error({ err: error }, 'server.shutdown_failed');
    process.exitCode = 1;
  }
}

process.once('SIGINT', (signal) => void shutdown(signal));
process.once('SIGTERM', (signal) => void shutdown(signal));

app.listen({ port: env.PORT, host: env.HOST }).catch((error: unknown) => {
  app.log.error({ err: error }, 'server.start_failed');
  process.exit(1);
});
