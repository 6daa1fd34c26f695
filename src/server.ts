import os from 'os';
import type { FastifyInstance } from 'fastify';
import { buildApp } from './app';
import { config } from './config/env';
import { initSentry } from './config/sentry';
import { createServices } from './container';
import { initCronJobs } from './jobs/cron';
import { checkRedisReachable, closeRedisClient, getRedisClient, isRedisConfigured } from './infrastructure/redis';

const SHUTDOWN_TIMEOUT_MS = 10_000;

initSentry();

function needsRedisAtStartup(): boolean {
  // A Redis stock lock that cannot be reached would fail every confirmation
  return config.STOCK_LOCK_BACKEND === 'redis' || (config.NODE_ENV === 'production' && isRedisConfigured());
}

function installShutdownHandlers(app: FastifyInstance, stopJobs: () => void): void {
  let closing = false;

  const shutdown = async (signal: NodeJS.Signals) => {
    if (closing) return;
    closing = true;
    app.log.info({ event: 'server.shutdown', signal }, 'Shutting down');

    const forceExit = setTimeout(() => {
      app.log.error({ event: 'server.shutdown_timeout' }, 'Shutdown timed out, exiting');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);

    try {
      // No sweep or catalog refresh may start once requests are draining
      stopJobs();
      await app.close();
      await closeRedisClient();
      clearTimeout(forceExit);
      process.exit(0);
    } catch (err) {
      app.log.error({ err }, 'Shutdown failed');
      process.exit(1);
    }
  };

  process.on('SIGINT', (signal) => void shutdown(signal));
  process.on('SIGTERM', (signal) => void shutdown(signal));
}

const start = async () => {
  const services = createServices();
  const app = buildApp({ services });
  const instanceId = process.env.INSTANCE_ID || os.hostname();
  let stopJobs = () => {};

  installShutdownHandlers(app, () => stopJobs());

  try {
    if (needsRedisAtStartup()) {
      const redis = await checkRedisReachable(getRedisClient(), { timeoutMs: 1000, attempts: 2 });
      if (!redis.ok) throw new Error(`Redis connectivity check failed: ${redis.error}`);
    }

    // onReady builds the first catalog snapshot; an inconsistent catalog stops startup here
    await app.ready();
    app.log.info(
      {
        event: 'catalog_index.ready',
        entries: services.catalog.current().size,
        units: services.catalog.current().unitVocabulary().size,
        lockBackend: config.STOCK_LOCK_BACKEND,
        instanceId,
      },
      'Catalog index loaded'
    );

    if (config.CRON_ENABLED === 'true') {
      stopJobs = initCronJobs(services).stop;
    }
    app.log.info({ event: 'cron.status', enabled: config.CRON_ENABLED === 'true', instanceId }, 'Cron configured');

    await app.listen({ port: config.PORT, host: '0.0.0.0' });
  } catch (err) {
    app.log.error({ err }, 'Startup failed');
    process.exit(1);
  }
};

void start();
