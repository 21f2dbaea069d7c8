import { buildServer } from './server';
import { createServices } from './services';
import { loadConfig, ApiConfigSchema, createLogger } from '@inkwell/shared';
import { initPool, closePool } from '@inkwell/db';

const logger = createLogger({ name: 'api' });

const SESSION_PRUNE_INTERVAL_MS = 60 * 60 * 1000;

async function main() {
  const config = loadConfig(ApiConfigSchema);

  initPool({ connectionString: config.DATABASE_URL });

  const services = createServices(config);
  const app = await buildServer(
    {
      cookie: { secure: config.COOKIE_SECURE, domain: config.COOKIE_DOMAIN },
      authRateLimit: { windowMs: 60_000, maxRequests: 20 },
      trustProxy: config.TRUST_PROXY,
    },
    services,
  );

  const pruneTimer = setInterval(() => {
    services.authService
      .pruneExpiredSessions()
      .then((removed) => {
        if (removed > 0) logger.info({ removed }, 'Pruned expired sessions');
      })
      .catch((err: unknown) => {
        logger.error({ err: err instanceof Error ? err.message : String(err) }, 'Session pruning failed');
      });
  }, SESSION_PRUNE_INTERVAL_MS);
  pruneTimer.unref();

  await app.listen({ host: config.API_HOST, port: config.API_PORT });
  logger.info({ port: config.API_PORT }, 'API server started');

  const shutdown = async () => {
    logger.info({}, 'Shutting down API server');
    clearInterval(pruneTimer);
    try {
      await app.close();
      await closePool();
      process.exit(0);
    } catch (err) {
      logger.error({ err: err instanceof Error ? err.message : String(err) }, 'Shutdown failed');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());
}

main().catch((err) => {
  logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Failed to start API');
  process.exit(1);
});
