import { config } from './config';
import { buildApp } from './app';
import { createServices } from './services';
import { logger } from './infra/logging/logger';
import { checkDatabaseHealth, checkIdempotencyKey, claimIdempotencyKey, closeDatabase, db } from './infra/db/client';
import { addInboundJob, checkRedisHealth, closeRedis, getQueueStats } from './infra/queue/client';

async function bootstrap() {
  logger.info('Starting complaint desk API bootstrap...');

  const services = createServices(db, config);

  const app = await buildApp({
    logger,
    corsOrigins: config.corsOrigins,
    health: {
      database: checkDatabaseHealth,
      redis: checkRedisHealth,
      queue: getQueueStats,
    },
    webhook: {
      verifyToken: config.whatsappVerifyToken,
      enqueue: addInboundJob,
      isDuplicate: checkIdempotencyKey,
      rememberMessage: async (key) => {
        await claimIdempotencyKey(key);
      },
    },
    conversations: services.conversations,
    reviews: services.reviews,
    tickets: services.tickets,
    messages: services.messages,
    customers: services.customers,
    reviewSlaHours: config.reviewSlaHours,
  });

  // Graceful shutdown handler
  let isShuttingDown = false;

  const shutdown = async (signal: string) => {
    if (isShuttingDown) return;
    isShuttingDown = true;

    logger.info({ signal }, 'Received shutdown signal, closing server...');

    try {
      await app.close();
      await closeDatabase();
      await closeRedis();
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (err) {
      logger.error({ err }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  // Start server
  try {
    await app.listen({ port: config.port, host: '0.0.0.0' });
    logger.info({ port: config.port, env: config.nodeEnv }, 'Server started');
  } catch (err) {
    logger.error({ err }, 'Failed to start server');
    process.exit(1);
  }
}

bootstrap().catch((err: unknown) => {
  logger.error({ err }, 'Bootstrap failed');
  process.exit(1);
});
