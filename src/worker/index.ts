/**
 * Worker Entry Point
 *
 * Workers:
 * 1. Inbound message workers, one per shard (concurrency 1 each, so a phone's
 *    messages are handled in order and never concurrently)
 * 2. Maintenance worker (idle-session sweep, review reminders)
 */

import { Worker, Job } from 'bullmq';
import { redis, closeRedis, scheduleMaintenanceJobs } from '../infra/queue/client';
import { MAINTENANCE_QUEUE_NAME, inboundQueueName } from '../infra/queue/sharding';
import { createInboundProcessor, createMaintenanceProcessor } from './processor';
import { createInboundHandler } from './handlers/inbound';
import { createMaintenanceHandler } from './handlers/maintenance';
import { config } from '../config';
import { logger } from '../infra/logging/logger';
import { db, closeDatabase, purgeExpiredIdempotencyKeys } from '../infra/db/client';
import { createServices } from '../services';
import { InboundJobData, JobResult } from '../shared/types';

const services = createServices(db, config);

const processInbound = createInboundProcessor(
  createInboundHandler({
    conversations: services.conversations,
    markAsRead: (messageId) => services.whatsapp.markAsRead(messageId),
  })
);

const processMaintenance = createMaintenanceProcessor(
  createMaintenanceHandler({
    sessions: services.sessions,
    reviews: services.reviews,
    idleTimeoutMs: config.sessionIdleTimeoutMinutes * 60 * 1000,
    reviewSlaHours: config.reviewSlaHours,
    purgeIdempotencyKeys: purgeExpiredIdempotencyKeys,
  })
);

// ============================================================================
// Worker 1: Inbound Messages (sharded by phone)
// ============================================================================

const inboundWorkers = Array.from({ length: config.inboundShards }, (_, shard) => {
  const worker = new Worker<InboundJobData, JobResult>(inboundQueueName(shard), processInbound, {
    connection: redis,
    concurrency: 1,
    maxStalledCount: 2,
    stalledInterval: 30000,
    lockDuration: config.jobTimeoutMs,
    settings: {
      backoffStrategy: (attemptsMade: number) => {
        return Math.min(Math.pow(2, attemptsMade) * 1000, 16000);
      },
    },
  });

  worker.on('ready', () => {
    logger.info({ queue: worker.name }, 'Inbound worker ready');
  });

  worker.on('failed', (job: Job<InboundJobData> | undefined, err: Error) => {
    logger.error({ jobId: job?.id, correlationId: job?.data.correlationId, error: err.message }, 'Job failed');
  });

  worker.on('error', (err: Error) => {
    logger.error({ queue: worker.name, error: err.message }, 'Worker error');
  });

  return worker;
});

// ============================================================================
// Worker 2: Maintenance
// ============================================================================

const maintenanceWorker = new Worker(MAINTENANCE_QUEUE_NAME, processMaintenance, {
  connection: redis,
  concurrency: 1,
  lockDuration: 300000,
});

maintenanceWorker.on('completed', (job: Job) => {
  logger.info({ jobId: job.id, name: job.name }, 'Maintenance job completed');
});

maintenanceWorker.on('failed', (job: Job | undefined, err: Error) => {
  logger.error({ jobId: job?.id, name: job?.name, error: err.message }, 'Maintenance job failed');
});

scheduleMaintenanceJobs().catch((err: unknown) => {
  logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Failed to schedule maintenance jobs');
});

// ============================================================================
// Graceful Shutdown
// ============================================================================

let isShuttingDown = false;

const shutdown = async (signal: string) => {
  if (isShuttingDown) return;
  isShuttingDown = true;

  logger.info({ signal }, 'Worker received shutdown signal');

  try {
    await Promise.all(inboundWorkers.map((worker) => worker.pause()));
    logger.info('Workers paused, waiting for active jobs...');

    const timeout = setTimeout(() => {
      logger.warn('Shutdown timeout, forcing close');
      process.exit(1);
    }, 30000);

    await Promise.all(inboundWorkers.map((worker) => worker.close()));
    await maintenanceWorker.close();
    clearTimeout(timeout);

    await closeDatabase();
    await closeRedis();

    logger.info('Worker shut down gracefully');
    process.exit(0);
  } catch (err) {
    logger.error({ err }, 'Error during worker shutdown');
    process.exit(1);
  }
};

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

logger.info({ shards: config.inboundShards }, 'Worker starting...');
