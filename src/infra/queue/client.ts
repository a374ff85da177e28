import { DefaultJobOptions, Queue, QueueEvents } from 'bullmq';
import Redis from 'ioredis';
import { config } from '../../config';
import { logger } from '../logging/logger';
import { InboundJobData, MaintenanceJobName } from '../../shared/types';
import { MAINTENANCE_QUEUE_NAME, inboundQueueName, shardForPhone } from './sharding';

// Redis connection with production settings
export const redis = new Redis(config.redisUrl, {
  maxRetriesPerRequest: null, // Required for BullMQ
  enableReadyCheck: false,
  retryStrategy: (times: number) => {
    if (times > 20) {
      logger.error('Redis connection failed after 20 retries');
      return null; // Stop retrying
    }
    return Math.min(times * 100, 3000); // Exponential backoff, max 3s
  },
  reconnectOnError: (err) => {
    const targetErrors = ['READONLY', 'ECONNRESET', 'ETIMEDOUT'];
    return targetErrors.some((e) => err.message.includes(e));
  },
});

redis.on('connect', () => {
  logger.info('Redis connected');
});

redis.on('error', (err) => {
  logger.error({ error: err.message }, 'Redis error');
});

redis.on('close', () => {
  logger.warn('Redis connection closed');
});

// ============================================================================
// Queue Definitions
// ============================================================================

const defaultJobOptions: DefaultJobOptions = {
  attempts: 3,
  backoff: {
    type: 'exponential',
    delay: 1000,
  },
  removeOnComplete: {
    count: 1000,  // Keep last 1000 completed jobs
    age: 3600,    // Or 1 hour
  },
  removeOnFail: {
    count: 5000,  // Keep last 5000 failed jobs for debugging
    age: 86400,   // Or 24 hours
  },
};

export const inboundQueues: Queue<InboundJobData>[] = Array.from(
  { length: config.inboundShards },
  (_, shard) => new Queue<InboundJobData>(inboundQueueName(shard), { connection: redis, defaultJobOptions })
);

export const maintenanceQueue = new Queue(MAINTENANCE_QUEUE_NAME, {
  connection: redis,
  defaultJobOptions: { ...defaultJobOptions, attempts: 1 },
});

// Queue events for monitoring
export const queueEvents: QueueEvents[] = inboundQueues.map((queue) => {
  const events = new QueueEvents(queue.name, { connection: redis });

  events.on('failed', ({ jobId, failedReason }) => {
    logger.warn({ queue: queue.name, jobId, reason: failedReason }, 'Job failed event');
  });

  events.on('stalled', ({ jobId }) => {
    logger.warn({ queue: queue.name, jobId }, 'Job stalled event');
  });

  return events;
});

// ============================================================================
// Queue Operations
// ============================================================================

export async function addInboundJob(data: InboundJobData): Promise<string> {
  const shard = shardForPhone(data.phone, inboundQueues.length);
  const queue = inboundQueues[shard];
  if (!queue) {
    throw new Error(`No inbound queue for shard ${shard}`);
  }

  const job = await queue.add(data.type, data, {
    jobId: data.messageId, // WhatsApp message id: redeliveries collapse into one job
  });

  logger.info({
    jobId: job.id,
    correlationId: data.correlationId,
    shard,
  }, 'Job added to queue');

  return job.id ?? data.messageId;
}

/**
 * Register the repeatable maintenance jobs. Safe to call on every start:
 * BullMQ de-duplicates repeatable jobs by name and pattern.
 */
export async function scheduleMaintenanceJobs(): Promise<void> {
  const jobs: Array<{ name: MaintenanceJobName; repeat: { every: number } | { pattern: string } }> = [
    { name: 'sweep-idle-sessions', repeat: { every: 5 * 60 * 1000 } },
    { name: 'review-reminders', repeat: { pattern: config.reminderCron } },
  ];

  for (const job of jobs) {
    await maintenanceQueue.add(job.name, {}, { repeat: job.repeat });
  }

  logger.info({ jobs: jobs.map((j) => j.name) }, 'Maintenance jobs scheduled');
}

export async function getQueueStats(): Promise<{
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
  shards: number;
}> {
  const perShard = await Promise.all(
    inboundQueues.map((queue) =>
      Promise.all([
        queue.getWaitingCount(),
        queue.getActiveCount(),
        queue.getCompletedCount(),
        queue.getFailedCount(),
        queue.getDelayedCount(),
      ])
    )
  );

  const totals = { waiting: 0, active: 0, completed: 0, failed: 0, delayed: 0, shards: inboundQueues.length };
  for (const [waiting, active, completed, failed, delayed] of perShard) {
    totals.waiting += waiting;
    totals.active += active;
    totals.completed += completed;
    totals.failed += failed;
    totals.delayed += delayed;
  }
  return totals;
}

// ============================================================================
// Health Check
// ============================================================================

export async function checkRedisHealth(): Promise<{
  healthy: boolean;
  latencyMs: number;
}> {
  const start = Date.now();

  try {
    await redis.ping();
    return {
      healthy: true,
      latencyMs: Date.now() - start,
    };
  } catch (error) {
    logger.warn({ error: error instanceof Error ? error.message : String(error) }, 'Redis health check failed');
    return {
      healthy: false,
      latencyMs: Date.now() - start,
    };
  }
}

// ============================================================================
// Cleanup
// ============================================================================

export async function closeRedis(): Promise<void> {
  await Promise.all(inboundQueues.map((queue) => queue.close()));
  await maintenanceQueue.close();
  await Promise.all(queueEvents.map((events) => events.close()));
  await redis.quit();
  logger.info('Redis connections closed');
}
