import { Job } from 'bullmq';
import { Logger } from 'pino';
import { logger } from '../infra/logging/logger';
import { InboundJobData, JobResult, MaintenanceJobName } from '../shared/types';
import { isRetryableError } from '../shared/errors';
import { InboundHandler } from './handlers/inbound';
import { MaintenanceHandler } from './handlers/maintenance';

const MAINTENANCE_JOBS: readonly MaintenanceJobName[] = ['sweep-idle-sessions', 'review-reminders'];

function isMaintenanceJob(name: string): name is MaintenanceJobName {
  return MAINTENANCE_JOBS.some((job) => job === name);
}

/**
 * Wrap a handler with job logging and the retry policy: transient failures
 * are re-thrown so BullMQ retries with backoff, anything else fails the job
 * once.
 */
async function runJob(
  job: Job,
  correlationId: string,
  handler: (jobLogger: Logger) => Promise<JobResult>
): Promise<JobResult> {
  const startTime = Date.now();

  const jobLogger = logger.child({
    jobId: job.id,
    correlationId,
    queue: job.queueName,
    attemptsMade: job.attemptsMade,
  });

  jobLogger.info('Processing job');

  try {
    const result = await handler(jobLogger);
    const duration = Date.now() - startTime;
    jobLogger.info({ duration, result: result.status }, 'Job processed successfully');
    return result;
  } catch (error) {
    const duration = Date.now() - startTime;
    const err = error instanceof Error ? error : new Error(String(error));

    jobLogger.error({
      duration,
      error: err.message,
      stack: err.stack,
    }, 'Job processing failed');

    if (isRetryableError(error)) {
      throw error; // BullMQ will retry based on settings
    }

    return {
      status: 'failed',
      error: err.message,
      correlationId,
    };
  }
}

export function createInboundProcessor(handleInbound: InboundHandler) {
  return async function processInboundJob(job: Job<InboundJobData>): Promise<JobResult> {
    const data = job.data;
    return runJob(job, data.correlationId, async (jobLogger) => {
      switch (data.type) {
        case 'inbound_message':
          return handleInbound(data, jobLogger);
      }
    });
  };
}

export function createMaintenanceProcessor(handleMaintenance: MaintenanceHandler) {
  return async function processMaintenanceJob(job: Job): Promise<JobResult> {
    const name = job.name;
    if (!isMaintenanceJob(name)) {
      logger.warn({ jobId: job.id, name }, 'Unknown maintenance job');
      return { status: 'skipped', correlationId: String(job.id) };
    }
    return runJob(job, name, async (jobLogger) => handleMaintenance(name, jobLogger));
  };
}
