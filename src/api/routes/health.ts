import { FastifyInstance, FastifyPluginAsync } from 'fastify';

const VERSION = process.env.npm_package_version || '0.1.0';

export interface DependencyHealth {
  healthy: boolean;
  latencyMs: number;
}

export interface QueueStats {
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
  shards: number;
}

export interface HealthChecks {
  database: () => Promise<DependencyHealth>;
  redis: () => Promise<DependencyHealth>;
  queue: () => Promise<QueueStats>;
}

export const healthRoutes: FastifyPluginAsync<{ checks: HealthChecks }> = async (
  app: FastifyInstance,
  { checks }
) => {
  // Basic liveness check - always returns 200 if server is running
  app.get('/live', async () => {
    return { status: 'ok' };
  });

  // Readiness check - returns 200 only if all dependencies are healthy
  app.get('/ready', async (request, reply) => {
    const [dbHealth, redisHealth] = await Promise.all([checks.database(), checks.redis()]);

    const isReady = dbHealth.healthy && redisHealth.healthy;

    if (!isReady) {
      reply.status(503);
    }

    return {
      status: isReady ? 'ready' : 'not_ready',
      checks: {
        database: dbHealth.healthy ? 'ok' : 'fail',
        redis: redisHealth.healthy ? 'ok' : 'fail',
      },
    };
  });

  // Full health check with detailed metrics
  app.get('/health', async (request, reply) => {
    const [dbHealth, redisHealth] = await Promise.all([checks.database(), checks.redis()]);
    const isHealthy = dbHealth.healthy && redisHealth.healthy;

    // Queue stats need Redis; skip them when it is down
    const queueStats = redisHealth.healthy ? await checks.queue() : null;
    const queueHealthy = queueStats !== null && queueStats.waiting < 10000;

    if (!isHealthy) {
      reply.status(503);
    }

    return {
      status: isHealthy ? 'healthy' : 'degraded',
      version: VERSION,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      checks: {
        database: {
          status: dbHealth.healthy ? 'ok' : 'fail',
          latencyMs: dbHealth.latencyMs,
        },
        redis: {
          status: redisHealth.healthy ? 'ok' : 'fail',
          latencyMs: redisHealth.latencyMs,
        },
        queue: {
          status: queueHealthy ? 'ok' : 'degraded',
          ...(queueStats ?? {}),
        },
      },
      memory: {
        heapUsed: Math.round(process.memoryUsage().heapUsed / 1024 / 1024),
        heapTotal: Math.round(process.memoryUsage().heapTotal / 1024 / 1024),
        rss: Math.round(process.memoryUsage().rss / 1024 / 1024),
      },
    };
  });
};
