import { FastifyInstance, FastifyPluginAsync } from 'fastify';
import type { SymptomCatalog } from '../../domain/catalog/service';
import { checkDatabaseHealth } from '../../infra/db/client';
import { checkRedisHealth, getQueueStats } from '../../infra/queue/client';

const VERSION = process.env.npm_package_version || '0.1.0';

export interface HealthRoutesOptions {
  catalog: SymptomCatalog;
  extractor: string;
}

export const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (
  app: FastifyInstance,
  { catalog, extractor }
) => {
  // Liveness: the process is up
  app.get('/live', async () => {
    return { status: 'ok' };
  });

  // Readiness: sessions and jobs depend on Redis, the archive on Postgres
  app.get('/ready', async (_request, reply) => {
    const [dbHealth, redisHealth] = await Promise.all([
      checkDatabaseHealth(),
      checkRedisHealth(),
    ]);

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

  app.get('/health', async (_request, reply) => {
    const [dbHealth, redisHealth, queueStats] = await Promise.all([
      checkDatabaseHealth(),
      checkRedisHealth(),
      getQueueStats(),
    ]);

    const isHealthy = dbHealth.healthy && redisHealth.healthy;
    const queueHealthy = queueStats.failed < 1000 && !queueStats.paused;

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
          connections: dbHealth.connections,
        },
        redis: {
          status: redisHealth.healthy ? 'ok' : 'fail',
          latencyMs: redisHealth.latencyMs,
        },
        queue: {
          status: queueHealthy ? 'ok' : 'degraded',
          ...queueStats,
        },
        catalog: {
          status: 'ok',
          symptoms: catalog.size,
        },
        extractor,
      },
    };
  });
};
