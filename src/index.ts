import { randomUUID } from 'crypto';
import Fastify from 'fastify';
import cors from '@fastify/cors';
import { config } from './config';
import { buildIntakeRuntime } from './bootstrap';
import { healthRoutes } from './api/routes/health';
import { intakeRoutes } from './api/routes/intake';
import { symptomRoutes } from './api/routes/symptoms';
import { correlationMiddleware } from './api/middleware/correlation';
import { errorHandler } from './api/error-handler';
import { logger } from './infra/logging/logger';
import { closeDatabase } from './infra/db/client';
import { redis, closeRedis, queueCompletionSink, createIdleTimeoutScheduler } from './infra/queue/client';

const app = Fastify({
  logger: logger,
  requestIdHeader: 'x-correlation-id',
  genReqId: () => randomUUID(),
});

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

async function bootstrap() {
  logger.info('Starting intake API bootstrap...');

  const { engine, catalog, extractor } = buildIntakeRuntime(redis, queueCompletionSink);

  await app.register(cors, {
    origin: config.corsOrigins,
    credentials: true,
  });

  await app.register(correlationMiddleware);

  app.setErrorHandler(errorHandler);

  await app.register(healthRoutes, { catalog, extractor: extractor.name });
  await app.register(symptomRoutes, { prefix: '/api/symptoms', catalog });
  await app.register(intakeRoutes, {
    prefix: '/api/intake',
    engine,
    scheduler: createIdleTimeoutScheduler(config.idleTimeoutMs),
    apiSecretKey: config.apiSecretKey,
  });

  await app.listen({ port: config.port, host: '0.0.0.0' });
  logger.info({ port: config.port, env: config.nodeEnv }, 'Server started');
}

bootstrap().catch((err) => {
  logger.error({ err }, 'Failed to start server');
  process.exit(1);
});
