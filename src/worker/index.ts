/**
 * Intake lifecycle worker
 *
 * Jobs on the `intake-lifecycle` queue:
 * - intake_completed: archive the snapshot in Postgres, alert the doctor on Telegram
 * - idle_timeout: abandon an intake the patient stopped answering
 */

import { Worker, Job } from 'bullmq';
import { redis, closeRedis, queueCompletionSink, LIFECYCLE_QUEUE_NAME } from '../infra/queue/client';
import { createJobProcessor } from './processor';
import { config } from '../config';
import { logger } from '../infra/logging/logger';
import { db, closeDatabase, idempotencyKeys } from '../infra/db/client';
import { buildIntakeRuntime } from '../bootstrap';
import { IntakeArchiveService } from '../domain/archive/service';
import { DoctorNotificationService } from '../domain/notification/service';
import { TelegramClient } from '../adapters/telegram/client';
import type { JobResult, LifecycleJobData } from '../shared/types';

const { engine } = buildIntakeRuntime(redis, queueCompletionSink);

const notifier = new DoctorNotificationService({
  sender: config.telegramBotToken ? new TelegramClient(config.telegramBotToken) : null,
  chatId: config.doctorChatId ?? null,
  idempotency: idempotencyKeys,
  logger,
});

const processJob = createJobProcessor({
  engine,
  archive: new IntakeArchiveService(db),
  notifier,
});

const worker = new Worker<LifecycleJobData, JobResult>(LIFECYCLE_QUEUE_NAME, processJob, {
  connection: redis,
  concurrency: config.workerConcurrency,
  maxStalledCount: 2,
  stalledInterval: 30000,
  lockDuration: config.jobTimeoutMs,
});

// ============================================================================
// Event Handlers
// ============================================================================

worker.on('ready', () => {
  logger.info({ queue: LIFECYCLE_QUEUE_NAME, concurrency: config.workerConcurrency }, 'Worker ready');
});

worker.on('completed', (job: Job<LifecycleJobData, JobResult>) => {
  logger.info({
    jobId: job.id,
    correlationId: job.data.correlationId,
    type: job.data.type,
    duration: Date.now() - job.timestamp,
  }, 'Job completed');
});

worker.on('failed', (job: Job<LifecycleJobData, JobResult> | undefined, err: Error) => {
  logger.error({
    jobId: job?.id,
    correlationId: job?.data.correlationId,
    error: err.message,
    stack: err.stack,
    attemptsMade: job?.attemptsMade,
  }, 'Job failed');
});

worker.on('error', (err: Error) => {
  logger.error({ error: err.message }, 'Worker error');
});

worker.on('stalled', (jobId: string) => {
  logger.warn({ jobId }, 'Job stalled');
});

// ============================================================================
// Graceful Shutdown
// ============================================================================

let isShuttingDown = false;

const shutdown = async (signal: string) => {
  if (isShuttingDown) return;
  isShuttingDown = true;

  logger.info({ signal }, 'Worker received shutdown signal');

  const timeout = setTimeout(() => {
    logger.warn('Shutdown timeout, forcing close');
    process.exit(1);
  }, 30000);

  try {
    await worker.close();
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

logger.info({ queue: LIFECYCLE_QUEUE_NAME }, 'Worker starting...');
