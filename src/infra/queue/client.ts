import { randomUUID } from 'crypto';
import { Queue, QueueEvents } from 'bullmq';
import Redis from 'ioredis';
import { config } from '../../config';
import { logger } from '../logging/logger';
import type { LifecycleJobData } from '../../shared/types';
import type { IntakeSnapshot } from '../../domain/intake/types';
import type { CompletionSink, IdleTimeoutScheduler } from '../../domain/intake/engine';

// Shared by BullMQ and the Redis session store
export const redis = new Redis(config.redisUrl, {
  maxRetriesPerRequest: null, // Required for BullMQ
  enableReadyCheck: false,
  retryStrategy: (times: number) => {
    if (times > 20) {
      logger.error('Redis connection failed after 20 retries');
      return null;
    }
    return Math.min(times * 100, 3000);
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

export const LIFECYCLE_QUEUE_NAME = 'intake-lifecycle';

export const lifecycleQueue = new Queue<LifecycleJobData>(LIFECYCLE_QUEUE_NAME, {
  connection: redis,
  defaultJobOptions: {
    attempts: 5,
    backoff: {
      type: 'exponential',
      delay: 2000,
    },
    // Completed jobs are kept a day so their ids keep deduplicating
    removeOnComplete: {
      count: 5000,
      age: 86400,
    },
    removeOnFail: {
      count: 5000,
      age: 7 * 86400,
    },
  },
});

export const queueEvents = new QueueEvents(LIFECYCLE_QUEUE_NAME, {
  connection: redis,
});

queueEvents.on('failed', ({ jobId, failedReason }) => {
  logger.warn({ jobId, reason: failedReason }, 'Job failed event');
});

queueEvents.on('stalled', ({ jobId }) => {
  logger.warn({ jobId }, 'Job stalled event');
});

// ============================================================================
// Queue Operations
// ============================================================================

/**
 * Enqueue archive + doctor alert for a completed intake. The job id is
 * derived from the conversation, so repeated handoffs collapse into one job.
 */
export async function enqueueIntakeCompleted(snapshot: IntakeSnapshot): Promise<string> {
  const correlationId = randomUUID();
  const jobId = `complete-${snapshot.conversationId}`;

  await lifecycleQueue.add(
    'intake_completed',
    { type: 'intake_completed', correlationId, snapshot },
    { jobId }
  );

  logger.info({ jobId, correlationId, conversationId: snapshot.conversationId }, 'Completion job queued');
  return jobId;
}

export async function scheduleIdleTimeout(conversationId: string, turn: number, delayMs: number): Promise<string> {
  const jobId = `idle-${conversationId}-${turn}`;

  await lifecycleQueue.add(
    'idle_timeout',
    { type: 'idle_timeout', correlationId: randomUUID(), conversationId, turn },
    { jobId, delay: delayMs, attempts: 3 }
  );

  logger.debug({ jobId, conversationId, turn, delayMs }, 'Idle timeout scheduled');
  return jobId;
}

export const queueCompletionSink: CompletionSink = {
  async handoff(snapshot) {
    await enqueueIntakeCompleted(snapshot);
  },
};

export function createIdleTimeoutScheduler(delayMs: number): IdleTimeoutScheduler {
  return {
    async schedule(conversationId, turn) {
      await scheduleIdleTimeout(conversationId, turn, delayMs);
    },
  };
}

export async function getQueueStats(): Promise<{
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
  paused: boolean;
}> {
  const [waiting, active, completed, failed, delayed, paused] = await Promise.all([
    lifecycleQueue.getWaitingCount(),
    lifecycleQueue.getActiveCount(),
    lifecycleQueue.getCompletedCount(),
    lifecycleQueue.getFailedCount(),
    lifecycleQueue.getDelayedCount(),
    lifecycleQueue.isPaused(),
  ]);

  return { waiting, active, completed, failed, delayed, paused };
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
    return { healthy: true, latencyMs: Date.now() - start };
  } catch (error) {
    logger.warn({ error: error instanceof Error ? error.message : String(error) }, 'Redis health check failed');
    return { healthy: false, latencyMs: Date.now() - start };
  }
}

// ============================================================================
// Cleanup
// ============================================================================

export async function closeRedis(): Promise<void> {
  await lifecycleQueue.close();
  await queueEvents.close();
  await redis.quit();
  logger.info('Redis connections closed');
}
