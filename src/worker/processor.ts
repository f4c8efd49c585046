import type { Job } from 'bullmq';
import { logger, logExecution } from '../infra/logging/logger';
import { handleIntakeCompleted, IntakeCompletedDeps } from './handlers/intake-completed';
import { handleIdleTimeout, IdleTimeoutDeps } from './handlers/idle-timeout';
import type { JobResult, LifecycleJobData } from '../shared/types';
import { isRetryableError } from '../shared/errors';

export type ProcessorDeps = IntakeCompletedDeps & IdleTimeoutDeps;

export function createJobProcessor(deps: ProcessorDeps) {
  return async function processJob(job: Job<LifecycleJobData>): Promise<JobResult> {
    const startTime = Date.now();
    const data = job.data;
    const { correlationId, type } = data;

    const jobLogger = logger.child({
      jobId: job.id,
      correlationId,
      type,
      attemptsMade: job.attemptsMade,
    });

    jobLogger.info('Processing job');

    try {
      let result: JobResult;

      switch (data.type) {
        case 'intake_completed':
          result = await logExecution(
            correlationId,
            'intake_completed',
            () => handleIntakeCompleted(data, jobLogger, deps),
            jobLogger,
            { jobId: job.id, conversationId: data.snapshot.conversationId }
          );
          break;

        case 'idle_timeout':
          result = await logExecution(
            correlationId,
            'idle_timeout',
            () => handleIdleTimeout(data, jobLogger, deps),
            jobLogger,
            { jobId: job.id, conversationId: data.conversationId, skipDbLog: true }
          );
          break;

        default: {
          const unknownJob: never = data;
          throw new Error(`Unknown job type: ${JSON.stringify(unknownJob)}`);
        }
      }

      jobLogger.info({ duration: Date.now() - startTime, result: result.status }, 'Job processed successfully');
      return result;
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));

      jobLogger.error({
        duration: Date.now() - startTime,
        error: err.message,
        stack: err.stack,
      }, 'Job processing failed');

      if (isRetryableError(error)) {
        throw error; // BullMQ retries with backoff
      }

      return {
        status: 'failed',
        error: err.message,
        correlationId,
      };
    }
  };
}
