import pino, { Logger } from 'pino';
import { config } from '../../config';
import { db } from '../db/client';

export const logger = pino({
  level: config.logLevel,
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: 'intake-core',
    env: config.nodeEnv,
  },
  // Pretty print in development
  ...(config.nodeEnv === 'development' && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    },
  }),
});

// ============================================================================
// Execution Logging
// ============================================================================

interface ExecutionLogInput {
  correlationId: string;
  jobId?: string;
  conversationId?: string;
  action: string;
  status: 'started' | 'completed' | 'failed';
  durationMs?: number;
  input?: unknown;
  error?: unknown;
}

export async function saveExecutionLog(log: ExecutionLogInput): Promise<void> {
  try {
    await db.query(
      `INSERT INTO execution_logs
       (id, correlation_id, job_id, conversation_id, action, status, duration_ms, input, error)
       VALUES (gen_random_uuid(), $1, $2, $3, $4, $5, $6, $7, $8)`,
      [
        log.correlationId,
        log.jobId ?? null,
        log.conversationId ?? null,
        log.action,
        log.status,
        log.durationMs ?? null,
        log.input !== undefined ? JSON.stringify(log.input) : null,
        log.error !== undefined ? JSON.stringify(log.error) : null,
      ]
    );
  } catch (error) {
    // Execution logs are best effort
    logger.error({ error, log }, 'Failed to save execution log');
  }
}

export interface ExecutionOptions {
  jobId?: string;
  conversationId?: string;
  logInput?: unknown;
  skipDbLog?: boolean;
}

/**
 * Run a unit of work with start/finish logging, persisted to execution_logs
 * unless skipDbLog is set.
 */
export async function logExecution<T>(
  correlationId: string,
  action: string,
  fn: () => Promise<T>,
  parentLogger?: Logger,
  options: ExecutionOptions = {}
): Promise<T> {
  const log = parentLogger ?? logger;
  const startTime = Date.now();
  const ids = { jobId: options.jobId, conversationId: options.conversationId };

  log.debug({ correlationId, action }, `Starting ${action}`);

  if (!options.skipDbLog) {
    await saveExecutionLog({ correlationId, action, status: 'started', input: options.logInput, ...ids });
  }

  try {
    const result = await fn();
    const durationMs = Date.now() - startTime;

    log.info({ correlationId, action, durationMs }, `Completed ${action}`);

    if (!options.skipDbLog) {
      await saveExecutionLog({ correlationId, action, status: 'completed', durationMs, ...ids });
    }

    return result;
  } catch (error) {
    const durationMs = Date.now() - startTime;
    const err = error instanceof Error ? error : new Error(String(error));

    log.error({
      correlationId,
      action,
      durationMs,
      error: err.message,
      stack: err.stack,
    }, `Failed ${action}`);

    if (!options.skipDbLog) {
      await saveExecutionLog({
        correlationId,
        action,
        status: 'failed',
        durationMs,
        error: { message: err.message, stack: err.stack },
        ...ids,
      });
    }

    throw error;
  }
}

// ============================================================================
// AI Usage Logging
// ============================================================================

interface AIUsageLog {
  conversationId: string | null;
  model: string;
  inputTokens: number;
  outputTokens: number;
  latencyMs: number;
}

// USD per million tokens
const MODEL_PRICING: Record<string, { input: number; output: number }> = {
  'claude-haiku-4-5-20251001': { input: 1.0, output: 5.0 },
  'claude-sonnet-4-5-20250929': { input: 3.0, output: 15.0 },
};

const HAIKU_PRICING = { input: 1.0, output: 5.0 };
const SONNET_PRICING = { input: 3.0, output: 15.0 };

export function estimateCostUsd(model: string, inputTokens: number, outputTokens: number): number {
  const pricing = MODEL_PRICING[model] ?? (model.includes('haiku') ? HAIKU_PRICING : SONNET_PRICING);
  return (inputTokens * pricing.input + outputTokens * pricing.output) / 1_000_000;
}

export async function logAIUsage(usage: AIUsageLog): Promise<void> {
  const costUsd = estimateCostUsd(usage.model, usage.inputTokens, usage.outputTokens);

  try {
    await db.query(
      `INSERT INTO ai_usage
       (id, conversation_id, model, input_tokens, output_tokens, cost_usd, latency_ms)
       VALUES (gen_random_uuid(), $1, $2, $3, $4, $5, $6)`,
      [
        usage.conversationId,
        usage.model,
        usage.inputTokens,
        usage.outputTokens,
        costUsd,
        usage.latencyMs,
      ]
    );
  } catch (error) {
    logger.error({ error, usage }, 'Failed to log AI usage');
  }
}
