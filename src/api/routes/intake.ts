import { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { IdleTimeoutScheduler, IntakeEngine } from '../../domain/intake/engine';
import type { EngineAction, IntakeRecord } from '../../domain/intake/types';
import { renderReply } from '../../domain/intake/messages';
import { createAuthMiddleware } from '../middleware/auth';
import { BadRequestError } from '../../shared/errors';
import type { ApiResponse } from '../../shared/types';

export interface IntakeRoutesOptions {
  engine: IntakeEngine;
  scheduler: IdleTimeoutScheduler | null;
  apiSecretKey: string;
}

const paramsSchema = z.object({
  conversationId: z.string(),
});

const messageBodySchema = z.object({
  message: z.string().trim().min(1, 'message is required').max(10000),
  messageId: z.string().min(1).max(128).optional(),
});

interface ActionResponse {
  action: EngineAction;
  reply: string;
}

function parseParams(params: unknown): string {
  const result = paramsSchema.safeParse(params);
  if (!result.success) {
    throw new BadRequestError('conversationId is required');
  }
  return result.data.conversationId;
}

function toRecordView(record: IntakeRecord) {
  return {
    conversationId: record.conversationId,
    status: record.status,
    demographics: record.demographics,
    symptom: record.symptom,
    answers: record.answers,
    askedQuestionIds: record.askedQuestionIds,
    turns: record.turns,
    createdAt: record.createdAt,
    updatedAt: record.updatedAt,
    completedAt: record.completedAt,
    abandonReason: record.abandonReason,
    handedOff: record.handedOff,
  };
}

export const intakeRoutes: FastifyPluginAsync<IntakeRoutesOptions> = async (
  app: FastifyInstance,
  { engine, scheduler, apiSecretKey }
) => {
  app.addHook('preHandler', createAuthMiddleware(apiSecretKey));

  // One patient turn
  app.post('/:conversationId/messages', async (request): Promise<ApiResponse<ActionResponse>> => {
    const conversationId = parseParams(request.params);

    const parseResult = messageBodySchema.safeParse(request.body);
    if (!parseResult.success) {
      throw new BadRequestError(`Invalid message body: ${parseResult.error.issues[0]?.message ?? 'unknown'}`);
    }
    const { message, messageId } = parseResult.data;

    const action = await engine.processMessage(conversationId, message, { messageId });
    request.log.info({ conversationId, action: action.type }, 'Intake turn processed');

    if (action.type === 'ask' && scheduler) {
      const record = await engine.getRecord(conversationId);
      try {
        await scheduler.schedule(conversationId, record.turns);
      } catch (error) {
        // The turn is saved; a missed timeout leaves the session to expire by TTL
        request.log.error({ conversationId, err: error }, 'Failed to schedule idle timeout');
      }
    }

    return {
      success: true,
      data: { action, reply: renderReply(action) },
      correlationId: request.correlationId,
    };
  });

  app.post('/:conversationId/cancel', async (request): Promise<ApiResponse<ActionResponse>> => {
    const conversationId = parseParams(request.params);
    const action = await engine.cancel(conversationId);

    return {
      success: true,
      data: { action, reply: renderReply(action) },
      correlationId: request.correlationId,
    };
  });

  app.get('/:conversationId', async (request): Promise<ApiResponse<ReturnType<typeof toRecordView>>> => {
    const conversationId = parseParams(request.params);
    const record = await engine.getRecord(conversationId);

    return {
      success: true,
      data: toRecordView(record),
      correlationId: request.correlationId,
    };
  });
};
