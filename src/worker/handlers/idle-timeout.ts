import type { Logger } from 'pino';
import type { IdleTimeoutJobData, JobResult } from '../../shared/types';
import type { IntakeEngine } from '../../domain/intake/engine';
import { UnknownConversationError } from '../../shared/errors';

export interface IdleTimeoutDeps {
  engine: Pick<IntakeEngine, 'signalIdleTimeout'>;
}

export async function handleIdleTimeout(
  data: IdleTimeoutJobData,
  logger: Logger,
  deps: IdleTimeoutDeps
): Promise<JobResult> {
  const { correlationId, conversationId, turn } = data;

  try {
    const action = await deps.engine.signalIdleTimeout(conversationId, turn);

    if (!action) {
      logger.debug({ conversationId, turn }, 'Idle timeout no longer applies');
      return { status: 'skipped', correlationId, action: 'stale' };
    }

    logger.info({ conversationId, turn }, 'Intake abandoned after inactivity');
    return { status: 'completed', correlationId, action: action.type };
  } catch (error) {
    // The session expired from the store before the timeout fired
    if (error instanceof UnknownConversationError) {
      logger.info({ conversationId }, 'Idle timeout for expired session');
      return { status: 'skipped', correlationId, action: 'expired' };
    }
    throw error;
  }
}
