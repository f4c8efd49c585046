import type { Logger } from 'pino';
import type { IntakeCompletedJobData, JobResult } from '../../shared/types';
import type { IntakeArchiveService } from '../../domain/archive/service';
import type { DoctorNotificationService } from '../../domain/notification/service';

export interface IntakeCompletedDeps {
  archive: Pick<IntakeArchiveService, 'saveCompleted'>;
  notifier: Pick<DoctorNotificationService, 'notifyCompleted'>;
}

/**
 * Archive a completed intake and alert the doctor. Both steps are
 * idempotent, so a retried job repeats only what did not finish.
 */
export async function handleIntakeCompleted(
  data: IntakeCompletedJobData,
  logger: Logger,
  deps: IntakeCompletedDeps
): Promise<JobResult> {
  const { correlationId, snapshot } = data;

  const inserted = await deps.archive.saveCompleted(snapshot);
  logger.info(
    { conversationId: snapshot.conversationId, inserted },
    inserted ? 'Intake archived' : 'Intake already archived'
  );

  const notification = await deps.notifier.notifyCompleted(snapshot);

  return {
    status: 'completed',
    correlationId,
    action: `archived:${inserted ? 'new' : 'existing'},notified:${notification}`,
  };
}
