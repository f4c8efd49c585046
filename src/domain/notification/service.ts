import type { Logger } from 'pino';
import type { IntakeSnapshot } from '../intake/types';
import { logger as rootLogger } from '../../infra/logging/logger';
import { escapeHtml } from '../../shared/validation';
import { withRetry } from '../../shared/errors';

export interface MessageSender {
  sendMessage(chatId: string, text: string, options?: { parseMode?: 'HTML' }): Promise<number>;
}

export interface IdempotencyStore {
  check(key: string): Promise<boolean>;
  set(key: string, result: unknown): Promise<void>;
}

export type NotificationResult = 'sent' | 'duplicate' | 'disabled';

export interface DoctorNotificationOptions {
  sender: MessageSender | null;
  chatId: string | null;
  idempotency: IdempotencyStore;
  logger?: Logger;
  retry?: { maxRetries: number; initialDelayMs: number };
}

/**
 * Sends the consultation summary of a completed intake to the doctor's
 * Telegram chat, at most once per conversation.
 */
export class DoctorNotificationService {
  private readonly sender: MessageSender | null;
  private readonly chatId: string | null;
  private readonly idempotency: IdempotencyStore;
  private readonly log: Logger;
  private readonly retry: { maxRetries: number; initialDelayMs: number };

  constructor(options: DoctorNotificationOptions) {
    this.sender = options.sender;
    this.chatId = options.chatId;
    this.idempotency = options.idempotency;
    this.log = options.logger ?? rootLogger;
    this.retry = options.retry ?? { maxRetries: 2, initialDelayMs: 1000 };
  }

  async notifyCompleted(snapshot: IntakeSnapshot): Promise<NotificationResult> {
    const { conversationId } = snapshot;

    if (!this.sender || !this.chatId) {
      this.log.warn({ conversationId }, 'Doctor notifications not configured, skipping');
      return 'disabled';
    }

    const key = `notify:${conversationId}`;
    if (await this.idempotency.check(key)) {
      this.log.info({ conversationId }, 'Doctor already notified');
      return 'duplicate';
    }

    const sender = this.sender;
    const chatId = this.chatId;
    const messageId = await withRetry(
      () => sender.sendMessage(chatId, formatConsultationSummary(snapshot), { parseMode: 'HTML' }),
      this.retry
    );

    await this.idempotency.set(key, { messageId });
    this.log.info({ conversationId, messageId }, 'Doctor notified');
    return 'sent';
  }
}

const NOT_PROVIDED = 'Not provided';

export function formatConsultationSummary(snapshot: IntakeSnapshot): string {
  const { symptom } = snapshot;
  const lines = [
    '<b>CARDIOLOGY CONSULTATION REQUEST</b>',
    '',
    '<b>Patient Information:</b>',
    `• Name: ${escapeHtml(snapshot.name ?? NOT_PROVIDED)}`,
    `• Email: ${escapeHtml(snapshot.email)}`,
    `• Age: ${snapshot.age ?? NOT_PROVIDED}`,
    `• Gender: ${snapshot.gender ?? NOT_PROVIDED}`,
    '',
    `<b>Primary Symptom:</b> ${escapeHtml(symptom.label)}${symptom.matched ? '' : ' (not in catalog)'}`,
    `<i>Patient's words:</i> ${escapeHtml(symptom.description)}`,
  ];

  if (snapshot.answers.length > 0) {
    lines.push('', '<b>Clinical Assessment:</b>');
    snapshot.answers.forEach((answer, i) => {
      const marker = answer.category === 'red_flag' ? ' ⚠️' : '';
      lines.push(`${i + 1}. ${escapeHtml(answer.questionText)}${marker}`, `   ${escapeHtml(answer.answer)}`);
    });
  }

  lines.push(
    '',
    `<b>Intake Completed:</b> ${snapshot.completedAt}`,
    '<b>Status:</b> Awaiting physician review'
  );

  return lines.join('\n');
}
