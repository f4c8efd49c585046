import { z } from 'zod';
import { TelegramError } from '../../shared/errors';
import { logger } from '../../infra/logging/logger';

interface SendMessageOptions {
  parseMode?: 'HTML' | 'MarkdownV2';
  disableNotification?: boolean;
}

const telegramResponseSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
  result: z.object({ message_id: z.number() }).optional(),
});

type TelegramResponse = z.infer<typeof telegramResponseSchema>;

/**
 * Minimal Telegram Bot API client for doctor alerts.
 */
export class TelegramClient {
  private baseUrl: string;

  constructor(botToken: string, apiUrl: string = 'https://api.telegram.org') {
    this.baseUrl = `${apiUrl}/bot${botToken}`;
  }

  /**
   * Send a message to a chat, returning the Telegram message id.
   */
  async sendMessage(chatId: string, text: string, options: SendMessageOptions = {}): Promise<number> {
    const body: Record<string, unknown> = {
      chat_id: chatId,
      text,
      disable_web_page_preview: true,
    };

    if (options.parseMode) {
      body.parse_mode = options.parseMode;
    }

    if (options.disableNotification) {
      body.disable_notification = true;
    }

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/sendMessage`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(10000),
      });
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      throw new TelegramError(`Network error: ${err.message}`, err);
    }

    const payload = await parseResponse(response);

    if (!response.ok || !payload.ok || !payload.result) {
      throw new TelegramError(
        `Failed to send message: ${response.status} ${payload.description ?? 'no description'}`
      );
    }

    logger.debug({ chatId, contentLength: text.length }, 'Message sent via Telegram');
    return payload.result.message_id;
  }
}

async function parseResponse(response: Response): Promise<TelegramResponse> {
  const text = await response.text();

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return { ok: false, description: text.substring(0, 200) };
  }

  const result = telegramResponseSchema.safeParse(json);
  return result.success ? result.data : { ok: false, description: text.substring(0, 200) };
}
