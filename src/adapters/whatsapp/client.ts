import { z } from 'zod';
import { config } from '../../config';
import { WhatsAppError } from '../../shared/errors';
import { logger } from '../../infra/logging/logger';

export interface WhatsAppClientOptions {
  apiUrl?: string;
  phoneNumberId?: string;
  accessToken?: string;
  fetchImpl?: typeof fetch;
}

/**
 * WhatsApp Cloud API (Graph API) client for outbound messages.
 */
export class WhatsAppClient {
  private apiUrl: string;
  private phoneNumberId: string;
  private accessToken: string;
  private fetchImpl: typeof fetch;

  constructor(options: WhatsAppClientOptions = {}) {
    this.apiUrl = options.apiUrl ?? config.whatsappApiUrl;
    this.phoneNumberId = options.phoneNumberId ?? config.whatsappPhoneNumberId;
    this.accessToken = options.accessToken ?? config.whatsappAccessToken;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /**
   * Send a plain text message. `to` is E.164; the API expects digits only.
   * Returns the WhatsApp message id.
   */
  async sendText(to: string, text: string): Promise<string | null> {
    const result = await this.post('messages', {
      messaging_product: 'whatsapp',
      recipient_type: 'individual',
      to: to.replace(/^\+/, ''),
      type: 'text',
      text: { preview_url: false, body: text },
    });

    const messageId = extractMessageId(result);
    logger.debug({ to, contentLength: text.length, messageId }, 'Message sent via WhatsApp');
    return messageId;
  }

  /**
   * Mark an inbound message as read (blue ticks).
   */
  async markAsRead(messageId: string): Promise<void> {
    await this.post('messages', {
      messaging_product: 'whatsapp',
      status: 'read',
      message_id: messageId,
    });
  }

  private async post(path: string, body: Record<string, unknown>): Promise<unknown> {
    const url = `${this.apiUrl}/${this.phoneNumberId}/${path}`;

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.accessToken}`,
        },
        body: JSON.stringify(body),
      });
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      throw new WhatsAppError(`Network error: ${err.message}`, err);
    }

    if (!response.ok) {
      const detail = await response.text();
      throw new WhatsAppError(
        `Request failed: ${response.status} ${detail.substring(0, 200)}`,
        undefined,
        response.status
      );
    }

    return response.json();
  }
}

const sendResultSchema = z.object({
  messages: z.array(z.object({ id: z.string() })).min(1),
});

function extractMessageId(result: unknown): string | null {
  const parsed = sendResultSchema.safeParse(result);
  return parsed.success ? parsed.data.messages[0]?.id ?? null : null;
}
