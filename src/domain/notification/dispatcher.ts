import { OutboundMessage } from '../../shared/types';
import { withRetry } from '../../shared/errors';
import { logger } from '../../infra/logging/logger';
import { WhatsAppClient } from '../../adapters/whatsapp/client';

/**
 * Delivers a rendered reply to a customer. Implementations throw on
 * transport failure after their own retries.
 */
export interface NotificationDispatcher {
  send(phone: string, message: OutboundMessage): Promise<void>;
}

export interface WhatsAppDispatcherOptions {
  maxRetries?: number;
  initialDelayMs?: number;
}

export class WhatsAppDispatcher implements NotificationDispatcher {
  constructor(
    private client: WhatsAppClient,
    private options: WhatsAppDispatcherOptions = {}
  ) {}

  async send(phone: string, message: OutboundMessage): Promise<void> {
    const messageId = await withRetry(() => this.client.sendText(phone, message.text), {
      maxRetries: this.options.maxRetries ?? 3,
      initialDelayMs: this.options.initialDelayMs ?? 1000,
    });

    logger.info({ phone, language: message.language, messageId }, 'Reply dispatched');
  }
}
