import { Logger } from 'pino';
import { InboundJobData, JobResult } from '../../shared/types';
import { ConversationService } from '../../domain/conversation/service';
import { logExecution } from '../../infra/logging/logger';

export interface InboundHandlerDeps {
  conversations: ConversationService;
  /** Best-effort read receipt. */
  markAsRead?: (messageId: string) => Promise<void>;
}

export type InboundHandler = (data: InboundJobData, logger: Logger) => Promise<JobResult>;

export function createInboundHandler(deps: InboundHandlerDeps): InboundHandler {
  return async function handleInboundMessage(data, logger) {
    const { correlationId, messageId, phone, message, attachments, contactName } = data;

    if (deps.markAsRead) {
      try {
        await deps.markAsRead(messageId);
      } catch (error) {
        logger.warn({
          messageId,
          error: error instanceof Error ? error.message : String(error),
        }, 'Failed to mark message as read');
      }
    }

    const outcome = await logExecution(
      correlationId,
      'handle_message',
      async () => deps.conversations.processMessage(phone, message, attachments, {
        messageId,
        correlationId,
        ...(contactName ? { contactName } : {}),
      }),
      logger
    );

    logger.info({
      state: outcome.state,
      intent: outcome.intent,
      ticketNumber: outcome.ticket?.ticketNumber,
      delivered: outcome.delivered,
    }, 'Message handled');

    return {
      status: 'completed',
      correlationId,
      action: outcome.ticket ? `${outcome.intent}:${outcome.ticket.ticketNumber}` : outcome.intent,
    };
  };
}
