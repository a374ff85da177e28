import { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { InboundJobData } from '../../shared/types';
import { BadRequestError, ForbiddenError } from '../../shared/errors';
import { parseInboundMessages, verifySubscription, webhookPayloadSchema } from '../../adapters/whatsapp/webhook';

export interface WebhookRouteOptions {
  verifyToken: string;
  enqueue: (job: InboundJobData) => Promise<string>;
  /** True when the key was stored by an earlier delivery and has not expired. */
  isDuplicate: (key: string) => Promise<boolean>;
  /** Stores the key once the message is safely queued. */
  rememberMessage: (key: string) => Promise<void>;
}

const verifyQuerySchema = z.object({
  'hub.mode': z.string().optional(),
  'hub.verify_token': z.string().optional(),
  'hub.challenge': z.string().optional(),
});

export const webhookRoutes: FastifyPluginAsync<WebhookRouteOptions> = async (
  app: FastifyInstance,
  options
) => {
  // Subscription handshake from Meta
  app.get('/webhook/whatsapp', async (request, reply) => {
    const query = verifyQuerySchema.safeParse(request.query);
    if (!query.success) {
      throw new BadRequestError('Invalid verification request');
    }

    const challenge = verifySubscription(
      query.data['hub.mode'],
      query.data['hub.verify_token'],
      query.data['hub.challenge'],
      options.verifyToken
    );

    if (!challenge) {
      request.log.warn('Webhook verification failed');
      throw new ForbiddenError('Verification failed');
    }

    reply.type('text/plain');
    return challenge;
  });

  app.post('/webhook/whatsapp', async (request, reply) => {
    const correlationId = request.correlationId;

    const parseResult = webhookPayloadSchema.safeParse(request.body);
    if (!parseResult.success) {
      throw new BadRequestError(`Invalid webhook payload: ${parseResult.error.message}`);
    }

    const messages = parseInboundMessages(parseResult.data);
    if (messages.length === 0) {
      request.log.debug('Ignoring webhook without customer messages');
      return { success: true, correlationId, action: 'ignored' };
    }

    const jobIds: string[] = [];
    let duplicates = 0;

    for (const message of messages) {
      const idempotencyKey = `whatsapp:${message.messageId}`;
      if (await options.isDuplicate(idempotencyKey)) {
        request.log.info({ messageId: message.messageId }, 'Duplicate webhook delivery');
        duplicates++;
        continue;
      }

      const jobId = await options.enqueue({
        type: 'inbound_message',
        correlationId: `${correlationId}:${message.messageId}`,
        messageId: message.messageId,
        phone: message.phone,
        message: message.text,
        attachments: message.attachments,
        timestamp: message.timestamp,
        ...(message.contactName ? { contactName: message.contactName } : {}),
      });
      jobIds.push(jobId);

      // Stored after the enqueue, so a message whose enqueue failed is taken again on redelivery
      await options.rememberMessage(idempotencyKey);
    }

    request.log.info({ queued: jobIds.length, duplicates }, 'Webhook processed');

    // 202 Accepted (async processing)
    reply.status(202);
    return { success: true, correlationId, jobIds, duplicates };
  });
};
