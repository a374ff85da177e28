import { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { BadRequestError, InvalidPhoneError } from '../../shared/errors';
import { normalizePhone } from '../../shared/validation';
import { ConversationService } from '../../domain/conversation/service';
import { KeyedSerializer } from '../../domain/conversation/serializer';
import { mediaRefSchema } from '../../domain/conversation/session-store';
import { authMiddleware, rateLimit } from '../middleware/auth';

export interface ChatRouteOptions {
  conversations: ConversationService;
}

const chatBodySchema = z.object({
  phone: z.string().min(1),
  message: z.string().max(4096).default(''),
  attachments: z.array(mediaRefSchema).default([]),
});

/**
 * Synchronous chat for testing the flow without WhatsApp. Replies are
 * returned in the response body, not dispatched.
 */
export const chatRoutes: FastifyPluginAsync<ChatRouteOptions> = async (
  app: FastifyInstance,
  { conversations }
) => {
  const serializer = new KeyedSerializer();

  app.addHook('preHandler', authMiddleware);
  app.addHook('preHandler', rateLimit({ windowMs: 60000, maxRequests: 60 }));

  app.post('/api/chat', async (request) => {
    const body = chatBodySchema.safeParse(request.body);
    if (!body.success) {
      throw new BadRequestError(`Invalid chat request: ${body.error.message}`);
    }

    const phone = normalizePhone(body.data.phone);
    if (!phone) {
      throw new InvalidPhoneError(body.data.phone);
    }

    const outcome = await serializer.run(phone, () =>
      conversations.processMessage(phone, body.data.message, body.data.attachments, {
        correlationId: request.correlationId,
        dispatch: false,
      })
    );

    return {
      success: true,
      data: {
        response: outcome.reply.text,
        language: outcome.reply.language,
        state: outcome.state,
        ...(outcome.ticket ? { ticketNumber: outcome.ticket.ticketNumber } : {}),
      },
    };
  });
};
