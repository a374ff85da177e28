import { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { InvalidPhoneError } from '../../shared/errors';
import { normalizePhone } from '../../shared/validation';
import { MessageLog } from '../../domain/conversation/message-log';
import { CustomerStore } from '../../domain/customer/store';
import { authMiddleware } from '../middleware/auth';
import { parse } from './tickets';

export interface MessageRouteOptions {
  messages: MessageLog;
  customers: CustomerStore;
}

const paramsSchema = z.object({
  phone: z.string().min(1),
});

const querySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

/**
 * Customer transcript for reviewers, newest message first.
 */
export const messageRoutes: FastifyPluginAsync<MessageRouteOptions> = async (
  app: FastifyInstance,
  { messages, customers }
) => {
  app.addHook('preHandler', authMiddleware);

  app.get('/messages/:phone', async (request) => {
    const params = parse(paramsSchema, request.params, 'phone');
    const { limit } = parse(querySchema, request.query, 'query');

    const phone = normalizePhone(params.phone);
    if (!phone) {
      throw new InvalidPhoneError(params.phone);
    }

    const [customer, history] = await Promise.all([
      customers.findByPhone(phone),
      messages.listForPhone(phone, limit),
    ]);

    return {
      success: true,
      data: {
        phone,
        customer: customer
          ? {
              ...customer,
              createdAt: customer.createdAt.toISOString(),
              updatedAt: customer.updatedAt.toISOString(),
            }
          : null,
        messages: history.map((m) => ({ ...m, createdAt: m.createdAt.toISOString() })),
      },
    };
  });
};
