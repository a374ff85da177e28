import { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { Ticket, TicketFilter } from '../../shared/types';
import { BadRequestError } from '../../shared/errors';
import { isValidTicketNumber } from '../../shared/validation';
import { ReviewService } from '../../domain/ticket/review';
import { TicketStore } from '../../domain/ticket/store';
import { authMiddleware } from '../middleware/auth';

export interface TicketRouteOptions {
  reviews: ReviewService;
  tickets: TicketStore;
}

const listQuerySchema = z.object({
  status: z.enum(['new', 'under_review', 'decided', 'completed', 'cancelled', 'rejected']).optional(),
  phone: z.string().optional(),
  technicianId: z.coerce.number().int().positive().optional(),
  limit: z.coerce.number().int().min(1).max(200).default(50),
});

const paramsSchema = z.object({
  ticketNumber: z.string().refine(isValidTicketNumber, 'Expected TKT-<yyyy>-<nnnnn>'),
});

const decisionSchema = z.object({
  decision: z.enum(['refund', 'replacement', 'rejected']),
  reviewer: z.string().min(1).max(100),
  notes: z.string().max(2000).optional(),
});

const completeSchema = z.object({
  reviewer: z.string().min(1).max(100),
});

const cancelSchema = z.object({
  reviewer: z.string().min(1).max(100),
  reason: z.string().max(2000).optional(),
});

const assignSchema = z.object({
  technicianId: z.number().int().positive().optional(),
});

export function parse<T extends z.ZodTypeAny>(schema: T, value: unknown, what: string): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new BadRequestError(`Invalid ${what}: ${result.error.message}`);
  }
  return result.data;
}

export function presentTicket(ticket: Ticket) {
  return {
    ...ticket,
    createdAt: ticket.createdAt.toISOString(),
    updatedAt: ticket.updatedAt.toISOString(),
    decidedAt: ticket.decidedAt?.toISOString() ?? null,
    completedAt: ticket.completedAt?.toISOString() ?? null,
    lastRemindedAt: ticket.lastRemindedAt?.toISOString() ?? null,
  };
}

export const ticketRoutes: FastifyPluginAsync<TicketRouteOptions> = async (
  app: FastifyInstance,
  { reviews, tickets }
) => {
  app.addHook('preHandler', authMiddleware);

  app.get('/', async (request) => {
    const query = parse(listQuerySchema, request.query, 'query');
    const filter: TicketFilter = {
      limit: query.limit,
      ...(query.status ? { status: query.status } : {}),
      ...(query.phone ? { phone: query.phone } : {}),
      ...(query.technicianId !== undefined ? { technicianId: query.technicianId } : {}),
    };

    const list = await tickets.list(filter);
    return { success: true, data: list.map(presentTicket) };
  });

  app.get('/:ticketNumber', async (request) => {
    const { ticketNumber } = parse(paramsSchema, request.params, 'ticket number');
    const { ticket, history } = await reviews.get(ticketNumber);

    return {
      success: true,
      data: {
        ...presentTicket(ticket),
        history: history.map((h) => ({ ...h, createdAt: h.createdAt.toISOString() })),
      },
    };
  });

  app.post('/:ticketNumber/decision', async (request) => {
    const { ticketNumber } = parse(paramsSchema, request.params, 'ticket number');
    const body = parse(decisionSchema, request.body, 'decision');

    const ticket = await reviews.decide(ticketNumber, {
      decision: body.decision,
      reviewer: body.reviewer,
      ...(body.notes ? { notes: body.notes } : {}),
    });

    request.log.info({ ticketNumber, decision: body.decision, reviewer: body.reviewer }, 'Ticket decided');
    return { success: true, data: presentTicket(ticket) };
  });

  app.post('/:ticketNumber/complete', async (request) => {
    const { ticketNumber } = parse(paramsSchema, request.params, 'ticket number');
    const body = parse(completeSchema, request.body, 'request');

    const ticket = await reviews.complete(ticketNumber, body.reviewer);
    return { success: true, data: presentTicket(ticket) };
  });

  app.post('/:ticketNumber/cancel', async (request) => {
    const { ticketNumber } = parse(paramsSchema, request.params, 'ticket number');
    const body = parse(cancelSchema, request.body, 'request');

    const ticket = await reviews.cancel(ticketNumber, body.reviewer, body.reason);
    return { success: true, data: presentTicket(ticket) };
  });

  app.post('/:ticketNumber/assign', async (request) => {
    const { ticketNumber } = parse(paramsSchema, request.params, 'ticket number');
    const body = parse(assignSchema, request.body ?? {}, 'request');

    const ticket = await reviews.assign(ticketNumber, body.technicianId);
    return { success: true, data: presentTicket(ticket) };
  });
};
