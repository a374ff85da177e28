import { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { NotFoundError } from '../../shared/errors';
import { TicketStore } from '../../domain/ticket/store';
import { authMiddleware } from '../middleware/auth';
import { parse, presentTicket } from './tickets';

export interface TechnicianRouteOptions {
  tickets: TicketStore;
  /** Tickets under review for longer than this are overdue. */
  reviewSlaHours: number;
  clock?: () => Date;
}

const technicianParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

const technicianTicketsQuerySchema = z.object({
  status: z.enum(['new', 'under_review', 'decided', 'completed', 'cancelled', 'rejected']).optional(),
  limit: z.coerce.number().int().min(1).max(200).default(50),
});

export const technicianRoutes: FastifyPluginAsync<TechnicianRouteOptions> = async (
  app: FastifyInstance,
  { tickets, reviewSlaHours, clock = () => new Date() }
) => {
  app.addHook('preHandler', authMiddleware);

  app.get('/technicians', async () => {
    const technicians = await tickets.listTechnicians();
    return { success: true, data: technicians };
  });

  app.get('/technicians/:id/tickets', async (request) => {
    const { id } = parse(technicianParamsSchema, request.params, 'technician id');
    const query = parse(technicianTicketsQuerySchema, request.query, 'query');

    const technicians = await tickets.listTechnicians();
    if (!technicians.some((t) => t.id === id)) {
      throw new NotFoundError(`Technician not found: ${id}`);
    }

    const assigned = await tickets.list({
      technicianId: id,
      limit: query.limit,
      ...(query.status ? { status: query.status } : {}),
    });
    return { success: true, data: assigned.map(presentTicket) };
  });

  app.get('/stats/overdue', async () => {
    const cutoff = new Date(clock().getTime() - reviewSlaHours * 60 * 60 * 1000);
    const overdue = await tickets.findOverdue(cutoff);

    return {
      success: true,
      data: {
        slaHours: reviewSlaHours,
        cutoff: cutoff.toISOString(),
        count: overdue.length,
        tickets: overdue.map(presentTicket),
      },
    };
  });
};
