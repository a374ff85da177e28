import { randomUUID } from 'crypto';
import Fastify from 'fastify';
import cors from '@fastify/cors';
import { Logger } from 'pino';
import { healthRoutes, HealthChecks } from './api/routes/health';
import { webhookRoutes, WebhookRouteOptions } from './api/routes/webhook';
import { chatRoutes } from './api/routes/chat';
import { ticketRoutes } from './api/routes/tickets';
import { technicianRoutes } from './api/routes/technicians';
import { messageRoutes } from './api/routes/messages';
import { correlationMiddleware } from './api/middleware/correlation';
import { ConversationService } from './domain/conversation/service';
import { ReviewService } from './domain/ticket/review';
import { TicketStore } from './domain/ticket/store';
import { MessageLog } from './domain/conversation/message-log';
import { CustomerStore } from './domain/customer/store';

export interface AppDeps {
  logger: Logger;
  corsOrigins: string[];
  health: HealthChecks;
  webhook: WebhookRouteOptions;
  conversations: ConversationService;
  reviews: ReviewService;
  tickets: TicketStore;
  messages: MessageLog;
  customers: CustomerStore;
  reviewSlaHours: number;
  clock?: () => Date;
}

/**
 * Assemble the HTTP API. Dependencies are passed in so tests can run the
 * app with in-memory stores through `app.inject`.
 */
export async function buildApp(deps: AppDeps) {
  const app = Fastify({
    logger: deps.logger,
    requestIdHeader: 'x-correlation-id',
    genReqId: () => randomUUID(),
  });

  await app.register(cors, {
    origin: deps.corsOrigins,
    credentials: true,
  });

  // Correlation ID middleware
  await app.register(correlationMiddleware);

  // Routes
  await app.register(healthRoutes, { checks: deps.health });
  await app.register(webhookRoutes, deps.webhook);
  await app.register(chatRoutes, { conversations: deps.conversations });
  await app.register(ticketRoutes, { prefix: '/api/tickets', reviews: deps.reviews, tickets: deps.tickets });
  await app.register(technicianRoutes, {
    prefix: '/api',
    tickets: deps.tickets,
    reviewSlaHours: deps.reviewSlaHours,
    ...(deps.clock ? { clock: deps.clock } : {}),
  });
  await app.register(messageRoutes, { prefix: '/api', messages: deps.messages, customers: deps.customers });

  // Global error handler
  app.setErrorHandler((error, request, reply) => {
    const correlationId = request.correlationId || request.id;
    const statusCode = error.statusCode || 500;

    const logPayload = {
      correlationId,
      error: error.message,
      statusCode,
      ...(statusCode >= 500 ? { stack: error.stack } : {}),
    };
    if (statusCode >= 500) {
      request.log.error(logPayload, 'Request error');
    } else {
      request.log.warn(logPayload, 'Request rejected');
    }

    // Don't expose internal errors
    const message = statusCode >= 500 ? 'Internal server error' : error.message;

    reply.status(statusCode).send({
      success: false,
      error: message,
      correlationId,
    });
  });

  return app;
}
