import { Logger } from 'pino';
import { Ticket, TicketStatusChange } from '../../shared/types';
import { TicketNotFoundError } from '../../shared/errors';
import { logger as rootLogger } from '../../infra/logging/logger';
import { NotificationDispatcher } from '../notification/dispatcher';
import { getMessageCatalogue, MessageCatalogue, MessageKey, MessageParams } from '../conversation/catalogue';
import { MessageLog } from '../conversation/message-log';
import { TicketStore } from './store';

export type ReviewDecision = 'refund' | 'replacement' | 'rejected';

export interface DecideInput {
  decision: ReviewDecision;
  reviewer: string;
  notes?: string;
}

export interface TicketDetails {
  ticket: Ticket;
  history: TicketStatusChange[];
}

export interface ReviewServiceOptions {
  catalogue?: MessageCatalogue;
  /** Notifications are appended to the customer's transcript. */
  messages?: MessageLog;
  clock?: () => Date;
  logger?: Logger;
}

/**
 * Reviewer-side operations on tickets. Every status change the customer cares
 * about is announced on WhatsApp in the ticket's language; a failed
 * notification never fails the reviewer's request.
 */
export class ReviewService {
  private catalogue: MessageCatalogue;
  private messages: MessageLog | undefined;
  private clock: () => Date;
  private logger: Logger;

  constructor(
    private tickets: TicketStore,
    private dispatcher: NotificationDispatcher,
    options: ReviewServiceOptions = {}
  ) {
    this.catalogue = options.catalogue ?? getMessageCatalogue();
    this.messages = options.messages;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? rootLogger;
  }

  async get(ticketNumber: string): Promise<TicketDetails> {
    const ticket = await this.tickets.findByNumber(ticketNumber);
    if (!ticket) {
      throw new TicketNotFoundError(ticketNumber);
    }
    const history = await this.tickets.getHistory(ticketNumber);
    return { ticket, history };
  }

  async decide(ticketNumber: string, input: DecideInput): Promise<Ticket> {
    if (input.decision === 'rejected') {
      const ticket = await this.tickets.updateStatus(ticketNumber, 'rejected', {
        reviewer: input.reviewer,
        ...(input.notes ? { notes: input.notes } : {}),
      });
      await this.notify(ticket, 'decision_rejected', { reason: input.notes ?? '-' });
      return ticket;
    }

    const ticket = await this.tickets.updateStatus(ticketNumber, 'decided', {
      reviewer: input.reviewer,
      compensationType: input.decision,
      ...(input.notes ? { notes: input.notes } : {}),
    });
    await this.notify(ticket, input.decision === 'refund' ? 'decision_refund' : 'decision_replacement');
    return ticket;
  }

  async complete(ticketNumber: string, reviewer: string): Promise<Ticket> {
    const ticket = await this.tickets.updateStatus(ticketNumber, 'completed', { reviewer });
    await this.notify(ticket, 'ticket_completed');
    return ticket;
  }

  async cancel(ticketNumber: string, reviewer: string, reason?: string): Promise<Ticket> {
    const ticket = await this.tickets.updateStatus(ticketNumber, 'cancelled', {
      reviewer,
      ...(reason ? { notes: reason } : {}),
    });
    await this.notify(ticket, 'ticket_cancelled', { reason: reason ?? '-' });
    return ticket;
  }

  async assign(ticketNumber: string, technicianId?: number): Promise<Ticket> {
    const ticket = await this.tickets.assignTechnician(ticketNumber, technicianId);
    this.logger.info({ ticketNumber, technicianId: ticket.assignedTechnicianId }, 'Ticket assigned');
    return ticket;
  }

  /**
   * Remind customers whose tickets have waited in review since before
   * `olderThan`. A ticket reminded after `olderThan` is skipped, so each
   * customer hears at most once per review window. Returns how many
   * reminders were delivered.
   */
  async sendReminders(olderThan: Date): Promise<number> {
    const overdue = await this.tickets.findOverdue(olderThan);
    const due = overdue.filter((t) => t.lastRemindedAt === null || t.lastRemindedAt < olderThan);
    let sent = 0;

    for (const ticket of due) {
      if (await this.notify(ticket, 'reminder_pending_review')) {
        await this.tickets.markReminded(ticket.ticketNumber, this.clock());
        sent++;
      }
    }

    this.logger.info({ overdue: overdue.length, due: due.length, sent }, 'Review reminders processed');
    return sent;
  }

  private async notify(ticket: Ticket, template: MessageKey, params: MessageParams = {}): Promise<boolean> {
    const text = this.catalogue.render(template, ticket.language, {
      ...params,
      ticketNumber: ticket.ticketNumber,
    });

    let delivered = false;
    try {
      await this.dispatcher.send(ticket.phone, { text, language: ticket.language });
      delivered = true;
    } catch (error) {
      this.logger.error({
        ticketNumber: ticket.ticketNumber,
        template,
        error: error instanceof Error ? error.message : String(error),
      }, 'Failed to notify customer');
    }

    await this.record(ticket, text, delivered);
    return delivered;
  }

  private async record(ticket: Ticket, text: string, delivered: boolean): Promise<void> {
    if (!this.messages) return;

    try {
      await this.messages.append({
        phone: ticket.phone,
        direction: 'outbound',
        body: text,
        messageId: null,
        attachments: [],
        delivered,
        createdAt: this.clock(),
      });
    } catch (error) {
      this.logger.error({
        ticketNumber: ticket.ticketNumber,
        error: error instanceof Error ? error.message : String(error),
      }, 'Failed to record notification');
    }
  }
}
