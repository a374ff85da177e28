import { Logger } from 'pino';
import {
  ConversationSession,
  ConversationState,
  Language,
  MediaRef,
  OutboundMessage,
  Ticket,
} from '../../shared/types';
import { InvalidPhoneError } from '../../shared/errors';
import { isValidPhone } from '../../shared/validation';
import { detectLanguage } from '../../shared/language';
import { logExecution, logger as rootLogger } from '../../infra/logging/logger';
import { TicketStore } from '../ticket/store';
import { NotificationDispatcher } from '../notification/dispatcher';
import { CustomerStore } from '../customer/store';
import { classify, Intent } from './intents';
import { ConversationMachine, Effect, emptyDraft, Transition, TransitionIssue } from './machine';
import { getMessageCatalogue, MessageCatalogue, Reply } from './catalogue';
import { SessionStore } from './session-store';
import { MessageLog } from './message-log';

export interface ConversationServiceDeps {
  sessions: SessionStore;
  tickets: TicketStore;
  dispatcher: NotificationDispatcher;
  machine: ConversationMachine;
  /** Transcript of both directions; nothing is recorded without one. */
  messages?: MessageLog;
  customers?: CustomerStore;
  catalogue?: MessageCatalogue;
  defaultLanguage?: Language;
  /** Sessions untouched for longer than this restart from idle. */
  idleTimeoutMs?: number;
  clock?: () => Date;
  logger?: Logger;
}

export interface HandleOptions {
  /** Inbound message id; makes ticket creation idempotent across retries. */
  messageId?: string;
  correlationId?: string;
  /** WhatsApp profile name of the sender. */
  contactName?: string;
  /** Send the reply through the dispatcher. Default true. */
  dispatch?: boolean;
}

export interface MessageOutcome {
  reply: OutboundMessage;
  state: ConversationState;
  intent: Intent['kind'];
  issue?: TransitionIssue;
  ticket?: Ticket;
  delivered: boolean;
}

const DEFAULT_IDLE_TIMEOUT_MS = 30 * 60 * 1000;

/**
 * Entry point for every customer message: load session, classify, transition,
 * perform effects, persist, reply.
 *
 * Callers must not run two messages for the same phone concurrently (the
 * worker shards by phone; the chat route uses a KeyedSerializer).
 */
export class ConversationService {
  private sessions: SessionStore;
  private tickets: TicketStore;
  private dispatcher: NotificationDispatcher;
  private machine: ConversationMachine;
  private messages: MessageLog | undefined;
  private customers: CustomerStore | undefined;
  private catalogue: MessageCatalogue;
  private defaultLanguage: Language;
  private idleTimeoutMs: number;
  private clock: () => Date;
  private logger: Logger;

  constructor(deps: ConversationServiceDeps) {
    this.sessions = deps.sessions;
    this.tickets = deps.tickets;
    this.dispatcher = deps.dispatcher;
    this.machine = deps.machine;
    this.messages = deps.messages;
    this.customers = deps.customers;
    this.catalogue = deps.catalogue ?? getMessageCatalogue();
    this.defaultLanguage = deps.defaultLanguage ?? 'ar';
    this.idleTimeoutMs = deps.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS;
    this.clock = deps.clock ?? (() => new Date());
    this.logger = deps.logger ?? rootLogger;
  }

  async handleMessage(
    phone: string,
    text: string,
    attachments: MediaRef[] = [],
    options: HandleOptions = {}
  ): Promise<OutboundMessage> {
    const outcome = await this.processMessage(phone, text, attachments, options);
    return outcome.reply;
  }

  async processMessage(
    phone: string,
    text: string,
    attachments: MediaRef[] = [],
    options: HandleOptions = {}
  ): Promise<MessageOutcome> {
    if (!isValidPhone(phone)) {
      throw new InvalidPhoneError(phone);
    }

    const correlationId = options.correlationId ?? options.messageId ?? 'direct';
    const log = this.logger.child({ correlationId, phone });
    const now = this.clock();
    const messages = this.messages;

    if (messages) {
      await logExecution(correlationId, 'record_inbound', async () => messages.append({
        phone,
        direction: 'inbound',
        body: text,
        messageId: options.messageId ?? null,
        attachments,
        delivered: null,
        createdAt: now,
      }), log);
    }

    const session = await logExecution(
      correlationId,
      'load_session',
      async () => this.loadSession(phone, text, now, log),
      log
    );

    const intent = classify(session.state, text, attachments);
    const transition = this.machine.transition(session, intent);

    log.info({
      from: session.state,
      to: transition.state,
      intent: intent.kind,
      effects: transition.effects.map((e) => e.type),
    }, 'Conversation transition');

    if (transition.issue) {
      log.info({ issue: transition.issue, state: session.state }, 'Input did not advance the conversation');
    }

    let reply = transition.reply;
    let ticket: Ticket | undefined;

    for (const effect of transition.effects) {
      const result = await logExecution(
        correlationId,
        effect.type,
        async () => this.performEffect(effect, phone, transition, options.messageId),
        log
      );
      reply = result.reply;
      ticket = result.ticket ?? ticket;
    }

    const next: ConversationSession = {
      ...session,
      state: transition.state,
      draft: transition.draft,
      language: transition.language,
      updatedAt: now,
    };

    await logExecution(correlationId, 'save_session', async () => this.sessions.save(next), log);

    const customers = this.customers;
    if (customers) {
      await logExecution(correlationId, 'save_customer', async () => customers.upsert(phone, {
        language: next.language,
        ...(options.contactName ? { contactName: options.contactName } : {}),
      }, now), log);
    }

    const outbound: OutboundMessage = {
      text: this.catalogue.renderReply(reply, transition.language),
      language: transition.language,
    };

    const dispatched = options.dispatch !== false;
    const delivered = dispatched ? await this.deliver(phone, outbound, log) : false;
    await this.recordOutbound(phone, outbound, dispatched ? delivered : null, log);

    return {
      reply: outbound,
      state: transition.state,
      intent: intent.kind,
      delivered,
      ...(transition.issue ? { issue: transition.issue } : {}),
      ...(ticket ? { ticket } : {}),
    };
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async loadSession(phone: string, text: string, now: Date, log: Logger): Promise<ConversationSession> {
    const existing = await this.sessions.load(phone);

    if (!existing) {
      return {
        phone,
        state: 'idle',
        language: detectLanguage(text) ?? this.defaultLanguage,
        draft: emptyDraft(),
        createdAt: now,
        updatedAt: now,
      };
    }

    const idleFor = now.getTime() - existing.updatedAt.getTime();
    if (existing.state !== 'idle' && idleFor > this.idleTimeoutMs) {
      log.info({ state: existing.state, idleMs: idleFor }, 'Session expired, restarting from idle');
      return { ...existing, state: 'idle', draft: emptyDraft() };
    }

    return existing;
  }

  private async performEffect(
    effect: Effect,
    phone: string,
    transition: Transition,
    messageId: string | undefined
  ): Promise<{ reply: Reply; ticket?: Ticket }> {
    switch (effect.type) {
      case 'create_ticket': {
        const ticket = await this.tickets.createTicket(effect.complaint, effect.decision, {
          phone,
          language: transition.language,
          ...(messageId ? { sourceMessageId: messageId } : {}),
        });
        return {
          reply: { ...transition.reply, params: { ...transition.reply.params, ticketNumber: ticket.ticketNumber } },
          ticket,
        };
      }

      case 'lookup_status': {
        const found = effect.ticketNumber
          ? await this.tickets.findByNumber(effect.ticketNumber)
          : await this.tickets.findLatestForPhone(phone);

        // Customers only see their own tickets
        if (!found || found.phone !== phone) {
          return { reply: transition.reply };
        }

        return { reply: this.statusReply(found, transition.language), ticket: found };
      }
    }
  }

  private statusReply(ticket: Ticket, language: Language): Reply {
    return {
      template: 'ticket_status',
      params: {
        ticketNumber: ticket.ticketNumber,
        createdDate: ticket.createdAt.toISOString().slice(0, 10),
        status: this.catalogue.statusLabel(ticket.status, language),
        product: ticket.product,
        extraInfo: this.catalogue.compensationLabel(ticket.compensationType, language),
      },
    };
  }

  /** The reply has already gone out, so a failed write is logged and not retried. */
  private async recordOutbound(
    phone: string,
    message: OutboundMessage,
    delivered: boolean | null,
    log: Logger
  ): Promise<void> {
    if (!this.messages) return;

    try {
      await this.messages.append({
        phone,
        direction: 'outbound',
        body: message.text,
        messageId: null,
        attachments: [],
        delivered,
        createdAt: this.clock(),
      });
    } catch (error) {
      log.error({
        error: error instanceof Error ? error.message : String(error),
      }, 'Failed to record outbound message');
    }
  }

  private async deliver(phone: string, message: OutboundMessage, log: Logger): Promise<boolean> {
    try {
      await this.dispatcher.send(phone, message);
      return true;
    } catch (error) {
      // The session is already saved; the customer can re-send to get the prompt again
      log.error({
        error: error instanceof Error ? error.message : String(error),
      }, 'Failed to deliver reply');
      return false;
    }
  }
}
