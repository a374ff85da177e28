import {
  CompleteComplaint,
  ConversationMessage,
  ConversationSession,
  Customer,
  NewConversationMessage,
  OutboundMessage,
  ReviewerInfo,
  RoutingDecision,
  Technician,
  Ticket,
  TicketFilter,
  TicketStatus,
  TicketStatusChange,
} from '../src/shared/types';
import { ConflictError, TicketNotFoundError } from '../src/shared/errors';
import { SessionStore } from '../src/domain/conversation/session-store';
import { MessageLog } from '../src/domain/conversation/message-log';
import { CustomerContact, CustomerStore } from '../src/domain/customer/store';
import { CreateTicketContext, TicketStore } from '../src/domain/ticket/store';
import { NotificationDispatcher } from '../src/domain/notification/dispatcher';
import { applyStatusChange } from '../src/domain/ticket/lifecycle';
import { TicketNumberGenerator } from '../src/domain/ticket/number';

export const FIXED_NOW = new Date('2024-05-10T12:00:00.000Z');

export class InMemorySessionStore implements SessionStore {
  readonly sessions = new Map<string, ConversationSession>();

  async load(phone: string): Promise<ConversationSession | null> {
    const session = this.sessions.get(phone);
    return session ? { ...session, draft: { ...session.draft } } : null;
  }

  async save(session: ConversationSession): Promise<void> {
    this.sessions.set(session.phone, { ...session, draft: { ...session.draft } });
  }

  async clear(phone: string): Promise<void> {
    this.sessions.delete(phone);
  }

  async resetIdle(olderThan: Date): Promise<number> {
    let count = 0;
    for (const session of this.sessions.values()) {
      if (session.state !== 'idle' && session.updatedAt < olderThan) {
        session.state = 'idle';
        session.draft = { photos: [] };
        count++;
      }
    }
    return count;
  }
}

export class InMemoryTicketStore implements TicketStore {
  readonly tickets: Ticket[] = [];
  readonly technicians: Technician[] = [
    { id: 1, name: 'Technician A', active: true, currentWorkload: 0, maxWorkload: 10 },
    { id: 2, name: 'Technician B', active: true, currentWorkload: 0, maxWorkload: 10 },
  ];
  private readonly history = new Map<number, TicketStatusChange[]>();
  private readonly sequences = new Map<number, number>();
  private readonly generator: TicketNumberGenerator;

  constructor(private clock: () => Date = () => FIXED_NOW) {
    this.generator = new TicketNumberGenerator(async (year) => {
      const next = (this.sequences.get(year) ?? 0) + 1;
      this.sequences.set(year, next);
      return next;
    }, clock);
  }

  async createTicket(
    complaint: CompleteComplaint,
    decision: RoutingDecision,
    context: CreateTicketContext
  ): Promise<Ticket> {
    if (context.sourceMessageId) {
      const existing = this.tickets.find((t) => t.sourceMessageId === context.sourceMessageId);
      if (existing) return existing;
    }

    const now = this.clock();
    const ticket: Ticket = {
      id: this.tickets.length + 1,
      ticketNumber: await this.generator.next(),
      phone: context.phone,
      product: complaint.product,
      issue: complaint.issue,
      issueCategory: decision.issueCategory,
      photos: complaint.photos,
      status: decision.initialStatus,
      compensationType: decision.compensationType,
      routingOutcome: decision.outcome,
      routingRule: decision.rule,
      matchedKeyword: decision.matchedKeyword ?? null,
      language: context.language,
      reviewer: null,
      reviewerNotes: null,
      decidedAt: decision.initialStatus === 'decided' ? now : null,
      assignedTechnicianId: null,
      sourceMessageId: context.sourceMessageId ?? null,
      createdAt: now,
      updatedAt: now,
      completedAt: null,
      lastRemindedAt: null,
    };

    this.tickets.push(ticket);
    this.history.set(ticket.id, [
      { fromStatus: null, toStatus: 'new', changedBy: 'system', reason: null, createdAt: now },
      { fromStatus: 'new', toStatus: decision.initialStatus, changedBy: 'router', reason: decision.rule, createdAt: now },
    ]);
    return ticket;
  }

  async updateStatus(ticketNumber: string, status: TicketStatus, info: ReviewerInfo): Promise<Ticket> {
    const index = this.tickets.findIndex((t) => t.ticketNumber === ticketNumber);
    const current = this.tickets[index];
    if (!current) {
      throw new TicketNotFoundError(ticketNumber);
    }

    const next = applyStatusChange(current, status, info, this.clock());
    this.tickets[index] = next;
    this.history.get(current.id)?.push({
      fromStatus: current.status,
      toStatus: status,
      changedBy: info.reviewer,
      reason: info.notes ?? null,
      createdAt: next.updatedAt,
    });
    return next;
  }

  async findByNumber(ticketNumber: string): Promise<Ticket | null> {
    return this.tickets.find((t) => t.ticketNumber === ticketNumber) ?? null;
  }

  async findLatestForPhone(phone: string): Promise<Ticket | null> {
    const own = this.tickets.filter((t) => t.phone === phone);
    return own[own.length - 1] ?? null;
  }

  async list(filter: TicketFilter = {}): Promise<Ticket[]> {
    return this.tickets
      .filter((t) => !filter.status || t.status === filter.status)
      .filter((t) => !filter.phone || t.phone === filter.phone)
      .filter((t) => filter.technicianId === undefined || t.assignedTechnicianId === filter.technicianId)
      .slice(0, filter.limit ?? 50);
  }

  async getHistory(ticketNumber: string): Promise<TicketStatusChange[]> {
    const ticket = await this.findByNumber(ticketNumber);
    return ticket ? this.history.get(ticket.id) ?? [] : [];
  }

  async findOverdue(olderThan: Date): Promise<Ticket[]> {
    return this.tickets.filter((t) => t.status === 'under_review' && t.createdAt < olderThan);
  }

  async markReminded(ticketNumber: string, at: Date): Promise<void> {
    const index = this.tickets.findIndex((t) => t.ticketNumber === ticketNumber);
    const current = this.tickets[index];
    if (current) {
      this.tickets[index] = { ...current, lastRemindedAt: at };
    }
  }

  async listTechnicians(): Promise<Technician[]> {
    return [...this.technicians];
  }

  async assignTechnician(ticketNumber: string, technicianId?: number): Promise<Ticket> {
    const index = this.tickets.findIndex((t) => t.ticketNumber === ticketNumber);
    const current = this.tickets[index];
    if (!current) {
      throw new TicketNotFoundError(ticketNumber);
    }
    if (current.status !== 'new' && current.status !== 'under_review') {
      throw new ConflictError(`Ticket ${ticketNumber} is ${current.status} and cannot be reassigned`);
    }
    const next = { ...current, assignedTechnicianId: technicianId ?? 1 };
    this.tickets[index] = next;
    return next;
  }
}

export class InMemoryMessageLog implements MessageLog {
  readonly messages: ConversationMessage[] = [];

  async append(message: NewConversationMessage): Promise<void> {
    if (message.messageId !== null && this.messages.some((m) => m.messageId === message.messageId)) {
      return;
    }
    this.messages.push({ ...message, id: this.messages.length + 1 });
  }

  async listForPhone(phone: string, limit: number = 50): Promise<ConversationMessage[]> {
    return this.messages
      .filter((m) => m.phone === phone)
      .reverse()
      .slice(0, limit);
  }
}

export class InMemoryCustomerStore implements CustomerStore {
  readonly customers = new Map<string, Customer>();

  async upsert(phone: string, contact: CustomerContact, at: Date): Promise<Customer> {
    const existing = this.customers.get(phone);
    const customer: Customer = {
      phone,
      contactName: contact.contactName ?? existing?.contactName ?? null,
      language: contact.language,
      createdAt: existing?.createdAt ?? at,
      updatedAt: at,
    };
    this.customers.set(phone, customer);
    return customer;
  }

  async findByPhone(phone: string): Promise<Customer | null> {
    return this.customers.get(phone) ?? null;
  }
}

export class RecordingDispatcher implements NotificationDispatcher {
  readonly sent: Array<{ phone: string; message: OutboundMessage }> = [];
  failing = false;

  async send(phone: string, message: OutboundMessage): Promise<void> {
    if (this.failing) {
      throw new Error('transport down');
    }
    this.sent.push({ phone, message });
  }
}

export function makeTicket(overrides: Partial<Ticket> = {}): Ticket {
  return {
    id: 1,
    ticketNumber: 'TKT-2024-00001',
    phone: '+201001234567',
    product: 'White paint',
    issue: 'paint is too thick',
    issueCategory: 'consistency',
    photos: [],
    status: 'under_review',
    compensationType: null,
    routingOutcome: 'manual_review',
    routingRule: 'defect_without_photo',
    matchedKeyword: 'too thick',
    language: 'en',
    reviewer: null,
    reviewerNotes: null,
    decidedAt: null,
    assignedTechnicianId: null,
    sourceMessageId: null,
    createdAt: FIXED_NOW,
    updatedAt: FIXED_NOW,
    completedAt: null,
    lastRemindedAt: null,
    ...overrides,
  };
}
