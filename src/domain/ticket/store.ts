import { Pool, PoolClient } from 'pg';
import { z } from 'zod';
import {
  CompleteComplaint,
  Language,
  ReviewerInfo,
  RoutingDecision,
  Technician,
  Ticket,
  TicketFilter,
  TicketStatus,
  TicketStatusChange,
} from '../../shared/types';
import { ConflictError, NotFoundError, PersistenceError, TicketNotFoundError } from '../../shared/errors';
import { query, queryMany, queryOne, withTransaction } from '../../infra/db/client';
import { logger } from '../../infra/logging/logger';
import { mediaRefSchema } from '../conversation/session-store';
import { applyStatusChange } from './lifecycle';
import { TicketNumberGenerator } from './number';

export interface CreateTicketContext {
  phone: string;
  language: Language;
  /** Inbound message that confirmed the complaint. Repeats return the same ticket. */
  sourceMessageId?: string;
}

export interface TicketStore {
  createTicket(complaint: CompleteComplaint, decision: RoutingDecision, context: CreateTicketContext): Promise<Ticket>;
  updateStatus(ticketNumber: string, status: TicketStatus, info: ReviewerInfo): Promise<Ticket>;
  findByNumber(ticketNumber: string): Promise<Ticket | null>;
  findLatestForPhone(phone: string): Promise<Ticket | null>;
  list(filter?: TicketFilter): Promise<Ticket[]>;
  getHistory(ticketNumber: string): Promise<TicketStatusChange[]>;
  /** Tickets still under review that were created before `olderThan`. */
  findOverdue(olderThan: Date): Promise<Ticket[]>;
  markReminded(ticketNumber: string, at: Date): Promise<void>;
  /** Assign to the given technician, or to the least-loaded active one. */
  assignTechnician(ticketNumber: string, technicianId?: number): Promise<Ticket>;
  listTechnicians(): Promise<Technician[]>;
}

// ============================================================================
// Row Mapping
// ============================================================================

const ticketStatus = z.enum(['new', 'under_review', 'decided', 'completed', 'cancelled', 'rejected']);

const ticketRowSchema = z.object({
  id: z.number(),
  ticket_number: z.string(),
  phone: z.string(),
  product: z.string(),
  issue: z.string(),
  issue_category: z.string(),
  photos: z.array(mediaRefSchema),
  status: ticketStatus,
  compensation_type: z.enum(['refund', 'replacement']).nullable(),
  routing_outcome: z.enum(['refund', 'replacement', 'manual_review']),
  routing_rule: z.enum(['defect_with_photo', 'defect_without_photo', 'wrong_item', 'default']),
  matched_keyword: z.string().nullable(),
  language: z.enum(['ar', 'en']),
  reviewer: z.string().nullable(),
  reviewer_notes: z.string().nullable(),
  decided_at: z.date().nullable(),
  assigned_technician_id: z.number().nullable(),
  source_message_id: z.string().nullable(),
  created_at: z.date(),
  updated_at: z.date(),
  completed_at: z.date().nullable(),
  last_reminded_at: z.date().nullable(),
});

const technicianRowSchema = z.object({
  id: z.number(),
  name: z.string(),
  active: z.boolean(),
  current_workload: z.number(),
  max_workload: z.number(),
});

const historyRowSchema = z.object({
  from_status: ticketStatus.nullable(),
  to_status: ticketStatus,
  changed_by: z.string(),
  reason: z.string().nullable(),
  created_at: z.date(),
});

const TICKET_COLUMNS = `id, ticket_number, phone, product, issue, issue_category, photos, status,
  compensation_type, routing_outcome, routing_rule, matched_keyword, language, reviewer,
  reviewer_notes, decided_at, assigned_technician_id, source_message_id, created_at,
  updated_at, completed_at, last_reminded_at`;

function toTicket(row: unknown): Ticket {
  const parsed = ticketRowSchema.safeParse(row);
  if (!parsed.success) {
    throw new PersistenceError(`Corrupt ticket row: ${parsed.error.message}`);
  }
  const r = parsed.data;
  return {
    id: r.id,
    ticketNumber: r.ticket_number,
    phone: r.phone,
    product: r.product,
    issue: r.issue,
    issueCategory: r.issue_category,
    photos: r.photos,
    status: r.status,
    compensationType: r.compensation_type,
    routingOutcome: r.routing_outcome,
    routingRule: r.routing_rule,
    matchedKeyword: r.matched_keyword,
    language: r.language,
    reviewer: r.reviewer,
    reviewerNotes: r.reviewer_notes,
    decidedAt: r.decided_at,
    assignedTechnicianId: r.assigned_technician_id,
    sourceMessageId: r.source_message_id,
    createdAt: r.created_at,
    updatedAt: r.updated_at,
    completedAt: r.completed_at,
    lastRemindedAt: r.last_reminded_at,
  };
}

function toTechnician(row: unknown): Technician {
  const parsed = technicianRowSchema.safeParse(row);
  if (!parsed.success) {
    throw new PersistenceError(`Corrupt technician row: ${parsed.error.message}`);
  }
  return {
    id: parsed.data.id,
    name: parsed.data.name,
    active: parsed.data.active,
    currentWorkload: parsed.data.current_workload,
    maxWorkload: parsed.data.max_workload,
  };
}

function toStatusChange(row: unknown): TicketStatusChange {
  const parsed = historyRowSchema.safeParse(row);
  if (!parsed.success) {
    throw new PersistenceError(`Corrupt ticket history row: ${parsed.error.message}`);
  }
  return {
    fromStatus: parsed.data.from_status,
    toStatus: parsed.data.to_status,
    changedBy: parsed.data.changed_by,
    reason: parsed.data.reason,
    createdAt: parsed.data.created_at,
  };
}

// ============================================================================
// PostgreSQL Implementation
// ============================================================================

export class PgTicketStore implements TicketStore {
  constructor(
    private db: Pool,
    private clock: () => Date = () => new Date()
  ) {}

  async createTicket(
    complaint: CompleteComplaint,
    decision: RoutingDecision,
    context: CreateTicketContext
  ): Promise<Ticket> {
    return withTransaction(async (client) => {
      if (context.sourceMessageId) {
        const existing = await queryOne(
          `SELECT ${TICKET_COLUMNS} FROM tickets WHERE source_message_id = $1`,
          [context.sourceMessageId],
          client
        );
        if (existing) {
          logger.info({ sourceMessageId: context.sourceMessageId }, 'Ticket already created for message');
          return toTicket(existing);
        }
      }

      const generator = new TicketNumberGenerator((year) => this.nextSequence(client, year), this.clock);
      const ticketNumber = await generator.next();

      const technicianId =
        decision.initialStatus === 'under_review' ? await this.claimTechnician(client) : null;

      const now = this.clock();
      const inserted = await queryOne(
        `INSERT INTO tickets (
           ticket_number, phone, product, issue, issue_category, photos, status,
           compensation_type, routing_outcome, routing_rule, matched_keyword, language,
           decided_at, assigned_technician_id, source_message_id, created_at, updated_at
         ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $16)
         RETURNING ${TICKET_COLUMNS}`,
        [
          ticketNumber,
          context.phone,
          complaint.product,
          complaint.issue,
          decision.issueCategory,
          JSON.stringify(complaint.photos),
          decision.initialStatus,
          decision.compensationType,
          decision.outcome,
          decision.rule,
          decision.matchedKeyword ?? null,
          context.language,
          decision.initialStatus === 'decided' ? now : null,
          technicianId,
          context.sourceMessageId ?? null,
          now,
        ],
        client
      );

      if (!inserted) {
        throw new PersistenceError(`Insert returned no row for ${ticketNumber}`);
      }
      const ticket = toTicket(inserted);

      await this.recordChange(client, ticket.id, null, 'new', 'system', null);
      await this.recordChange(client, ticket.id, 'new', decision.initialStatus, 'router', decision.rule);

      return ticket;
    });
  }

  async updateStatus(ticketNumber: string, status: TicketStatus, info: ReviewerInfo): Promise<Ticket> {
    return withTransaction(async (client) => {
      const current = await this.lockTicket(client, ticketNumber);
      const next = applyStatusChange(current, status, info, this.clock());

      const updated = await queryOne(
        `UPDATE tickets SET
           status = $2, compensation_type = $3, reviewer = $4, reviewer_notes = $5,
           decided_at = $6, completed_at = $7, updated_at = $8
         WHERE id = $1
         RETURNING ${TICKET_COLUMNS}`,
        [
          current.id,
          next.status,
          next.compensationType,
          next.reviewer,
          next.reviewerNotes,
          next.decidedAt,
          next.completedAt,
          next.updatedAt,
        ],
        client
      );
      if (!updated) {
        throw new TicketNotFoundError(ticketNumber);
      }

      if (current.status === 'under_review' && current.assignedTechnicianId !== null) {
        await this.releaseTechnician(client, current.assignedTechnicianId);
      }

      await this.recordChange(client, current.id, current.status, status, info.reviewer, info.notes ?? null);

      return toTicket(updated);
    });
  }

  async findByNumber(ticketNumber: string): Promise<Ticket | null> {
    const row = await queryOne(
      `SELECT ${TICKET_COLUMNS} FROM tickets WHERE ticket_number = $1`,
      [ticketNumber],
      this.db
    );
    return row ? toTicket(row) : null;
  }

  async findLatestForPhone(phone: string): Promise<Ticket | null> {
    const row = await queryOne(
      `SELECT ${TICKET_COLUMNS} FROM tickets
       WHERE phone = $1
       ORDER BY created_at DESC, id DESC
       LIMIT 1`,
      [phone],
      this.db
    );
    return row ? toTicket(row) : null;
  }

  async list(filter: TicketFilter = {}): Promise<Ticket[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (filter.status) {
      params.push(filter.status);
      conditions.push(`status = $${params.length}`);
    }
    if (filter.phone) {
      params.push(filter.phone);
      conditions.push(`phone = $${params.length}`);
    }
    if (filter.technicianId !== undefined) {
      params.push(filter.technicianId);
      conditions.push(`assigned_technician_id = $${params.length}`);
    }

    params.push(filter.limit ?? 50);
    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';

    const rows = await queryMany(
      `SELECT ${TICKET_COLUMNS} FROM tickets ${where}
       ORDER BY created_at DESC, id DESC
       LIMIT $${params.length}`,
      params,
      this.db
    );
    return rows.map(toTicket);
  }

  async getHistory(ticketNumber: string): Promise<TicketStatusChange[]> {
    const rows = await queryMany(
      `SELECT h.from_status, h.to_status, h.changed_by, h.reason, h.created_at
       FROM ticket_status_history h
       JOIN tickets t ON t.id = h.ticket_id
       WHERE t.ticket_number = $1
       ORDER BY h.id ASC`,
      [ticketNumber],
      this.db
    );
    return rows.map(toStatusChange);
  }

  async findOverdue(olderThan: Date): Promise<Ticket[]> {
    const rows = await queryMany(
      `SELECT ${TICKET_COLUMNS} FROM tickets
       WHERE status = 'under_review' AND created_at < $1
       ORDER BY created_at ASC`,
      [olderThan],
      this.db
    );
    return rows.map(toTicket);
  }

  async markReminded(ticketNumber: string, at: Date): Promise<void> {
    await query('UPDATE tickets SET last_reminded_at = $2 WHERE ticket_number = $1', [ticketNumber, at], this.db);
  }

  async listTechnicians(): Promise<Technician[]> {
    const rows = await queryMany(
      `SELECT id, name, active, current_workload, max_workload
       FROM technicians
       ORDER BY id ASC`,
      [],
      this.db
    );
    return rows.map(toTechnician);
  }

  async assignTechnician(ticketNumber: string, technicianId?: number): Promise<Ticket> {
    return withTransaction(async (client) => {
      const current = await this.lockTicket(client, ticketNumber);
      if (current.status !== 'new' && current.status !== 'under_review') {
        throw new ConflictError(`Ticket ${ticketNumber} is ${current.status} and cannot be reassigned`);
      }

      const assignee = technicianId ?? (await this.claimTechnician(client));
      if (assignee === null) {
        throw new ConflictError('No technician has capacity');
      }

      if (technicianId !== undefined) {
        const found = await query(
          `UPDATE technicians SET current_workload = current_workload + 1
           WHERE id = $1 AND active = true`,
          [technicianId],
          client
        );
        if ((found.rowCount ?? 0) === 0) {
          throw new NotFoundError(`Technician not found: ${technicianId}`);
        }
      }

      if (current.assignedTechnicianId !== null) {
        await this.releaseTechnician(client, current.assignedTechnicianId);
      }

      const updated = await queryOne(
        `UPDATE tickets SET assigned_technician_id = $2, updated_at = $3
         WHERE id = $1
         RETURNING ${TICKET_COLUMNS}`,
        [current.id, assignee, this.clock()],
        client
      );
      if (!updated) {
        throw new TicketNotFoundError(ticketNumber);
      }
      return toTicket(updated);
    });
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async nextSequence(client: PoolClient, year: number): Promise<number> {
    const row = await queryOne<{ last_value: number }>(
      `INSERT INTO ticket_sequences (year, last_value) VALUES ($1, 1)
       ON CONFLICT (year) DO UPDATE SET last_value = ticket_sequences.last_value + 1
       RETURNING last_value`,
      [year],
      client
    );
    if (!row) {
      throw new PersistenceError(`Sequence allocation failed for ${year}`);
    }
    return row.last_value;
  }

  private async lockTicket(client: PoolClient, ticketNumber: string): Promise<Ticket> {
    const row = await queryOne(
      `SELECT ${TICKET_COLUMNS} FROM tickets WHERE ticket_number = $1 FOR UPDATE`,
      [ticketNumber],
      client
    );
    if (!row) {
      throw new TicketNotFoundError(ticketNumber);
    }
    return toTicket(row);
  }

  /** Least-loaded active technician with spare capacity; workload is incremented. */
  private async claimTechnician(client: PoolClient): Promise<number | null> {
    const row = await queryOne<{ id: number }>(
      `UPDATE technicians SET current_workload = current_workload + 1
       WHERE id = (
         SELECT id FROM technicians
         WHERE active = true AND current_workload < max_workload
         ORDER BY current_workload ASC, id ASC
         LIMIT 1
         FOR UPDATE SKIP LOCKED
       )
       RETURNING id`,
      [],
      client
    );
    return row ? row.id : null;
  }

  private async releaseTechnician(client: PoolClient, technicianId: number): Promise<void> {
    await query(
      `UPDATE technicians SET current_workload = GREATEST(current_workload - 1, 0) WHERE id = $1`,
      [technicianId],
      client
    );
  }

  private async recordChange(
    client: PoolClient,
    ticketId: number,
    from: TicketStatus | null,
    to: TicketStatus,
    changedBy: string,
    reason: string | null
  ): Promise<void> {
    await query(
      `INSERT INTO ticket_status_history (ticket_id, from_status, to_status, changed_by, reason)
       VALUES ($1, $2, $3, $4, $5)`,
      [ticketId, from, to, changedBy, reason],
      client
    );
  }
}
