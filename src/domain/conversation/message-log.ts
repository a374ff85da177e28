import { Pool } from 'pg';
import { z } from 'zod';
import { ConversationMessage, NewConversationMessage } from '../../shared/types';
import { PersistenceError } from '../../shared/errors';
import { query, queryMany } from '../../infra/db/client';
import { mediaRefSchema } from './session-store';

/**
 * Transcript of everything said to and by a customer. Inbound entries are
 * keyed by WhatsApp message id, so a retried job appends its message once.
 */
export interface MessageLog {
  append(message: NewConversationMessage): Promise<void>;
  /** Newest first. */
  listForPhone(phone: string, limit?: number): Promise<ConversationMessage[]>;
}

const messageRowSchema = z.object({
  id: z.number(),
  phone: z.string(),
  direction: z.enum(['inbound', 'outbound']),
  body: z.string(),
  message_id: z.string().nullable(),
  attachments: z.array(mediaRefSchema),
  delivered: z.boolean().nullable(),
  created_at: z.date(),
});

function toMessage(row: unknown): ConversationMessage {
  const parsed = messageRowSchema.safeParse(row);
  if (!parsed.success) {
    throw new PersistenceError(`Corrupt message row: ${parsed.error.message}`);
  }
  const r = parsed.data;
  return {
    id: r.id,
    phone: r.phone,
    direction: r.direction,
    body: r.body,
    messageId: r.message_id,
    attachments: r.attachments,
    delivered: r.delivered,
    createdAt: r.created_at,
  };
}

export class PgMessageLog implements MessageLog {
  constructor(private db: Pool) {}

  async append(message: NewConversationMessage): Promise<void> {
    await query(
      `INSERT INTO conversation_messages (phone, direction, body, message_id, attachments, delivered, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       ON CONFLICT (message_id) DO NOTHING`,
      [
        message.phone,
        message.direction,
        message.body,
        message.messageId,
        JSON.stringify(message.attachments),
        message.delivered,
        message.createdAt,
      ],
      this.db
    );
  }

  async listForPhone(phone: string, limit: number = 50): Promise<ConversationMessage[]> {
    const rows = await queryMany(
      `SELECT id, phone, direction, body, message_id, attachments, delivered, created_at
       FROM conversation_messages
       WHERE phone = $1
       ORDER BY id DESC
       LIMIT $2`,
      [phone, limit],
      this.db
    );
    return rows.map(toMessage);
  }
}
