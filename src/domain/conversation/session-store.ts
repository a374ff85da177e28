import { Pool } from 'pg';
import { z } from 'zod';
import { ConversationSession } from '../../shared/types';
import { PersistenceError } from '../../shared/errors';
import { query, queryOne } from '../../infra/db/client';

/**
 * Per-phone conversation state. Exactly one session per phone; callers
 * serialize access per phone, so no locking is done here.
 */
export interface SessionStore {
  load(phone: string): Promise<ConversationSession | null>;
  save(session: ConversationSession): Promise<void>;
  clear(phone: string): Promise<void>;
  /** Reset every non-idle session last touched before `olderThan`. Returns the count. */
  resetIdle(olderThan: Date): Promise<number>;
}

export const mediaRefSchema = z.object({
  id: z.string().min(1),
  type: z.enum(['image', 'audio', 'video', 'document']),
  mimeType: z.string().optional(),
  caption: z.string().optional(),
});

const draftSchema = z.object({
  product: z.string().optional(),
  issue: z.string().optional(),
  photos: z.array(mediaRefSchema).default([]),
});

const sessionRowSchema = z.object({
  phone: z.string(),
  state: z.enum([
    'idle',
    'awaiting_menu_choice',
    'awaiting_product',
    'awaiting_issue',
    'awaiting_photo',
    'awaiting_confirmation',
    'completed',
  ]),
  language: z.enum(['ar', 'en']),
  draft: draftSchema,
  created_at: z.date(),
  updated_at: z.date(),
});

// ============================================================================
// PostgreSQL Implementation
// ============================================================================

export class PgSessionStore implements SessionStore {
  constructor(private db: Pool) {}

  async load(phone: string): Promise<ConversationSession | null> {
    const row = await queryOne(
      `SELECT phone, state, language, draft, created_at, updated_at
       FROM conversation_sessions
       WHERE phone = $1`,
      [phone],
      this.db
    );

    if (!row) return null;

    const parsed = sessionRowSchema.safeParse(row);
    if (!parsed.success) {
      throw new PersistenceError(`Corrupt session row for ${phone}: ${parsed.error.message}`);
    }

    return {
      phone: parsed.data.phone,
      state: parsed.data.state,
      language: parsed.data.language,
      draft: parsed.data.draft,
      createdAt: parsed.data.created_at,
      updatedAt: parsed.data.updated_at,
    };
  }

  async save(session: ConversationSession): Promise<void> {
    await query(
      `INSERT INTO conversation_sessions (phone, state, language, draft, created_at, updated_at)
       VALUES ($1, $2, $3, $4, $5, $6)
       ON CONFLICT (phone) DO UPDATE SET
         state = EXCLUDED.state,
         language = EXCLUDED.language,
         draft = EXCLUDED.draft,
         updated_at = EXCLUDED.updated_at`,
      [
        session.phone,
        session.state,
        session.language,
        JSON.stringify(session.draft),
        session.createdAt,
        session.updatedAt,
      ],
      this.db
    );
  }

  async clear(phone: string): Promise<void> {
    await query('DELETE FROM conversation_sessions WHERE phone = $1', [phone], this.db);
  }

  async resetIdle(olderThan: Date): Promise<number> {
    const result = await query(
      `UPDATE conversation_sessions
       SET state = 'idle', draft = '{"photos": []}'::jsonb, updated_at = NOW()
       WHERE state <> 'idle' AND updated_at < $1`,
      [olderThan],
      this.db
    );
    return result.rowCount ?? 0;
  }
}
