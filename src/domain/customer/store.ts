import { Pool } from 'pg';
import { z } from 'zod';
import { Customer, Language } from '../../shared/types';
import { PersistenceError } from '../../shared/errors';
import { queryOne } from '../../infra/db/client';

export interface CustomerContact {
  language: Language;
  /** Profile name from WhatsApp; a missing name keeps the stored one. */
  contactName?: string;
}

export interface CustomerStore {
  /** Create the customer on first contact, refresh name and language after. */
  upsert(phone: string, contact: CustomerContact, at: Date): Promise<Customer>;
  findByPhone(phone: string): Promise<Customer | null>;
}

const customerRowSchema = z.object({
  phone: z.string(),
  contact_name: z.string().nullable(),
  language: z.enum(['ar', 'en']),
  created_at: z.date(),
  updated_at: z.date(),
});

function toCustomer(row: unknown): Customer {
  const parsed = customerRowSchema.safeParse(row);
  if (!parsed.success) {
    throw new PersistenceError(`Corrupt customer row: ${parsed.error.message}`);
  }
  return {
    phone: parsed.data.phone,
    contactName: parsed.data.contact_name,
    language: parsed.data.language,
    createdAt: parsed.data.created_at,
    updatedAt: parsed.data.updated_at,
  };
}

export class PgCustomerStore implements CustomerStore {
  constructor(private db: Pool) {}

  async upsert(phone: string, contact: CustomerContact, at: Date): Promise<Customer> {
    const row = await queryOne(
      `INSERT INTO customers (phone, contact_name, language, created_at, updated_at)
       VALUES ($1, $2, $3, $4, $4)
       ON CONFLICT (phone) DO UPDATE SET
         contact_name = COALESCE(EXCLUDED.contact_name, customers.contact_name),
         language = EXCLUDED.language,
         updated_at = EXCLUDED.updated_at
       RETURNING phone, contact_name, language, created_at, updated_at`,
      [phone, contact.contactName ?? null, contact.language, at],
      this.db
    );
    if (!row) {
      throw new PersistenceError(`Customer upsert returned no row for ${phone}`);
    }
    return toCustomer(row);
  }

  async findByPhone(phone: string): Promise<Customer | null> {
    const row = await queryOne(
      `SELECT phone, contact_name, language, created_at, updated_at
       FROM customers
       WHERE phone = $1`,
      [phone],
      this.db
    );
    return row ? toCustomer(row) : null;
  }
}
