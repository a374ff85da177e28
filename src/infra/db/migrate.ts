import { readdirSync, readFileSync } from 'fs';
import path from 'path';
import { closeDatabase, query, queryMany, withTransaction } from './client';
import { logger } from '../logging/logger';

const MIGRATIONS_DIR = path.join(__dirname, '..', '..', '..', 'migrations');

/**
 * Apply pending SQL files from migrations/ in file-name order. Each file runs
 * in its own transaction and is recorded in schema_migrations.
 */
export async function runMigrations(dir: string = MIGRATIONS_DIR): Promise<string[]> {
  await query(
    `CREATE TABLE IF NOT EXISTS schema_migrations (
       name VARCHAR(200) PRIMARY KEY,
       applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
     )`
  );

  const applied = new Set(
    (await queryMany<{ name: string }>('SELECT name FROM schema_migrations')).map((row) => row.name)
  );

  const pending = readdirSync(dir)
    .filter((file) => file.endsWith('.sql') && !applied.has(file))
    .sort();

  for (const file of pending) {
    const sql = readFileSync(path.join(dir, file), 'utf-8');
    await withTransaction(async (client) => {
      // No parameters: multi-statement files need the simple query protocol
      await query(sql, undefined, client);
      await query('INSERT INTO schema_migrations (name) VALUES ($1)', [file], client);
    });
    logger.info({ migration: file }, 'Migration applied');
  }

  return pending;
}

if (require.main === module) {
  runMigrations()
    .then(async (applied) => {
      logger.info({ count: applied.length }, 'Migrations complete');
      await closeDatabase();
    })
    .catch(async (err: unknown) => {
      logger.error({ err }, 'Migration failed');
      await closeDatabase();
      process.exit(1);
    });
}
