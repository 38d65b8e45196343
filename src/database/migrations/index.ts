import { database } from '../connection';
import { SqlClient, TransactionalConnection } from '../repositories/types';
import { logger } from '../../utils/logger';
import { createTimesheetTables } from './scripts/001_create_timesheet_tables';

export interface Migration {
  id: string;
  name: string;
  up: (client: SqlClient) => Promise<void>;
}

export const MIGRATIONS: readonly Migration[] = [
  { id: '001', name: 'create_timesheet_tables', up: createTimesheetTables }
];

const CREATE_MIGRATIONS_TABLE = `
  CREATE TABLE IF NOT EXISTS schema_migrations (
    id VARCHAR(255) PRIMARY KEY,
    name VARCHAR(255) NOT NULL,
    executed_at TIMESTAMP WITH TIME ZONE DEFAULT CURRENT_TIMESTAMP
  )
`;

/**
 * Applies, in id order, every migration not yet recorded in
 * schema_migrations. Each one runs in its own transaction together with its
 * bookkeeping row. Returns the ids applied by this call.
 */
export async function applyPendingMigrations(
  connection: TransactionalConnection = database,
  migrations: readonly Migration[] = MIGRATIONS
): Promise<string[]> {
  const executed = await connection.transaction(async (client) => {
    await client.query(CREATE_MIGRATIONS_TABLE);
    const result = await client.query<{ id: string }>('SELECT id FROM schema_migrations');
    return new Set(result.rows.map(row => row.id));
  });

  const pending = [...migrations]
    .filter(migration => !executed.has(migration.id))
    .sort((a, b) => a.id.localeCompare(b.id));

  if (pending.length === 0) {
    logger.info('No pending migrations');
    return [];
  }

  for (const migration of pending) {
    logger.info('Running migration', { id: migration.id, name: migration.name });
    await connection.transaction(async (client) => {
      await migration.up(client);
      await client.query('INSERT INTO schema_migrations (id, name) VALUES ($1, $2)', [migration.id, migration.name]);
    });
  }

  const applied = pending.map(migration => migration.id);
  logger.info('Migrations completed', { applied });
  return applied;
}
