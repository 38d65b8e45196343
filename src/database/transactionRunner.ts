import { database } from './connection';
import { LockRequest, SqlClient, TransactionRunner, TransactionalConnection } from './repositories/types';

/**
 * Collapses duplicate keys (exclusive wins) and sorts by key so every
 * transaction acquires its advisory locks in the same order.
 */
export function orderLocks(locks: readonly LockRequest[]): LockRequest[] {
  const byKey = new Map<string, LockRequest>();
  for (const lock of locks) {
    const existing = byKey.get(lock.key);
    if (!existing || lock.mode === 'EXCLUSIVE') {
      byKey.set(lock.key, lock);
    }
  }
  return [...byKey.values()].sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
}

/**
 * Runs work inside one pg transaction after taking transaction-scoped
 * advisory locks. The locks are released on COMMIT or ROLLBACK.
 */
export class PgTransactionRunner implements TransactionRunner<SqlClient> {
  constructor(private readonly connection: TransactionalConnection = database) {}

  async run<R>(locks: readonly LockRequest[], work: (client: SqlClient) => Promise<R>): Promise<R> {
    return this.connection.transaction(async (client) => {
      for (const lock of orderLocks(locks)) {
        await client.query(
          lock.mode === 'SHARED'
            ? 'SELECT pg_advisory_xact_lock_shared(hashtext($1))'
            : 'SELECT pg_advisory_xact_lock(hashtext($1))',
          [lock.key]
        );
      }
      return work(client);
    });
  }
}
