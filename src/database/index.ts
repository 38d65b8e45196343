// Export database connection
export { database, DatabaseConnection, loadDatabaseConfig } from './connection';
export { PgTransactionRunner, orderLocks } from './transactionRunner';

// Export migration runner
export { MIGRATIONS, applyPendingMigrations } from './migrations';

export * from './repositories';
export * from './health';
