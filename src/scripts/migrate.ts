import dotenv from 'dotenv';
import { database, applyPendingMigrations } from '../database';
import { logger } from '../utils/logger';

// Load environment variables
dotenv.config();

async function main(): Promise<void> {
  try {
    await database.connect();
    await applyPendingMigrations(database);
  } catch (error) {
    logger.error('Database migration failed', {
      error: error instanceof Error ? error.message : 'Unknown error'
    });
    process.exitCode = 1;
  } finally {
    await database.disconnect();
  }
}

void main();
