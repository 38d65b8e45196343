import { database } from './connection';
import { logger } from '../utils/logger';

export interface DatabaseHealthStatus {
  connected: boolean;
  responseTime: number;
  poolStats: {
    totalCount: number;
    idleCount: number;
    waitingCount: number;
  } | null;
  error?: string;
}

/**
 * Check database health and connection status
 */
export async function checkDatabaseHealth(): Promise<DatabaseHealthStatus> {
  const startTime = Date.now();

  try {
    await database.query('SELECT 1');

    return {
      connected: true,
      responseTime: Date.now() - startTime,
      poolStats: database.getPoolStats()
    };
  } catch (error) {
    const responseTime = Date.now() - startTime;
    const errorMessage = error instanceof Error ? error.message : 'Unknown database error';

    logger.error('Database health check failed', { error: errorMessage, responseTime });

    return {
      connected: false,
      responseTime,
      poolStats: database.getPoolStats(),
      error: errorMessage
    };
  }
}
