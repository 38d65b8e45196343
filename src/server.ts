import dotenv from 'dotenv';
import { createApp } from './app';
import { logger } from './utils/logger';
import { database } from './database/connection';
import { checkDatabaseHealth } from './database/health';
import { PgTransactionRunner } from './database/transactionRunner';
import { ClientRepository, LeaveRequestRepository, TaskEntryRepository } from './database/repositories';
import { TimesheetService } from './services/time-attendance/TimesheetService';
import { NotificationService } from './services/time-attendance/NotificationService';
import { loadTimesheetPolicy } from './models/time-attendance/TimesheetPolicy';
import { JwtIdentityProvider } from './middleware/authenticate';

// Load environment variables
dotenv.config();

const PORT = process.env.PORT || 3000;
const NODE_ENV = process.env.NODE_ENV || 'development';

async function startServer(): Promise<void> {
  try {
    const policy = loadTimesheetPolicy();

    logger.info('Testing database connection...');
    await database.connect();

    const timesheetService = new TimesheetService({
      taskEntries: new TaskEntryRepository(),
      leaveRequests: new LeaveRequestRepository(),
      clients: new ClientRepository(),
      transactions: new PgTransactionRunner(),
      notifier: new NotificationService(),
      policy
    });

    const app = createApp({
      timesheetService,
      identityProvider: new JwtIdentityProvider({ secret: process.env.JWT_SECRET || '' }),
      healthCheck: checkDatabaseHealth
    });

    const server = app.listen(PORT, () => {
      logger.info('Timesheet API server started', {
        port: PORT,
        environment: NODE_ENV,
        dailyHourLimit: policy.dailyHourLimit,
        timestamp: new Date().toISOString()
      });
    });

    // Graceful shutdown handling
    const gracefulShutdown = (signal: string): void => {
      logger.info(`Received ${signal}, starting graceful shutdown...`);

      server.close(() => {
        logger.info('HTTP server closed');

        database.disconnect()
          .then(() => {
            logger.info('Database connections closed');
            process.exit(0);
          })
          .catch((error: unknown) => {
            logger.error('Error during database shutdown', {
              error: error instanceof Error ? error.message : 'Unknown error'
            });
            process.exit(1);
          });
      });

      // Force shutdown after 30 seconds
      setTimeout(() => {
        logger.error('Forced shutdown after timeout');
        process.exit(1);
      }, 30000).unref();
    };

    process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => gracefulShutdown('SIGINT'));

    process.on('uncaughtException', (error) => {
      logger.error('Uncaught Exception', { error: error.message, stack: error.stack });
      process.exit(1);
    });

    process.on('unhandledRejection', (reason) => {
      logger.error('Unhandled Rejection', { reason: reason instanceof Error ? reason.message : String(reason) });
      process.exit(1);
    });
  } catch (error) {
    logger.error('Failed to start server', {
      error: error instanceof Error ? error.message : 'Unknown error'
    });
    process.exit(1);
  }
}

void startServer();
