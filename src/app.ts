import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { TimesheetService } from './services/time-attendance/TimesheetService';
import { TimesheetController } from './controllers/time-attendance/TimesheetController';
import { createTimesheetRoutes } from './routes/time-attendance/timesheetRoutes';
import { IdentityProvider } from './middleware/authenticate';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { requestLogger } from './middleware/requestLogger';
import { correlationIdMiddleware } from './middleware/correlationId';

export interface AppDependencies<Tx> {
  timesheetService: TimesheetService<Tx>;
  identityProvider: IdentityProvider;
  healthCheck?: () => Promise<{ connected: boolean }>;
}

export const createApp = <Tx>(dependencies: AppDependencies<Tx>): express.Application => {
  const app = express();

  // Correlation ID tracking (should be first)
  app.use(correlationIdMiddleware);

  app.use(helmet());

  // CORS configuration
  app.use(cors({
    origin: process.env.ALLOWED_ORIGINS?.split(',') || ['http://localhost:3000'],
    credentials: true,
    methods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'x-request-id', 'x-correlation-id']
  }));

  // Body parsing middleware
  app.use(express.json({ limit: '1mb' }));

  // Request logging
  app.use(requestLogger);

  // Health check endpoint
  app.get('/health', (_req, res, next) => {
    const check = dependencies.healthCheck ?? (async () => ({ connected: true }));
    check()
      .then((database) => {
        res.status(database.connected ? 200 : 503).json({
          status: database.connected ? 'healthy' : 'degraded',
          database,
          timestamp: new Date().toISOString(),
          version: process.env.npm_package_version || '1.0.0'
        });
      })
      .catch(next);
  });

  // API routes
  const controller = new TimesheetController(dependencies.timesheetService);
  app.use('/api', createTimesheetRoutes(controller, dependencies.identityProvider));

  // 404 handler
  app.use(notFoundHandler);

  // Global error handler
  app.use(errorHandler);

  return app;
};
