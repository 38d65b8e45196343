// Export all modules for easy access
export * from './models';
export * from './services';
export * from './database';
export { TimesheetController } from './controllers/time-attendance/TimesheetController';
export { createTimesheetRoutes } from './routes/time-attendance/timesheetRoutes';
export { authenticate, requireRole, JwtIdentityProvider } from './middleware/authenticate';
export type { IdentityProvider } from './middleware/authenticate';
export { errorHandler, notFoundHandler } from './middleware/errorHandler';
export { logger } from './utils/logger';
export * from './utils/errors';
export * from './utils/timesheetErrors';
export { systemClock, fixedClock } from './utils/clock';
export type { Clock } from './utils/clock';
export { createApp } from './app';
export type { AppDependencies } from './app';
