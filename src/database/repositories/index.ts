// Export base repository classes and interfaces
export * from './base';
export * from './types';

// Export timesheet repositories
export * from './time-attendance';
