// Timesheet services

export * from './ValidationOrchestrator';
export * from './TimesheetService';
export * from './NotificationService';
