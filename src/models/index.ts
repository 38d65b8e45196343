// Export all model interfaces and types
export * from './User';

// Time and Attendance models
export * from './time-attendance';
