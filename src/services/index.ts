// Export all service classes
export * from './time-attendance';
