export * from './TaskEntryRepository';
export * from './LeaveRequestRepository';
export * from './ClientRepository';
