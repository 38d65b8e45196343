// Timesheet models
export * from './TimeAccounting';
export * from './RuleViolation';
export * from './TimesheetPolicy';
export * from './TaskEntry';
export * from './LeaveRequest';
export * from './ApprovalStateMachine';
