import type { CalendarDate } from './TimeAccounting';

export const APPROVAL_STATUSES = ['DRAFT', 'SUBMITTED', 'APPROVED', 'REJECTED'] as const;
export type ApprovalStatus = typeof APPROVAL_STATUSES[number];

export const APPROVAL_EVENTS = ['update', 'submit', 'approve', 'reject', 'delete', 'resubmit'] as const;
export type ApprovalEvent = typeof APPROVAL_EVENTS[number];

export type InvalidHoursReason = 'NEGATIVE' | 'NOT_POSITIVE' | 'PRECISION' | 'GRANULARITY' | 'OUT_OF_RANGE';

/**
 * Every business-rule rejection the engine can produce. Each variant carries
 * what a caller needs to render a precise message.
 */
export type RuleViolation =
  | { code: 'INVALID_RANGE'; startDate: CalendarDate; endDate: CalendarDate }
  | { code: 'INVALID_HOURS'; hours: number; reason: InvalidHoursReason; subTaskIndex?: number; granularity?: number }
  | { code: 'EMPTY_SUBTASK_SET'; entryId: string }
  | { code: 'UNKNOWN_CLIENT'; clientId: string; subTaskIndex: number }
  | { code: 'DAILY_HOURS_EXCEEDED'; date: CalendarDate; attempted: number; limit: number }
  | { code: 'LEAVE_OVERLAP'; conflictingId: string; startDate: CalendarDate; endDate: CalendarDate }
  | { code: 'LEAVE_TASK_CONFLICT'; date: CalendarDate; taskEntryIds: string[] }
  | { code: 'TASK_LEAVE_CONFLICT'; date: CalendarDate; leaveRequestId: string }
  | { code: 'INVALID_TRANSITION'; recordId: string; from: ApprovalStatus; event: ApprovalEvent }
  | { code: 'FORBIDDEN'; actorId: string; event: ApprovalEvent; reason: 'ROLE' | 'OWNERSHIP' }
  | { code: 'REVIEW_COMMENT_REQUIRED'; recordId: string; event: ApprovalEvent };

export type RuleViolationCode = RuleViolation['code'];

export interface RuleCheck {
  isValid: boolean;
  violations: RuleViolation[];
}

export function ruleCheck(violations: RuleViolation[]): RuleCheck {
  return { isValid: violations.length === 0, violations };
}

export function mergeRuleChecks(...checks: RuleCheck[]): RuleCheck {
  return ruleCheck(checks.flatMap(check => check.violations));
}

export function formatHours(hours: number): string {
  const fixed = hours.toFixed(2);
  return fixed.endsWith('0') ? hours.toFixed(1) : fixed;
}

const INVALID_HOURS_MESSAGES: Record<InvalidHoursReason, string> = {
  NEGATIVE: 'hours cannot be negative',
  NOT_POSITIVE: 'hours must be greater than zero',
  PRECISION: 'hours allow at most two decimal places',
  GRANULARITY: 'hours must be a multiple of the configured granularity',
  OUT_OF_RANGE: 'hours are outside the allowed range'
};

export function describeViolation(violation: RuleViolation): string {
  switch (violation.code) {
    case 'INVALID_RANGE':
      return `invalid date range ${violation.startDate}..${violation.endDate}: end date is before start date`;
    case 'INVALID_HOURS': {
      const position = violation.subTaskIndex === undefined ? '' : ` on sub-task ${violation.subTaskIndex + 1}`;
      const granularity = violation.reason === 'GRANULARITY' && violation.granularity !== undefined
        ? ` (${formatHours(violation.granularity)})`
        : '';
      return `invalid value ${violation.hours}${position}: ${INVALID_HOURS_MESSAGES[violation.reason]}${granularity}`;
    }
    case 'EMPTY_SUBTASK_SET':
      return `task entry ${violation.entryId} has no sub-tasks`;
    case 'UNKNOWN_CLIENT':
      return `client ${violation.clientId} on sub-task ${violation.subTaskIndex + 1} does not exist or is inactive`;
    case 'DAILY_HOURS_EXCEEDED':
      return `cannot log ${formatHours(violation.attempted)} hours on ${violation.date}: daily limit is ${formatHours(violation.limit)}`;
    case 'LEAVE_OVERLAP':
      return `leave overlaps existing request ${violation.conflictingId} (${violation.startDate}..${violation.endDate})`;
    case 'LEAVE_TASK_CONFLICT':
      return `cannot take leave on ${violation.date}: task hours are already logged for that date`;
    case 'TASK_LEAVE_CONFLICT':
      return `cannot log task hours on ${violation.date}: leave request ${violation.leaveRequestId} covers that date`;
    case 'INVALID_TRANSITION':
      return `cannot ${violation.event} record ${violation.recordId} while it is ${violation.from}`;
    case 'FORBIDDEN':
      return violation.reason === 'ROLE'
        ? `user ${violation.actorId} lacks the role required to ${violation.event}`
        : `user ${violation.actorId} does not own the record and cannot ${violation.event} it`;
    case 'REVIEW_COMMENT_REQUIRED':
      return `a comment is required to ${violation.event} record ${violation.recordId}`;
    default: {
      const unreachable: never = violation;
      return String(unreachable);
    }
  }
}
