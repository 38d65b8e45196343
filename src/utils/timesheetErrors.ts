import { AppError } from './errors';
import {
  RuleViolation,
  RuleViolationCode,
  describeViolation
} from '../models/time-attendance/RuleViolation';

const STATUS_BY_CODE: Record<RuleViolationCode, number> = {
  INVALID_RANGE: 400,
  INVALID_HOURS: 400,
  EMPTY_SUBTASK_SET: 400,
  UNKNOWN_CLIENT: 400,
  REVIEW_COMMENT_REQUIRED: 400,
  DAILY_HOURS_EXCEEDED: 409,
  LEAVE_OVERLAP: 409,
  LEAVE_TASK_CONFLICT: 409,
  TASK_LEAVE_CONFLICT: 409,
  INVALID_TRANSITION: 409,
  FORBIDDEN: 403
};

/**
 * Typed business-rule rejection. Thrown by model constructors for malformed
 * input and by the service layer when a decision is rejected.
 */
export class RuleViolationError extends AppError {
  public readonly violations: RuleViolation[];

  constructor(violations: RuleViolation[]) {
    const [first] = violations;
    super(
      violations.length > 0 ? violations.map(describeViolation).join('; ') : 'Rule violation',
      first ? first.code : 'RULE_VIOLATION',
      first ? STATUS_BY_CODE[first.code] : 400,
      { violations }
    );
    this.violations = violations;
  }
}

export class ConcurrencyConflictError extends AppError {
  constructor(resourceType: string, resourceId: string) {
    super(
      `The ${resourceType} was modified by another request`,
      'CONCURRENT_MODIFICATION',
      409,
      { resourceType, resourceId, suggestion: 'Reload the record and try again' }
    );
  }
}

