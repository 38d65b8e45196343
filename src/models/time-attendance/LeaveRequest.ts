import Joi from 'joi';
import { v4 as uuidv4 } from 'uuid';
import {
  validateAndThrow,
  identifierSchema,
  requiredStringSchema
} from '../../utils/validation';
import {
  CalendarDate,
  DateRange,
  createDateRange,
  daysInRange,
  eachDateInRange,
  fromHundredths,
  overlaps,
  toHundredths
} from './TimeAccounting';
import {
  ApprovalStatus,
  APPROVAL_STATUSES,
  RuleCheck,
  RuleViolation,
  ruleCheck
} from './RuleViolation';
import type { TransitionPatch } from './ApprovalStateMachine';
import type { TaskEntry } from './TaskEntry';

export type LeaveType = 'FULL_DAY' | 'HALF_DAY' | 'SHORT_LEAVE';

export const FULL_DAY_LEAVE_HOURS = 8;

export interface LeaveRequestData {
  id?: string;
  ownerId: string;
  startDate: CalendarDate | Date;
  endDate: CalendarDate | Date;
  reason: string;
  hoursPerDay?: number;
  status: ApprovalStatus;
  createdAt: Date;
  updatedAt: Date;
  createdBy: string;
  updatedBy: string;
  reviewedBy?: string;
  reviewedAt?: Date;
  reviewComment?: string;
  version?: number;
}

/**
 * 2 hours or less is a short leave, up to 4 a half day, anything longer a full day.
 */
export function classifyLeaveType(hoursPerDay: number): LeaveType {
  if (hoursPerDay <= 2) {
    return 'SHORT_LEAVE';
  }
  if (hoursPerDay <= 4) {
    return 'HALF_DAY';
  }
  return 'FULL_DAY';
}

const leaveRequestSchema = Joi.object({
  id: identifierSchema.optional(),
  ownerId: identifierSchema,
  startDate: Joi.alternatives(Joi.string(), Joi.date()).required(),
  endDate: Joi.alternatives(Joi.string(), Joi.date()).required(),
  reason: requiredStringSchema.max(1000),
  hoursPerDay: Joi.number().greater(0).max(FULL_DAY_LEAVE_HOURS).optional(),
  status: Joi.string().valid(...APPROVAL_STATUSES).required(),
  createdAt: Joi.date().required(),
  updatedAt: Joi.date().required(),
  createdBy: requiredStringSchema,
  updatedBy: requiredStringSchema,
  reviewedBy: Joi.string().optional(),
  reviewedAt: Joi.date().optional(),
  reviewComment: Joi.string().allow('').max(1000).optional(),
  version: Joi.number().integer().min(0).optional()
});

export class LeaveRequest {
  public readonly id: string;
  public readonly ownerId: string;
  public readonly startDate: CalendarDate;
  public readonly endDate: CalendarDate;
  public readonly reason: string;
  public readonly hoursPerDay: number;
  public readonly leaveType: LeaveType;
  public readonly status: ApprovalStatus;
  public readonly createdAt: Date;
  public readonly updatedAt: Date;
  public readonly createdBy: string;
  public readonly updatedBy: string;
  public readonly reviewedBy?: string;
  public readonly reviewedAt?: Date;
  public readonly reviewComment?: string;
  public readonly version: number;

  constructor(data: LeaveRequestData) {
    validateAndThrow(leaveRequestSchema, data);

    // end < start is rejected here, before any cross-entity validation
    const range = createDateRange(data.startDate, data.endDate);

    this.id = data.id || uuidv4();
    this.ownerId = data.ownerId.trim();
    this.startDate = range.startDate;
    this.endDate = range.endDate;
    this.reason = data.reason.trim();
    this.hoursPerDay = fromHundredths(toHundredths(data.hoursPerDay ?? FULL_DAY_LEAVE_HOURS));
    this.leaveType = classifyLeaveType(this.hoursPerDay);
    this.status = data.status;
    this.createdAt = data.createdAt;
    this.updatedAt = data.updatedAt;
    this.createdBy = data.createdBy;
    this.updatedBy = data.updatedBy;
    this.reviewedBy = data.reviewedBy;
    this.reviewedAt = data.reviewedAt;
    this.reviewComment = data.reviewComment?.trim();
    this.version = data.version ?? 0;
  }

  public get range(): DateRange {
    return { startDate: this.startDate, endDate: this.endDate };
  }

  public get totalDays(): number {
    return daysInRange(this.range);
  }

  public get totalHours(): number {
    return fromHundredths(toHundredths(this.hoursPerDay) * this.totalDays);
  }

  public isActive(): boolean {
    return this.status !== 'REJECTED';
  }

  public withContent(
    changes: { startDate?: CalendarDate | Date; endDate?: CalendarDate | Date; reason?: string; hoursPerDay?: number },
    updatedBy: string,
    updatedAt: Date
  ): LeaveRequest {
    return new LeaveRequest({
      ...this.toData(),
      startDate: changes.startDate ?? this.startDate,
      endDate: changes.endDate ?? this.endDate,
      reason: changes.reason ?? this.reason,
      hoursPerDay: changes.hoursPerDay ?? this.hoursPerDay,
      updatedBy,
      updatedAt
    });
  }

  public withTransition(patch: TransitionPatch): LeaveRequest {
    return new LeaveRequest({
      ...this.toData(),
      ...patch,
      version: this.version + 1
    });
  }

  public toData(): LeaveRequestData {
    return {
      id: this.id,
      ownerId: this.ownerId,
      startDate: this.startDate,
      endDate: this.endDate,
      reason: this.reason,
      hoursPerDay: this.hoursPerDay,
      status: this.status,
      createdAt: this.createdAt,
      updatedAt: this.updatedAt,
      createdBy: this.createdBy,
      updatedBy: this.updatedBy,
      reviewedBy: this.reviewedBy,
      reviewedAt: this.reviewedAt,
      reviewComment: this.reviewComment,
      version: this.version
    };
  }

  public toJSON(): LeaveRequestData & { leaveType: LeaveType; totalDays: number } {
    return {
      ...this.toData(),
      leaveType: this.leaveType,
      totalDays: this.totalDays
    };
  }

  public static createDraft(
    ownerId: string,
    startDate: CalendarDate | Date,
    endDate: CalendarDate | Date,
    reason: string,
    createdBy: string,
    createdAt: Date,
    hoursPerDay?: number
  ): LeaveRequest {
    return new LeaveRequest({
      ownerId,
      startDate,
      endDate,
      reason,
      hoursPerDay,
      status: 'DRAFT',
      createdAt,
      updatedAt: createdAt,
      createdBy,
      updatedBy: createdBy,
      version: 0
    });
  }
}

/**
 * Checks a leave request against the owner's other leave and logged task
 * hours. The candidate's own prior version is ignored.
 */
export function validateCreate(
  existingLeaveForOwner: readonly LeaveRequest[],
  existingTaskEntriesForOwner: readonly TaskEntry[],
  candidate: LeaveRequest
): RuleCheck {
  const violations: RuleViolation[] = existingLeaveForOwner
    .filter(leave =>
      leave.id !== candidate.id &&
      leave.ownerId === candidate.ownerId &&
      leave.isActive() &&
      overlaps(leave.range, candidate.range)
    )
    .map(leave => ({
      code: 'LEAVE_OVERLAP' as const,
      conflictingId: leave.id,
      startDate: leave.startDate,
      endDate: leave.endDate
    }));

  const entriesByDate = new Map<CalendarDate, string[]>();
  for (const entry of existingTaskEntriesForOwner) {
    if (entry.ownerId !== candidate.ownerId || !entry.isActive() || entry.totalHundredths === 0) {
      continue;
    }
    entriesByDate.set(entry.workDate, [...(entriesByDate.get(entry.workDate) ?? []), entry.id]);
  }

  for (const date of eachDateInRange(candidate.range)) {
    const taskEntryIds = entriesByDate.get(date);
    if (taskEntryIds) {
      violations.push({ code: 'LEAVE_TASK_CONFLICT', date, taskEntryIds });
    }
  }

  return ruleCheck(violations);
}
