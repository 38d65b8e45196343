import Joi from 'joi';
import { v4 as uuidv4 } from 'uuid';
import {
  validateAndThrow,
  identifierSchema,
  requiredStringSchema
} from '../../utils/validation';
import {
  CalendarDate,
  containsDate,
  fromHundredths,
  parseCalendarDate,
  toHundredths
} from './TimeAccounting';
import {
  ApprovalStatus,
  APPROVAL_STATUSES,
  RuleCheck,
  RuleViolation,
  ruleCheck
} from './RuleViolation';
import { DEFAULT_TIMESHEET_POLICY, TimesheetPolicy } from './TimesheetPolicy';
import type { TransitionPatch } from './ApprovalStateMachine';

export interface SubTaskData {
  clientId: string;
  title?: string;
  description: string;
  hours: number;
}

export interface TaskEntryData {
  id?: string;
  ownerId: string;
  workDate: CalendarDate | Date;
  subTasks: SubTaskData[];
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
 * Minimal view of a leave request needed to keep task hours off leave days.
 */
export interface LeaveSpan {
  id: string;
  ownerId: string;
  status: ApprovalStatus;
  startDate: CalendarDate;
  endDate: CalendarDate;
}

const subTaskSchema = Joi.object<SubTaskData>({
  clientId: identifierSchema,
  title: Joi.string().trim().max(255).optional(),
  description: Joi.string().trim().allow('').max(500).required(),
  hours: Joi.number().min(0).required()
});

export class SubTask {
  public readonly clientId: string;
  public readonly title?: string;
  public readonly description: string;
  public readonly hours: number;
  public readonly hundredths: number;

  constructor(data: SubTaskData, index: number = 0) {
    // Hour precision is checked first so the rejection names the offending sub-task
    this.hundredths = toHundredths(data.hours, index);

    const value = validateAndThrow(subTaskSchema, data);
    this.clientId = value.clientId;
    this.title = value.title;
    this.description = value.description;
    this.hours = fromHundredths(this.hundredths);
  }

  public toJSON(): SubTaskData {
    return {
      clientId: this.clientId,
      title: this.title,
      description: this.description,
      hours: this.hours
    };
  }
}

const taskEntrySchema = Joi.object({
  id: identifierSchema.optional(),
  ownerId: identifierSchema,
  workDate: Joi.alternatives(Joi.string(), Joi.date()).required(),
  subTasks: Joi.array().items(Joi.object()).required(),
  status: Joi.string().valid(...APPROVAL_STATUSES).required(),
  createdAt: Joi.date().required(),
  updatedAt: Joi.date().required(),
  createdBy: requiredStringSchema,
  updatedBy: requiredStringSchema,
  reviewedBy: Joi.string().optional(),
  reviewedAt: Joi.date().optional(),
  reviewComment: Joi.string().allow('').max(500).optional(),
  version: Joi.number().integer().min(0).optional()
});

export class TaskEntry {
  public readonly id: string;
  public readonly ownerId: string;
  public readonly workDate: CalendarDate;
  public readonly subTasks: readonly SubTask[];
  public readonly status: ApprovalStatus;
  public readonly createdAt: Date;
  public readonly updatedAt: Date;
  public readonly createdBy: string;
  public readonly updatedBy: string;
  public readonly reviewedBy?: string;
  public readonly reviewedAt?: Date;
  public readonly reviewComment?: string;
  public readonly version: number;

  constructor(data: TaskEntryData) {
    validateAndThrow(taskEntrySchema, data);

    this.id = data.id || uuidv4();
    this.ownerId = data.ownerId.trim();
    this.workDate = parseCalendarDate(data.workDate);
    this.subTasks = data.subTasks.map((subTask, index) => new SubTask(subTask, index));
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

  public get totalHundredths(): number {
    return this.subTasks.reduce((sum, subTask) => sum + subTask.hundredths, 0);
  }

  public get totalHours(): number {
    return fromHundredths(this.totalHundredths);
  }

  public isDraft(): boolean {
    return this.status === 'DRAFT';
  }

  /**
   * Counts toward the daily cap and leave conflicts.
   */
  public isActive(): boolean {
    return this.status !== 'REJECTED';
  }

  public withContent(
    changes: { workDate?: CalendarDate | Date; subTasks?: SubTaskData[] },
    updatedBy: string,
    updatedAt: Date
  ): TaskEntry {
    return new TaskEntry({
      ...this.toData(),
      workDate: changes.workDate ?? this.workDate,
      subTasks: changes.subTasks ?? this.subTasks.map(subTask => subTask.toJSON()),
      updatedBy,
      updatedAt
    });
  }

  public withTransition(patch: TransitionPatch): TaskEntry {
    return new TaskEntry({
      ...this.toData(),
      ...patch,
      version: this.version + 1
    });
  }

  public toData(): TaskEntryData {
    return {
      id: this.id,
      ownerId: this.ownerId,
      workDate: this.workDate,
      subTasks: this.subTasks.map(subTask => subTask.toJSON()),
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

  public toJSON(): TaskEntryData & { totalHours: number } {
    return {
      ...this.toData(),
      totalHours: this.totalHours
    };
  }

  public static createDraft(
    ownerId: string,
    workDate: CalendarDate | Date,
    subTasks: SubTaskData[],
    createdBy: string,
    createdAt: Date
  ): TaskEntry {
    return new TaskEntry({
      ownerId,
      workDate,
      subTasks,
      status: 'DRAFT',
      createdAt,
      updatedAt: createdAt,
      createdBy,
      updatedBy: createdBy,
      version: 0
    });
  }
}

function checkSubTaskHours(candidate: TaskEntry, policy: TimesheetPolicy): RuleViolation[] {
  const granularity = policy.hourGranularity === undefined ? undefined : toHundredths(policy.hourGranularity);

  return candidate.subTasks.flatMap((subTask, index): RuleViolation[] => {
    if (subTask.hundredths <= 0) {
      return [{ code: 'INVALID_HOURS', hours: subTask.hours, reason: 'NOT_POSITIVE', subTaskIndex: index }];
    }
    if (granularity !== undefined && subTask.hundredths % granularity !== 0) {
      return [{
        code: 'INVALID_HOURS',
        hours: subTask.hours,
        reason: 'GRANULARITY',
        subTaskIndex: index,
        granularity: policy.hourGranularity
      }];
    }
    return [];
  });
}

/**
 * Checks a new or changed entry against the other entries its owner has on
 * the same day. The candidate's prior version, if present, is ignored.
 */
export function validateCreateOrUpdate(
  existingEntriesForDay: readonly TaskEntry[],
  candidateEntry: TaskEntry,
  policy: TimesheetPolicy = DEFAULT_TIMESHEET_POLICY
): RuleCheck {
  const violations: RuleViolation[] = checkSubTaskHours(candidateEntry, policy);

  if (!candidateEntry.isDraft() && candidateEntry.subTasks.length === 0) {
    violations.push({ code: 'EMPTY_SUBTASK_SET', entryId: candidateEntry.id });
  }

  const existingHundredths = existingEntriesForDay
    .filter(entry =>
      entry.id !== candidateEntry.id &&
      entry.ownerId === candidateEntry.ownerId &&
      entry.workDate === candidateEntry.workDate &&
      entry.isActive()
    )
    .reduce((sum, entry) => sum + entry.totalHundredths, 0);

  const attempted = existingHundredths + candidateEntry.totalHundredths;
  if (attempted > toHundredths(policy.dailyHourLimit)) {
    violations.push({
      code: 'DAILY_HOURS_EXCEEDED',
      date: candidateEntry.workDate,
      attempted: fromHundredths(attempted),
      limit: policy.dailyHourLimit
    });
  }

  return ruleCheck(violations);
}

/**
 * Task hours may not land on a day covered by a live leave request.
 */
export function validateAgainstLeave(
  leaveForOwner: readonly LeaveSpan[],
  candidateEntry: TaskEntry
): RuleCheck {
  if (candidateEntry.totalHundredths === 0) {
    return ruleCheck([]);
  }

  const violations: RuleViolation[] = leaveForOwner
    .filter(leave =>
      leave.ownerId === candidateEntry.ownerId &&
      leave.status !== 'REJECTED' &&
      containsDate(leave, candidateEntry.workDate)
    )
    .map(leave => ({
      code: 'TASK_LEAVE_CONFLICT' as const,
      date: candidateEntry.workDate,
      leaveRequestId: leave.id
    }));

  return ruleCheck(violations);
}

/**
 * Sub-tasks must reference clients known to be active, when the caller
 * supplies that set.
 */
export function validateClients(
  candidateEntry: TaskEntry,
  activeClientIds?: ReadonlySet<string>
): RuleCheck {
  if (!activeClientIds) {
    return ruleCheck([]);
  }

  const violations: RuleViolation[] = candidateEntry.subTasks.flatMap((subTask, index): RuleViolation[] =>
    activeClientIds.has(subTask.clientId)
      ? []
      : [{ code: 'UNKNOWN_CLIENT', clientId: subTask.clientId, subTaskIndex: index }]
  );

  return ruleCheck(violations);
}
