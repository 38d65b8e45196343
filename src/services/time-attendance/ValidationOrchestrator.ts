import {
  TaskEntry,
  SubTaskData,
  LeaveSpan,
  validateAgainstLeave,
  validateClients,
  validateCreateOrUpdate
} from '../../models/time-attendance/TaskEntry';
import { LeaveRequest, validateCreate } from '../../models/time-attendance/LeaveRequest';
import {
  Approvable,
  ApprovalDecision,
  ApprovalStateMachine,
  TransitionResult
} from '../../models/time-attendance/ApprovalStateMachine';
import { ApprovalEvent, RuleCheck, RuleViolation, mergeRuleChecks } from '../../models/time-attendance/RuleViolation';
import { CalendarDate } from '../../models/time-attendance/TimeAccounting';
import { DEFAULT_TIMESHEET_POLICY, TimesheetPolicy } from '../../models/time-attendance/TimesheetPolicy';
import { Actor } from '../../models/User';
import { Clock } from '../../utils/clock';
import { RuleViolationError } from '../../utils/timesheetErrors';

export type Decision<T> =
  | { accepted: true; record: T; removed: boolean; decision?: ApprovalDecision }
  | { accepted: false; violations: RuleViolation[] };

/**
 * Everything a task entry is checked against. `entriesForDay` holds the
 * owner's entries on the candidate's work date.
 */
export interface TaskEntryContext {
  entriesForDay: readonly TaskEntry[];
  leaveForOwner: readonly LeaveSpan[];
  activeClientIds?: ReadonlySet<string>;
}

export interface LeaveContext {
  leaveForOwner: readonly LeaveRequest[];
  taskEntriesForOwner: readonly TaskEntry[];
}

export interface TaskEntryInput {
  workDate: CalendarDate | Date;
  subTasks: SubTaskData[];
}

export interface TaskEntryChanges {
  workDate?: CalendarDate | Date;
  subTasks?: SubTaskData[];
}

export interface LeaveRequestInput {
  startDate: CalendarDate | Date;
  endDate: CalendarDate | Date;
  reason: string;
  hoursPerDay?: number;
}

export type LeaveRequestChanges = Partial<LeaveRequestInput>;

export type RevalidationTarget =
  | { kind: 'TASK_ENTRY'; record: TaskEntry; context: TaskEntryContext }
  | { kind: 'LEAVE_REQUEST'; record: LeaveRequest; context: LeaveContext };

type Built<T> = { ok: true; value: T } | { ok: false; violations: RuleViolation[] };

/**
 * Model constructors throw for malformed hours and ranges. Those become
 * rejected decisions; any other failure propagates.
 */
function build<T>(factory: () => T): Built<T> {
  try {
    return { ok: true, value: factory() };
  } catch (error) {
    if (error instanceof RuleViolationError) {
      return { ok: false, violations: error.violations };
    }
    throw error;
  }
}

function rejected<T>(violations: RuleViolation[]): Decision<T> {
  return { accepted: false, violations };
}

function fromCheck<T>(check: RuleCheck, record: T): Decision<T> {
  return check.isValid ? { accepted: true, record, removed: false } : rejected(check.violations);
}

function fromTransition<T>(result: TransitionResult<T>): Decision<T> {
  if (!result.accepted) {
    return rejected(result.violations);
  }
  return { accepted: true, record: result.record, removed: result.removed, decision: result.decision };
}

/**
 * Single entry point for every timesheet mutation. Each operation takes the
 * consistency snapshot it needs plus the acting user and returns a decision
 * without touching storage. A rejected decision leaves nothing applied.
 */
export class ValidationOrchestrator {
  private readonly taskMachine: ApprovalStateMachine<TaskEntry>;
  private readonly leaveMachine: ApprovalStateMachine<LeaveRequest>;

  constructor(
    private readonly clock: Clock,
    private readonly policy: TimesheetPolicy = DEFAULT_TIMESHEET_POLICY
  ) {
    const options = { requireRejectionComment: policy.requireRejectionComment };
    this.taskMachine = new ApprovalStateMachine<TaskEntry>(options);
    this.leaveMachine = new ApprovalStateMachine<LeaveRequest>(options);
  }

  // Task entries

  public createTaskEntry(input: TaskEntryInput, actor: Actor, context: TaskEntryContext): Decision<TaskEntry> {
    const candidate = build(() =>
      TaskEntry.createDraft(actor.id, input.workDate, input.subTasks, actor.id, this.clock.now())
    );
    if (!candidate.ok) {
      return rejected(candidate.violations);
    }
    return fromCheck(this.checkTaskEntry(candidate.value, context), candidate.value);
  }

  public updateTaskEntry(
    entry: TaskEntry,
    changes: TaskEntryChanges,
    actor: Actor,
    context: TaskEntryContext
  ): Decision<TaskEntry> {
    const now = this.clock.now();
    const transition = this.taskMachine.transition(entry, 'update', actor, now);
    if (!transition.accepted) {
      return rejected(transition.violations);
    }

    const candidate = build(() => transition.record.withContent(changes, actor.id, now));
    if (!candidate.ok) {
      return rejected(candidate.violations);
    }
    return fromCheck(this.checkTaskEntry(candidate.value, context), candidate.value);
  }

  /**
   * Submission re-runs the aggregate checks against the current snapshot,
   * which may have changed since the draft was last saved.
   */
  public submitTaskEntry(entry: TaskEntry, actor: Actor, context: TaskEntryContext): Decision<TaskEntry> {
    const transition = this.taskMachine.transition(entry, 'submit', actor, this.clock.now());
    if (!transition.accepted) {
      return rejected(transition.violations);
    }
    return fromCheck(this.checkTaskEntry(transition.record, context), transition.record);
  }

  public approveTaskEntry(entry: TaskEntry, actor: Actor, comment?: string): Decision<TaskEntry> {
    return this.review(this.taskMachine, entry, 'approve', actor, comment);
  }

  public rejectTaskEntry(entry: TaskEntry, actor: Actor, comment?: string): Decision<TaskEntry> {
    return this.review(this.taskMachine, entry, 'reject', actor, comment);
  }

  public deleteTaskEntry(entry: TaskEntry, actor: Actor): Decision<TaskEntry> {
    return fromTransition(this.taskMachine.transition(entry, 'delete', actor, this.clock.now()));
  }

  /**
   * A rejected entry stays as history. Its content seeds a fresh draft that
   * is validated like any new entry.
   */
  public reviseRejectedTaskEntry(entry: TaskEntry, actor: Actor, context: TaskEntryContext): Decision<TaskEntry> {
    const refused = this.checkRevision(this.taskMachine, entry, actor);
    if (refused) {
      return rejected(refused);
    }
    return this.createTaskEntry(
      { workDate: entry.workDate, subTasks: entry.subTasks.map(subTask => subTask.toJSON()) },
      actor,
      context
    );
  }

  // Leave requests

  public createLeaveRequest(input: LeaveRequestInput, actor: Actor, context: LeaveContext): Decision<LeaveRequest> {
    const candidate = build(() =>
      LeaveRequest.createDraft(
        actor.id,
        input.startDate,
        input.endDate,
        input.reason,
        actor.id,
        this.clock.now(),
        input.hoursPerDay
      )
    );
    if (!candidate.ok) {
      return rejected(candidate.violations);
    }
    return fromCheck(this.checkLeaveRequest(candidate.value, context), candidate.value);
  }

  public updateLeaveRequest(
    request: LeaveRequest,
    changes: LeaveRequestChanges,
    actor: Actor,
    context: LeaveContext
  ): Decision<LeaveRequest> {
    const now = this.clock.now();
    const transition = this.leaveMachine.transition(request, 'update', actor, now);
    if (!transition.accepted) {
      return rejected(transition.violations);
    }

    const candidate = build(() => transition.record.withContent(changes, actor.id, now));
    if (!candidate.ok) {
      return rejected(candidate.violations);
    }
    return fromCheck(this.checkLeaveRequest(candidate.value, context), candidate.value);
  }

  public submitLeaveRequest(request: LeaveRequest, actor: Actor, context: LeaveContext): Decision<LeaveRequest> {
    const transition = this.leaveMachine.transition(request, 'submit', actor, this.clock.now());
    if (!transition.accepted) {
      return rejected(transition.violations);
    }
    return fromCheck(this.checkLeaveRequest(transition.record, context), transition.record);
  }

  public approveLeaveRequest(request: LeaveRequest, actor: Actor, comment?: string): Decision<LeaveRequest> {
    return this.review(this.leaveMachine, request, 'approve', actor, comment);
  }

  public rejectLeaveRequest(request: LeaveRequest, actor: Actor, comment?: string): Decision<LeaveRequest> {
    return this.review(this.leaveMachine, request, 'reject', actor, comment);
  }

  public deleteLeaveRequest(request: LeaveRequest, actor: Actor): Decision<LeaveRequest> {
    return fromTransition(this.leaveMachine.transition(request, 'delete', actor, this.clock.now()));
  }

  public reviseRejectedLeaveRequest(request: LeaveRequest, actor: Actor, context: LeaveContext): Decision<LeaveRequest> {
    const refused = this.checkRevision(this.leaveMachine, request, actor);
    if (refused) {
      return rejected(refused);
    }
    return this.createLeaveRequest(
      {
        startDate: request.startDate,
        endDate: request.endDate,
        reason: request.reason,
        hoursPerDay: request.hoursPerDay
      },
      actor,
      context
    );
  }

  /**
   * Re-runs the aggregate checks on a stored record without changing it.
   * Calling it twice on the same snapshot gives the same answer.
   */
  public revalidate(target: { kind: 'TASK_ENTRY'; record: TaskEntry; context: TaskEntryContext }): Decision<TaskEntry>;
  public revalidate(target: { kind: 'LEAVE_REQUEST'; record: LeaveRequest; context: LeaveContext }): Decision<LeaveRequest>;
  public revalidate(target: RevalidationTarget): Decision<TaskEntry> | Decision<LeaveRequest> {
    if (target.kind === 'TASK_ENTRY') {
      return fromCheck(this.checkTaskEntry(target.record, target.context), target.record);
    }
    return fromCheck(this.checkLeaveRequest(target.record, target.context), target.record);
  }

  private checkTaskEntry(candidate: TaskEntry, context: TaskEntryContext): RuleCheck {
    return mergeRuleChecks(
      validateCreateOrUpdate(context.entriesForDay, candidate, this.policy),
      validateAgainstLeave(context.leaveForOwner, candidate),
      validateClients(candidate, context.activeClientIds)
    );
  }

  private checkLeaveRequest(candidate: LeaveRequest, context: LeaveContext): RuleCheck {
    return validateCreate(context.leaveForOwner, context.taskEntriesForOwner, candidate);
  }

  private review<T extends Approvable<T>>(
    machine: ApprovalStateMachine<T>,
    record: T,
    event: 'approve' | 'reject',
    actor: Actor,
    comment?: string
  ): Decision<T> {
    return fromTransition(machine.transition(record, event, actor, this.clock.now(), comment));
  }

  private checkRevision<T extends Approvable<T>>(
    machine: ApprovalStateMachine<T>,
    record: T,
    actor: Actor
  ): RuleViolation[] | undefined {
    const event: ApprovalEvent = 'resubmit';
    const forbidden = machine.authorize(record, event, actor);
    if (forbidden) {
      return [forbidden];
    }
    if (record.status !== 'REJECTED') {
      return [{ code: 'INVALID_TRANSITION', recordId: record.id, from: record.status, event }];
    }
    return undefined;
  }
}
