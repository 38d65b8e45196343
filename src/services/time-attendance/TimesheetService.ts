import { ValidationOrchestrator, Decision, LeaveContext, TaskEntryContext, TaskEntryChanges, TaskEntryInput, LeaveRequestInput, LeaveRequestChanges } from './ValidationOrchestrator';
import { TimesheetNotifier, DecisionSubject } from './NotificationService';
import { TaskEntry } from '../../models/time-attendance/TaskEntry';
import { LeaveRequest } from '../../models/time-attendance/LeaveRequest';
import { ApprovalDecision } from '../../models/time-attendance/ApprovalStateMachine';
import { ApprovalStatus, RuleCheck, ruleCheck } from '../../models/time-attendance/RuleViolation';
import {
  CalendarDate,
  DatePreset,
  DateRange,
  createDateRange,
  parseCalendarDate,
  resolveDatePreset,
  toCalendarDate
} from '../../models/time-attendance/TimeAccounting';
import { DEFAULT_TIMESHEET_POLICY, TimesheetPolicy } from '../../models/time-attendance/TimesheetPolicy';
import { Actor, isAdmin } from '../../models/User';
import {
  ClientDirectory,
  LeaveRequestStore,
  LockRequest,
  TaskEntryStore,
  TransactionRunner
} from '../../database/repositories/types';
import { Clock, systemClock } from '../../utils/clock';
import { AuthorizationError, NotFoundError } from '../../utils/errors';
import { ConcurrencyConflictError, RuleViolationError } from '../../utils/timesheetErrors';
import { logger } from '../../utils/logger';

export interface TimesheetServiceDependencies<Tx> {
  taskEntries: TaskEntryStore<Tx>;
  leaveRequests: LeaveRequestStore<Tx>;
  transactions: TransactionRunner<Tx>;
  clients?: ClientDirectory<Tx>;
  notifier?: TimesheetNotifier;
  clock?: Clock;
  policy?: TimesheetPolicy;
}

export interface ListQuery {
  preset?: DatePreset;
  startDate?: CalendarDate;
  endDate?: CalendarDate;
  status?: ApprovalStatus;
}

type Accepted<T> = Extract<Decision<T>, { accepted: true }>;

export function ownerLockKey(ownerId: string): string {
  return `timesheet:owner:${ownerId}`;
}

export function ownerDayLockKey(ownerId: string, date: CalendarDate): string {
  return `timesheet:owner-day:${ownerId}:${date}`;
}

function isVisibleTo(record: { ownerId: string }, actor: Actor): boolean {
  return isAdmin(actor) || record.ownerId === actor.id;
}

/**
 * Runs the orchestrator against stored state. Every mutation loads its
 * consistency set, decides, and persists inside one transaction guarded by
 * advisory locks: task entries share the owner lock and take the day
 * exclusively, leave requests take the owner exclusively.
 */
export class TimesheetService<Tx> {
  private readonly taskEntries: TaskEntryStore<Tx>;
  private readonly leaveRequests: LeaveRequestStore<Tx>;
  private readonly transactions: TransactionRunner<Tx>;
  private readonly clients?: ClientDirectory<Tx>;
  private readonly notifier?: TimesheetNotifier;
  private readonly clock: Clock;
  private readonly policy: TimesheetPolicy;
  private readonly orchestrator: ValidationOrchestrator;

  constructor(dependencies: TimesheetServiceDependencies<Tx>) {
    this.taskEntries = dependencies.taskEntries;
    this.leaveRequests = dependencies.leaveRequests;
    this.transactions = dependencies.transactions;
    this.clients = dependencies.clients;
    this.notifier = dependencies.notifier;
    this.clock = dependencies.clock || systemClock;
    this.policy = dependencies.policy || DEFAULT_TIMESHEET_POLICY;
    this.orchestrator = new ValidationOrchestrator(this.clock, this.policy);
  }

  // ==========================================================================
  // Task entries
  // ==========================================================================

  async createTaskEntry(input: TaskEntryInput, actor: Actor): Promise<TaskEntry> {
    const workDate = parseCalendarDate(input.workDate);

    return this.transactions.run(this.taskLocks(actor.id, [workDate]), async (tx) => {
      const context = await this.loadTaskContext(actor.id, workDate, tx);
      const { record } = this.accept('createTaskEntry', actor,
        this.orchestrator.createTaskEntry(input, actor, context));
      const saved = await this.taskEntries.save(record, tx);

      logger.info('Task entry created', { entryId: saved.id, ownerId: saved.ownerId, workDate: saved.workDate });
      return saved;
    });
  }

  async getTaskEntry(id: string, actor: Actor): Promise<TaskEntry> {
    return this.transactions.run([], async (tx) => this.findVisibleTaskEntry(id, actor, tx));
  }

  async listTaskEntries(actor: Actor, query: ListQuery = {}): Promise<TaskEntry[]> {
    const range = this.resolveRange(query) ?? this.resolveRange({ preset: 'this_month' });
    if (!range) {
      return [];
    }

    const entries = await this.transactions.run([], async (tx) =>
      this.taskEntries.findByOwnerInRange(actor.id, range, tx));
    return entries.filter(entry => !query.status || entry.status === query.status);
  }

  async updateTaskEntry(id: string, changes: TaskEntryChanges, actor: Actor): Promise<TaskEntry> {
    const targetDates = changes.workDate === undefined ? [] : [parseCalendarDate(changes.workDate)];

    return this.withLockedTaskEntry(id, actor, targetDates, async (entry, tx) => {
      const workDate = targetDates[0] ?? entry.workDate;
      const context = await this.loadTaskContext(entry.ownerId, workDate, tx);
      const { record } = this.accept('updateTaskEntry', actor,
        this.orchestrator.updateTaskEntry(entry, changes, actor, context));
      const saved = await this.taskEntries.save(record, tx);

      logger.info('Task entry updated', { entryId: saved.id, workDate: saved.workDate, version: saved.version });
      return saved;
    });
  }

  async submitTaskEntry(id: string, actor: Actor): Promise<TaskEntry> {
    return this.withLockedTaskEntry(id, actor, [], async (entry, tx) => {
      const context = await this.loadTaskContext(entry.ownerId, entry.workDate, tx);
      const { record } = this.accept('submitTaskEntry', actor,
        this.orchestrator.submitTaskEntry(entry, actor, context));
      const saved = await this.taskEntries.save(record, tx);

      logger.info('Task entry submitted', { entryId: saved.id, ownerId: saved.ownerId });
      return saved;
    });
  }

  async approveTaskEntry(id: string, actor: Actor, comment?: string): Promise<TaskEntry> {
    return this.reviewTaskEntry('approveTaskEntry', id, actor, entry =>
      this.orchestrator.approveTaskEntry(entry, actor, comment));
  }

  async rejectTaskEntry(id: string, actor: Actor, comment?: string): Promise<TaskEntry> {
    return this.reviewTaskEntry('rejectTaskEntry', id, actor, entry =>
      this.orchestrator.rejectTaskEntry(entry, actor, comment));
  }

  async deleteTaskEntry(id: string, actor: Actor): Promise<void> {
    await this.transactions.run([], async (tx) => {
      const entry = await this.findVisibleTaskEntry(id, actor, tx, true);
      this.accept('deleteTaskEntry', actor, this.orchestrator.deleteTaskEntry(entry, actor));
      await this.taskEntries.delete(entry, tx);

      logger.info('Task entry deleted', { entryId: entry.id, ownerId: entry.ownerId });
    });
  }

  async reviseRejectedTaskEntry(id: string, actor: Actor): Promise<TaskEntry> {
    return this.withLockedTaskEntry(id, actor, [], async (entry, tx) => {
      const context = await this.loadTaskContext(entry.ownerId, entry.workDate, tx);
      const { record } = this.accept('reviseRejectedTaskEntry', actor,
        this.orchestrator.reviseRejectedTaskEntry(entry, actor, context));
      const saved = await this.taskEntries.save(record, tx);

      logger.info('Rejected task entry revised', { rejectedEntryId: entry.id, entryId: saved.id });
      return saved;
    });
  }

  async revalidateTaskEntry(id: string, actor: Actor): Promise<RuleCheck> {
    return this.transactions.run([], async (tx) => {
      const entry = await this.findVisibleTaskEntry(id, actor, tx);
      const context = await this.loadTaskContext(entry.ownerId, entry.workDate, tx);
      const decision = this.orchestrator.revalidate({ kind: 'TASK_ENTRY', record: entry, context });
      return ruleCheck(decision.accepted ? [] : decision.violations);
    });
  }

  async listTaskEntriesForReview(actor: Actor, query: ListQuery = {}): Promise<TaskEntry[]> {
    this.requireAdmin(actor);
    const range = this.resolveRange(query);

    return this.transactions.run([], async (tx) =>
      this.taskEntries.findByStatus(query.status ?? 'SUBMITTED', tx, range));
  }

  // ==========================================================================
  // Leave requests
  // ==========================================================================

  async createLeaveRequest(input: LeaveRequestInput, actor: Actor): Promise<LeaveRequest> {
    const range = this.requestedRange(input.startDate, input.endDate);

    return this.transactions.run(this.leaveLocks(actor.id), async (tx) => {
      const context = await this.loadLeaveContext(actor.id, range, tx);
      const { record } = this.accept('createLeaveRequest', actor,
        this.orchestrator.createLeaveRequest(input, actor, context));
      const saved = await this.leaveRequests.save(record, tx);

      logger.info('Leave request created', {
        requestId: saved.id,
        ownerId: saved.ownerId,
        startDate: saved.startDate,
        endDate: saved.endDate
      });
      return saved;
    });
  }

  async getLeaveRequest(id: string, actor: Actor): Promise<LeaveRequest> {
    return this.transactions.run([], async (tx) => this.findVisibleLeaveRequest(id, actor, tx));
  }

  async listLeaveRequests(actor: Actor, query: ListQuery = {}): Promise<LeaveRequest[]> {
    const range = this.resolveRange(query);
    const requests = await this.transactions.run([], async (tx) =>
      this.leaveRequests.findByOwner(actor.id, tx, range));
    return requests.filter(request => !query.status || request.status === query.status);
  }

  async updateLeaveRequest(id: string, changes: LeaveRequestChanges, actor: Actor): Promise<LeaveRequest> {
    return this.withLockedLeaveRequest(id, actor, async (request, tx) => {
      const range = this.requestedRange(changes.startDate ?? request.startDate, changes.endDate ?? request.endDate);
      const context = await this.loadLeaveContext(request.ownerId, range, tx);
      const { record } = this.accept('updateLeaveRequest', actor,
        this.orchestrator.updateLeaveRequest(request, changes, actor, context));
      const saved = await this.leaveRequests.save(record, tx);

      logger.info('Leave request updated', { requestId: saved.id, version: saved.version });
      return saved;
    });
  }

  async submitLeaveRequest(id: string, actor: Actor): Promise<LeaveRequest> {
    return this.withLockedLeaveRequest(id, actor, async (request, tx) => {
      const context = await this.loadLeaveContext(request.ownerId, request.range, tx);
      const { record } = this.accept('submitLeaveRequest', actor,
        this.orchestrator.submitLeaveRequest(request, actor, context));
      const saved = await this.leaveRequests.save(record, tx);

      logger.info('Leave request submitted', { requestId: saved.id, ownerId: saved.ownerId });
      return saved;
    });
  }

  async approveLeaveRequest(id: string, actor: Actor, comment?: string): Promise<LeaveRequest> {
    return this.reviewLeaveRequest('approveLeaveRequest', id, actor, request =>
      this.orchestrator.approveLeaveRequest(request, actor, comment));
  }

  async rejectLeaveRequest(id: string, actor: Actor, comment?: string): Promise<LeaveRequest> {
    return this.reviewLeaveRequest('rejectLeaveRequest', id, actor, request =>
      this.orchestrator.rejectLeaveRequest(request, actor, comment));
  }

  async deleteLeaveRequest(id: string, actor: Actor): Promise<void> {
    await this.transactions.run([], async (tx) => {
      const request = await this.findVisibleLeaveRequest(id, actor, tx, true);
      this.accept('deleteLeaveRequest', actor, this.orchestrator.deleteLeaveRequest(request, actor));
      await this.leaveRequests.delete(request, tx);

      logger.info('Leave request deleted', { requestId: request.id, ownerId: request.ownerId });
    });
  }

  async reviseRejectedLeaveRequest(id: string, actor: Actor): Promise<LeaveRequest> {
    return this.withLockedLeaveRequest(id, actor, async (request, tx) => {
      const context = await this.loadLeaveContext(request.ownerId, request.range, tx);
      const { record } = this.accept('reviseRejectedLeaveRequest', actor,
        this.orchestrator.reviseRejectedLeaveRequest(request, actor, context));
      const saved = await this.leaveRequests.save(record, tx);

      logger.info('Rejected leave request revised', { rejectedRequestId: request.id, requestId: saved.id });
      return saved;
    });
  }

  async revalidateLeaveRequest(id: string, actor: Actor): Promise<RuleCheck> {
    return this.transactions.run([], async (tx) => {
      const request = await this.findVisibleLeaveRequest(id, actor, tx);
      const context = await this.loadLeaveContext(request.ownerId, request.range, tx);
      const decision = this.orchestrator.revalidate({ kind: 'LEAVE_REQUEST', record: request, context });
      return ruleCheck(decision.accepted ? [] : decision.violations);
    });
  }

  async listLeaveRequestsForReview(actor: Actor, query: ListQuery = {}): Promise<LeaveRequest[]> {
    this.requireAdmin(actor);
    const range = this.resolveRange(query);

    return this.transactions.run([], async (tx) =>
      this.leaveRequests.findByStatus(query.status ?? 'SUBMITTED', tx, range));
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private accept<T>(operation: string, actor: Actor, decision: Decision<T>): Accepted<T> {
    if (!decision.accepted) {
      logger.warn('Timesheet operation rejected', {
        operation,
        actorId: actor.id,
        violations: decision.violations.map(violation => violation.code)
      });
      throw new RuleViolationError(decision.violations);
    }
    return decision;
  }

  private taskLocks(ownerId: string, dates: CalendarDate[]): LockRequest[] {
    return [
      { key: ownerLockKey(ownerId), mode: 'SHARED' },
      ...dates.map((date): LockRequest => ({ key: ownerDayLockKey(ownerId, date), mode: 'EXCLUSIVE' }))
    ];
  }

  private leaveLocks(ownerId: string): LockRequest[] {
    return [{ key: ownerLockKey(ownerId), mode: 'EXCLUSIVE' }];
  }

  private async loadTaskContext(ownerId: string, workDate: CalendarDate, tx: Tx): Promise<TaskEntryContext> {
    const entriesForDay = await this.taskEntries.findByOwnerOnDate(ownerId, workDate, tx);
    const leaveForOwner = await this.leaveRequests.findByOwner(ownerId, tx, { startDate: workDate, endDate: workDate });
    const activeClientIds = this.clients ? await this.clients.findActiveClientIds(tx) : undefined;

    return { entriesForDay, leaveForOwner, activeClientIds };
  }

  private async loadLeaveContext(ownerId: string, range: DateRange | undefined, tx: Tx): Promise<LeaveContext> {
    const leaveForOwner = await this.leaveRequests.findByOwner(ownerId, tx);
    const taskEntriesForOwner = range ? await this.taskEntries.findByOwnerInRange(ownerId, range, tx) : [];

    return { leaveForOwner, taskEntriesForOwner };
  }

  /**
   * Range used to load conflicting task entries. An inverted range loads
   * nothing; the orchestrator rejects it on construction.
   */
  private requestedRange(startDate: CalendarDate | Date, endDate: CalendarDate | Date): DateRange | undefined {
    const start = parseCalendarDate(startDate);
    const end = parseCalendarDate(endDate);
    return start <= end ? { startDate: start, endDate: end } : undefined;
  }

  private resolveRange(query: ListQuery): DateRange | undefined {
    if (query.startDate && query.endDate) {
      return createDateRange(query.startDate, query.endDate);
    }
    if (query.preset) {
      return resolveDatePreset(query.preset, toCalendarDate(this.clock.now(), this.policy.defaultTimeZone));
    }
    return undefined;
  }

  private requireAdmin(actor: Actor): void {
    if (!isAdmin(actor)) {
      throw new AuthorizationError('Only administrators can review timesheets');
    }
  }

  private async findVisibleTaskEntry(id: string, actor: Actor, tx: Tx, forUpdate: boolean = false): Promise<TaskEntry> {
    const entry = await this.taskEntries.findById(id, tx, { forUpdate });
    if (!entry || !isVisibleTo(entry, actor)) {
      throw new NotFoundError('Task entry');
    }
    return entry;
  }

  private async findVisibleLeaveRequest(id: string, actor: Actor, tx: Tx, forUpdate: boolean = false): Promise<LeaveRequest> {
    const request = await this.leaveRequests.findById(id, tx, { forUpdate });
    if (!request || !isVisibleTo(request, actor)) {
      throw new NotFoundError('Leave request');
    }
    return request;
  }

  /**
   * The owner and day locks are chosen from an unlocked read. If the entry
   * moved to another day in between, the locks no longer cover it.
   */
  private async withLockedTaskEntry<R>(
    id: string,
    actor: Actor,
    extraDates: CalendarDate[],
    work: (entry: TaskEntry, tx: Tx) => Promise<R>
  ): Promise<R> {
    const current = await this.getTaskEntry(id, actor);
    const dates = [current.workDate, ...extraDates];

    return this.transactions.run(this.taskLocks(current.ownerId, dates), async (tx) => {
      const entry = await this.findVisibleTaskEntry(id, actor, tx, true);
      if (!dates.includes(entry.workDate)) {
        throw new ConcurrencyConflictError('task entry', id);
      }
      return work(entry, tx);
    });
  }

  private async withLockedLeaveRequest<R>(
    id: string,
    actor: Actor,
    work: (request: LeaveRequest, tx: Tx) => Promise<R>
  ): Promise<R> {
    const current = await this.getLeaveRequest(id, actor);

    return this.transactions.run(this.leaveLocks(current.ownerId), async (tx) =>
      work(await this.findVisibleLeaveRequest(id, actor, tx, true), tx));
  }

  private async reviewTaskEntry(
    operation: string,
    id: string,
    actor: Actor,
    decide: (entry: TaskEntry) => Decision<TaskEntry>
  ): Promise<TaskEntry> {
    const { record, decision } = await this.transactions.run([], async (tx) => {
      const entry = await this.findVisibleTaskEntry(id, actor, tx, true);
      const accepted = this.accept(operation, actor, decide(entry));
      return { record: await this.taskEntries.save(accepted.record, tx), decision: accepted.decision };
    });

    this.logDecision('Task entry', record.id, decision);
    await this.notify({ kind: 'TASK_ENTRY', record }, decision);
    return record;
  }

  private async reviewLeaveRequest(
    operation: string,
    id: string,
    actor: Actor,
    decide: (request: LeaveRequest) => Decision<LeaveRequest>
  ): Promise<LeaveRequest> {
    const { record, decision } = await this.transactions.run([], async (tx) => {
      const request = await this.findVisibleLeaveRequest(id, actor, tx, true);
      const accepted = this.accept(operation, actor, decide(request));
      return { record: await this.leaveRequests.save(accepted.record, tx), decision: accepted.decision };
    });

    this.logDecision('Leave request', record.id, decision);
    await this.notify({ kind: 'LEAVE_REQUEST', record }, decision);
    return record;
  }

  private logDecision(resource: string, recordId: string, decision?: ApprovalDecision): void {
    if (decision) {
      logger.info(`${resource} ${decision.outcome.toLowerCase()}`, {
        recordId,
        reviewedBy: decision.actorId,
        reviewedAt: decision.timestamp.toISOString()
      });
    }
  }

  /**
   * Runs after commit. A failed notification is logged and the decision stands.
   */
  private async notify(subject: DecisionSubject, decision?: ApprovalDecision): Promise<void> {
    if (!decision || !this.notifier) {
      return;
    }

    try {
      await this.notifier.notifyDecision(subject, decision);
    } catch (error) {
      logger.error('Failed to deliver decision notification', {
        recordId: decision.recordId,
        outcome: decision.outcome,
        error: error instanceof Error ? error.message : 'Unknown error'
      });
    }
  }
}
