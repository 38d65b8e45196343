import { TaskEntry } from '../../models/time-attendance/TaskEntry';
import { LeaveRequest } from '../../models/time-attendance/LeaveRequest';
import { ApprovalStatus } from '../../models/time-attendance/RuleViolation';
import { CalendarDate, DateRange, containsDate, overlaps } from '../../models/time-attendance/TimeAccounting';
import {
  ClientDirectory,
  LeaveRequestStore,
  LockRequest,
  ReadOptions,
  TaskEntryStore,
  TransactionRunner
} from '../../database/repositories/types';
import { orderLocks } from '../../database/transactionRunner';
import { ConcurrencyConflictError } from '../../utils/timesheetErrors';

// Handle passed to in-memory store calls
export interface InMemoryTx {
  readonly id: number;
}

interface Versioned {
  readonly id: string;
  readonly version: number;
}

class VersionedTable<T extends Versioned> {
  private rows = new Map<string, T>();

  constructor(private readonly resourceType: string) {}

  get(id: string): T | null {
    return this.rows.get(id) ?? null;
  }

  all(): T[] {
    return [...this.rows.values()];
  }

  load(record: T): void {
    this.rows.set(record.id, record);
  }

  put(record: T): T {
    const stored = this.rows.get(record.id);
    const expected = record.version === 0 ? undefined : record.version - 1;

    if (record.version === 0 ? stored !== undefined : stored?.version !== expected) {
      throw new ConcurrencyConflictError(this.resourceType, record.id);
    }
    this.rows.set(record.id, record);
    return record;
  }

  remove(record: T): void {
    if (this.rows.get(record.id)?.version !== record.version) {
      throw new ConcurrencyConflictError(this.resourceType, record.id);
    }
    this.rows.delete(record.id);
  }

  snapshot(): Map<string, T> {
    return new Map(this.rows);
  }

  restore(rows: Map<string, T>): void {
    this.rows = new Map(rows);
  }
}

interface Snapshotting {
  snapshot(): () => void;
}

export class InMemoryTaskEntryStore implements TaskEntryStore<InMemoryTx>, Snapshotting {
  private readonly table = new VersionedTable<TaskEntry>('task entry');
  public readonly forUpdateReads: string[] = [];

  seed(...entries: TaskEntry[]): void {
    entries.forEach(entry => this.table.load(entry));
  }

  all(): TaskEntry[] {
    return this.table.all();
  }

  async findById(id: string, _tx: InMemoryTx, options: ReadOptions = {}): Promise<TaskEntry | null> {
    if (options.forUpdate) {
      this.forUpdateReads.push(id);
    }
    return this.table.get(id);
  }

  async findByOwnerOnDate(ownerId: string, workDate: CalendarDate, _tx: InMemoryTx): Promise<TaskEntry[]> {
    return this.table.all().filter(entry => entry.ownerId === ownerId && entry.workDate === workDate);
  }

  async findByOwnerInRange(ownerId: string, range: DateRange, _tx: InMemoryTx): Promise<TaskEntry[]> {
    return this.table.all().filter(entry => entry.ownerId === ownerId && containsDate(range, entry.workDate));
  }

  async findByStatus(status: ApprovalStatus, _tx: InMemoryTx, range?: DateRange): Promise<TaskEntry[]> {
    return this.table.all().filter(entry =>
      entry.status === status && (!range || containsDate(range, entry.workDate)));
  }

  async save(entry: TaskEntry, _tx: InMemoryTx): Promise<TaskEntry> {
    return this.table.put(entry);
  }

  async delete(entry: TaskEntry, _tx: InMemoryTx): Promise<void> {
    this.table.remove(entry);
  }

  snapshot(): () => void {
    const rows = this.table.snapshot();
    return () => this.table.restore(rows);
  }
}

export class InMemoryLeaveRequestStore implements LeaveRequestStore<InMemoryTx>, Snapshotting {
  private readonly table = new VersionedTable<LeaveRequest>('leave request');

  seed(...requests: LeaveRequest[]): void {
    requests.forEach(request => this.table.load(request));
  }

  all(): LeaveRequest[] {
    return this.table.all();
  }

  async findById(id: string, _tx: InMemoryTx, _options?: ReadOptions): Promise<LeaveRequest | null> {
    return this.table.get(id);
  }

  async findByOwner(ownerId: string, _tx: InMemoryTx, range?: DateRange): Promise<LeaveRequest[]> {
    return this.table.all().filter(request =>
      request.ownerId === ownerId && (!range || overlaps(request.range, range)));
  }

  async findByStatus(status: ApprovalStatus, _tx: InMemoryTx, range?: DateRange): Promise<LeaveRequest[]> {
    return this.table.all().filter(request =>
      request.status === status && (!range || overlaps(request.range, range)));
  }

  async save(request: LeaveRequest, _tx: InMemoryTx): Promise<LeaveRequest> {
    return this.table.put(request);
  }

  async delete(request: LeaveRequest, _tx: InMemoryTx): Promise<void> {
    this.table.remove(request);
  }

  snapshot(): () => void {
    const rows = this.table.snapshot();
    return () => this.table.restore(rows);
  }
}

export class InMemoryClientDirectory implements ClientDirectory<InMemoryTx> {
  constructor(private readonly activeClientIds: string[]) {}

  async findActiveClientIds(_tx: InMemoryTx): Promise<ReadonlySet<string>> {
    return new Set(this.activeClientIds);
  }
}

/**
 * Runs transactions one at a time, which is the strongest isolation the
 * advisory locks can give. A throwing transaction restores every store.
 */
export class InMemoryTransactionRunner implements TransactionRunner<InMemoryTx> {
  public readonly lockLog: LockRequest[][] = [];
  private queue: Promise<unknown> = Promise.resolve();
  private nextId = 1;

  constructor(private readonly stores: Snapshotting[]) {}

  run<R>(locks: readonly LockRequest[], work: (tx: InMemoryTx) => Promise<R>): Promise<R> {
    const result = this.queue.then(async () => {
      this.lockLog.push(orderLocks(locks));
      const restores = this.stores.map(store => store.snapshot());

      try {
        return await work({ id: this.nextId++ });
      } catch (error) {
        restores.forEach(restore => restore());
        throw error;
      }
    });

    this.queue = result.catch(() => undefined);
    return result;
  }
}

export function createInMemoryPersistence(activeClientIds?: string[]) {
  const taskEntries = new InMemoryTaskEntryStore();
  const leaveRequests = new InMemoryLeaveRequestStore();
  const transactions = new InMemoryTransactionRunner([taskEntries, leaveRequests]);
  const clients = activeClientIds ? new InMemoryClientDirectory(activeClientIds) : undefined;

  return { taskEntries, leaveRequests, transactions, clients };
}
