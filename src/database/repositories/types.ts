import { QueryResult, QueryResultRow } from 'pg';
import { ApprovalStatus } from '../../models/time-attendance/RuleViolation';
import { CalendarDate, DateRange } from '../../models/time-attendance/TimeAccounting';
import { TaskEntry } from '../../models/time-attendance/TaskEntry';
import { LeaveRequest } from '../../models/time-attendance/LeaveRequest';

// Database row interfaces that match the schema in migrations/scripts

export interface TaskEntryRow extends QueryResultRow {
  id: string;
  owner_id: string;
  work_date: CalendarDate; // selected through to_char, never as a JS Date
  sub_tasks: unknown;
  status: ApprovalStatus;
  created_at: Date;
  updated_at: Date;
  created_by: string;
  updated_by: string;
  reviewed_by: string | null;
  reviewed_at: Date | null;
  review_comment: string | null;
  version: number;
}

export interface LeaveRequestRow extends QueryResultRow {
  id: string;
  owner_id: string;
  start_date: CalendarDate;
  end_date: CalendarDate;
  reason: string;
  hours_per_day: string; // NUMERIC arrives as text
  status: ApprovalStatus;
  created_at: Date;
  updated_at: Date;
  created_by: string;
  updated_by: string;
  reviewed_by: string | null;
  reviewed_at: Date | null;
  review_comment: string | null;
  version: number;
}

export interface ClientRow extends QueryResultRow {
  id: string;
}

/**
 * The part of a pg client the stores and migrations query through.
 * `PoolClient` satisfies it.
 */
export interface SqlClient {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

export interface TransactionalConnection {
  transaction<T>(callback: (client: SqlClient) => Promise<T>): Promise<T>;
}

export interface ReadOptions {
  forUpdate?: boolean;
}

/**
 * Persistence seams the timesheet service depends on. `Tx` is whatever
 * handle the transaction runner passes to its callback.
 */
export interface TaskEntryStore<Tx> {
  findById(id: string, tx: Tx, options?: ReadOptions): Promise<TaskEntry | null>;
  findByOwnerOnDate(ownerId: string, workDate: CalendarDate, tx: Tx): Promise<TaskEntry[]>;
  findByOwnerInRange(ownerId: string, range: DateRange, tx: Tx): Promise<TaskEntry[]>;
  findByStatus(status: ApprovalStatus, tx: Tx, range?: DateRange): Promise<TaskEntry[]>;
  /** Inserts version 0, otherwise updates the row holding `version - 1`. */
  save(entry: TaskEntry, tx: Tx): Promise<TaskEntry>;
  delete(entry: TaskEntry, tx: Tx): Promise<void>;
}

export interface LeaveRequestStore<Tx> {
  findById(id: string, tx: Tx, options?: ReadOptions): Promise<LeaveRequest | null>;
  /** All of the owner's requests, or only those overlapping `range`. */
  findByOwner(ownerId: string, tx: Tx, range?: DateRange): Promise<LeaveRequest[]>;
  findByStatus(status: ApprovalStatus, tx: Tx, range?: DateRange): Promise<LeaveRequest[]>;
  save(request: LeaveRequest, tx: Tx): Promise<LeaveRequest>;
  delete(request: LeaveRequest, tx: Tx): Promise<void>;
}

export interface ClientDirectory<Tx> {
  findActiveClientIds(tx: Tx): Promise<ReadonlySet<string>>;
}

export type LockMode = 'SHARED' | 'EXCLUSIVE';

export interface LockRequest {
  key: string;
  mode: LockMode;
}

export interface TransactionRunner<Tx> {
  run<R>(locks: readonly LockRequest[], work: (tx: Tx) => Promise<R>): Promise<R>;
}
