import Joi from 'joi';
import { BaseRepository } from '../base';
import { ReadOptions, SqlClient, TaskEntryRow, TaskEntryStore } from '../types';
import { SubTaskData, TaskEntry } from '../../../models/time-attendance/TaskEntry';
import { ApprovalStatus } from '../../../models/time-attendance/RuleViolation';
import { CalendarDate, DateRange } from '../../../models/time-attendance/TimeAccounting';
import { validateAndThrow } from '../../../utils/validation';
import { ConcurrencyConflictError } from '../../../utils/timesheetErrors';

const COLUMNS = `
  id, owner_id, to_char(work_date, 'YYYY-MM-DD') AS work_date, sub_tasks, status,
  created_at, updated_at, created_by, updated_by,
  reviewed_by, reviewed_at, review_comment, version
`;

const storedSubTasksSchema = Joi.array<SubTaskData[]>().items(
  Joi.object({
    clientId: Joi.string().required(),
    title: Joi.string().optional(),
    description: Joi.string().allow('').required(),
    hours: Joi.number().required()
  })
).required();

export class TaskEntryRepository extends BaseRepository<TaskEntry, TaskEntryRow> implements TaskEntryStore<SqlClient> {
  constructor() {
    super('task_entries');
  }

  protected mapRow(row: TaskEntryRow): TaskEntry {
    return new TaskEntry({
      id: row.id,
      ownerId: row.owner_id,
      workDate: row.work_date,
      subTasks: validateAndThrow(storedSubTasksSchema, row.sub_tasks),
      status: row.status,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      createdBy: row.created_by,
      updatedBy: row.updated_by,
      reviewedBy: row.reviewed_by ?? undefined,
      reviewedAt: row.reviewed_at ?? undefined,
      reviewComment: row.review_comment ?? undefined,
      version: row.version
    });
  }

  async findById(id: string, client: SqlClient, options?: ReadOptions): Promise<TaskEntry | null> {
    const [entry] = await this.queryRecords(
      `SELECT ${COLUMNS} FROM ${this.tableName} WHERE id = $1${this.lockClause(options)}`,
      [id],
      client
    );
    return entry ?? null;
  }

  async findByOwnerOnDate(ownerId: string, workDate: CalendarDate, client: SqlClient): Promise<TaskEntry[]> {
    return this.queryRecords(
      `SELECT ${COLUMNS} FROM ${this.tableName}
       WHERE owner_id = $1 AND work_date = $2
       ORDER BY created_at`,
      [ownerId, workDate],
      client
    );
  }

  async findByOwnerInRange(ownerId: string, range: DateRange, client: SqlClient): Promise<TaskEntry[]> {
    return this.queryRecords(
      `SELECT ${COLUMNS} FROM ${this.tableName}
       WHERE owner_id = $1 AND work_date BETWEEN $2 AND $3
       ORDER BY work_date, created_at`,
      [ownerId, range.startDate, range.endDate],
      client
    );
  }

  async findByStatus(status: ApprovalStatus, client: SqlClient, range?: DateRange): Promise<TaskEntry[]> {
    const { conditions, params } = this.buildWhereClause({ status });
    if (range) {
      conditions.push(`work_date BETWEEN $${params.length + 1} AND $${params.length + 2}`);
      params.push(range.startDate, range.endDate);
    }

    return this.queryRecords(
      `SELECT ${COLUMNS} FROM ${this.tableName}
       WHERE ${conditions.join(' AND ')}
       ORDER BY work_date, created_at`,
      params,
      client
    );
  }

  async save(entry: TaskEntry, client: SqlClient): Promise<TaskEntry> {
    const subTasks = JSON.stringify(entry.subTasks.map(subTask => subTask.toJSON()));

    if (entry.version === 0) {
      const result = await this.executeQuery(
        `INSERT INTO ${this.tableName} (
           id, owner_id, work_date, sub_tasks, status,
           created_at, updated_at, created_by, updated_by,
           reviewed_by, reviewed_at, review_comment, version
         ) VALUES ($1, $2, $3, $4::jsonb, $5, $6, $7, $8, $9, $10, $11, $12, 0)
         ON CONFLICT (id) DO NOTHING
         RETURNING ${COLUMNS}`,
        [
          entry.id, entry.ownerId, entry.workDate, subTasks, entry.status,
          entry.createdAt, entry.updatedAt, entry.createdBy, entry.updatedBy,
          entry.reviewedBy ?? null, entry.reviewedAt ?? null, entry.reviewComment ?? null
        ],
        client
      );
      return this.singleOrConflict(result.rows, entry.id);
    }

    const result = await this.executeQuery(
      `UPDATE ${this.tableName} SET
         work_date = $2, sub_tasks = $3::jsonb, status = $4,
         updated_at = $5, updated_by = $6,
         reviewed_by = $7, reviewed_at = $8, review_comment = $9,
         version = $10
       WHERE id = $1 AND version = $11
       RETURNING ${COLUMNS}`,
      [
        entry.id, entry.workDate, subTasks, entry.status,
        entry.updatedAt, entry.updatedBy,
        entry.reviewedBy ?? null, entry.reviewedAt ?? null, entry.reviewComment ?? null,
        entry.version, entry.version - 1
      ],
      client
    );
    return this.singleOrConflict(result.rows, entry.id);
  }

  async delete(entry: TaskEntry, client: SqlClient): Promise<void> {
    const result = await this.executeQuery(
      `DELETE FROM ${this.tableName} WHERE id = $1 AND version = $2`,
      [entry.id, entry.version],
      client
    );
    if (result.rowCount === 0) {
      throw new ConcurrencyConflictError('task entry', entry.id);
    }
  }

  private singleOrConflict(rows: TaskEntryRow[], id: string): TaskEntry {
    const [row] = rows;
    if (!row) {
      throw new ConcurrencyConflictError('task entry', id);
    }
    return this.mapRow(row);
  }
}
