import { BaseRepository } from '../base';
import { LeaveRequestRow, LeaveRequestStore, ReadOptions, SqlClient } from '../types';
import { LeaveRequest } from '../../../models/time-attendance/LeaveRequest';
import { ApprovalStatus } from '../../../models/time-attendance/RuleViolation';
import { DateRange } from '../../../models/time-attendance/TimeAccounting';
import { ConcurrencyConflictError } from '../../../utils/timesheetErrors';

const COLUMNS = `
  id, owner_id,
  to_char(start_date, 'YYYY-MM-DD') AS start_date,
  to_char(end_date, 'YYYY-MM-DD') AS end_date,
  reason, hours_per_day, status,
  created_at, updated_at, created_by, updated_by,
  reviewed_by, reviewed_at, review_comment, version
`;

export class LeaveRequestRepository extends BaseRepository<LeaveRequest, LeaveRequestRow> implements LeaveRequestStore<SqlClient> {
  constructor() {
    super('leave_requests');
  }

  protected mapRow(row: LeaveRequestRow): LeaveRequest {
    return new LeaveRequest({
      id: row.id,
      ownerId: row.owner_id,
      startDate: row.start_date,
      endDate: row.end_date,
      reason: row.reason,
      hoursPerDay: Number(row.hours_per_day),
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

  async findById(id: string, client: SqlClient, options?: ReadOptions): Promise<LeaveRequest | null> {
    const [request] = await this.queryRecords(
      `SELECT ${COLUMNS} FROM ${this.tableName} WHERE id = $1${this.lockClause(options)}`,
      [id],
      client
    );
    return request ?? null;
  }

  async findByOwner(ownerId: string, client: SqlClient, range?: DateRange): Promise<LeaveRequest[]> {
    return this.findWhere({ owner_id: ownerId }, client, range);
  }

  async findByStatus(status: ApprovalStatus, client: SqlClient, range?: DateRange): Promise<LeaveRequest[]> {
    return this.findWhere({ status }, client, range);
  }

  async save(request: LeaveRequest, client: SqlClient): Promise<LeaveRequest> {
    if (request.version === 0) {
      const result = await this.executeQuery(
        `INSERT INTO ${this.tableName} (
           id, owner_id, start_date, end_date, reason, hours_per_day, status,
           created_at, updated_at, created_by, updated_by,
           reviewed_by, reviewed_at, review_comment, version
         ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, 0)
         ON CONFLICT (id) DO NOTHING
         RETURNING ${COLUMNS}`,
        [
          request.id, request.ownerId, request.startDate, request.endDate, request.reason,
          request.hoursPerDay, request.status,
          request.createdAt, request.updatedAt, request.createdBy, request.updatedBy,
          request.reviewedBy ?? null, request.reviewedAt ?? null, request.reviewComment ?? null
        ],
        client
      );
      return this.singleOrConflict(result.rows, request.id);
    }

    const result = await this.executeQuery(
      `UPDATE ${this.tableName} SET
         start_date = $2, end_date = $3, reason = $4, hours_per_day = $5, status = $6,
         updated_at = $7, updated_by = $8,
         reviewed_by = $9, reviewed_at = $10, review_comment = $11,
         version = $12
       WHERE id = $1 AND version = $13
       RETURNING ${COLUMNS}`,
      [
        request.id, request.startDate, request.endDate, request.reason, request.hoursPerDay, request.status,
        request.updatedAt, request.updatedBy,
        request.reviewedBy ?? null, request.reviewedAt ?? null, request.reviewComment ?? null,
        request.version, request.version - 1
      ],
      client
    );
    return this.singleOrConflict(result.rows, request.id);
  }

  async delete(request: LeaveRequest, client: SqlClient): Promise<void> {
    const result = await this.executeQuery(
      `DELETE FROM ${this.tableName} WHERE id = $1 AND version = $2`,
      [request.id, request.version],
      client
    );
    if (result.rowCount === 0) {
      throw new ConcurrencyConflictError('leave request', request.id);
    }
  }

  private async findWhere(
    filters: { owner_id?: string; status?: ApprovalStatus },
    client: SqlClient,
    range?: DateRange
  ): Promise<LeaveRequest[]> {
    const { conditions, params } = this.buildWhereClause(filters);
    if (range) {
      // Inclusive overlap with the requested window
      conditions.push(`start_date <= $${params.length + 1} AND end_date >= $${params.length + 2}`);
      params.push(range.endDate, range.startDate);
    }

    return this.queryRecords(
      `SELECT ${COLUMNS} FROM ${this.tableName}
       WHERE ${conditions.join(' AND ')}
       ORDER BY start_date, created_at`,
      params,
      client
    );
  }

  private singleOrConflict(rows: LeaveRequestRow[], id: string): LeaveRequest {
    const [row] = rows;
    if (!row) {
      throw new ConcurrencyConflictError('leave request', id);
    }
    return this.mapRow(row);
  }
}
