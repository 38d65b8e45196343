import { SqlClient } from '../../repositories/types';

export const createTimesheetTables = async (client: SqlClient): Promise<void> => {
  await client.query(`
    CREATE TABLE IF NOT EXISTS clients (
      id VARCHAR(64) PRIMARY KEY,
      name VARCHAR(255) NOT NULL,
      is_active BOOLEAN NOT NULL DEFAULT TRUE,
      created_at TIMESTAMP WITH TIME ZONE DEFAULT CURRENT_TIMESTAMP
    )
  `);

  await client.query(`
    CREATE TABLE IF NOT EXISTS task_entries (
      id VARCHAR(64) PRIMARY KEY,
      owner_id VARCHAR(64) NOT NULL,
      work_date DATE NOT NULL,
      sub_tasks JSONB NOT NULL DEFAULT '[]'::jsonb,
      status VARCHAR(20) NOT NULL CHECK (status IN ('DRAFT', 'SUBMITTED', 'APPROVED', 'REJECTED')),
      created_at TIMESTAMP WITH TIME ZONE NOT NULL,
      updated_at TIMESTAMP WITH TIME ZONE NOT NULL,
      created_by VARCHAR(64) NOT NULL,
      updated_by VARCHAR(64) NOT NULL,
      reviewed_by VARCHAR(64),
      reviewed_at TIMESTAMP WITH TIME ZONE,
      review_comment TEXT,
      version INTEGER NOT NULL DEFAULT 0
    )
  `);

  await client.query(`
    CREATE INDEX IF NOT EXISTS idx_task_entries_owner_date
    ON task_entries(owner_id, work_date)
  `);

  await client.query(`
    CREATE INDEX IF NOT EXISTS idx_task_entries_status
    ON task_entries(status)
  `);

  await client.query(`
    CREATE TABLE IF NOT EXISTS leave_requests (
      id VARCHAR(64) PRIMARY KEY,
      owner_id VARCHAR(64) NOT NULL,
      start_date DATE NOT NULL,
      end_date DATE NOT NULL,
      reason TEXT NOT NULL,
      hours_per_day NUMERIC(4,2) NOT NULL DEFAULT 8 CHECK (hours_per_day > 0 AND hours_per_day <= 8),
      status VARCHAR(20) NOT NULL CHECK (status IN ('DRAFT', 'SUBMITTED', 'APPROVED', 'REJECTED')),
      created_at TIMESTAMP WITH TIME ZONE NOT NULL,
      updated_at TIMESTAMP WITH TIME ZONE NOT NULL,
      created_by VARCHAR(64) NOT NULL,
      updated_by VARCHAR(64) NOT NULL,
      reviewed_by VARCHAR(64),
      reviewed_at TIMESTAMP WITH TIME ZONE,
      review_comment TEXT,
      version INTEGER NOT NULL DEFAULT 0,
      CONSTRAINT leave_requests_valid_range CHECK (end_date >= start_date)
    )
  `);

  await client.query(`
    CREATE INDEX IF NOT EXISTS idx_leave_requests_owner_range
    ON leave_requests(owner_id, start_date, end_date)
  `);

  await client.query(`
    CREATE INDEX IF NOT EXISTS idx_leave_requests_status
    ON leave_requests(status)
  `);
};
