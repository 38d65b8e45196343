import { QueryResult, QueryResultRow } from 'pg';
import { mapDatabaseError } from '../../utils/errors';
import { ReadOptions, SqlClient } from './types';

export type FilterValue = string | number | boolean | null | undefined;

export interface FilterOptions {
  [column: string]: FilterValue;
}

/**
 * Abstract base repository with the query plumbing shared by the pg stores.
 * Every call runs on the client of the caller's transaction.
 */
export abstract class BaseRepository<T, Row extends QueryResultRow> {
  protected tableName: string;

  constructor(tableName: string) {
    this.tableName = tableName;
  }

  /**
   * Maps a selected row onto the domain record
   */
  protected abstract mapRow(row: Row): T;

  /**
   * Execute query on the given client. Driver errors are translated into
   * the application error hierarchy.
   */
  protected async executeQuery<R extends QueryResultRow = Row>(
    query: string,
    params: unknown[],
    client: SqlClient
  ): Promise<QueryResult<R>> {
    try {
      return await client.query<R>(query, params);
    } catch (error) {
      throw mapDatabaseError(error);
    }
  }

  protected async queryRecords(query: string, params: unknown[], client: SqlClient): Promise<T[]> {
    const result = await this.executeQuery(query, params, client);
    return result.rows.map(row => this.mapRow(row));
  }

  /**
   * Build WHERE clause from equality filters, numbering placeholders from
   * `firstIndex`
   */
  protected buildWhereClause(
    filters: FilterOptions,
    firstIndex: number = 1
  ): { conditions: string[]; params: unknown[] } {
    const conditions: string[] = [];
    const params: unknown[] = [];
    let paramIndex = firstIndex;

    Object.entries(filters).forEach(([key, value]) => {
      if (value !== undefined) {
        conditions.push(`${key} = $${paramIndex++}`);
        params.push(value);
      }
    });

    return { conditions, params };
  }

  protected lockClause(options?: ReadOptions): string {
    return options?.forUpdate ? ' FOR UPDATE' : '';
  }
}
