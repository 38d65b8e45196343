import { BaseRepository } from '../base';
import { ClientDirectory, ClientRow, SqlClient } from '../types';

/**
 * Read-only view of the client table. Sub-tasks may only reference ids
 * returned here.
 */
export class ClientRepository extends BaseRepository<string, ClientRow> implements ClientDirectory<SqlClient> {
  constructor() {
    super('clients');
  }

  protected mapRow(row: ClientRow): string {
    return row.id;
  }

  async findActiveClientIds(client: SqlClient): Promise<ReadonlySet<string>> {
    const ids = await this.queryRecords(
      `SELECT id FROM ${this.tableName} WHERE is_active = TRUE`,
      [],
      client
    );
    return new Set(ids);
  }
}
