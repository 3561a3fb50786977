import { Injectable, Logger } from '@nestjs/common';
import type { Client } from 'pg';
import { errorMessage } from '../common/errors';
import { DatabaseConnectionService } from '../database/database-connection.service';
import type { RowTuple, TableSchema } from '../common/types';
import type { DatabaseConfig } from '../config/database.config';
import { columnNames, primaryKeyColumns } from '../protocol/schema';

/**
 * Reads back the table a JDBC sink wrote to
 * Rows come back ordered by primary key so they line up with fixture order
 */
@Injectable()
export class JdbcStoreService {
  private readonly logger = new Logger(JdbcStoreService.name);

  constructor(private readonly connectionService: DatabaseConnectionService) {}

  async readRows(table: string, schema: TableSchema, target: Partial<DatabaseConfig> = {}): Promise<RowTuple[]> {
    const keys = primaryKeyColumns(schema);
    if (keys.length === 0) {
      throw new Error(`Cannot read ${table} in a deterministic order: schema has no primary key`);
    }

    const client = await this.connectionService.connect(target);
    try {
      const columns = columnNames(schema).map(name => client.escapeIdentifier(name)).join(', ');
      const orderBy = keys.map(name => client.escapeIdentifier(name)).join(', ');
      const text = `SELECT ${columns} FROM ${client.escapeIdentifier(table)} ORDER BY ${orderBy}`;

      this.logger.log(`Executing query: ${text}`);
      const result = await client.query<unknown[]>({ text, rowMode: 'array' });
      this.logger.log(`Read ${result.rows.length} rows from ${table}`);
      return result.rows;
    } finally {
      await this.release(client);
    }
  }

  // A failed close is only logged so it never replaces the query's own outcome
  private async release(client: Client): Promise<void> {
    try {
      await this.connectionService.disconnect(client);
    } catch (error) {
      this.logger.error(`Error closing result store connection: ${errorMessage(error)}`);
    }
  }
}
