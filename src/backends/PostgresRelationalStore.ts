import { Pool } from 'pg';
import type { BackendRows, IRelationalStore } from './IQueryBackends.js';
import { logger } from '../utils/logger.js';

/**
 * PostgresRelationalStore
 * PostgreSQL implementation of IRelationalStore.
 *
 * Queries run exactly as written by the caller; nothing here rewrites SQL.
 * Every session starts with `default_transaction_read_only`, so the server
 * refuses writes even if one slips past the caller.
 */
export class PostgresRelationalStore implements IRelationalStore {
  private pool: Pool;

  /**
   * @param postgresUri - PostgreSQL connection string
   * @param statementTimeoutMs - Server-side statement timeout, if any
   */
  constructor(postgresUri: string, statementTimeoutMs?: number) {
    this.pool = new Pool({
      connectionString: postgresUri,
      options: '-c default_transaction_read_only=on',
      ...(statementTimeoutMs !== undefined ? { statement_timeout: statementTimeoutMs } : {}),
    });

    // Idle clients can error when the server drops them; without a listener
    // the pool would crash the process
    this.pool.on('error', (error) => {
      logger.error('postgres pool error', { error });
    });
  }

  async query(sql: string): Promise<BackendRows> {
    const start = performance.now();
    const result = await this.pool.query<Record<string, unknown>>(sql);
    const elapsedMs = performance.now() - start;

    // Statements without a result set report no fields
    const rows = result.fields.length > 0 ? result.rows : [];

    logger.queryTiming('postgres', elapsedMs, { rowCount: rows.length });

    return { rows, elapsedMs };
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
