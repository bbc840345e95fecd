/**
 * PostgreSQL database adapter with connection pooling
 */

import { ClientConfig, Pool, PoolClient, PoolConfig } from 'pg';
import {
  DatabaseConfig,
  DatabaseConnection,
  ConnectionPool,
  QueryResult,
  ExecuteResult,
  ConnectionError,
  QueryError,
  MissingTableError,
  Row,
  SqlParam,
  toError
} from '../types';

// SQLSTATE for "undefined_table"
const UNDEFINED_TABLE = '42P01';

function sqlState(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function wrapPostgresError(action: string, sql: string, error: unknown): QueryError {
  const cause = toError(error);
  const message = `PostgreSQL ${action} failed: ${cause.message}`;
  if (sqlState(error) === UNDEFINED_TABLE) {
    return new MissingTableError(message, sql, cause);
  }
  return new QueryError(message, sql, cause);
}

export class PostgresConnection implements DatabaseConnection {
  readonly dialect = 'postgresql' as const;
  readonly paramStyle = 'numeric' as const;
  private client: PoolClient;
  private transactionOpen = false;
  private released = false;

  constructor(client: PoolClient) {
    this.client = client;
  }

  async query<T = Row>(sql: string, params: SqlParam[] = []): Promise<QueryResult<T>> {
    try {
      const result = await this.client.query(sql, params);
      return {
        rows: result.rows as T[],
        rowCount: result.rowCount || 0
      };
    } catch (error) {
      throw wrapPostgresError('query', sql, error);
    }
  }

  async execute(sql: string, params: SqlParam[] = []): Promise<ExecuteResult> {
    try {
      const result = await this.client.query(sql, params);
      return {
        affectedRows: result.rowCount || 0
      };
    } catch (error) {
      throw wrapPostgresError('execute', sql, error);
    }
  }

  async executeBatch(sql: string): Promise<void> {
    // Without parameters pg uses the simple query protocol, which accepts
    // several statements in one round-trip
    try {
      await this.client.query(sql);
    } catch (error) {
      throw wrapPostgresError('batch', sql, error);
    }
  }

  async beginTransaction(): Promise<void> {
    if (this.transactionOpen) {
      throw new Error('Transaction already in progress');
    }

    await this.client.query('BEGIN');
    this.transactionOpen = true;
  }

  async commit(): Promise<void> {
    if (!this.transactionOpen) {
      throw new Error('No transaction in progress');
    }

    this.transactionOpen = false;
    await this.client.query('COMMIT');
  }

  async rollback(): Promise<void> {
    if (!this.transactionOpen) {
      throw new Error('No transaction in progress');
    }

    this.transactionOpen = false;
    await this.client.query('ROLLBACK');
  }

  inTransaction(): boolean {
    return this.transactionOpen;
  }

  async close(): Promise<void> {
    // Pooled clients go back to the pool instead of being closed
    if (!this.released) {
      this.released = true;
      this.client.release();
    }
  }

  isConnected(): boolean {
    return !this.released;
  }
}

export function postgresClientConfig(config: DatabaseConfig): ClientConfig {
  return {
    connectionString: config.connectionString,
    host: config.host,
    port: config.port || 5432,
    database: config.database,
    user: config.username,
    password: config.password,
    ssl: config.ssl,
    connectionTimeoutMillis: config.pool?.acquireTimeoutMillis || 10000
  };
}

export function postgresPoolConfig(config: DatabaseConfig): PoolConfig {
  return {
    ...postgresClientConfig(config),
    max: config.maxConnections || 10,
    idleTimeoutMillis: config.pool?.idleTimeoutMillis || 30000
  };
}

export class PostgresConnectionPool implements ConnectionPool {
  private pool: Pool;
  private destroyed = false;

  constructor(config: DatabaseConfig) {
    this.pool = new Pool(postgresPoolConfig(config));

    this.pool.on('error', (err) => {
      console.error('PostgreSQL pool error:', err);
    });
  }

  async acquire(): Promise<DatabaseConnection> {
    if (this.destroyed) {
      throw new ConnectionError('Connection pool has been destroyed');
    }

    try {
      const client = await this.pool.connect();
      return new PostgresConnection(client);
    } catch (error) {
      const cause = toError(error);
      throw new ConnectionError(`Failed to acquire PostgreSQL connection: ${cause.message}`, cause);
    }
  }

  async release(connection: DatabaseConnection): Promise<void> {
    await connection.close();
  }

  async destroy(): Promise<void> {
    this.destroyed = true;
    await this.pool.end();
  }
}
