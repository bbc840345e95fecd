/**
 * Database configuration types and interfaces
 */

export type DatabaseType = 'sqlite' | 'postgresql';

/**
 * How a driver marks bound parameters in SQL text.
 *
 * The bundled adapters use `qmark` (sqlite3) and `numeric` (pg). The
 * printf styles are for third-party `DatabaseConnection` implementations
 * over drivers that read a bare `%` as a placeholder prefix; for those the
 * executor doubles `%` in migration SQL.
 */
export type ParamStyle = 'qmark' | 'numeric' | 'format' | 'pyformat';

export type SqlParam = string | number | bigint | boolean | null | Date | Buffer;

export type Row = Record<string, unknown>;

export interface DatabaseConfig {
  type: DatabaseType;
  connectionString?: string;
  host?: string;
  port?: number;
  database?: string;
  username?: string;
  password?: string;
  maxConnections?: number;
  ssl?: boolean;
  // Connection pool timeouts
  pool?: {
    acquireTimeoutMillis?: number;
    idleTimeoutMillis?: number;
  };
}

export interface ConnectionPool {
  acquire(): Promise<DatabaseConnection>;
  release(connection: DatabaseConnection): Promise<void>;
  destroy(): Promise<void>;
}

export interface DatabaseConnection {
  readonly dialect: DatabaseType;
  readonly paramStyle: ParamStyle;
  query<T = Row>(sql: string, params?: SqlParam[]): Promise<QueryResult<T>>;
  execute(sql: string, params?: SqlParam[]): Promise<ExecuteResult>;
  /** Run a multi-statement script with no bound parameters. */
  executeBatch(sql: string): Promise<void>;
  beginTransaction(): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  inTransaction(): boolean;
  close(): Promise<void>;
  isConnected(): boolean;
}

export interface QueryResult<T = Row> {
  rows: T[];
  rowCount: number;
}

export interface ExecuteResult {
  affectedRows: number;
}

/**
 * Placeholder for the 1-based parameter `index` in the given style.
 */
export function placeholder(style: ParamStyle, index: number): string {
  switch (style) {
    case 'numeric':
      return `$${index}`;
    case 'format':
    case 'pyformat':
      return '%s';
    case 'qmark':
      return '?';
  }
}

export class DatabaseError extends Error {
  constructor(
    message: string,
    public code?: string,
    public originalError?: Error
  ) {
    super(message);
    this.name = 'DatabaseError';
  }
}

export class ConnectionError extends DatabaseError {
  constructor(message: string, originalError?: Error) {
    super(message, 'CONNECTION_ERROR', originalError);
    this.name = 'ConnectionError';
  }
}

export class QueryError extends DatabaseError {
  constructor(message: string, public query?: string, originalError?: Error, code = 'QUERY_ERROR') {
    super(message, code, originalError);
    this.name = 'QueryError';
  }
}

/**
 * Raised by adapters when a statement references a table that does not exist.
 */
export class MissingTableError extends QueryError {
  constructor(message: string, query?: string, originalError?: Error) {
    super(message, query, originalError, 'MISSING_TABLE');
    this.name = 'MissingTableError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
