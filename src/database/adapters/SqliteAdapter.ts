/**
 * SQLite database adapter with connection pooling
 */

import sqlite3 from 'sqlite3';
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
  SqlParam
} from '../types';

function wrapSqliteError(action: string, sql: string, err: Error): QueryError {
  const message = `SQLite ${action} failed: ${err.message}`;
  if (/no such table/i.test(err.message)) {
    return new MissingTableError(message, sql, err);
  }
  return new QueryError(message, sql, err);
}

export class SqliteConnection implements DatabaseConnection {
  readonly dialect = 'sqlite' as const;
  readonly paramStyle = 'qmark' as const;
  private db: sqlite3.Database;
  private transactionOpen = false;
  private closed = false;

  constructor(db: sqlite3.Database) {
    this.db = db;
  }

  async query<T = Row>(sql: string, params: SqlParam[] = []): Promise<QueryResult<T>> {
    return new Promise((resolve, reject) => {
      this.db.all<T>(sql, params, (err, rows) => {
        if (err) {
          reject(wrapSqliteError('query', sql, err));
          return;
        }

        resolve({
          rows: rows ?? [],
          rowCount: rows ? rows.length : 0
        });
      });
    });
  }

  async execute(sql: string, params: SqlParam[] = []): Promise<ExecuteResult> {
    return new Promise((resolve, reject) => {
      this.db.run(sql, params, function(err) {
        if (err) {
          reject(wrapSqliteError('execute', sql, err));
          return;
        }

        resolve({ affectedRows: this.changes });
      });
    });
  }

  async executeBatch(sql: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.db.exec(sql, (err) => {
        if (err) {
          reject(wrapSqliteError('batch', sql, err));
          return;
        }
        resolve();
      });
    });
  }

  async beginTransaction(): Promise<void> {
    if (this.transactionOpen) {
      throw new Error('Transaction already in progress');
    }

    await this.execute('BEGIN TRANSACTION');
    this.transactionOpen = true;
  }

  async commit(): Promise<void> {
    if (!this.transactionOpen) {
      throw new Error('No transaction in progress');
    }

    await this.execute('COMMIT');
    this.transactionOpen = false;
  }

  async rollback(): Promise<void> {
    if (!this.transactionOpen) {
      throw new Error('No transaction in progress');
    }

    // SQLite may already have rolled back on its own after certain errors
    this.transactionOpen = false;
    await this.execute('ROLLBACK');
  }

  inTransaction(): boolean {
    return this.transactionOpen;
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    return new Promise((resolve, reject) => {
      this.db.close((err) => {
        if (err) {
          reject(new ConnectionError(`Failed to close SQLite connection: ${err.message}`, err));
          return;
        }
        this.closed = true;
        resolve();
      });
    });
  }

  isConnected(): boolean {
    return !this.closed;
  }
}

/**
 * Hands out at most `maxConnections` handles (default 1). Acquiring past
 * that fails until one is released.
 */
export class SqliteConnectionPool implements ConnectionPool {
  private config: DatabaseConfig;
  private connections: SqliteConnection[] = [];
  private availableConnections: SqliteConnection[] = [];
  private maxConnections: number;
  private destroyed = false;

  constructor(config: DatabaseConfig) {
    this.config = config;
    this.maxConnections = config.maxConnections || 1;
  }

  async acquire(): Promise<DatabaseConnection> {
    if (this.destroyed) {
      throw new ConnectionError('Connection pool has been destroyed');
    }

    const available = this.availableConnections.pop();
    if (available) {
      return available;
    }

    if (this.connections.length >= this.maxConnections) {
      throw new ConnectionError(`All ${this.maxConnections} SQLite connection(s) are in use`);
    }

    const connection = await this.createConnection();
    this.connections.push(connection);
    return connection;
  }

  async release(connection: DatabaseConnection): Promise<void> {
    if (!(connection instanceof SqliteConnection) || !this.connections.includes(connection)) {
      throw new Error('Connection does not belong to this pool');
    }
    if (connection.inTransaction()) {
      await connection.rollback();
    }

    this.availableConnections.push(connection);
  }

  async destroy(): Promise<void> {
    this.destroyed = true;
    await Promise.all(this.connections.map(conn => conn.close()));

    this.connections = [];
    this.availableConnections = [];
  }

  private async createConnection(): Promise<SqliteConnection> {
    return new Promise((resolve, reject) => {
      const db = new sqlite3.Database(sqliteFilename(this.config), (err) => {
        if (err) {
          reject(new ConnectionError(`Failed to create SQLite connection: ${err.message}`, err));
          return;
        }

        db.run('PRAGMA foreign_keys = ON');
        resolve(new SqliteConnection(db));
      });
    });
  }
}

export function sqliteFilename(config: DatabaseConfig): string {
  return config.database || ':memory:';
}
