// Test utilities for migration engine tests

import {
  DatabaseConnection,
  ExecuteResult,
  MissingTableError,
  ParamStyle,
  QueryError,
  QueryResult,
  SqlParam
} from '../../database/types';
import { Direction, MigrationStore, MigrationType, MigrationUnit } from '../types';

/**
 * In-memory stand-in for a database holding only the version table.
 * SQL batches are recorded; the INSERT/DELETE statements on
 * `db_version` inside them are applied so units can move the ledger.
 */
export class FakeConnection implements DatabaseConnection {
  readonly dialect = 'sqlite' as const;
  paramStyle: ParamStyle = 'qmark';
  versions: number[] = [];
  tableExists = true;
  batches: string[] = [];
  statements: string[] = [];
  commits = 0;
  rollbacks = 0;
  failBatch?: (sql: string) => Error | undefined;
  failCommit?: (lastBatch: string | undefined) => Error | undefined;
  failQuery?: Error;

  private open = false;
  private snapshot: { versions: number[]; tableExists: boolean } | null = null;

  async query<T>(sql: string, params: SqlParam[] = []): Promise<QueryResult<T>> {
    this.statements.push(sql);
    if (this.failQuery) {
      throw this.failQuery;
    }
    if (/SELECT MAX\(version\)/i.test(sql)) {
      this.requireTable(sql);
      const max = this.versions.length > 0 ? Math.max(...this.versions) : null;
      return { rows: [{ version: max }] as unknown as T[], rowCount: 1 };
    }
    throw new QueryError(`Unsupported query: ${sql} ${params.join(',')}`, sql);
  }

  async execute(sql: string, params: SqlParam[] = []): Promise<ExecuteResult> {
    this.statements.push(sql);
    const before = this.versions.length;
    const [first, second] = params.map(Number);

    if (/^INSERT INTO/i.test(sql)) {
      this.requireTable(sql);
      this.versions.push(first);
      return { affectedRows: 1 };
    }
    if (/WHERE version > .* AND version <= /i.test(sql)) {
      this.requireTable(sql);
      this.versions = this.versions.filter(v => !(v > first && v <= second));
      return { affectedRows: before - this.versions.length };
    }
    if (/^DELETE FROM .* WHERE version = /i.test(sql)) {
      this.requireTable(sql);
      this.versions = this.versions.filter(v => v !== first);
      return { affectedRows: before - this.versions.length };
    }
    throw new QueryError(`Unsupported statement: ${sql}`, sql);
  }

  async executeBatch(sql: string): Promise<void> {
    this.batches.push(sql);
    const failure = this.failBatch?.(sql);
    if (failure) {
      throw failure;
    }

    if (/CREATE TABLE db_version/i.test(sql)) {
      this.tableExists = true;
    }
    for (const match of sql.matchAll(/INSERT INTO db_version \(version\) VALUES \((\d+)\)/gi)) {
      this.requireTable(sql);
      this.versions.push(Number(match[1]));
    }
    for (const match of sql.matchAll(/DELETE FROM db_version WHERE version = (\d+)/gi)) {
      this.requireTable(sql);
      const version = Number(match[1]);
      this.versions = this.versions.filter(v => v !== version);
    }
  }

  async beginTransaction(): Promise<void> {
    if (this.open) {
      throw new Error('Transaction already in progress');
    }
    this.open = true;
    this.snapshot = { versions: [...this.versions], tableExists: this.tableExists };
  }

  async commit(): Promise<void> {
    if (!this.open) {
      throw new Error('No transaction in progress');
    }
    const failure = this.failCommit?.(this.batches[this.batches.length - 1]);
    if (failure) {
      throw failure;
    }
    this.open = false;
    this.snapshot = null;
    this.commits++;
  }

  async rollback(): Promise<void> {
    if (!this.open) {
      throw new Error('No transaction in progress');
    }
    if (this.snapshot) {
      this.versions = this.snapshot.versions;
      this.tableExists = this.snapshot.tableExists;
    }
    this.open = false;
    this.snapshot = null;
    this.rollbacks++;
  }

  inTransaction(): boolean {
    return this.open;
  }

  async close(): Promise<void> {
    // Nothing to release
  }

  isConnected(): boolean {
    return true;
  }

  private requireTable(sql: string): void {
    if (!this.tableExists) {
      throw new MissingTableError('SQLite query failed: SQLITE_ERROR: no such table: db_version', sql);
    }
  }
}

export interface MemoryArtifact {
  type?: MigrationType;
  content: string;
}

export type MemoryArtifacts = Record<Direction, Record<number, MemoryArtifact>>;

export class MemoryMigrationStore implements MigrationStore {
  constructor(private readonly artifacts: MemoryArtifacts) {}

  async discover(direction: Direction): Promise<Set<number>> {
    return new Set(Object.keys(this.artifacts[direction]).map(Number));
  }

  async resolve(direction: Direction, version: number): Promise<MigrationUnit | undefined> {
    const artifact = this.artifacts[direction][version];
    if (!artifact) {
      return undefined;
    }
    const type = artifact.type ?? 'sql';
    return {
      direction,
      version,
      type,
      artifact: `${version}.${type}`,
      path: `/memory/${direction}/${version}.${type}`
    };
  }

  async read(unit: MigrationUnit): Promise<string> {
    return this.artifacts[unit.direction][unit.version].content;
  }
}

export function upSql(version: number): MemoryArtifact {
  return { content: `CREATE TABLE t${version} (id INTEGER);\nINSERT INTO db_version (version) VALUES (${version});\n` };
}

export function downSql(version: number): MemoryArtifact {
  return { content: `DROP TABLE t${version};\nDELETE FROM db_version WHERE version = ${version};\n` };
}

/**
 * Artifacts with matching up/down SQL units for each version
 * (version 0 only gets an up unit).
 */
export function sqlArtifacts(versions: number[], downVersions = versions.filter(v => v !== 0)): MemoryArtifacts {
  const up: Record<number, MemoryArtifact> = {};
  const down: Record<number, MemoryArtifact> = {};
  versions.forEach(v => { up[v] = upSql(v); });
  downVersions.forEach(v => { down[v] = downSql(v); });
  return { up, down };
}

export function silenceConsole(): void {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
}
