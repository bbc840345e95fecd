/**
 * Reads and writes applied versions in the version table
 */

import { DatabaseConnection, MissingTableError, placeholder, toError } from '../database/types';
import { LedgerUnavailableError, MigrationConfigError } from './errors';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function assertIdentifier(name: string): string {
  if (!IDENTIFIER.test(name)) {
    throw new MigrationConfigError(`Invalid version table name: ${name}`);
  }
  return name;
}

interface MaxVersionRow {
  version: number | string | bigint | null;
}

function toVersion(value: MaxVersionRow['version'] | undefined): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  // pg returns MAX() over integer columns as a string for int8
  const version = Number(value);
  return Number.isFinite(version) ? version : null;
}

export class VersionLedger {
  readonly table: string;

  constructor(private readonly connection: DatabaseConnection, table = 'db_version') {
    this.table = assertIdentifier(table);
  }

  /**
   * Highest recorded version, or `null` when the table is empty or
   * has not been created yet.
   */
  async currentVersion(): Promise<number | null> {
    try {
      const result = await this.connection.query<MaxVersionRow>(
        `SELECT MAX(version) AS version FROM ${this.table}`
      );
      return toVersion(result.rows[0]?.version);
    } catch (error) {
      if (!(error instanceof MissingTableError)) {
        throw error;
      }

      await this.rollbackQuietly();
      const unavailable = new LedgerUnavailableError(this.table, error);
      console.warn(`⚠️  ${unavailable.message}; treating database as unversioned`);
      return null;
    }
  }

  async insertVersion(version: number): Promise<void> {
    await this.mutate(
      `INSERT INTO ${this.table} (version) VALUES (${placeholder(this.connection.paramStyle, 1)})`,
      version
    );
  }

  async deleteVersion(version: number): Promise<number> {
    return this.mutate(
      `DELETE FROM ${this.table} WHERE version = ${placeholder(this.connection.paramStyle, 1)}`,
      version
    );
  }

  /**
   * Delete every row with `above < version <= upTo`.
   */
  async deleteRange(above: number, upTo: number): Promise<number> {
    const style = this.connection.paramStyle;
    return this.mutate(
      `DELETE FROM ${this.table} WHERE version > ${placeholder(style, 1)} AND version <= ${placeholder(style, 2)}`,
      above,
      upTo
    );
  }

  private async mutate(sql: string, ...params: number[]): Promise<number> {
    await this.connection.beginTransaction();
    try {
      const result = await this.connection.execute(sql, params);
      await this.connection.commit();
      return result.affectedRows;
    } catch (error) {
      await this.rollbackQuietly();
      throw error;
    }
  }

  private async rollbackQuietly(): Promise<void> {
    if (!this.connection.inTransaction()) {
      return;
    }
    try {
      await this.connection.rollback();
    } catch (error) {
      console.error('❌ Rollback failed:', toError(error).message);
    }
  }
}
