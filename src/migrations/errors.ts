/**
 * Migration engine error types
 */

import { Direction } from './types';

export class MigrationError extends Error {
  constructor(
    message: string,
    public code: string = 'MIGRATION_ERROR',
    public originalError?: Error
  ) {
    super(message);
    this.name = 'MigrationError';
  }
}

export class VersionNotFoundError extends MigrationError {
  constructor(public version: number | undefined, public direction: Direction) {
    super(
      version === undefined
        ? `No ${direction} migrations found`
        : `Migration version ${version} not found in ${direction} migrations`,
      'VERSION_NOT_FOUND'
    );
    this.name = 'VersionNotFoundError';
  }
}

/**
 * Reading the ledger failed because its table does not exist yet.
 * Recovered by the ledger itself and never thrown to callers.
 */
export class LedgerUnavailableError extends MigrationError {
  constructor(public table: string, originalError?: Error) {
    super(`Version table "${table}" is not available`, 'LEDGER_UNAVAILABLE', originalError);
    this.name = 'LedgerUnavailableError';
  }
}

export class UnitExecutionError extends MigrationError {
  constructor(
    public direction: Direction,
    public version: number,
    public artifact: string,
    originalError: Error
  ) {
    super(`Migration ${direction}/${artifact} failed: ${originalError.message}`, 'UNIT_EXECUTION_FAILED', originalError);
    this.name = 'UnitExecutionError';
  }
}

export class UnsupportedMigrationTypeError extends MigrationError {
  constructor(public type: string, public artifact?: string) {
    super(
      artifact
        ? `Unsupported migration type "${type}" for ${artifact}`
        : `Unsupported migration type "${type}"`,
      'UNSUPPORTED_TYPE'
    );
    this.name = 'UnsupportedMigrationTypeError';
  }
}

export class MigrationConfigError extends MigrationError {
  constructor(message: string, originalError?: Error) {
    super(message, 'CONFIG_ERROR', originalError);
    this.name = 'MigrationConfigError';
  }
}
