/**
 * Migration system types and interfaces
 */

import { DatabaseConnection } from '../database/types';

export type Direction = 'up' | 'down';

export type MigrationType = 'sql' | 'script';

export const DIRECTIONS: readonly Direction[] = ['up', 'down'];

export function isMigrationType(value: string): value is MigrationType {
  return value === 'sql' || value === 'script';
}

export interface MigrationUnit {
  direction: Direction;
  version: number;
  type: MigrationType;
  /** File name of the artifact, e.g. `3.sql` */
  artifact: string;
  /** Absolute path of the artifact */
  path: string;
}

/**
 * Code-driven migration step. Implementations own their ledger
 * mutation and their commit/rollback, the same way an SQL unit
 * ends with its own INSERT or DELETE on the version table.
 */
export interface ScriptedMigration {
  apply(connection: DatabaseConnection): Promise<void>;
}

export interface MigrationStore {
  discover(direction: Direction): Promise<Set<number>>;
  resolve(direction: Direction, version: number): Promise<MigrationUnit | undefined>;
  /** Raw artifact content: SQL text, or the registered name of a script */
  read(unit: MigrationUnit): Promise<string>;
}

export enum EngineState {
  Idle = 'idle',
  Running = 'running',
  Completed = 'completed',
  Failed = 'failed'
}

export interface RunOptions {
  verbose?: boolean;
}

export interface MigrationRunResult {
  direction: Direction;
  /** True when the engine had already run and the call was ignored */
  skipped: boolean;
  plan: number[];
  applied: number[];
  /** Ledger rows purged by reconciliation before planning */
  purged: number;
}

export interface MigrationEngineOptions {
  ledgerTable?: string;
}
