/**
 * Public API of the migration runner
 */

export * from './database/types';
export * from './database/config';
export * from './database/ConnectionFactory';
export * from './database/DatabaseAdmin';
export * from './database/adapters/SqliteAdapter';
export * from './database/adapters/PostgresAdapter';
export * from './config/database';
export * from './migrations/types';
export * from './migrations/errors';
export * from './migrations/FileMigrationStore';
export * from './migrations/ScriptRegistry';
export * from './migrations/VersionLedger';
export * from './migrations/Reconciler';
export * from './migrations/Planner';
export * from './migrations/Executor';
export * from './migrations/MigrationEngine';
export * from './migrations/Scaffolder';
export { runCli, parseArgs, parseVersion, USAGE } from './cli/commands';
