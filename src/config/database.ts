/**
 * Environment-driven configuration for the migration runner
 */

import * as path from 'path';
import { DatabaseConfig, DatabaseType } from '../database/types';
import { DatabaseConfigBuilder } from '../database/config';

export type Env = Record<string, string | undefined>;

export interface MigrateConfig {
  /** Directory holding the `up/` and `down/` artifact folders */
  migrationsDir: string;
  ledgerTable: string;
  /** Module exporting scripted migrations, resolved against the working directory */
  scriptsModule?: string;
  verbose: boolean;
}

export const DEFAULT_MIGRATIONS_DIR = './migrations';
export const DEFAULT_LEDGER_TABLE = 'db_version';

function parseInteger(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed)) {
    throw new Error(`${name} must be an integer, got "${value}"`);
  }
  return parsed;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  return value === 'true' || value === '1';
}

function parseDatabaseType(value: string | undefined): DatabaseType {
  const type = value || 'sqlite';
  if (type === 'sqlite' || type === 'postgresql') {
    return type;
  }
  throw new Error(`Unsupported DATABASE_TYPE: ${type}`);
}

/**
 * Get the database configuration from the environment
 */
export function getDatabaseConfig(env: Env = process.env): DatabaseConfig {
  const dbType = parseDatabaseType(env.DATABASE_TYPE);

  if (dbType === 'sqlite') {
    return DatabaseConfigBuilder.create('sqlite')
      .database(path.resolve(env.DATABASE_PATH || './data/database.db'))
      .build();
  }

  const builder = DatabaseConfigBuilder.create('postgresql')
    .maxConnections(parseInteger('MAX_CONNECTIONS', env.MAX_CONNECTIONS))
    .ssl(parseBoolean(env.DB_SSL));

  if (env.DATABASE_URL) {
    return builder.connectionString(env.DATABASE_URL).build();
  }

  return builder
    .host(env.DB_HOST || 'localhost')
    .port(parseInteger('DB_PORT', env.DB_PORT) ?? 5432)
    .database(env.DB_NAME)
    .username(env.DB_USER)
    .password(env.DB_PASSWORD)
    .build();
}

/**
 * Get the migration runner settings from the environment
 */
export function getMigrateConfig(env: Env = process.env): MigrateConfig {
  return {
    migrationsDir: path.resolve(env.MIGRATIONS_DIR || DEFAULT_MIGRATIONS_DIR),
    ledgerTable: env.MIGRATE_LEDGER_TABLE || DEFAULT_LEDGER_TABLE,
    scriptsModule: env.MIGRATE_SCRIPTS || undefined,
    verbose: parseBoolean(env.MIGRATE_VERBOSE) ?? false
  };
}
