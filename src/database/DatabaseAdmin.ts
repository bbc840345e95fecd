/**
 * Create, drop and schema-dump helpers for the supported databases
 */

import * as fs from 'fs/promises';
import { execFile } from 'child_process';
import { promisify } from 'util';
import { Client } from 'pg';
import { DatabaseConfig, DatabaseConnection } from './types';
import { postgresClientConfig } from './adapters/PostgresAdapter';
import { sqliteFilename } from './adapters/SqliteAdapter';

const execFileAsync = promisify(execFile);

const MAINTENANCE_DATABASE = 'postgres';

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Name of the PostgreSQL database a config points at.
 */
export function postgresDatabaseName(config: DatabaseConfig): string {
  if (config.database) {
    return config.database;
  }
  if (config.connectionString) {
    const name = decodeURIComponent(new URL(config.connectionString).pathname.replace(/^\//, ''));
    if (name) {
      return name;
    }
  }
  throw new Error('PostgreSQL config does not name a database');
}

function maintenanceClient(config: DatabaseConfig): Client {
  const clientConfig = postgresClientConfig(config);
  if (config.connectionString) {
    const url = new URL(config.connectionString);
    url.pathname = `/${MAINTENANCE_DATABASE}`;
    return new Client({ ...clientConfig, connectionString: url.toString(), database: undefined });
  }
  return new Client({ ...clientConfig, database: MAINTENANCE_DATABASE });
}

async function withMaintenanceClient(config: DatabaseConfig, sql: string): Promise<void> {
  const client = maintenanceClient(config);
  await client.connect();
  try {
    await client.query(sql);
  } finally {
    await client.end();
  }
}

export async function createDatabase(config: DatabaseConfig): Promise<void> {
  switch (config.type) {
    case 'sqlite': {
      const filename = sqliteFilename(config);
      if (filename === ':memory:') {
        return;
      }
      // An empty file is a valid, empty SQLite database
      const handle = await fs.open(filename, 'a');
      await handle.close();
      return;
    }
    case 'postgresql':
      await withMaintenanceClient(config, `CREATE DATABASE ${quoteIdentifier(postgresDatabaseName(config))}`);
      return;
  }
}

export async function dropDatabase(config: DatabaseConfig): Promise<void> {
  switch (config.type) {
    case 'sqlite': {
      const filename = sqliteFilename(config);
      if (filename === ':memory:') {
        return;
      }
      await fs.rm(filename, { force: true });
      return;
    }
    case 'postgresql':
      await withMaintenanceClient(config, `DROP DATABASE IF EXISTS ${quoteIdentifier(postgresDatabaseName(config))}`);
      return;
  }
}

interface SqliteMasterRow {
  sql: string;
}

/**
 * Schema DDL of the database the connection points at.
 */
export async function dumpSchema(connection: DatabaseConnection, config: DatabaseConfig): Promise<string> {
  switch (config.type) {
    case 'sqlite': {
      const result = await connection.query<SqliteMasterRow>(
        `SELECT sql FROM sqlite_master
         WHERE sql IS NOT NULL AND name NOT LIKE 'sqlite_%'
         ORDER BY CASE type WHEN 'table' THEN 0 WHEN 'index' THEN 1 ELSE 2 END, name`
      );
      return result.rows.map(row => `${row.sql};`).join('\n\n') + '\n';
    }
    case 'postgresql':
      return dumpPostgresSchema(config);
  }
}

export function pgDumpArgs(config: DatabaseConfig): string[] {
  const args = ['--schema-only', '--no-owner', '--no-privileges'];
  if (config.connectionString) {
    args.push(`--dbname=${config.connectionString}`);
    return args;
  }
  if (config.host) args.push(`--host=${config.host}`);
  if (config.port) args.push(`--port=${config.port}`);
  if (config.username) args.push(`--username=${config.username}`);
  args.push(`--dbname=${postgresDatabaseName(config)}`);
  return args;
}

async function dumpPostgresSchema(config: DatabaseConfig): Promise<string> {
  const env = config.password ? { ...process.env, PGPASSWORD: config.password } : process.env;
  const { stdout } = await execFileAsync('pg_dump', pgDumpArgs(config), { env, encoding: 'utf8', maxBuffer: 64 * 1024 * 1024 });
  return stdout;
}
