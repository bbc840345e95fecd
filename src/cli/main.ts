#!/usr/bin/env node

import * as path from 'path';
import dotenv from 'dotenv';
import { ConnectionFactory } from '../database/ConnectionFactory';
import { DatabaseConfig } from '../database/types';
import { getDatabaseConfig, getMigrateConfig } from '../config/database';
import { registryFromModule, ScriptRegistry } from '../migrations/ScriptRegistry';
import { CliDependencies, DatabaseSession, EXIT_FAILURE, runCli } from './commands';

async function openSession(config: DatabaseConfig): Promise<DatabaseSession> {
  const factory = ConnectionFactory.getInstance();
  const pool = await factory.createPool(config);
  const connection = await pool.acquire();

  return {
    connection,
    close: async () => {
      await pool.release(connection);
      await factory.closeAllPools();
    }
  };
}

function loadScripts(modulePath: string): ScriptRegistry {
  const resolved = path.resolve(modulePath);
  return registryFromModule(require(resolved), resolved);
}

async function main(): Promise<number> {
  dotenv.config();

  let deps: CliDependencies;
  try {
    deps = {
      databaseConfig: getDatabaseConfig(),
      migrateConfig: getMigrateConfig(),
      openSession,
      loadScripts
    };
  } catch (error) {
    console.error('❌ Invalid configuration:', error instanceof Error ? error.message : error);
    return EXIT_FAILURE;
  }

  return runCli(process.argv.slice(2), deps);
}

if (require.main === module) {
  main().then(
    code => process.exit(code),
    error => {
      console.error('💥 Unexpected failure:', error);
      process.exit(EXIT_FAILURE);
    }
  );
}
