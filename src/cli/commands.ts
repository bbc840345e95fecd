/**
 * Command-line front end for the migration engine
 */

import { DatabaseConfig, DatabaseConnection, toError } from '../database/types';
import { createDatabase, dropDatabase, dumpSchema } from '../database/DatabaseAdmin';
import { MigrateConfig } from '../config/database';
import { FileMigrationStore } from '../migrations/FileMigrationStore';
import { MigrationEngine } from '../migrations/MigrationEngine';
import { Scaffolder } from '../migrations/Scaffolder';
import { ScriptRegistry } from '../migrations/ScriptRegistry';

export const USAGE = `Usage: sqlmigrate <command> [arguments] [options]

Commands:
  init                 Create the up/ and down/ directories and up/0.sql
  new [sql|script]     Create the next numbered migration (default: sql)
  up [version]         Apply migrations up to version (default: latest)
  down <version>       Revert migrations above version
  stamp [version]      Record version as applied without running it
  remove <version>     Delete version from the version table
  version              Print the current version and exit with it as status
  dump                 Write the current schema to up/0.sql
  create               Create the database
  drop                 Drop the database
  help                 Show this message

Options:
  -v, --verbose        Print migration SQL before running it
  -d, --dir <path>     Migrations directory (default: $MIGRATIONS_DIR or ./migrations)
  -h, --help           Show this message`;

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export interface ParsedArgs {
  command: string;
  positionals: string[];
  verbose: boolean;
  dir?: string;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const positionals: string[] = [];
  let verbose = false;
  let dir: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '-v':
      case '--verbose':
        verbose = true;
        break;
      case '-d':
      case '--dir': {
        const value = argv[i + 1];
        if (value === undefined) {
          throw new CliUsageError(`${arg} requires a path`);
        }
        dir = value;
        i++;
        break;
      }
      case '-h':
      case '--help':
        positionals.unshift('help');
        break;
      default:
        if (arg.startsWith('-')) {
          throw new CliUsageError(`Unknown option: ${arg}`);
        }
        positionals.push(arg);
    }
  }

  const [command = 'help', ...rest] = positionals;
  return { command, positionals: rest, verbose, dir };
}

export function parseVersion(value: string | undefined, name = 'version'): number {
  if (value === undefined) {
    throw new CliUsageError(`Missing ${name}`);
  }
  const version = /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
  if (!Number.isSafeInteger(version)) {
    throw new CliUsageError(`Invalid ${name}: ${value}`);
  }
  return version;
}

function optionalVersion(value: string | undefined): number | undefined {
  return value === undefined ? undefined : parseVersion(value);
}

export interface DatabaseSession {
  connection: DatabaseConnection;
  close(): Promise<void>;
}

export interface CliDependencies {
  databaseConfig: DatabaseConfig;
  migrateConfig: MigrateConfig;
  openSession(config: DatabaseConfig): Promise<DatabaseSession>;
  loadScripts(modulePath: string): ScriptRegistry;
}

export async function runCli(argv: string[], deps: CliDependencies): Promise<number> {
  let args: ParsedArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    console.error(`❌ ${toError(error).message}\n\n${USAGE}`);
    return EXIT_USAGE;
  }

  const migrationsDir = args.dir ?? deps.migrateConfig.migrationsDir;
  const ledgerTable = deps.migrateConfig.ledgerTable;
  const verbose = args.verbose || deps.migrateConfig.verbose;
  const [arg] = args.positionals;

  const withEngine = async <T>(fn: (engine: MigrationEngine) => Promise<T>): Promise<T> => {
    const scripts = deps.migrateConfig.scriptsModule
      ? deps.loadScripts(deps.migrateConfig.scriptsModule)
      : new ScriptRegistry();
    const session = await deps.openSession(deps.databaseConfig);
    try {
      const engine = new MigrationEngine(session.connection, new FileMigrationStore(migrationsDir), scripts, { ledgerTable });
      return await fn(engine);
    } finally {
      await session.close();
    }
  };

  try {
    switch (args.command) {
      case 'help':
        console.log(USAGE);
        return EXIT_OK;

      case 'init': {
        const created = await new Scaffolder(migrationsDir, ledgerTable).init();
        if (created.length === 0) {
          console.log(`Migrations directory ${migrationsDir} is already initialized`);
        }
        created.forEach(file => console.log(`📁 Created ${file}`));
        return EXIT_OK;
      }

      case 'new': {
        const result = await new Scaffolder(migrationsDir, ledgerTable).newMigration(arg ?? 'sql');
        result.files.forEach(file => console.log(`📝 Created ${file}`));
        if (arg === 'script') {
          console.log(`Register scripted migrations named "${result.version}_up" and "${result.version}_down"`);
        }
        return EXIT_OK;
      }

      case 'up': {
        const target = optionalVersion(arg);
        await withEngine(engine => engine.up(target, { verbose }));
        return EXIT_OK;
      }

      case 'down': {
        const target = parseVersion(arg);
        await withEngine(engine => engine.down(target, { verbose }));
        return EXIT_OK;
      }

      case 'stamp': {
        const version = optionalVersion(arg);
        await withEngine(engine => engine.stamp(version));
        return EXIT_OK;
      }

      case 'remove': {
        const version = parseVersion(arg);
        await withEngine(engine => engine.remove(version));
        return EXIT_OK;
      }

      case 'version': {
        const current = await withEngine(engine => engine.currentVersion());
        console.log(current === null ? 'none' : String(current));
        return current ?? EXIT_OK;
      }

      case 'dump': {
        const schema = await withDatabase(deps, connection => dumpSchema(connection, deps.databaseConfig));
        const file = await new Scaffolder(migrationsDir, ledgerTable).writeInitialSchema(schema);
        console.log(`💾 Wrote schema to ${file}`);
        return EXIT_OK;
      }

      case 'create':
        await createDatabase(deps.databaseConfig);
        console.log('🆕 Database created');
        return EXIT_OK;

      case 'drop':
        await dropDatabase(deps.databaseConfig);
        console.log('🗑️  Database dropped');
        return EXIT_OK;

      default:
        throw new CliUsageError(`Unknown command: ${args.command}`);
    }
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(`❌ ${error.message}\n\n${USAGE}`);
      return EXIT_USAGE;
    }
    console.error(`❌ ${toError(error).message}`);
    return EXIT_FAILURE;
  }
}

async function withDatabase<T>(deps: CliDependencies, fn: (connection: DatabaseConnection) => Promise<T>): Promise<T> {
  const session = await deps.openSession(deps.databaseConfig);
  try {
    return await fn(session.connection);
  } finally {
    await session.close();
  }
}
