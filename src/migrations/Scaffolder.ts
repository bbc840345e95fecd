/**
 * Creates migration directories and new numbered migration artifacts
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { DIRECTIONS, Direction, isMigrationType } from './types';
import { UnsupportedMigrationTypeError } from './errors';
import { FileMigrationStore } from './FileMigrationStore';
import { assertIdentifier } from './VersionLedger';

const CLEARS_SEARCH_PATH = /set_config\(\s*'search_path'\s*,\s*''/i;
const RESTORE_SEARCH_PATH = "SELECT pg_catalog.set_config('search_path', 'public', false);\n";

export interface NewMigrationResult {
  version: number;
  files: string[];
}

export function ledgerTableSql(table: string): string {
  return `CREATE TABLE ${assertIdentifier(table)} (version INTEGER NOT NULL);\n`;
}

export function recordVersionSql(table: string, version: number): string {
  return `INSERT INTO ${assertIdentifier(table)} (version) VALUES (${version});\n`;
}

export function forgetVersionSql(table: string, version: number): string {
  return `DELETE FROM ${assertIdentifier(table)} WHERE version = ${version};\n`;
}

export function scriptName(direction: Direction, version: number): string {
  return `${version}_${direction}`;
}

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}

export class Scaffolder {
  private readonly store: FileMigrationStore;

  constructor(private readonly migrationsDir: string, private readonly ledgerTable = 'db_version') {
    this.store = new FileMigrationStore(migrationsDir);
  }

  /**
   * Create `up/` and `down/` plus an `up/0.sql` that creates the version
   * table. Returns the files and directories that were created.
   */
  async init(): Promise<string[]> {
    const created: string[] = [];
    for (const direction of DIRECTIONS) {
      const dir = this.store.directoryFor(direction);
      if (!(await exists(dir))) {
        await fs.mkdir(dir, { recursive: true });
        created.push(dir);
      }
    }

    const initial = path.join(this.store.directoryFor('up'), '0.sql');
    if (!(await exists(initial))) {
      await fs.writeFile(initial, ledgerTableSql(this.ledgerTable) + recordVersionSql(this.ledgerTable, 0));
      created.push(initial);
    }

    return created;
  }

  /**
   * Write the next numbered up/down pair of the given type.
   */
  async newMigration(type: string = 'sql'): Promise<NewMigrationResult> {
    if (!isMigrationType(type)) {
      throw new UnsupportedMigrationTypeError(type);
    }

    const [up, down] = await Promise.all([this.store.discover('up'), this.store.discover('down')]);
    const version = Math.max(0, ...up, ...down) + 1;

    const contents: Record<Direction, string> = type === 'sql'
      ? {
        up: `-- Migration ${version}\n\n${recordVersionSql(this.ledgerTable, version)}`,
        down: `-- Revert migration ${version}\n\n${forgetVersionSql(this.ledgerTable, version)}`
      }
      : {
        up: `${scriptName('up', version)}\n`,
        down: `${scriptName('down', version)}\n`
      };

    const files: string[] = [];
    for (const direction of DIRECTIONS) {
      const file = path.join(this.store.directoryFor(direction), `${version}.${type}`);
      await fs.writeFile(file, contents[direction], { flag: 'wx' });
      files.push(file);
    }

    return { version, files };
  }

  /**
   * Replace `up/0.sql` with a dumped schema, making sure it creates and
   * seeds the version table.
   */
  async writeInitialSchema(schemaSql: string): Promise<string> {
    const dir = this.store.directoryFor('up');
    await fs.mkdir(dir, { recursive: true });

    const table = assertIdentifier(this.ledgerTable);
    const hasLedger = new RegExp(`CREATE\\s+TABLE\\s+(IF\\s+NOT\\s+EXISTS\\s+)?("?\\w+"?\\.)?"?${table}"?[\\s(]`, 'i').test(schemaSql);

    let content = schemaSql.trimEnd() + '\n\n';
    if (CLEARS_SEARCH_PATH.test(schemaSql)) {
      // pg_dump empties search_path; the unqualified ledger SQL needs it back
      content += RESTORE_SEARCH_PATH;
    }
    if (!hasLedger) {
      content += ledgerTableSql(table);
    }
    content += recordVersionSql(table, 0);

    const file = path.join(dir, '0.sql');
    await fs.writeFile(file, content);
    return file;
  }
}
