/**
 * Filesystem migration store: `<dir>/up/<version>.<type>` and
 * `<dir>/down/<version>.<type>`
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { Direction, MigrationStore, MigrationType, MigrationUnit, isMigrationType } from './types';
import { MigrationConfigError, UnsupportedMigrationTypeError } from './errors';

const VERSION_PATTERN = /^\d+$/;

export interface ParsedArtifactName {
  version: number;
  extension: string;
}

/**
 * Split an artifact name at its first `.`. Names without a numeric
 * prefix (`.gitkeep`, `README.md`) yield `null`; a prefix beyond the
 * safe integer range is an error.
 */
export function parseArtifactName(fileName: string): ParsedArtifactName | null {
  const dot = fileName.indexOf('.');
  const prefix = dot === -1 ? fileName : fileName.slice(0, dot);
  if (!VERSION_PATTERN.test(prefix)) {
    return null;
  }

  const version = parseInt(prefix, 10);
  if (!Number.isSafeInteger(version)) {
    throw new MigrationConfigError(`Migration version in ${fileName} is too large`);
  }

  return {
    version,
    extension: dot === -1 ? '' : fileName.slice(dot + 1)
  };
}

export class FileMigrationStore implements MigrationStore {
  constructor(private readonly migrationsDir: string) {}

  directoryFor(direction: Direction): string {
    return path.join(this.migrationsDir, direction);
  }

  async discover(direction: Direction): Promise<Set<number>> {
    const units = await this.scan(direction);
    return new Set(units.keys());
  }

  async resolve(direction: Direction, version: number): Promise<MigrationUnit | undefined> {
    const units = await this.scan(direction);
    return units.get(version);
  }

  async read(unit: MigrationUnit): Promise<string> {
    return fs.readFile(unit.path, 'utf8');
  }

  /**
   * One unit per version. When both `N.sql` and `N.script` exist the
   * SQL artifact wins and the other is reported.
   */
  private async scan(direction: Direction): Promise<Map<number, MigrationUnit>> {
    const dir = this.directoryFor(direction);
    let entries: string[];
    try {
      entries = await fs.readdir(dir);
    } catch (error) {
      throw new MigrationConfigError(
        `Cannot read ${direction} migrations directory ${dir}`,
        error instanceof Error ? error : undefined
      );
    }

    const units = new Map<number, MigrationUnit>();
    for (const fileName of entries.sort()) {
      const parsed = parseArtifactName(fileName);
      if (!parsed) {
        continue;
      }
      if (!isMigrationType(parsed.extension)) {
        throw new UnsupportedMigrationTypeError(parsed.extension, `${direction}/${fileName}`);
      }

      const unit: MigrationUnit = {
        direction,
        version: parsed.version,
        type: parsed.extension,
        artifact: fileName,
        path: path.join(dir, fileName)
      };

      const existing = units.get(parsed.version);
      if (existing) {
        const winner = preferred(existing, unit);
        const loser = winner === existing ? unit : existing;
        console.warn(`⚠️  Duplicate ${direction} migration ${parsed.version}: using ${winner.artifact}, ignoring ${loser.artifact}`);
        units.set(parsed.version, winner);
        continue;
      }
      units.set(parsed.version, unit);
    }

    return units;
  }
}

const TYPE_PRECEDENCE: Record<MigrationType, number> = {
  sql: 0,
  script: 1
};

function preferred(a: MigrationUnit, b: MigrationUnit): MigrationUnit {
  return TYPE_PRECEDENCE[b.type] < TYPE_PRECEDENCE[a.type] ? b : a;
}
