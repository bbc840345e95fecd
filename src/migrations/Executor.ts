/**
 * Applies a single migration unit against the database
 */

import { DatabaseConnection, ParamStyle, toError } from '../database/types';
import { Direction, MigrationStore, MigrationUnit } from './types';
import { ScriptRegistry } from './ScriptRegistry';
import { MigrationError, UnitExecutionError, VersionNotFoundError } from './errors';

/**
 * Printf-style drivers read `%` as the start of a placeholder; double it
 * so literal percent signs in dumped DDL survive.
 */
export function escapeParamMarkers(sql: string, style: ParamStyle): string {
  if (style === 'format' || style === 'pyformat') {
    return sql.replace(/%/g, '%%');
  }
  return sql;
}

export class Executor {
  constructor(
    private readonly connection: DatabaseConnection,
    private readonly store: MigrationStore,
    private readonly scripts: ScriptRegistry = new ScriptRegistry()
  ) {}

  async applyUnit(direction: Direction, version: number, verbose = false): Promise<MigrationUnit> {
    const unit = await this.store.resolve(direction, version);
    if (!unit) {
      throw new VersionNotFoundError(version, direction);
    }

    try {
      if (unit.type === 'sql') {
        await this.applySql(unit, verbose);
      } else {
        await this.applyScript(unit, verbose);
      }
    } catch (error) {
      await this.rollbackOpenTransaction();
      if (error instanceof UnitExecutionError) {
        throw error;
      }
      throw new UnitExecutionError(direction, version, unit.artifact, toError(error));
    }

    console.log(`✅ Applied ${direction}/${unit.artifact}`);
    return unit;
  }

  private async applySql(unit: MigrationUnit, verbose: boolean): Promise<void> {
    const sql = escapeParamMarkers(await this.store.read(unit), this.connection.paramStyle);
    if (verbose) {
      console.log(`-- ${unit.direction}/${unit.artifact}\n${sql}`);
    }

    await this.connection.beginTransaction();
    await this.connection.executeBatch(sql);
    await this.connection.commit();
  }

  private async applyScript(unit: MigrationUnit, verbose: boolean): Promise<void> {
    const name = (await this.store.read(unit)).trim();
    const script = this.scripts.get(name);
    if (!script) {
      throw new MigrationError(`Scripted migration "${name}" is not registered`, 'SCRIPT_NOT_REGISTERED');
    }
    if (verbose) {
      console.log(`-- ${unit.direction}/${unit.artifact} -> ${name}`);
    }

    await script.apply(this.connection);
  }

  private async rollbackOpenTransaction(): Promise<void> {
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
