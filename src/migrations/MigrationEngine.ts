/**
 * Coordinates reconciliation, planning and execution of migrations
 */

import { DatabaseConnection } from '../database/types';
import {
  Direction,
  EngineState,
  MigrationEngineOptions,
  MigrationRunResult,
  MigrationStore,
  RunOptions
} from './types';
import { VersionLedger } from './VersionLedger';
import { Reconciler } from './Reconciler';
import { Executor } from './Executor';
import { ScriptRegistry } from './ScriptRegistry';
import { planDown, planUp } from './Planner';
import { VersionNotFoundError } from './errors';

export class MigrationEngine {
  private readonly store: MigrationStore;
  private readonly ledger: VersionLedger;
  private readonly reconciler: Reconciler;
  private readonly executor: Executor;
  private runState: EngineState = EngineState.Idle;

  constructor(
    connection: DatabaseConnection,
    store: MigrationStore,
    scripts: ScriptRegistry = new ScriptRegistry(),
    options: MigrationEngineOptions = {}
  ) {
    this.store = store;
    this.ledger = new VersionLedger(connection, options.ledgerTable);
    this.reconciler = new Reconciler(this.ledger);
    this.executor = new Executor(connection, store, scripts);
  }

  get state(): EngineState {
    return this.runState;
  }

  /**
   * Apply pending migrations up to `target` (default: the latest).
   */
  async up(target?: number, options: RunOptions = {}): Promise<MigrationRunResult> {
    return this.run('up', options, (available, recorded) => planUp(available, recorded, target));
  }

  /**
   * Revert applied migrations down to, but not including, `target`.
   */
  async down(target: number, options: RunOptions = {}): Promise<MigrationRunResult> {
    return this.run('down', options, (available, recorded) => planDown(available, recorded, target));
  }

  /**
   * Record `version` as applied without running it. Defaults to the
   * highest available up migration.
   */
  async stamp(version?: number): Promise<number> {
    let stamped = version;
    if (stamped === undefined) {
      const available = await this.store.discover('up');
      if (available.size === 0) {
        throw new VersionNotFoundError(undefined, 'up');
      }
      stamped = Math.max(...available);
    }

    await this.ledger.insertVersion(stamped);
    console.log(`📌 Stamped version ${stamped}`);
    return stamped;
  }

  /**
   * Delete the ledger row for `version` so the unit can be applied again.
   */
  async remove(version: number): Promise<number> {
    const removed = await this.ledger.deleteVersion(version);
    console.log(`🗑️  Removed version ${version} (${removed} row${removed === 1 ? '' : 's'})`);
    return removed;
  }

  async currentVersion(): Promise<number | null> {
    return this.ledger.currentVersion();
  }

  private async run(
    direction: Direction,
    options: RunOptions,
    plan: (available: ReadonlySet<number>, recorded: number | null) => number[]
  ): Promise<MigrationRunResult> {
    if (this.runState !== EngineState.Idle) {
      return { direction, skipped: true, plan: [], applied: [], purged: 0 };
    }

    this.runState = EngineState.Running;
    const applied: number[] = [];
    try {
      let recorded = await this.ledger.currentVersion();
      const applyable = await this.store.discover('up');
      const purged = await this.reconciler.reconcile(applyable, recorded);
      if (purged > 0) {
        recorded = await this.ledger.currentVersion();
      }

      const available = direction === 'up' ? applyable : await this.store.discover('down');
      const versions = plan(available, recorded);

      if (versions.length === 0) {
        console.log(`Nothing to migrate ${direction} (current version: ${recorded ?? 'none'})`);
      } else {
        console.log(`Running ${versions.length} ${direction} migration${versions.length === 1 ? '' : 's'}: ${versions.join(', ')}`);
      }

      for (const version of versions) {
        await this.executor.applyUnit(direction, version, options.verbose ?? false);
        applied.push(version);
      }

      this.runState = EngineState.Completed;
      return { direction, skipped: false, plan: versions, applied, purged };
    } catch (error) {
      this.runState = EngineState.Failed;
      throw error;
    }
  }
}
