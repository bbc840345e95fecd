/**
 * Tests for the migration engine
 */

import { MigrationEngine } from '../MigrationEngine';
import { ScriptRegistry } from '../ScriptRegistry';
import { EngineState } from '../types';
import { UnitExecutionError, VersionNotFoundError } from '../errors';
import { FakeConnection, MemoryArtifacts, MemoryMigrationStore, sqlArtifacts, silenceConsole } from './helpers';

const INITIAL_SQL = 'CREATE TABLE db_version (version INTEGER NOT NULL);\nINSERT INTO db_version (version) VALUES (0);\n';

function withInitial(artifacts: MemoryArtifacts): MemoryArtifacts {
  return { ...artifacts, up: { ...artifacts.up, 0: { content: INITIAL_SQL } } };
}

describe('MigrationEngine', () => {
  let connection: FakeConnection;

  beforeEach(() => {
    silenceConsole();
    connection = new FakeConnection();
  });

  describe('up', () => {
    it('should initialise a fresh database with version 0 and then apply the rest', async () => {
      connection.tableExists = false;
      const store = new MemoryMigrationStore(withInitial(sqlArtifacts([1, 2])));

      const init = await new MigrationEngine(connection, store).up(0);
      expect(init.applied).toEqual([0]);
      expect(connection.versions).toEqual([0]);

      const rest = await new MigrationEngine(connection, store).up();
      expect(rest.plan).toEqual([1, 2]);
      expect(rest.applied).toEqual([1, 2]);
      expect(connection.versions).toEqual([0, 1, 2]);
      expect(console.log).toHaveBeenCalledWith('Running 2 up migrations: 1, 2');
    });

    it('should apply only up to the requested target', async () => {
      connection.versions = [1];
      const engine = new MigrationEngine(connection, new MemoryMigrationStore(sqlArtifacts([1, 2, 3])));

      const result = await engine.up(2);

      expect(result.applied).toEqual([2]);
      expect(connection.versions).toEqual([1, 2]);
      expect(engine.state).toBe(EngineState.Completed);
    });

    it('should report when there is nothing to apply', async () => {
      connection.versions = [2];
      const engine = new MigrationEngine(connection, new MemoryMigrationStore(sqlArtifacts([1, 2])));

      const result = await engine.up();

      expect(result).toEqual({ direction: 'up', skipped: false, plan: [], applied: [], purged: 0 });
      expect(console.log).toHaveBeenCalledWith('Nothing to migrate up (current version: 2)');
    });

    it('should fail for an unknown target without touching the database', async () => {
      const engine = new MigrationEngine(connection, new MemoryMigrationStore(sqlArtifacts([1, 2])));

      await expect(engine.up(7)).rejects.toThrow(VersionNotFoundError);
      expect(connection.batches).toEqual([]);
      expect(engine.state).toBe(EngineState.Failed);
    });

    it('should echo each unit when verbose', async () => {
      const engine = new MigrationEngine(connection, new MemoryMigrationStore(sqlArtifacts([1])));

      await engine.up(undefined, { verbose: true });

      expect(console.log).toHaveBeenCalledWith(
        '-- up/1.sql\nCREATE TABLE t1 (id INTEGER);\nINSERT INTO db_version (version) VALUES (1);\n'
      );
    });

    it('should stop at the first failing unit and keep earlier ones', async () => {
      connection.failBatch = sql => (sql.includes('t2') ? new Error('table t2 exists') : undefined);
      const engine = new MigrationEngine(connection, new MemoryMigrationStore(sqlArtifacts([1, 2, 3])));

      await expect(engine.up()).rejects.toThrow('Migration up/2.sql failed: table t2 exists');
      expect(connection.versions).toEqual([1]);
      expect(connection.batches).toHaveLength(2);
      expect(engine.state).toBe(EngineState.Failed);
    });

    it('should run scripted units from the registry', async () => {
      const scripts = new ScriptRegistry().register('2_up', {
        async apply(conn) {
          await conn.beginTransaction();
          await conn.execute('INSERT INTO db_version (version) VALUES (?)', [2]);
          await conn.commit();
        }
      });
      const artifacts = sqlArtifacts([1]);
      artifacts.up[2] = { type: 'script', content: '2_up' };

      const result = await new MigrationEngine(connection, new MemoryMigrationStore(artifacts), scripts).up();

      expect(result.applied).toEqual([1, 2]);
      expect(connection.versions).toEqual([1, 2]);
    });
  });

  describe('down', () => {
    it('should revert in descending order down to the target', async () => {
      connection.versions = [0, 1, 2, 3];
      const engine = new MigrationEngine(connection, new MemoryMigrationStore(sqlArtifacts([0, 1, 2, 3])));

      const result = await engine.down(1);

      expect(result.applied).toEqual([3, 2]);
      expect(connection.versions).toEqual([0, 1]);
      expect(console.log).toHaveBeenCalledWith('Running 2 down migrations: 3, 2');
    });

    it('should stop when a commit fails and leave the remaining units unapplied', async () => {
      connection.versions = [0, 1, 2, 3];
      connection.failCommit = lastBatch => (lastBatch?.includes('DROP TABLE t3') ? new Error('commit failed') : undefined);
      const engine = new MigrationEngine(connection, new MemoryMigrationStore(sqlArtifacts([0, 1, 2, 3])));

      const failure = engine.down(1);

      await expect(failure).rejects.toThrow(UnitExecutionError);
      await expect(failure).rejects.toThrow('Migration down/3.sql failed: commit failed');
      expect(connection.batches).toEqual(['DROP TABLE t3;\nDELETE FROM db_version WHERE version = 3;\n']);
      expect(connection.versions).toEqual([0, 1, 2, 3]);
      expect(connection.rollbacks).toBe(1);
    });

    it('should do nothing for an unversioned database', async () => {
      connection.tableExists = false;
      const engine = new MigrationEngine(connection, new MemoryMigrationStore(sqlArtifacts([1, 2])));

      const result = await engine.down(0);

      expect(result.plan).toEqual([]);
      expect(console.log).toHaveBeenCalledWith('Nothing to migrate down (current version: none)');
    });
  });

  describe('reconciliation', () => {
    it('should purge stale versions before planning up', async () => {
      connection.versions = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10];
      const engine = new MigrationEngine(connection, new MemoryMigrationStore(sqlArtifacts([1, 2, 3])));

      const result = await engine.up();

      expect(result).toEqual({ direction: 'up', skipped: false, plan: [], applied: [], purged: 7 });
      expect(connection.versions).toEqual([1, 2, 3]);
      expect(console.log).toHaveBeenCalledWith('Nothing to migrate up (current version: 3)');
    });

    it('should plan down from the reconciled version', async () => {
      connection.versions = [1, 2, 3, 10];
      const engine = new MigrationEngine(connection, new MemoryMigrationStore(sqlArtifacts([1, 2, 3])));

      const result = await engine.down(0);

      expect(result.purged).toBe(1);
      expect(result.applied).toEqual([3, 2, 1]);
      expect(connection.versions).toEqual([]);
    });
  });

  it('should ignore a second run on the same engine', async () => {
    const engine = new MigrationEngine(connection, new MemoryMigrationStore(sqlArtifacts([1])));

    await engine.up();
    const again = await engine.up();

    expect(again).toEqual({ direction: 'up', skipped: true, plan: [], applied: [], purged: 0 });
    expect(connection.batches).toHaveLength(1);
  });

  describe('stamp / remove / currentVersion', () => {
    it('should stamp the highest available version by default', async () => {
      const engine = new MigrationEngine(connection, new MemoryMigrationStore(sqlArtifacts([0, 1, 4])));

      await expect(engine.stamp()).resolves.toBe(4);
      expect(connection.versions).toEqual([4]);
      expect(connection.batches).toEqual([]);
      expect(console.log).toHaveBeenCalledWith('📌 Stamped version 4');
    });

    it('should stamp an explicit version', async () => {
      const engine = new MigrationEngine(connection, new MemoryMigrationStore(sqlArtifacts([1])));

      await engine.stamp(9);

      await expect(engine.currentVersion()).resolves.toBe(9);
    });

    it('should fail to stamp when no migrations exist', async () => {
      const engine = new MigrationEngine(connection, new MemoryMigrationStore({ up: {}, down: {} }));

      await expect(engine.stamp()).rejects.toThrow('No up migrations found');
    });

    it('should remove a recorded version', async () => {
      connection.versions = [1, 2];
      const engine = new MigrationEngine(connection, new MemoryMigrationStore(sqlArtifacts([1, 2])));

      await expect(engine.remove(2)).resolves.toBe(1);
      await expect(engine.currentVersion()).resolves.toBe(1);
      expect(console.log).toHaveBeenCalledWith('🗑️  Removed version 2 (1 row)');
    });

    it('should read the configured version table', async () => {
      const engine = new MigrationEngine(connection, new MemoryMigrationStore(sqlArtifacts([1])), undefined, {
        ledgerTable: 'schema_versions'
      });

      await engine.currentVersion();

      expect(connection.statements).toEqual(['SELECT MAX(version) AS version FROM schema_versions']);
    });
  });
});
