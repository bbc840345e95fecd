/**
 * Database connection factory
 */

import { DatabaseConfig, ConnectionPool } from './types';
import { SqliteConnectionPool } from './adapters/SqliteAdapter';
import { PostgresConnectionPool } from './adapters/PostgresAdapter';
import { DatabaseConfigValidator } from './config';

export class ConnectionFactory {
  private static instance: ConnectionFactory | undefined;
  private pools: Map<string, ConnectionPool> = new Map();

  private constructor() {}

  public static getInstance(): ConnectionFactory {
    if (!ConnectionFactory.instance) {
      ConnectionFactory.instance = new ConnectionFactory();
    }
    return ConnectionFactory.instance;
  }

  /**
   * Pool for the given target, created on first use and shared after that.
   */
  public async createPool(config: DatabaseConfig): Promise<ConnectionPool> {
    const poolKey = this.generatePoolKey(config);

    const existing = this.pools.get(poolKey);
    if (existing) {
      return existing;
    }

    this.validateConfig(config);

    const pool: ConnectionPool = config.type === 'sqlite'
      ? new SqliteConnectionPool(config)
      : new PostgresConnectionPool(config);

    this.pools.set(poolKey, pool);
    return pool;
  }

  public validateConfig(config: DatabaseConfig): void {
    const errors = DatabaseConfigValidator.validate(config);
    if (errors.length > 0) {
      throw new Error(errors.join('; '));
    }
  }

  public async closeAllPools(): Promise<void> {
    const closePromises = Array.from(this.pools.values()).map(pool => pool.destroy());
    await Promise.all(closePromises);
    this.pools.clear();
  }

  private generatePoolKey(config: DatabaseConfig): string {
    const target = config.connectionString || config.database;
    return `${config.type}:${config.host || 'localhost'}:${config.port || 'default'}:${target}`;
  }
}

export default ConnectionFactory;
