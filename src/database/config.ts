/**
 * Database configuration builder, validation and per-type defaults
 */

import { DatabaseConfig, DatabaseType } from './types';

export const DatabaseDefaults: Record<DatabaseType, Omit<DatabaseConfig, 'type'>> = {
  sqlite: {
    maxConnections: 1
  },
  postgresql: {
    maxConnections: 5,
    pool: {
      acquireTimeoutMillis: 10000,
      idleTimeoutMillis: 30000
    }
  }
};

export class DatabaseConfigValidator {
  static validate(config: DatabaseConfig): string[] {
    const errors: string[] = [];

    switch (config.type) {
      case 'sqlite':
        if (!config.database) {
          errors.push('SQLite requires a database path');
        }
        break;

      case 'postgresql':
        if (!config.connectionString && (!config.host || !config.database)) {
          errors.push('PostgreSQL requires either connectionString or host/database');
        }
        if (config.port !== undefined && (config.port < 1 || config.port > 65535)) {
          errors.push('PostgreSQL port must be between 1 and 65535');
        }
        break;

      default:
        errors.push(`Unsupported database type: ${String(config.type)}`);
    }

    if (config.maxConnections !== undefined && config.maxConnections < 1) {
      errors.push('maxConnections must be greater than 0');
    }

    return errors;
  }
}

/**
 * Builds a `DatabaseConfig` on top of the defaults for its type. Setters
 * ignore `undefined`, so optional environment values can be passed
 * straight through.
 */
export class DatabaseConfigBuilder {
  private config: DatabaseConfig;

  private constructor(type: DatabaseType) {
    this.config = { ...DatabaseDefaults[type], type };
  }

  static create(type: DatabaseType): DatabaseConfigBuilder {
    return new DatabaseConfigBuilder(type);
  }

  connectionString(connectionString: string | undefined): this {
    return this.set('connectionString', connectionString);
  }

  host(host: string | undefined): this {
    return this.set('host', host);
  }

  port(port: number | undefined): this {
    return this.set('port', port);
  }

  database(database: string | undefined): this {
    return this.set('database', database);
  }

  username(username: string | undefined): this {
    return this.set('username', username);
  }

  password(password: string | undefined): this {
    return this.set('password', password);
  }

  maxConnections(maxConnections: number | undefined): this {
    return this.set('maxConnections', maxConnections);
  }

  ssl(ssl: boolean | undefined): this {
    return this.set('ssl', ssl);
  }

  /**
   * Validated config. Throws with every problem found.
   */
  build(): DatabaseConfig {
    const errors = DatabaseConfigValidator.validate(this.config);
    if (errors.length > 0) {
      throw new Error(`Invalid ${this.config.type} configuration: ${errors.join('; ')}`);
    }

    return { ...this.config };
  }

  private set<K extends Exclude<keyof DatabaseConfig, 'type'>>(key: K, value: DatabaseConfig[K] | undefined): this {
    if (value !== undefined) {
      this.config[key] = value;
    }
    return this;
  }
}
