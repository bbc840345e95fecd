/**
 * Registry of scripted migrations, looked up by the name a `.script`
 * artifact refers to.
 */

import { ScriptedMigration } from './types';
import { MigrationConfigError } from './errors';

export class ScriptRegistry {
  private scripts: Map<string, ScriptedMigration> = new Map();

  register(name: string, script: ScriptedMigration): this {
    if (this.scripts.has(name)) {
      throw new MigrationConfigError(`Scripted migration "${name}" is already registered`);
    }
    this.scripts.set(name, script);
    return this;
  }

  registerAll(scripts: Record<string, ScriptedMigration>): this {
    for (const [name, script] of Object.entries(scripts)) {
      this.register(name, script);
    }
    return this;
  }

  get(name: string): ScriptedMigration | undefined {
    return this.scripts.get(name);
  }

  has(name: string): boolean {
    return this.scripts.has(name);
  }

  names(): string[] {
    return Array.from(this.scripts.keys()).sort();
  }
}

export function isScriptedMigration(value: unknown): value is ScriptedMigration {
  return typeof value === 'object' && value !== null && 'apply' in value && typeof value.apply === 'function';
}

/**
 * Build a registry from a loaded scripts module. The module exports
 * its migrations as `scripts` (or as the default export), keyed by name.
 */
export function registryFromModule(loaded: unknown, source: string): ScriptRegistry {
  const registry = new ScriptRegistry();
  if (typeof loaded !== 'object' || loaded === null) {
    throw new MigrationConfigError(`Scripts module ${source} did not export an object`);
  }

  let scripts: unknown = loaded;
  if ('scripts' in loaded) {
    scripts = loaded.scripts;
  } else if ('default' in loaded) {
    scripts = loaded.default;
  }

  if (typeof scripts !== 'object' || scripts === null) {
    throw new MigrationConfigError(`Scripts module ${source} has no scripts export`);
  }

  for (const [name, script] of Object.entries(scripts)) {
    if (!isScriptedMigration(script)) {
      throw new MigrationConfigError(`Export "${name}" of ${source} is not a scripted migration`);
    }
    registry.register(name, script);
  }

  return registry;
}
