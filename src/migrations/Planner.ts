/**
 * Computes which versions to run, and in which order
 */

import { VersionNotFoundError } from './errors';

function ascending(a: number, b: number): number {
  return a - b;
}

/**
 * Versions to apply to move from `recorded` up to `target`.
 *
 * `target` defaults to the highest available version. Version 0 is the
 * initial schema and is only ever planned on its own, via `target = 0`.
 */
export function planUp(available: ReadonlySet<number>, recorded: number | null, target?: number): number[] {
  if (target !== undefined && !available.has(target)) {
    throw new VersionNotFoundError(target, 'up');
  }
  if (target === 0) {
    return [0];
  }

  const baseline = recorded ?? 0;
  const ceiling = target ?? (available.size > 0 ? Math.max(...available) : 0);

  return Array.from(available)
    .filter(version => version !== 0 && version > baseline && version <= ceiling)
    .sort(ascending);
}

/**
 * Versions to revert to move from `recorded` down to `target`, most
 * recent first. `target` itself stays applied.
 */
export function planDown(available: ReadonlySet<number>, recorded: number | null, target: number): number[] {
  const ceiling = recorded ?? 0;

  return Array.from(available)
    .filter(version => version > target && version <= ceiling)
    .sort(ascending)
    .reverse();
}
