/**
 * Purges ledger rows for versions that no longer have an artifact
 */

import { VersionLedger } from './VersionLedger';

export class Reconciler {
  constructor(private readonly ledger: VersionLedger) {}

  /**
   * Delete recorded versions above the highest available one. Returns
   * the number of ledger rows removed.
   */
  async reconcile(available: ReadonlySet<number>, recorded: number | null): Promise<number> {
    if (!recorded || available.size === 0) {
      return 0;
    }

    const highestAvailable = Math.max(...available);
    if (highestAvailable >= recorded) {
      return 0;
    }

    const purged = await this.ledger.deleteRange(highestAvailable, recorded);
    console.log(
      `🧹 Removed ${purged} stale version entr${purged === 1 ? 'y' : 'ies'} ` +
      `(${highestAvailable + 1}..${recorded}) with no migration on disk`
    );
    return purged;
  }
}
