import type { LedgerSnapshot } from '../interfaces/ledger.interface.ts';
import type { StateStore } from '../interfaces/state-store.interface.ts';

/**
 * Keeps snapshots for the life of the process
 */
export class MemoryStateStore implements StateStore {
  private readonly snapshots = new Map<string, LedgerSnapshot>();

  load(walletId: string): Promise<LedgerSnapshot | undefined> {
    return Promise.resolve(this.snapshots.get(walletId));
  }

  save(walletId: string, snapshot: LedgerSnapshot): Promise<void> {
    this.snapshots.set(walletId, snapshot);
    return Promise.resolve();
  }

  clear(): void {
    this.snapshots.clear();
  }
}
