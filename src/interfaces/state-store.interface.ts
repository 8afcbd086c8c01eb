/**
 * State Store Interface
 * Persists committed ledger snapshots per wallet
 */

import type { LedgerSnapshot } from './ledger.interface.ts';

export interface StateStore {
  load(walletId: string): Promise<LedgerSnapshot | undefined>;
  save(walletId: string, snapshot: LedgerSnapshot): Promise<void>;
}

export type StateStoreType = 'memory' | 'file';
