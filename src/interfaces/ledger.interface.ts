/**
 * UTXO Ledger Snapshot Types
 */

import type { Branch, WalletUTXO } from './utxo.interface.ts';

export interface BranchScan {
  branch: Branch;
  /** -1 when no index has activity */
  lastUsedIndex: number;
  scannedThrough: number;
  nextUnusedIndex: number;
  usedIndices: number[];
}

/**
 * Immutable result of one complete sync pass
 */
export interface LedgerSnapshot {
  descriptorId: string;
  changeDescriptorId?: string;
  utxos: ReadonlyMap<string, WalletUTXO>;
  branches: {
    external: BranchScan;
    internal?: BranchScan;
  };
  tipHeight: number;
  syncedAt: number;
}

export interface LedgerOptions {
  /** Consecutive unused indices that end a branch scan (default 20) */
  gapLimit?: number;
  /** Scripts requested from the chain source per round trip (default: gapLimit) */
  batchSize?: number;
  /** Identity under which snapshots are persisted */
  walletId?: string;
}
