import type { StateStore, StateStoreType } from '../interfaces/state-store.interface.ts';
import { FileStateStore } from './file-state-store.ts';
import { MemoryStateStore } from './memory-state-store.ts';

export { decodeSnapshot, encodeSnapshot, FileStateStore, type StoredSnapshot } from './file-state-store.ts';
export { MemoryStateStore } from './memory-state-store.ts';
export { walletIdFor } from './wallet-id.ts';

export interface StateStoreConfig {
  type: StateStoreType;
  /** Directory for `file` stores */
  path?: string;
}

export function createStateStore(config: StateStoreConfig): StateStore {
  switch (config.type) {
    case 'memory':
      return new MemoryStateStore();
    case 'file':
      return new FileStateStore(config.path ?? '.watch-wallet');
  }
}
