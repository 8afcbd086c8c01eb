/**
 * Wallets funded on a fake chain and synced into a ledger snapshot
 */

import { parseDescriptor } from '../../src/descriptors/descriptor-parser.ts';
import { deriveScript } from '../../src/descriptors/descriptor-deriver.ts';
import { UTXOLedger } from '../../src/core/utxo-ledger.ts';
import type { ScriptUnspent } from '../../src/interfaces/chain-source.interface.ts';
import type { Descriptor } from '../../src/interfaces/descriptor.interface.ts';
import type { LedgerSnapshot } from '../../src/interfaces/ledger.interface.ts';
import { FakeChainSource } from '../mocks/fake-chain-source.ts';
import { network, type TestWallet } from './wallet-fixtures.ts';

export interface SyncedWallet {
  chain: FakeChainSource;
  ledger: UTXOLedger;
  descriptor: Descriptor;
  changeDescriptor: Descriptor;
  snapshot: LedgerSnapshot;
  funded: ScriptUnspent[];
}

/**
 * Fund receive index i with values[i] at height 90 (tip 100) and sync both branches
 */
export async function syncedWallet(wallet: TestWallet, values: number[]): Promise<SyncedWallet> {
  const descriptor = parseDescriptor(wallet.external);
  const changeDescriptor = parseDescriptor(wallet.internal);
  const chain = new FakeChainSource(network);
  const funded = values.map((value, index) => chain.fund(deriveScript(descriptor, index, network).script, value, 90));

  const ledger = new UTXOLedger(chain, { network });
  const snapshot = await ledger.sync(descriptor, changeDescriptor);

  return { chain, ledger, descriptor, changeDescriptor, snapshot, funded };
}
