/**
 * Transaction Building Types
 */

import type { Psbt } from 'bitcoinjs-lib';

import type { Descriptor } from './descriptor.interface.ts';
import type { LedgerSnapshot } from './ledger.interface.ts';
import type { CoinSelectionPlan } from './selector.interface.ts';
import type { WalletUTXO } from './utxo.interface.ts';

export interface Recipient {
  address: string;
  value: number;
}

export interface BuildRequest {
  snapshot: LedgerSnapshot;
  descriptor: Descriptor;
  changeDescriptor?: Descriptor;
  recipients: Recipient[];
  feeRate: number; // sat/vB
  /** Signal replaceability on every input (default true) */
  enableRbf?: boolean;
  locktime?: number;
  minConfirmations?: number;
}

export interface ChangeOutput {
  address: string;
  value: number;
  index?: number;
  outputIndex: number;
}

export interface BuildResult {
  psbt: Psbt;
  plan: CoinSelectionPlan<WalletUTXO>;
  fee: number;
  /** Estimated virtual size of the signed transaction */
  vsize: number;
  change?: ChangeOutput;
  /** Txid of the unsigned transaction; stable for segwit-only spends */
  unsignedTxid: string;
}

export type PsbtState = 'unsigned' | 'partially-signed' | 'finalized';

export interface FinalizedTransaction {
  txid: string;
  hex: string;
  vsize: number;
  weight: number;
  fee: number;
}
