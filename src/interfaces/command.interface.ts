/**
 * Wallet Command Surface
 * Every request the wallet serves, as one tagged union
 */

import type { ChangeOutput, FinalizedTransaction, Recipient } from './transaction.interface.ts';
import type { BalanceDetails, WalletUTXO } from './utxo.interface.ts';

export interface BalanceCommand {
  kind: 'balance';
  descriptor: string;
  changeDescriptor?: string;
}

export interface ReceiveCommand {
  kind: 'receive';
  descriptor: string;
  index: number;
}

export interface SendCommand {
  kind: 'send';
  descriptor: string;
  changeDescriptor?: string;
  recipients: Recipient[];
  /** sat/vB; the chain source estimate is used when absent */
  feeRate?: number;
  enableRbf?: boolean;
}

export interface BroadcastCommand {
  kind: 'broadcast';
  descriptor: string;
  changeDescriptor?: string;
  /** Base64 PSBT carrying the signer's signatures */
  psbt: string;
}

export type WalletCommand = BalanceCommand | ReceiveCommand | SendCommand | BroadcastCommand;

export interface BalanceResult {
  kind: 'balance';
  balance: BalanceDetails;
  utxos: WalletUTXO[];
}

export interface ReceiveResult {
  kind: 'receive';
  descriptor: string;
  /** Descriptor with the wildcard replaced by the index, re-checksummed */
  derivedDescriptor: string;
  index: number;
  address: string;
}

export interface SendResult {
  kind: 'send';
  psbt: string;
  unsignedTxid: string;
  sent: number;
  fee: number;
  feeRate: number;
  vsize: number;
  change?: ChangeOutput;
}

export interface BroadcastResult {
  kind: 'broadcast';
  txid: string;
  transaction: FinalizedTransaction;
}

export type WalletCommandResult = BalanceResult | ReceiveResult | SendResult | BroadcastResult;

export type CommandResult<C extends WalletCommand> = Extract<WalletCommandResult, { kind: C['kind'] }>;
