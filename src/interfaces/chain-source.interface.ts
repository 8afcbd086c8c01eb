/**
 * Chain Source Interface
 * Read and submit access to the blockchain, keyed by output script
 */

import type { Buffer } from 'node:buffer';
import type { Network } from 'bitcoinjs-lib';

export interface ScriptUnspent {
  txid: string;
  vout: number;
  value: number;
  /** 0 while unconfirmed */
  height: number;
}

export interface ScriptActivity {
  /** True once any transaction paid to or spent from the script */
  used: boolean;
  utxos: ScriptUnspent[];
}

export interface ChainSourceOptions {
  network: Network;
  timeout?: number;
  retries?: number;
  retryDelay?: number;
  maxRetryDelay?: number;
}

export interface ChainSource {
  /**
   * Activity for every script, keyed by lowercase script hex
   */
  fetch(scripts: Buffer[]): Promise<Map<string, ScriptActivity>>;

  /**
   * Raw serialized transaction
   */
  getTransaction(txid: string): Promise<Buffer>;

  /**
   * Submit a raw transaction and return its txid
   */
  submit(rawTxHex: string): Promise<string>;

  getTipHeight(): Promise<number>;

  /**
   * Fee rate in sat/vB for confirmation within `targetBlocks`, if the source knows one
   */
  estimateFeeRate?(targetBlocks: number): Promise<number | undefined>;

  getNetwork(): Network;

  close(): Promise<void>;
}
