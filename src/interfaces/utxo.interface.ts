/**
 * Wallet-owned UTXO types
 */

export type Branch = 'external' | 'internal';

/**
 * Minimal shape every selection algorithm works on
 */
export interface SelectableUTXO {
  txid: string;
  vout: number;
  value: number;
  confirmations?: number;
}

export interface WalletUTXO extends SelectableUTXO {
  /** Owning scriptPubKey, hex */
  script: string;
  address: string;
  branch: Branch;
  /** Derivation index; absent for fixed descriptors */
  index?: number;
  /** Block height, 0 while unconfirmed */
  height: number;
  confirmations: number;
}

export interface BalanceDetails {
  confirmed: number;
  unconfirmed: number;
  total: number;
}

export function outpointKey(utxo: { txid: string; vout: number }): string {
  return `${utxo.txid}:${utxo.vout}`;
}
