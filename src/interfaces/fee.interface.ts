/**
 * Fee and Size Estimation Types
 */

import type { DescriptorScriptType } from './descriptor.interface.ts';

export type OutputType = 'P2PKH' | 'P2WPKH' | 'P2SH' | 'P2WSH' | 'P2TR';

/**
 * What it takes to spend one input of a descriptor
 */
export interface InputSpendProfile {
  scriptType: DescriptorScriptType;
  /** Signatures required; 1 for single-key scripts */
  threshold: number;
  /** Keys in the script */
  keyCount: number;
  compressed: boolean;
}

export interface SizeEstimate {
  weight: number;
  vsize: number;
}
