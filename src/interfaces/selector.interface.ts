/**
 * UTXO Selection Strategy Interface
 */

import type { SelectableUTXO } from './utxo.interface.ts';
import type { SelectionResult } from './selector-result.interface.ts';

/**
 * Fee owed by a transaction spending `inputs`, with or without a change output
 */
export interface FeeModel {
  feeFor(inputs: readonly SelectableUTXO[], withChange: boolean): number;
}

export interface SelectionOptions {
  targetValue: number;
  feeRate: number; // sat/vB
  /** Overrides the selector's own size-based estimate */
  feeModel?: FeeModel;
  /** Change at or below this is left to the fee */
  dustThreshold?: number;
  minConfirmations?: number;
  maxInputs?: number;
  /** Waste baseline for branch-and-bound */
  longTermFeeRate?: number;
}

export interface IUTXOSelector {
  /**
   * Always returns a structured result, never throws for a funding shortfall
   */
  select<T extends SelectableUTXO>(utxos: T[], options: SelectionOptions): SelectionResult<T>;

  getName(): SelectorAlgorithm;
}

export type SelectorAlgorithm = 'largest-first' | 'branch-and-bound';

export interface CoinSelectionPlan<T extends SelectableUTXO = SelectableUTXO> {
  algorithm: SelectorAlgorithm;
  inputs: T[];
  target: number;
  totalSelected: number;
  fee: number;
  change: number;
  hasChange: boolean;
}
