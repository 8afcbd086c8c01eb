/**
 * Selection Result Interface
 * Structured responses for both success and failure cases
 */

import type { SelectableUTXO } from './utxo.interface.ts';

/**
 * Reasons why selection might fail
 */
export enum SelectionFailureReason {
  INSUFFICIENT_FUNDS = 'INSUFFICIENT_FUNDS',
  NO_UTXOS_AVAILABLE = 'NO_UTXOS_AVAILABLE',
  MAX_INPUTS_EXCEEDED = 'MAX_INPUTS_EXCEEDED',
  NO_SOLUTION_FOUND = 'NO_SOLUTION_FOUND',
  INVALID_OPTIONS = 'INVALID_OPTIONS',
}

/**
 * Successful selection; `totalValue === target + fee + change`
 */
export interface SelectionSuccess<T extends SelectableUTXO = SelectableUTXO> {
  success: true;
  inputs: T[];
  totalValue: number;
  change: number;
  fee: number;
  /** Whether the change is large enough to be paid back as an output */
  hasChange: boolean;
  wasteMetric?: number;
}

/**
 * Failed selection with debugging information
 */
export interface SelectionFailure {
  success: false;
  reason: SelectionFailureReason;
  message: string;
  details?: {
    availableBalance?: number;
    requiredAmount?: number;
    utxoCount?: number;
    maxInputs?: number;
    minConfirmations?: number;
    targetValue?: number;
    feeRate?: number;
  };
}

export type SelectionResult<T extends SelectableUTXO = SelectableUTXO> =
  | SelectionSuccess<T>
  | SelectionFailure;
