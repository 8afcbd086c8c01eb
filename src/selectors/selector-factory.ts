/**
 * UTXO Selector Factory
 * Creates selector instances based on algorithm type
 */

import { InsufficientFundsError, ValidationError } from '../errors/index.ts';
import type {
  CoinSelectionPlan,
  IUTXOSelector,
  SelectionOptions,
  SelectorAlgorithm,
} from '../interfaces/selector.interface.ts';
import { SelectionFailureReason } from '../interfaces/selector-result.interface.ts';
import type { SelectableUTXO } from '../interfaces/utxo.interface.ts';

import { BranchAndBoundSelector } from './branch-and-bound.ts';
import { LargestFirstSelector } from './largest-first.ts';

export const SELECTOR_ALGORITHMS: readonly SelectorAlgorithm[] = ['largest-first', 'branch-and-bound'];

export function isSelectorAlgorithm(value: string): value is SelectorAlgorithm {
  return SELECTOR_ALGORITHMS.some((algorithm) => algorithm === value);
}

export function createSelector(algorithm: SelectorAlgorithm = 'largest-first'): IUTXOSelector {
  switch (algorithm) {
    case 'largest-first':
      return new LargestFirstSelector();
    case 'branch-and-bound':
      return new BranchAndBoundSelector();
  }
}

/**
 * Run a selector and turn its structured failure into a thrown wallet error
 */
export function selectCoins<T extends SelectableUTXO>(
  selector: IUTXOSelector,
  utxos: T[],
  options: SelectionOptions,
): CoinSelectionPlan<T> {
  const result = selector.select(utxos, options);

  if (!result.success) {
    switch (result.reason) {
      case SelectionFailureReason.INVALID_OPTIONS:
        throw new ValidationError(result.message);
      case SelectionFailureReason.INSUFFICIENT_FUNDS:
      case SelectionFailureReason.NO_UTXOS_AVAILABLE:
      case SelectionFailureReason.MAX_INPUTS_EXCEEDED:
      case SelectionFailureReason.NO_SOLUTION_FOUND:
        throw new InsufficientFundsError(
          result.details?.requiredAmount ?? options.targetValue,
          result.details?.availableBalance ?? 0,
        );
    }
  }

  return {
    algorithm: selector.getName(),
    inputs: result.inputs,
    target: options.targetValue,
    totalSelected: result.totalValue,
    fee: result.fee,
    change: result.change,
    hasChange: result.hasChange,
  };
}
