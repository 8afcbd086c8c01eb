/**
 * Branch and Bound UTXO Selection Algorithm
 * Depth-first search for a changeless input set, falling back to largest-first
 */

import type { SelectionOptions, SelectorAlgorithm } from '../interfaces/selector.interface.ts';
import type { SelectionResult, SelectionSuccess } from '../interfaces/selector-result.interface.ts';
import type { SelectableUTXO } from '../interfaces/utxo.interface.ts';

import { BaseSelector } from './base-selector.ts';
import { LargestFirstSelector } from './largest-first.ts';

interface SearchState<T extends SelectableUTXO> {
  selection: T[];
  totalValue: number;
  utxoIndex: number;
}

/**
 * Branch and Bound selection for changeless transactions
 *
 * @remarks
 * Looks for a subset whose excess over target plus fee is no more than the
 * cost of creating a change output, so the excess can be left to the fee.
 * Among matches the lowest waste wins. When the search finds nothing, or
 * exhausts its iteration budget, selection is delegated to largest-first.
 *
 * @example
 * ```typescript
 * const selector = new BranchAndBoundSelector();
 * const result = selector.select(utxos, {
 *   targetValue: 100000,
 *   feeRate: 10,
 *   longTermFeeRate: 5,
 * });
 * ```
 */
export class BranchAndBoundSelector extends BaseSelector {
  private readonly MAX_ITERATIONS = 100000;
  private readonly fallback = new LargestFirstSelector();

  getName(): SelectorAlgorithm {
    return 'branch-and-bound';
  }

  select<T extends SelectableUTXO>(utxos: T[], options: SelectionOptions): SelectionResult<T> {
    const validationFailure = this.checkOptionsValidity(options);
    if (validationFailure) {
      return validationFailure;
    }

    const sorted = this.sortByValue(this.filterEligibleUTXOs(utxos, options));
    const match = sorted.length > 0 ? this.findChangeless(sorted, options) : undefined;
    if (match) {
      return match;
    }

    return this.fallback.select(utxos, options);
  }

  private findChangeless<T extends SelectableUTXO>(
    sorted: T[],
    options: SelectionOptions,
  ): SelectionSuccess<T> | undefined {
    const model = this.feeModel(options);
    const dustThreshold = this.dustThreshold(options);

    // Remaining value from each position to the end
    const remaining: number[] = new Array<number>(sorted.length + 1).fill(0);
    for (let i = sorted.length - 1; i >= 0; i--) {
      remaining[i] = remaining[i + 1] + sorted[i].value;
    }

    let best: SelectionSuccess<T> | undefined;
    let bestWaste = Infinity;
    let iterations = 0;

    const visit = (state: SearchState<T>): void => {
      if (++iterations > this.MAX_ITERATIONS) return;
      if (options.maxInputs !== undefined && state.selection.length > options.maxInputs) return;

      const fee = model.feeFor(state.selection, false);
      const required = options.targetValue + fee;

      // Fees only grow with more inputs, so nothing below can catch up
      if (state.totalValue + remaining[state.utxoIndex] < required) return;

      if (state.selection.length > 0 && state.totalValue >= required) {
        const costOfChange = model.feeFor(state.selection, true) - fee + dustThreshold;
        const excess = state.totalValue - required;
        if (excess > costOfChange) return;

        const candidate: SelectionSuccess<T> = {
          success: true,
          inputs: [...state.selection],
          totalValue: state.totalValue,
          change: 0,
          fee: state.totalValue - options.targetValue,
          hasChange: false,
        };
        const waste = this.calculateWaste(candidate, options);
        if (waste < bestWaste) {
          best = { ...candidate, wasteMetric: waste };
          bestWaste = waste;
        }
        // Adding inputs only raises the excess further
        return;
      }

      if (state.utxoIndex >= sorted.length) return;
      const utxo = sorted[state.utxoIndex];

      // Branch 1: include
      visit({
        selection: [...state.selection, utxo],
        totalValue: state.totalValue + utxo.value,
        utxoIndex: state.utxoIndex + 1,
      });

      // Branch 2: skip
      visit({
        selection: state.selection,
        totalValue: state.totalValue,
        utxoIndex: state.utxoIndex + 1,
      });
    };

    visit({ selection: [], totalValue: 0, utxoIndex: 0 });
    return best;
  }
}
