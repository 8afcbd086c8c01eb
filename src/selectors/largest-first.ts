/**
 * Largest-First UTXO Selection Algorithm
 * Accumulates coins from the largest down until the target and fee are covered
 */

import type { SelectionOptions, SelectorAlgorithm } from '../interfaces/selector.interface.ts';
import type { SelectionResult } from '../interfaces/selector-result.interface.ts';
import { SelectionFailureReason } from '../interfaces/selector-result.interface.ts';
import type { SelectableUTXO } from '../interfaces/utxo.interface.ts';

import { BaseSelector } from './base-selector.ts';

/**
 * Deterministic largest-first selection
 *
 * @remarks
 * Coins are ordered by value descending, then txid and vout ascending. After
 * each coin is added the set is settled: change is paid back when it clears
 * the dust threshold, otherwise the remainder goes to the fee.
 *
 * @example
 * ```typescript
 * const selector = new LargestFirstSelector();
 * const result = selector.select(utxos, { targetValue: 40_000, feeRate: 2 });
 * ```
 */
export class LargestFirstSelector extends BaseSelector {
  getName(): SelectorAlgorithm {
    return 'largest-first';
  }

  select<T extends SelectableUTXO>(utxos: T[], options: SelectionOptions): SelectionResult<T> {
    const validationFailure = this.checkOptionsValidity(options);
    if (validationFailure) {
      return validationFailure;
    }

    const eligible = this.filterEligibleUTXOs(utxos, options);
    if (eligible.length === 0) {
      return this.failure(
        SelectionFailureReason.NO_UTXOS_AVAILABLE,
        'No eligible UTXOs available',
        {
          utxoCount: utxos.length,
          minConfirmations: options.minConfirmations,
          requiredAmount: options.targetValue,
          availableBalance: 0,
        },
      );
    }

    const sorted = this.sortByValue(eligible);
    const selected: T[] = [];

    for (const utxo of sorted) {
      if (options.maxInputs !== undefined && selected.length >= options.maxInputs) {
        // Only blame the cap when spending everything would have worked
        return this.settle(sorted, options)
          ? this.shortfall(sorted, options, options.maxInputs)
          : this.shortfall(sorted, options);
      }

      selected.push(utxo);
      const settled = this.settle([...selected], options);
      if (settled) {
        return { ...settled, wasteMetric: this.calculateWaste(settled, options) };
      }
    }

    return this.shortfall(sorted, options);
  }
}
