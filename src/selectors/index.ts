/**
 * @module Selectors
 * @description Coin selection over wallet UTXOs. Both algorithms order coins
 * deterministically and settle a candidate set the same way: change is paid
 * back only when it clears the dust threshold.
 *
 * @example
 * ```typescript
 * import { createSelector, selectCoins } from 'watch-wallet';
 *
 * const plan = selectCoins(createSelector('largest-first'), utxos, {
 *   targetValue: 40_000,
 *   feeRate: 2,
 * });
 * ```
 */

export { BaseSelector, defaultFeeModel } from './base-selector.ts';
export { LargestFirstSelector } from './largest-first.ts';
export { BranchAndBoundSelector } from './branch-and-bound.ts';
export { createSelector, isSelectorAlgorithm, SELECTOR_ALGORITHMS, selectCoins } from './selector-factory.ts';

