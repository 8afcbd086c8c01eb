/**
 * Base UTXO Selector
 * Common functionality for all selection algorithms
 */

import { SizeEstimator } from '../core/size-estimator.ts';
import type { InputSpendProfile } from '../interfaces/fee.interface.ts';
import type {
  FeeModel,
  IUTXOSelector,
  SelectionOptions,
  SelectorAlgorithm,
} from '../interfaces/selector.interface.ts';
import type {
  SelectionFailure,
  SelectionResult,
  SelectionSuccess,
} from '../interfaces/selector-result.interface.ts';
import { SelectionFailureReason } from '../interfaces/selector-result.interface.ts';
import type { SelectableUTXO } from '../interfaces/utxo.interface.ts';

const P2WPKH_PROFILE: InputSpendProfile = {
  scriptType: 'wpkh',
  threshold: 1,
  keyCount: 1,
  compressed: true,
};
const P2WPKH_SCRIPT_LENGTH = 22;

/**
 * Size-based fee model for single-key segwit inputs paying one P2WPKH
 * output plus optional P2WPKH change
 */
export function defaultFeeModel(feeRate: number): FeeModel {
  return {
    feeFor(inputs, withChange) {
      const outputs = withChange ? [P2WPKH_SCRIPT_LENGTH, P2WPKH_SCRIPT_LENGTH] : [P2WPKH_SCRIPT_LENGTH];
      const { vsize } = SizeEstimator.estimate(inputs.map(() => P2WPKH_PROFILE), outputs);
      return SizeEstimator.fee(vsize, feeRate);
    },
  };
}

export abstract class BaseSelector implements IUTXOSelector {
  protected readonly DUST_THRESHOLD = 294;

  abstract select<T extends SelectableUTXO>(utxos: T[], options: SelectionOptions): SelectionResult<T>;
  abstract getName(): SelectorAlgorithm;

  /**
   * Filter UTXOs based on confirmation requirements
   */
  protected filterEligibleUTXOs<T extends SelectableUTXO>(utxos: T[], options: SelectionOptions): T[] {
    const minConfirmations = options.minConfirmations ?? 0;
    return utxos.filter((utxo) => (utxo.confirmations ?? 0) >= minConfirmations);
  }

  /**
   * Largest value first; ties broken by outpoint so the order is total
   */
  protected sortByValue<T extends SelectableUTXO>(utxos: T[]): T[] {
    return [...utxos].sort((a, b) => {
      if (a.value !== b.value) return b.value - a.value;
      if (a.txid !== b.txid) return a.txid < b.txid ? -1 : 1;
      return a.vout - b.vout;
    });
  }

  protected sumUTXOs(utxos: readonly SelectableUTXO[]): number {
    return utxos.reduce((sum, utxo) => sum + utxo.value, 0);
  }

  protected feeModel(options: SelectionOptions): FeeModel {
    return options.feeModel ?? defaultFeeModel(options.feeRate);
  }

  protected dustThreshold(options: SelectionOptions): number {
    return options.dustThreshold ?? this.DUST_THRESHOLD;
  }

  /**
   * Change at or below the threshold is not worth an output
   */
  protected isDust(amount: number, dustThreshold: number): boolean {
    return amount <= dustThreshold;
  }

  /**
   * Settle a candidate input set: with change when the change clears dust,
   * otherwise changeless when the inputs still cover the smaller fee
   */
  protected settle<T extends SelectableUTXO>(
    inputs: T[],
    options: SelectionOptions,
  ): SelectionSuccess<T> | undefined {
    const model = this.feeModel(options);
    const total = this.sumUTXOs(inputs);

    const feeWithChange = model.feeFor(inputs, true);
    const change = total - options.targetValue - feeWithChange;
    if (change >= 0 && !this.isDust(change, this.dustThreshold(options))) {
      return {
        success: true,
        inputs,
        totalValue: total,
        change,
        fee: feeWithChange,
        hasChange: true,
      };
    }

    const feeWithoutChange = model.feeFor(inputs, false);
    if (total >= options.targetValue + feeWithoutChange) {
      return {
        success: true,
        inputs,
        totalValue: total,
        change: 0,
        fee: total - options.targetValue,
        hasChange: false,
      };
    }

    return undefined;
  }

  protected checkOptionsValidity(options: SelectionOptions): SelectionFailure | null {
    if (!Number.isSafeInteger(options.targetValue) || options.targetValue <= 0) {
      return this.failure(
        SelectionFailureReason.INVALID_OPTIONS,
        `Target value must be a positive integer, got ${options.targetValue}`,
        { targetValue: options.targetValue },
      );
    }
    if (!Number.isFinite(options.feeRate) || options.feeRate <= 0) {
      return this.failure(
        SelectionFailureReason.INVALID_OPTIONS,
        `Fee rate must be positive, got ${options.feeRate}`,
        { feeRate: options.feeRate },
      );
    }
    if (options.maxInputs !== undefined && (!Number.isInteger(options.maxInputs) || options.maxInputs < 1)) {
      return this.failure(
        SelectionFailureReason.INVALID_OPTIONS,
        `Max inputs must be at least 1, got ${options.maxInputs}`,
        { maxInputs: options.maxInputs },
      );
    }
    return null;
  }

  protected failure(
    reason: SelectionFailureReason,
    message: string,
    details?: SelectionFailure['details'],
  ): SelectionFailure {
    return { success: false, reason, message, details };
  }

  /**
   * Failure for an input set that ran out before covering the target;
   * the required amount assumes every eligible coin is spent
   */
  protected shortfall(
    eligible: readonly SelectableUTXO[],
    options: SelectionOptions,
    limitedBy?: number,
  ): SelectionFailure {
    const availableBalance = this.sumUTXOs(eligible);
    const requiredAmount = options.targetValue + this.feeModel(options).feeFor(eligible, false);

    if (limitedBy !== undefined) {
      return this.failure(
        SelectionFailureReason.MAX_INPUTS_EXCEEDED,
        `Target not reached within ${limitedBy} inputs`,
        { availableBalance, requiredAmount, maxInputs: limitedBy, utxoCount: eligible.length },
      );
    }

    return this.failure(
      SelectionFailureReason.INSUFFICIENT_FUNDS,
      `Insufficient funds: have ${availableBalance}, need at least ${requiredAmount}`,
      {
        availableBalance,
        requiredAmount,
        utxoCount: eligible.length,
        targetValue: options.targetValue,
        feeRate: options.feeRate,
      },
    );
  }

  /**
   * Waste relative to spending the same inputs at the long-term fee rate
   */
  protected calculateWaste(
    selection: SelectionSuccess<SelectableUTXO>,
    options: SelectionOptions,
  ): number {
    const longTermFeeRate = options.longTermFeeRate ?? options.feeRate;
    const longTermFee = Math.ceil(selection.fee * (longTermFeeRate / options.feeRate));
    const timingCost = selection.fee - longTermFee;
    if (selection.hasChange) return timingCost;

    const changelessFee = this.feeModel(options).feeFor(selection.inputs, false);
    const excess = selection.totalValue - options.targetValue - changelessFee;
    return timingCost + Math.max(0, excess);
  }
}
