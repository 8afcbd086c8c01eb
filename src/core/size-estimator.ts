/**
 * Transaction Size Estimator
 * Weight-unit estimates for fully signed transactions, witness discount included
 */

import type { Descriptor } from '../interfaces/descriptor.interface.ts';
import type { InputSpendProfile, SizeEstimate } from '../interfaces/fee.interface.ts';
import { varIntLength } from '../utils/witness.ts';

export class SizeEstimator {
  // version + locktime
  static readonly TX_FIXED_SIZE = 8;
  // segwit marker + flag, witness weight
  static readonly SEGWIT_MARKER_WEIGHT = 2;
  // outpoint + sequence
  static readonly INPUT_FIXED_SIZE = 40;
  // DER signature with sighash byte, low-R
  static readonly SIGNATURE_SIZE = 72;

  /**
   * Spend profile shared by every input of a descriptor
   */
  static profileFor(descriptor: Descriptor): InputSpendProfile {
    const compressed = descriptor.keys.every((key) =>
      key.material.kind === 'xpub' || key.material.compressed
    );
    return {
      scriptType: descriptor.scriptType,
      threshold: descriptor.multisig?.threshold ?? 1,
      keyCount: descriptor.keys.length,
      compressed,
    };
  }

  static multisigScriptSize(keyCount: number, compressed = true): number {
    // OP_m <push pubkey>... OP_n OP_CHECKMULTISIG
    return 1 + keyCount * (compressed ? 34 : 66) + 2;
  }

  /**
   * Non-witness bytes and witness bytes of one signed input
   */
  static inputSize(profile: InputSpendProfile): { base: number; witness: number } {
    const sig = 1 + SizeEstimator.SIGNATURE_SIZE;
    const pubkey = 1 + (profile.compressed ? 33 : 65);
    const withScriptSig = (scriptSig: number) =>
      SizeEstimator.INPUT_FIXED_SIZE + varIntLength(scriptSig) + scriptSig;
    const multisigWitness = () => {
      const script = SizeEstimator.multisigScriptSize(profile.keyCount, profile.compressed);
      return varIntLength(profile.threshold + 2) + 1 + profile.threshold * sig +
        varIntLength(script) + script;
    };

    switch (profile.scriptType) {
      case 'pkh':
        return { base: withScriptSig(sig + pubkey), witness: 0 };
      case 'wpkh':
        return { base: withScriptSig(0), witness: 1 + sig + pubkey };
      case 'sh-wpkh':
        // push of the 22-byte p2wpkh program
        return { base: withScriptSig(23), witness: 1 + sig + pubkey };
      case 'wsh-multi':
        return { base: withScriptSig(0), witness: multisigWitness() };
      case 'sh-wsh-multi':
        // push of the 34-byte p2wsh program
        return { base: withScriptSig(35), witness: multisigWitness() };
      case 'sh-multi': {
        const redeem = SizeEstimator.multisigScriptSize(profile.keyCount, profile.compressed);
        const push = redeem < 76 ? 1 : redeem <= 0xff ? 2 : 3;
        return { base: withScriptSig(1 + profile.threshold * sig + push + redeem), witness: 0 };
      }
    }
  }

  static outputSize(scriptLength: number): number {
    return 8 + varIntLength(scriptLength) + scriptLength;
  }

  /**
   * Weight and virtual size for the given inputs and output script lengths
   */
  static estimate(inputs: readonly InputSpendProfile[], outputScriptLengths: readonly number[]): SizeEstimate {
    const sizes = inputs.map((profile) => SizeEstimator.inputSize(profile));
    const hasWitness = sizes.some((size) => size.witness > 0);

    let weight = (SizeEstimator.TX_FIXED_SIZE + varIntLength(inputs.length) +
      varIntLength(outputScriptLengths.length)) * 4;

    if (hasWitness) {
      weight += SizeEstimator.SEGWIT_MARKER_WEIGHT;
    }

    for (const size of sizes) {
      weight += size.base * 4;
      // inputs without witness still carry an empty stack count once any input has one
      weight += hasWitness ? Math.max(size.witness, 1) : 0;
    }

    for (const length of outputScriptLengths) {
      weight += SizeEstimator.outputSize(length) * 4;
    }

    return { weight, vsize: Math.ceil(weight / 4) };
  }

  static fee(vsize: number, feeRate: number): number {
    return Math.ceil(vsize * feeRate);
  }
}
