/**
 * Dust Threshold Calculator
 * Bitcoin Core's GetDustThreshold: an output is dust when spending it would
 * cost more than its value at the dust relay fee rate.
 */

import type { Buffer } from 'node:buffer';

import type { OutputType } from '../interfaces/fee.interface.ts';
import { varIntLength } from './witness.ts';

export interface DustCalculatorOptions {
  dustRelayFeeRate?: number; // sat/vB, Bitcoin Core default 3
}

export class DustCalculator {
  private options: Required<DustCalculatorOptions>;

  public static readonly DEFAULT_DUST_RELAY_FEE_RATE = 3;

  // Standard scriptPubKey sizes
  private static readonly SCRIPT_SIZES: Record<OutputType, number> = {
    P2PKH: 25, // OP_DUP OP_HASH160 <20 bytes> OP_EQUALVERIFY OP_CHECKSIG
    P2WPKH: 22, // OP_0 <20 bytes>
    P2SH: 23, // OP_HASH160 <20 bytes> OP_EQUAL
    P2WSH: 34, // OP_0 <32 bytes>
    P2TR: 34, // OP_1 <32 bytes>
  };

  // Size of the input that later spends the output
  private static readonly LEGACY_SPEND_SIZE = 148; // 32 + 4 + 1 + 107 + 4
  private static readonly WITNESS_SPEND_SIZE = 67; // 32 + 4 + 1 + 107/4 + 4

  constructor(options?: DustCalculatorOptions) {
    this.options = {
      dustRelayFeeRate: options?.dustRelayFeeRate ?? DustCalculator.DEFAULT_DUST_RELAY_FEE_RATE,
    };
  }

  /**
   * Dust threshold for a standard output type
   */
  calculateDustThreshold(outputType: OutputType, feeRate?: number): number {
    const scriptSize = DustCalculator.SCRIPT_SIZES[outputType];
    const witness = outputType === 'P2WPKH' || outputType === 'P2WSH' || outputType === 'P2TR';
    return this.threshold(scriptSize, witness, feeRate);
  }

  /**
   * Dust threshold for an arbitrary scriptPubKey
   */
  thresholdForScript(script: Buffer, feeRate?: number): number {
    return this.threshold(script.length, isWitnessProgram(script), feeRate);
  }

  private threshold(scriptSize: number, witness: boolean, feeRate?: number): number {
    const rate = feeRate ?? this.options.dustRelayFeeRate;
    const outputSize = 8 + varIntLength(scriptSize) + scriptSize;
    const spendSize = witness ? DustCalculator.WITNESS_SPEND_SIZE : DustCalculator.LEGACY_SPEND_SIZE;
    return Math.ceil((outputSize + spendSize) * rate);
  }
}

/**
 * OP_0..OP_16 followed by a single 2-40 byte push
 */
export function isWitnessProgram(script: Buffer): boolean {
  if (script.length < 4 || script.length > 42) return false;
  const version = script[0];
  if (version !== 0x00 && (version < 0x51 || version > 0x60)) return false;
  return script[1] + 2 === script.length;
}

export function classifyOutputScript(script: Buffer): OutputType | undefined {
  if (
    script.length === 25 && script[0] === 0x76 && script[1] === 0xa9 && script[2] === 0x14 &&
    script[23] === 0x88 && script[24] === 0xac
  ) {
    return 'P2PKH';
  }
  if (script.length === 23 && script[0] === 0xa9 && script[1] === 0x14 && script[22] === 0x87) {
    return 'P2SH';
  }
  if (script.length === 22 && script[0] === 0x00 && script[1] === 0x14) return 'P2WPKH';
  if (script.length === 34 && script[0] === 0x00 && script[1] === 0x20) return 'P2WSH';
  if (script.length === 34 && script[0] === 0x51 && script[1] === 0x20) return 'P2TR';
  return undefined;
}
