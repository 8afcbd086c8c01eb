import type { FeeModel } from '../../src/interfaces/selector.interface.ts';
import type { SelectableUTXO } from '../../src/interfaces/utxo.interface.ts';

export function utxo(value: number, txidByte: string, vout = 0, confirmations = 6): SelectableUTXO {
  return { txid: txidByte.repeat(64), vout, value, confirmations };
}

export function fixedFee(fee: number): FeeModel {
  return { feeFor: () => fee };
}

/**
 * Fee that grows with the input count, plus a surcharge for the change output
 */
export function perInputFee(perInput: number, changeCost: number, base = 0): FeeModel {
  return {
    feeFor: (inputs, withChange) => base + inputs.length * perInput + (withChange ? changeCost : 0),
  };
}

/**
 * Small deterministic generator so property tests replay identically
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 0x100000000;
  };
}
