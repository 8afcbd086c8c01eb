/**
 * PSBT Finalizer
 * Checks every partial signature, assembles final scripts per spending
 * policy and extracts the network transaction.
 */

import { Buffer } from 'node:buffer';

import * as bitcoin from 'bitcoinjs-lib';
import type { Psbt } from 'bitcoinjs-lib';

import {
  IncompleteSignaturesError,
  InconsistentPSBTError,
  InvalidSignatureError,
  NotFinalizedError,
  SignatureError,
  errorMessage,
} from '../errors/index.ts';
import type { FinalizedTransaction } from '../interfaces/transaction.interface.ts';
import { ecc } from '../utils/ecc.ts';
import type { Logger } from '../utils/logger.ts';
import { noopLogger } from '../utils/logger.ts';
import { classifyOutputScript } from '../utils/dust-calculator.ts';
import { witnessStackToScriptWitness } from '../utils/witness.ts';
import { isFinalizedInput } from './psbt-codec.ts';

type PsbtInput = Psbt['data']['inputs'][number];

export type SpendPolicy = 'p2pkh' | 'p2wpkh' | 'p2sh-p2wpkh' | 'p2wsh-multi' | 'p2sh-p2wsh-multi' | 'p2sh-multi';

/**
 * Everything a finalizer may look at for one input
 */
export interface InputContext {
  index: number;
  input: PsbtInput;
  /** scriptPubKey of the output being spent */
  prevScript: Buffer;
}

export interface FinalScripts {
  finalScriptSig?: Buffer;
  finalScriptWitness?: Buffer;
}

/**
 * Keys that must sign, in script order, and how many of them
 */
export interface SigningRequirement {
  pubkeys: Buffer[];
  threshold: number;
}

export interface InputFinalizer {
  name: SpendPolicy;
  matches(ctx: InputContext): boolean;
  requirement(ctx: InputContext): SigningRequirement;
  /** Called with exactly `threshold` signatures ordered as the script lists the keys */
  finalScripts(ctx: InputContext, signatures: Array<{ pubkey: Buffer; signature: Buffer }>): FinalScripts;
}

function isMultisigScript(script: Buffer | undefined): script is Buffer {
  if (!script) return false;
  try {
    bitcoin.payments.p2ms({ output: script });
    return true;
  } catch {
    return false;
  }
}

function multisigRequirement(script: Buffer | undefined, index: number): SigningRequirement {
  if (!isMultisigScript(script)) {
    throw new SignatureError(`Input ${index} has no multisig script`, index);
  }
  const payment = bitcoin.payments.p2ms({ output: script });
  if (payment.m === undefined || !payment.pubkeys) {
    throw new SignatureError(`Input ${index} multisig script does not decode`, index);
  }
  return { pubkeys: payment.pubkeys, threshold: payment.m };
}

function p2msRedeem(script: Buffer | undefined, signatures: Array<{ signature: Buffer }>): bitcoin.Payment {
  return bitcoin.payments.p2ms({ output: script, signatures: signatures.map((entry) => entry.signature) });
}

/**
 * The single key whose hash the program commits to, taken from the signatures present
 */
function singleKeyRequirement(ctx: InputContext, program: Buffer | undefined): SigningRequirement {
  const hash = program && bitcoin.payments.p2wpkh({ output: program }).hash;
  const candidates = ctx.input.partialSig ?? [];
  const pubkey = candidates.map((entry) => entry.pubkey).find((key) =>
    hash !== undefined && bitcoin.crypto.hash160(key).equals(hash)
  );
  return { pubkeys: pubkey ? [pubkey] : [], threshold: 1 };
}

function witnessOf(payment: bitcoin.Payment, index: number): Buffer {
  if (!payment.witness) {
    throw new SignatureError(`Input ${index} witness could not be assembled`, index);
  }
  return witnessStackToScriptWitness(payment.witness);
}

function isP2shOf(ctx: InputContext, kind: 'P2WPKH' | 'P2WSH' | 'multisig'): boolean {
  const redeem = ctx.input.redeemScript;
  if (classifyOutputScript(ctx.prevScript) !== 'P2SH' || !redeem) return false;
  if (!bitcoin.crypto.hash160(redeem).equals(ctx.prevScript.subarray(2, 22))) return false;
  return kind === 'multisig' ? isMultisigScript(redeem) : classifyOutputScript(redeem) === kind;
}

export const DEFAULT_FINALIZERS: readonly InputFinalizer[] = [
  {
    name: 'p2pkh',
    matches: (ctx) => classifyOutputScript(ctx.prevScript) === 'P2PKH',
    requirement: (ctx) => {
      const hash = bitcoin.payments.p2pkh({ output: ctx.prevScript }).hash;
      const pubkey = (ctx.input.partialSig ?? []).map((entry) => entry.pubkey).find((key) =>
        hash !== undefined && bitcoin.crypto.hash160(key).equals(hash)
      );
      return { pubkeys: pubkey ? [pubkey] : [], threshold: 1 };
    },
    finalScripts: (ctx, [sig]) => ({
      finalScriptSig: bitcoin.payments.p2pkh({
        output: ctx.prevScript,
        pubkey: sig.pubkey,
        signature: sig.signature,
      }).input,
    }),
  },
  {
    name: 'p2wpkh',
    matches: (ctx) => classifyOutputScript(ctx.prevScript) === 'P2WPKH',
    requirement: (ctx) => singleKeyRequirement(ctx, ctx.prevScript),
    finalScripts: (ctx, [sig]) => ({
      finalScriptWitness: witnessOf(
        bitcoin.payments.p2wpkh({ pubkey: sig.pubkey, signature: sig.signature }),
        ctx.index,
      ),
    }),
  },
  {
    name: 'p2sh-p2wpkh',
    matches: (ctx) => isP2shOf(ctx, 'P2WPKH'),
    requirement: (ctx) => singleKeyRequirement(ctx, ctx.input.redeemScript),
    finalScripts: (ctx, [sig]) => {
      const payment = bitcoin.payments.p2sh({
        redeem: bitcoin.payments.p2wpkh({ pubkey: sig.pubkey, signature: sig.signature }),
      });
      return { finalScriptSig: payment.input, finalScriptWitness: witnessOf(payment, ctx.index) };
    },
  },
  {
    name: 'p2wsh-multi',
    matches: (ctx) =>
      classifyOutputScript(ctx.prevScript) === 'P2WSH' && isMultisigScript(ctx.input.witnessScript),
    requirement: (ctx) => multisigRequirement(ctx.input.witnessScript, ctx.index),
    finalScripts: (ctx, sigs) => ({
      finalScriptWitness: witnessOf(
        bitcoin.payments.p2wsh({ redeem: p2msRedeem(ctx.input.witnessScript, sigs) }),
        ctx.index,
      ),
    }),
  },
  {
    name: 'p2sh-p2wsh-multi',
    matches: (ctx) => isP2shOf(ctx, 'P2WSH') && isMultisigScript(ctx.input.witnessScript),
    requirement: (ctx) => multisigRequirement(ctx.input.witnessScript, ctx.index),
    finalScripts: (ctx, sigs) => {
      const payment = bitcoin.payments.p2sh({
        redeem: bitcoin.payments.p2wsh({ redeem: p2msRedeem(ctx.input.witnessScript, sigs) }),
      });
      return { finalScriptSig: payment.input, finalScriptWitness: witnessOf(payment, ctx.index) };
    },
  },
  {
    name: 'p2sh-multi',
    matches: (ctx) => isP2shOf(ctx, 'multisig'),
    requirement: (ctx) => multisigRequirement(ctx.input.redeemScript, ctx.index),
    finalScripts: (ctx, sigs) => ({
      finalScriptSig: bitcoin.payments.p2sh({ redeem: p2msRedeem(ctx.input.redeemScript, sigs) }).input,
    }),
  },
];

export interface PSBTFinalizerOptions {
  logger?: Logger;
}

export class PSBTFinalizer {
  private readonly finalizers = new Map<SpendPolicy, InputFinalizer>();
  private readonly logger: Logger;

  constructor(options: PSBTFinalizerOptions = {}) {
    this.logger = options.logger ?? noopLogger;
    for (const finalizer of DEFAULT_FINALIZERS) {
      this.registerFinalizer(finalizer);
    }
  }

  /**
   * Register or replace the finalizer for a spending policy
   */
  registerFinalizer(finalizer: InputFinalizer): void {
    this.finalizers.set(finalizer.name, finalizer);
  }

  /**
   * Finalize a copy of `psbt`. Every pending input is checked before any is
   * written, so a failure leaves nothing half-finalized. Inputs that are
   * already final pass through unchanged.
   */
  finalize(psbt: Psbt): Psbt {
    const finalized = psbt.clone();
    const pending: Array<{ index: number; policy: SpendPolicy; scripts: FinalScripts }> = [];

    finalized.data.inputs.forEach((input, index) => {
      if (isFinalizedInput(input)) {
        if ((input.partialSig?.length ?? 0) > 0) {
          throw new InconsistentPSBTError(`input ${index} carries both final and partial signing data`, index);
        }
        return;
      }
      pending.push({ index, ...this.prepareInput(finalized, index, input) });
    });

    for (const { index, policy, scripts } of pending) {
      finalized.finalizeInput(index, () => ({
        finalScriptSig: scripts.finalScriptSig,
        finalScriptWitness: scripts.finalScriptWitness,
      }));
      this.logger.debug?.('Input finalized', { index, policy });
    }

    this.logger.info('PSBT finalized', {
      inputs: finalized.inputCount,
      newlyFinalized: pending.length,
    });
    return finalized;
  }

  /**
   * Network transaction of a fully finalized PSBT
   */
  extract(psbt: Psbt): FinalizedTransaction {
    const pending = psbt.data.inputs
      .map((input, index) => (isFinalizedInput(input) ? -1 : index))
      .filter((index) => index >= 0);
    if (pending.length > 0) {
      throw new NotFinalizedError(pending);
    }

    const tx = psbt.extractTransaction(true);
    return {
      txid: tx.getId(),
      hex: tx.toHex(),
      vsize: tx.virtualSize(),
      weight: tx.weight(),
      fee: psbt.getFee(),
    };
  }

  private prepareInput(
    psbt: Psbt,
    index: number,
    input: PsbtInput,
  ): { policy: SpendPolicy; scripts: FinalScripts } {
    const ctx: InputContext = { index, input, prevScript: this.prevScript(psbt, index, input) };

    const finalizer = [...this.finalizers.values()].find((candidate) => candidate.matches(ctx));
    if (!finalizer) {
      throw new SignatureError(`Input ${index} spends a script no finalizer handles`, index);
    }

    const { pubkeys, threshold } = finalizer.requirement(ctx);
    const partials = input.partialSig ?? [];

    for (const partial of partials) {
      const pubkeyHex = partial.pubkey.toString('hex');
      if (!pubkeys.some((key) => key.equals(partial.pubkey))) {
        throw new InvalidSignatureError(index, pubkeyHex, 'key is not part of the spending script');
      }

      let valid: boolean;
      try {
        valid = psbt.validateSignaturesOfInput(
          index,
          (pubkey, msghash, signature) => ecc.verify(msghash, pubkey, signature),
          partial.pubkey,
        );
      } catch (error) {
        throw new InvalidSignatureError(index, pubkeyHex, errorMessage(error));
      }
      if (!valid) {
        throw new InvalidSignatureError(index, pubkeyHex);
      }
    }

    const ordered = pubkeys.flatMap((pubkey) => {
      const partial = partials.find((entry) => entry.pubkey.equals(pubkey));
      return partial ? [{ pubkey, signature: partial.signature }] : [];
    });
    if (ordered.length < threshold) {
      throw new IncompleteSignaturesError(index, ordered.length, threshold);
    }

    const scripts = finalizer.finalScripts(ctx, ordered.slice(0, threshold));
    if (!scripts.finalScriptSig && !scripts.finalScriptWitness) {
      throw new SignatureError(`Input ${index} produced no final script`, index);
    }
    return { policy: finalizer.name, scripts };
  }

  private prevScript(psbt: Psbt, index: number, input: PsbtInput): Buffer {
    if (input.witnessUtxo) {
      return input.witnessUtxo.script;
    }
    if (input.nonWitnessUtxo) {
      const vout = psbt.txInputs[index].index;
      const output = bitcoin.Transaction.fromBuffer(input.nonWitnessUtxo).outs[vout];
      if (output) return output.script;
    }
    throw new InconsistentPSBTError(`input ${index} has no previous output data`, index);
  }
}
