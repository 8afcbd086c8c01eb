/**
 * PSBT Codec
 * BIP-174 bytes and base64 in and out, with a structural check of the
 * key-value maps before bitcoinjs-lib decodes them.
 */

import { Buffer } from 'node:buffer';

import * as bitcoin from 'bitcoinjs-lib';
import type { Network, Psbt } from 'bitcoinjs-lib';

import { InconsistentPSBTError, MalformedPSBTError, errorMessage } from '../errors/index.ts';
import type { PsbtState } from '../interfaces/transaction.interface.ts';

export const PSBT_MAGIC = Buffer.from('70736274ff', 'hex');

const GLOBAL_UNSIGNED_TX = 0x00;
const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

type PsbtInput = Psbt['data']['inputs'][number];

export interface PsbtLayout {
  unsignedTx: bitcoin.Transaction;
  inputMaps: number;
  outputMaps: number;
}

/**
 * Sequential reader over the raw map structure
 */
class MapReader {
  private offset = 0;

  constructor(private readonly bytes: Buffer) {}

  get position(): number {
    return this.offset;
  }

  get done(): boolean {
    return this.offset >= this.bytes.length;
  }

  readBytes(length: number): Buffer {
    if (this.offset + length > this.bytes.length) {
      throw new MalformedPSBTError(`needs ${length} bytes, ${this.bytes.length - this.offset} left`, this.offset);
    }
    const slice = this.bytes.subarray(this.offset, this.offset + length);
    this.offset += length;
    return slice;
  }

  readCompactSize(): number {
    const first = this.readBytes(1)[0];
    if (first < 0xfd) return first;
    if (first === 0xfd) return this.readBytes(2).readUInt16LE(0);
    if (first === 0xfe) return this.readBytes(4).readUInt32LE(0);

    const value = this.readBytes(8).readBigUInt64LE(0);
    if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new MalformedPSBTError('length does not fit in memory', this.offset - 8);
    }
    return Number(value);
  }

  /**
   * One map up to and including its 0x00 separator; returns key-value pairs by key
   */
  readMap(): Map<string, Buffer> {
    const entries = new Map<string, Buffer>();

    for (;;) {
      const start = this.offset;
      const keyLength = this.readCompactSize();
      if (keyLength === 0) return entries;

      const key = this.readBytes(keyLength).toString('hex');
      const valueLength = this.readCompactSize();
      const value = this.readBytes(valueLength);

      if (entries.has(key)) {
        throw new MalformedPSBTError(`duplicate key ${key}`, start);
      }
      entries.set(key, value);
    }
  }
}

/**
 * Walk magic, global map and per-input/per-output maps without interpreting
 * the values beyond the unsigned transaction
 */
export function readPsbtLayout(bytes: Buffer): PsbtLayout {
  if (bytes.length < PSBT_MAGIC.length || !bytes.subarray(0, PSBT_MAGIC.length).equals(PSBT_MAGIC)) {
    throw new MalformedPSBTError('missing psbt magic bytes', 0);
  }

  const reader = new MapReader(bytes);
  reader.readBytes(PSBT_MAGIC.length);

  const global = reader.readMap();
  const rawTx = global.get(Buffer.from([GLOBAL_UNSIGNED_TX]).toString('hex'));
  if (!rawTx) {
    throw new MalformedPSBTError('global map has no unsigned transaction');
  }

  let unsignedTx: bitcoin.Transaction;
  try {
    unsignedTx = bitcoin.Transaction.fromBuffer(rawTx);
  } catch (error) {
    throw new MalformedPSBTError(`unsigned transaction does not decode: ${errorMessage(error)}`);
  }
  if (unsignedTx.ins.some((input) => input.script.length > 0 || input.witness.length > 0)) {
    throw new MalformedPSBTError('unsigned transaction carries input scripts');
  }

  let maps = 0;
  while (!reader.done) {
    reader.readMap();
    maps++;
  }

  const expected = unsignedTx.ins.length + unsignedTx.outs.length;
  if (maps !== expected) {
    throw new InconsistentPSBTError(
      `${maps} input/output maps for a transaction with ${unsignedTx.ins.length} inputs and ${unsignedTx.outs.length} outputs`,
    );
  }

  return { unsignedTx, inputMaps: unsignedTx.ins.length, outputMaps: unsignedTx.outs.length };
}

export function isFinalizedInput(input: PsbtInput): boolean {
  return input.finalScriptSig !== undefined || input.finalScriptWitness !== undefined;
}

function hasPartialFields(input: PsbtInput): boolean {
  return (input.partialSig?.length ?? 0) > 0 ||
    input.redeemScript !== undefined ||
    input.witnessScript !== undefined;
}

/**
 * Rules bitcoinjs-lib leaves for later: every input can name the output it
 * spends, and final and partial data never sit on one input
 */
export function assertPsbtConsistent(psbt: Psbt): void {
  psbt.data.inputs.forEach((input, i) => {
    const outpoint = psbt.txInputs[i];
    const prevTxid = Buffer.from(outpoint.hash).reverse().toString('hex');

    if (!input.witnessUtxo && !input.nonWitnessUtxo) {
      throw new InconsistentPSBTError(`input ${i} has no previous output data`, i);
    }

    if (input.nonWitnessUtxo) {
      let prevTx: bitcoin.Transaction;
      try {
        prevTx = bitcoin.Transaction.fromBuffer(input.nonWitnessUtxo);
      } catch (error) {
        throw new InconsistentPSBTError(`input ${i} previous transaction does not decode: ${errorMessage(error)}`, i);
      }
      if (prevTx.getId() !== prevTxid) {
        throw new InconsistentPSBTError(
          `input ${i} previous transaction is ${prevTx.getId()}, outpoint names ${prevTxid}`,
          i,
        );
      }

      const prevOut = prevTx.outs[outpoint.index];
      if (!prevOut) {
        throw new InconsistentPSBTError(`input ${i} spends missing output ${prevTxid}:${outpoint.index}`, i);
      }
      if (
        input.witnessUtxo &&
        (input.witnessUtxo.value !== prevOut.value || !input.witnessUtxo.script.equals(prevOut.script))
      ) {
        throw new InconsistentPSBTError(`input ${i} witness output disagrees with its previous transaction`, i);
      }
    }

    if (isFinalizedInput(input) && hasPartialFields(input)) {
      throw new InconsistentPSBTError(`input ${i} carries both final and partial signing data`, i);
    }
  });
}

export function serializePsbt(psbt: Psbt): Buffer {
  return psbt.toBuffer();
}

export function parsePsbt(bytes: Buffer, network?: Network): Psbt {
  readPsbtLayout(bytes);

  let psbt: Psbt;
  try {
    psbt = bitcoin.Psbt.fromBuffer(bytes, network ? { network } : {});
  } catch (error) {
    throw new MalformedPSBTError(errorMessage(error));
  }

  assertPsbtConsistent(psbt);
  return psbt;
}

export function toBase64(psbt: Psbt): string {
  return serializePsbt(psbt).toString('base64');
}

export function fromBase64(text: string, network?: Network): Psbt {
  const compact = text.replace(/\s+/g, '');
  if (compact.length === 0 || compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
    throw new MalformedPSBTError('not valid base64');
  }
  return parsePsbt(Buffer.from(compact, 'base64'), network);
}

/**
 * Lifecycle position read from content
 */
export function psbtState(psbt: Psbt): PsbtState {
  const inputs = psbt.data.inputs;
  if (inputs.length > 0 && inputs.every(isFinalizedInput)) {
    return 'finalized';
  }
  if (inputs.some((input) => isFinalizedInput(input) || (input.partialSig?.length ?? 0) > 0)) {
    return 'partially-signed';
  }
  return 'unsigned';
}
