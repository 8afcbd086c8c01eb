/**
 * PSBT codec tests: structural checks around bitcoinjs-lib decoding
 */

import { Buffer } from 'node:buffer';

import { describe, expect, it } from 'vitest';
import * as bitcoin from 'bitcoinjs-lib';

import {
  assertPsbtConsistent,
  fromBase64,
  parsePsbt,
  psbtState,
  readPsbtLayout,
  serializePsbt,
  toBase64,
} from '../../../src/core/psbt-codec.ts';
import { InconsistentPSBTError, MalformedPSBTError } from '../../../src/errors/index.ts';
import { foreignAddress, fundingTransaction, network, rootKey } from '../../fixtures/wallet-fixtures.ts';

const key = rootKey(7).derivePath("m/84'/1'/0'/0/0");
const ownScript = bitcoin.payments.p2wpkh({ pubkey: Buffer.from(key.publicKey), network }).output ?? Buffer.alloc(0);

function spendPsbt(options: { witnessValue?: number } = {}): bitcoin.Psbt {
  const prev = fundingTransaction([{ script: ownScript, value: 25_000 }]);
  const psbt = new bitcoin.Psbt({ network });
  psbt.addInput({
    hash: prev.getId(),
    index: 0,
    nonWitnessUtxo: prev.toBuffer(),
    witnessUtxo: { script: ownScript, value: options.witnessValue ?? 25_000 },
  });
  psbt.addOutput({ address: foreignAddress(), value: 24_000 });
  return psbt;
}

describe('PSBT codec', () => {
  describe('parsePsbt', () => {
    it('should read back what it serialized', () => {
      const psbt = spendPsbt();

      const parsed = parsePsbt(serializePsbt(psbt), network);

      expect(parsed.toBase64()).toBe(psbt.toBase64());
      expect(parsed.txOutputs[0].value).toBe(24_000);
    });

    it('should reject bytes without the magic prefix', () => {
      expect(() => parsePsbt(Buffer.alloc(10))).toThrow('Malformed PSBT at byte 0: missing psbt magic bytes');
    });

    it('should reject truncated input', () => {
      const bytes = serializePsbt(spendPsbt());

      expect(() => parsePsbt(bytes.subarray(0, 40))).toThrow(MalformedPSBTError);
    });

    it('should reject a map count that disagrees with the transaction', () => {
      const bytes = Buffer.concat([serializePsbt(spendPsbt()), Buffer.from([0x00])]);

      expect(() => parsePsbt(bytes)).toThrow(InconsistentPSBTError);
      expect(() => parsePsbt(bytes)).toThrow(
        'Inconsistent PSBT: 3 input/output maps for a transaction with 1 inputs and 1 outputs',
      );
    });

    it('should reject a witness output that disagrees with the previous transaction', () => {
      const bytes = serializePsbt(spendPsbt({ witnessValue: 26_000 }));

      expect(() => parsePsbt(bytes)).toThrow(
        'Inconsistent PSBT: input 0 witness output disagrees with its previous transaction',
      );
    });
  });

  describe('readPsbtLayout', () => {
    it('should count input and output maps', () => {
      const layout = readPsbtLayout(serializePsbt(spendPsbt()));

      expect(layout.inputMaps).toBe(1);
      expect(layout.outputMaps).toBe(1);
      expect(layout.unsignedTx.outs[0].value).toBe(24_000);
    });
  });

  describe('base64', () => {
    it('should round trip through base64', () => {
      const psbt = spendPsbt();

      expect(fromBase64(toBase64(psbt), network).toBase64()).toBe(psbt.toBase64());
    });

    it('should ignore whitespace from wrapped text', () => {
      const text = toBase64(spendPsbt());
      const wrapped = `${text.slice(0, 40)}\n${text.slice(40)}\n`;

      expect(fromBase64(wrapped).toBase64()).toBe(text);
    });

    it('should reject text that is not base64', () => {
      expect(() => fromBase64('not base64!')).toThrow('Malformed PSBT: not valid base64');
      expect(() => fromBase64('')).toThrow('Malformed PSBT: not valid base64');
    });
  });

  describe('assertPsbtConsistent', () => {
    it('should require previous output data on every input', () => {
      const psbt = new bitcoin.Psbt({ network });
      psbt.addInput({ hash: 'ab'.repeat(32), index: 0 });
      psbt.addOutput({ address: foreignAddress(), value: 1_000 });

      expect(() => assertPsbtConsistent(psbt)).toThrow('Inconsistent PSBT: input 0 has no previous output data');
    });
  });

  describe('psbtState', () => {
    it('should move from unsigned to partially signed to finalized', () => {
      const psbt = spendPsbt();
      expect(psbtState(psbt)).toBe('unsigned');

      psbt.signInput(0, key);
      expect(psbtState(psbt)).toBe('partially-signed');

      psbt.finalizeAllInputs();
      expect(psbtState(psbt)).toBe('finalized');
    });
  });
});
