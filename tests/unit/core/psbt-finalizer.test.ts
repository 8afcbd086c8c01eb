/**
 * PSBTFinalizer Tests
 *
 * Signature checks, final script assembly per spending policy, and
 * extraction of the network transaction.
 */

import { Buffer } from 'node:buffer';

import { describe, expect, it } from 'vitest';
import * as bitcoin from 'bitcoinjs-lib';
import { ECPairFactory } from 'ecpair';

import { psbtState } from '../../../src/core/psbt-codec.ts';
import { PSBTFinalizer } from '../../../src/core/psbt-finalizer.ts';
import { TransactionBuilder } from '../../../src/core/transaction-builder.ts';
import {
  IncompleteSignaturesError,
  InvalidSignatureError,
  NotFinalizedError,
} from '../../../src/errors/index.ts';
import type { BuildResult } from '../../../src/interfaces/transaction.interface.ts';
import { ecc } from '../../../src/utils/ecc.ts';
import { syncedWallet } from '../../fixtures/synced-wallet.ts';
import {
  foreignAddress,
  multisigWallet,
  network,
  singleKeyWallet,
  type TestWallet,
} from '../../fixtures/wallet-fixtures.ts';

async function unsignedSpend(wallet: TestWallet, values = [50_000]): Promise<BuildResult> {
  const { chain, descriptor, changeDescriptor, snapshot } = await syncedWallet(wallet, values);
  return new TransactionBuilder({ network, chain }).build({
    snapshot,
    descriptor,
    changeDescriptor,
    recipients: [{ address: foreignAddress(), value: 20_000 }],
    feeRate: 2,
  });
}

const ECPair = ECPairFactory(ecc);

describe('PSBTFinalizer', () => {
  const finalizer = new PSBTFinalizer();

  describe('single-key policies', () => {
    for (const kind of ['wpkh', 'sh-wpkh', 'pkh'] as const) {
      it(`should finalize and extract a signed ${kind} spend`, async () => {
        const wallet = singleKeyWallet(kind);
        const { psbt, fee } = await unsignedSpend(wallet);
        psbt.signAllInputsHD(wallet.roots[0]);

        const finalized = finalizer.finalize(psbt);
        const tx = finalizer.extract(finalized);

        expect(psbtState(finalized)).toBe('finalized');
        expect(tx.fee).toBe(fee);
        expect(bitcoin.Transaction.fromHex(tx.hex).getId()).toBe(tx.txid);
      });
    }

    it('should keep the unsigned txid for segwit spends', async () => {
      const wallet = singleKeyWallet('wpkh');
      const { psbt, unsignedTxid } = await unsignedSpend(wallet);
      psbt.signAllInputsHD(wallet.roots[0]);

      const tx = finalizer.extract(finalizer.finalize(psbt));

      expect(tx.txid).toBe(unsignedTxid);
    });

    it('should leave the given PSBT untouched', async () => {
      const wallet = singleKeyWallet('wpkh');
      const { psbt } = await unsignedSpend(wallet);
      psbt.signAllInputsHD(wallet.roots[0]);

      finalizer.finalize(psbt);

      expect(psbtState(psbt)).toBe('partially-signed');
    });

    it('should pass already final inputs through', async () => {
      const wallet = singleKeyWallet('wpkh');
      const { psbt } = await unsignedSpend(wallet);
      psbt.signAllInputsHD(wallet.roots[0]);

      const once = finalizer.finalize(psbt);
      const twice = finalizer.finalize(once);

      expect(twice.toBase64()).toBe(once.toBase64());
    });
  });

  describe('multisig policies', () => {
    it('should refuse a 2-of-3 input with one signature', async () => {
      const wallet = multisigWallet('wsh', 2, [1, 2, 3]);
      const { psbt } = await unsignedSpend(wallet);
      psbt.signAllInputsHD(wallet.roots[0]);

      const attempt = () => finalizer.finalize(psbt);

      expect(attempt).toThrow(IncompleteSignaturesError);
      expect(attempt).toThrow('Input 0 has 1 of 2 required signatures');
    });

    for (const kind of ['wsh', 'sh-wsh', 'sh'] as const) {
      it(`should finalize a ${kind} 2-of-3 input with two signatures`, async () => {
        const wallet = multisigWallet(kind, 2, [1, 2, 3]);
        const { psbt, fee } = await unsignedSpend(wallet);
        psbt.signAllInputsHD(wallet.roots[0]);
        psbt.signAllInputsHD(wallet.roots[2]);

        const tx = finalizer.extract(finalizer.finalize(psbt));

        expect(tx.fee).toBe(fee);
        expect(bitcoin.Transaction.fromHex(tx.hex).ins).toHaveLength(1);
      });
    }

    it('should use only the threshold number of signatures', async () => {
      const wallet = multisigWallet('wsh', 2, [1, 2, 3]);
      const { psbt } = await unsignedSpend(wallet);
      for (const root of wallet.roots) {
        psbt.signAllInputsHD(root);
      }

      const tx = bitcoin.Transaction.fromHex(finalizer.extract(finalizer.finalize(psbt)).hex);

      // empty dummy, two signatures, witness script
      expect(tx.ins[0].witness).toHaveLength(4);
    });
  });

  describe('signature checks', () => {
    it('should reject a signature from a key outside the script', async () => {
      const wallet = singleKeyWallet('wpkh');
      const { psbt } = await unsignedSpend(wallet);
      const stranger = ECPair.fromPrivateKey(Buffer.alloc(32, 42), { network });
      const strangerPubkey = stranger.publicKey;
      psbt.updateInput(0, {
        partialSig: [{
          pubkey: strangerPubkey,
          signature: bitcoin.script.signature.encode(
            stranger.sign(Buffer.alloc(32, 1)),
            bitcoin.Transaction.SIGHASH_ALL,
          ),
        }],
      });

      const attempt = () => finalizer.finalize(psbt);

      expect(attempt).toThrow(InvalidSignatureError);
      expect(attempt).toThrow(
        `Input 0 signature for ${strangerPubkey.toString('hex')}: key is not part of the spending script`,
      );
    });

    it('should reject a signature over the wrong message', async () => {
      const wallet = singleKeyWallet('wpkh');
      const { psbt } = await unsignedSpend(wallet);
      const signer = wallet.roots[0].derivePath(`${wallet.accountPath}/0/0`);
      const pubkey = Buffer.from(signer.publicKey);
      psbt.updateInput(0, {
        partialSig: [{
          pubkey,
          signature: bitcoin.script.signature.encode(
            Buffer.from(signer.sign(Buffer.alloc(32, 1))),
            bitcoin.Transaction.SIGHASH_ALL,
          ),
        }],
      });

      expect(() => finalizer.finalize(psbt)).toThrow(
        `Input 0 signature for ${pubkey.toString('hex')}: signature does not verify`,
      );
    });
  });

  describe('extract', () => {
    it('should refuse a PSBT with pending inputs', async () => {
      const { psbt } = await unsignedSpend(singleKeyWallet('wpkh'));

      expect(() => finalizer.extract(psbt)).toThrow(NotFinalizedError);
      expect(() => finalizer.extract(psbt)).toThrow('PSBT is not finalized: inputs 0 pending');
    });
  });
});
