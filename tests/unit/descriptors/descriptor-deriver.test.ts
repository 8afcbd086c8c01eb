/**
 * Descriptor Derivation Tests
 *
 * Derived scripts are checked against keys derived straight from the test
 * seeds with bip32.
 */

import { Buffer } from 'node:buffer';

import * as bitcoin from 'bitcoinjs-lib';
import { describe, expect, it } from 'vitest';

import {
  assertDescriptorPair,
  deriveFixed,
  deriveScript,
  keyFingerprint,
  specialiseDescriptor,
} from '../../../src/descriptors/descriptor-deriver.ts';
import { addChecksum } from '../../../src/descriptors/checksum.ts';
import { parseDescriptor } from '../../../src/descriptors/descriptor-parser.ts';
import {
  DescriptorMismatchError,
  NetworkMismatchError,
  NotARangeDescriptorError,
  ValidationError,
} from '../../../src/errors/index.ts';
import { childPubkey, fingerprintOf, multisigWallet, network, rootKey, singleKeyWallet } from '../../fixtures/wallet-fixtures.ts';

describe('deriveScript', () => {
  const wallet = singleKeyWallet('wpkh');
  const descriptor = parseDescriptor(wallet.external);
  const [root] = wallet.roots;

  it('should derive the P2WPKH address at an index', () => {
    const pubkey = childPubkey(root, wallet.accountPath, 0, 123);
    const expected = bitcoin.payments.p2wpkh({ pubkey, network });

    const derived = deriveScript(descriptor, 123, network);

    expect(derived.address).toBe(expected.address);
    expect(derived.script.equals(expected.output ?? Buffer.alloc(0))).toBe(true);
    expect(derived.index).toBe(123);
    expect(derived.descriptorId).toBe(descriptor.id);
    expect(derived.hints).toEqual([
      {
        pubkey,
        masterFingerprint: Buffer.from(fingerprintOf(root), 'hex'),
        path: "m/84'/1'/0'/0/123",
      },
    ]);
  });

  it('should derive the same script every time', () => {
    const first = deriveScript(descriptor, 7, network);
    const second = deriveScript(parseDescriptor(wallet.external), 7, network);
    expect(second.address).toBe(first.address);
  });

  it('should derive different scripts on the change branch', () => {
    const change = parseDescriptor(wallet.internal);
    const pubkey = childPubkey(root, wallet.accountPath, 1, 0);

    expect(deriveScript(change, 0, network).address).toBe(bitcoin.payments.p2wpkh({ pubkey, network }).address);
    expect(deriveScript(change, 0, network).address).not.toBe(deriveScript(descriptor, 0, network).address);
  });

  it('should derive P2PKH and nested P2SH-P2WPKH', () => {
    const pkh = singleKeyWallet('pkh');
    const pkhKey = childPubkey(pkh.roots[0], pkh.accountPath, 0, 2);
    expect(deriveScript(parseDescriptor(pkh.external), 2, network).address)
      .toBe(bitcoin.payments.p2pkh({ pubkey: pkhKey, network }).address);

    const nested = singleKeyWallet('sh-wpkh');
    const nestedKey = childPubkey(nested.roots[0], nested.accountPath, 0, 2);
    const redeem = bitcoin.payments.p2wpkh({ pubkey: nestedKey, network });
    const derived = deriveScript(parseDescriptor(nested.external), 2, network);

    expect(derived.address).toBe(bitcoin.payments.p2sh({ redeem, network }).address);
    expect(derived.redeemScript?.equals(redeem.output ?? Buffer.alloc(0))).toBe(true);
    expect(derived.witnessScript).toBeUndefined();
  });

  it('should sort keys for sortedmulti and keep hints in descriptor order', () => {
    const multi = multisigWallet('wsh', 2, [1, 2, 3]);
    const pubkeys = multi.roots.map((key) => childPubkey(key, multi.accountPath, 0, 4));
    const p2ms = bitcoin.payments.p2ms({ m: 2, pubkeys: [...pubkeys].sort(Buffer.compare), network });

    const derived = deriveScript(parseDescriptor(multi.external), 4, network);

    expect(derived.witnessScript?.equals(p2ms.output ?? Buffer.alloc(0))).toBe(true);
    expect(derived.address).toBe(bitcoin.payments.p2wsh({ redeem: p2ms, network }).address);
    expect(derived.hints.map((hint) => hint.pubkey)).toEqual(pubkeys);
    expect(derived.hints.map((hint) => hint.path)).toEqual([
      "m/48'/1'/0'/2'/0/4",
      "m/48'/1'/0'/2'/0/4",
      "m/48'/1'/0'/2'/0/4",
    ]);
  });

  it('should nest the witness script for sh(wsh(multi))', () => {
    const multi = multisigWallet('sh-wsh', 2, [1, 2, 3]);
    const derived = deriveScript(parseDescriptor(multi.external), 0, network);

    expect(derived.witnessScript).toBeDefined();
    expect(derived.redeemScript?.length).toBe(34);
    expect(derived.script.length).toBe(23);
  });

  it('should derive legacy P2SH multisig with only a redeem script', () => {
    const multi = multisigWallet('sh', 1, [1, 2]);
    const derived = deriveScript(parseDescriptor(multi.external), 0, network);

    expect(derived.redeemScript).toBeDefined();
    expect(derived.witnessScript).toBeUndefined();
  });

  it('should use regtest address prefixes on regtest', () => {
    expect(deriveScript(descriptor, 0, bitcoin.networks.regtest).address.startsWith('bcrt1')).toBe(true);
  });

  it('should refuse a testnet key on mainnet', () => {
    expect(() => deriveScript(descriptor, 0, bitcoin.networks.bitcoin)).toThrow(NetworkMismatchError);
    expect(() => deriveScript(descriptor, 0, bitcoin.networks.bitcoin))
      .toThrow('Network mismatch: expected mainnet, got testnet');
  });

  it('should need an index in range for ranged descriptors', () => {
    expect(() => deriveScript(descriptor, undefined, network)).toThrow(ValidationError);
    expect(() => deriveScript(descriptor, 0x80000000, network))
      .toThrow('Child index 2147483648 is outside 0..2147483647');
    expect(() => deriveScript(descriptor, -1, network)).toThrow(ValidationError);
    expect(deriveScript(descriptor, 0x7fffffff, network).index).toBe(0x7fffffff);
  });

  describe('fixed descriptors', () => {
    const pubkey = Buffer.from(rootKey(5).publicKey);
    const fixed = parseDescriptor(addChecksum(`wpkh(${pubkey.toString('hex')})`));

    it('should derive without an index', () => {
      const derived = deriveFixed(fixed, network);
      expect(derived.address).toBe(bitcoin.payments.p2wpkh({ pubkey, network }).address);
      expect(derived.index).toBeUndefined();
      expect(derived.hints).toEqual([]);
    });

    it('should refuse an index', () => {
      expect(() => deriveScript(fixed, 0, network)).toThrow(NotARangeDescriptorError);
    });
  });
});

describe('specialiseDescriptor', () => {
  const wallet = singleKeyWallet('wpkh');
  const descriptor = parseDescriptor(wallet.external);

  it('should replace the wildcard and re-checksum', () => {
    const specialised = specialiseDescriptor(descriptor, 5);
    const expectedBody = descriptor.body.replace('/0/*', '/0/5');

    expect(specialised).toBe(addChecksum(expectedBody));

    const parsed = parseDescriptor(specialised);
    expect(parsed.isRange).toBe(false);
    expect(deriveFixed(parsed, network).address).toBe(deriveScript(descriptor, 5, network).address);
  });

  it('should refuse fixed descriptors', () => {
    const fixed = parseDescriptor(specialiseDescriptor(descriptor, 1));
    expect(() => specialiseDescriptor(fixed, 2)).toThrow(NotARangeDescriptorError);
  });
});

describe('keyFingerprint', () => {
  it('should prefer the origin fingerprint', () => {
    const wallet = singleKeyWallet('wpkh');
    const descriptor = parseDescriptor(wallet.external);
    expect(keyFingerprint(descriptor.keys[0])).toBe(fingerprintOf(wallet.roots[0]));
  });

  it('should fall back to the extended key fingerprint', () => {
    const account = rootKey(1).derivePath("m/84'/1'/0'");
    const descriptor = parseDescriptor(addChecksum(`wpkh(${account.neutered().toBase58()}/0/*)`));
    expect(keyFingerprint(descriptor.keys[0])).toBe(Buffer.from(account.fingerprint).toString('hex'));
  });
});

describe('assertDescriptorPair', () => {
  it('should accept the two branches of one wallet', () => {
    const wallet = multisigWallet('wsh', 2, [1, 2, 3]);
    expect(() => assertDescriptorPair(parseDescriptor(wallet.external), parseDescriptor(wallet.internal)))
      .not.toThrow();
  });

  it('should reject different script types', () => {
    const external = parseDescriptor(singleKeyWallet('wpkh').external);
    const internal = parseDescriptor(singleKeyWallet('pkh').internal);
    expect(() => assertDescriptorPair(external, internal))
      .toThrow('Descriptor pair mismatch: script types differ (wpkh vs pkh)');
  });

  it('should reject keys from another wallet', () => {
    const external = parseDescriptor(singleKeyWallet('wpkh', 1).external);
    const internal = parseDescriptor(singleKeyWallet('wpkh', 2).internal);
    expect(() => assertDescriptorPair(external, internal)).toThrow(DescriptorMismatchError);
  });

  it('should reject a different threshold', () => {
    const external = parseDescriptor(multisigWallet('wsh', 2, [1, 2, 3]).external);
    const internal = parseDescriptor(multisigWallet('wsh', 1, [1, 2, 3]).internal);
    expect(() => assertDescriptorPair(external, internal)).toThrow('multisig thresholds differ');
  });
});
