/**
 * Descriptor Derivation
 * Turns a parsed descriptor and a child index into a script, an address and
 * the BIP32 hints a signer needs to find its keys.
 */

import { Buffer } from 'node:buffer';

import * as bitcoin from 'bitcoinjs-lib';
import type { Network, Payment } from 'bitcoinjs-lib';
import type { BIP32Interface } from 'bip32';

import {
  DescriptorMismatchError,
  NetworkMismatchError,
  NotARangeDescriptorError,
  ValidationError,
} from '../errors/index.ts';
import type {
  DerivedScript,
  Descriptor,
  DescriptorKey,
  KeyDerivationHint,
  PathStep,
} from '../interfaces/descriptor.interface.ts';
import { bip32 } from '../utils/ecc.ts';
import { isTestNetwork, networkLabel } from '../utils/networks.ts';
import { addChecksum } from './checksum.ts';
import { formatPath } from './descriptor-parser.ts';

export const MAX_CHILD_INDEX = 0x7fffffff;

// Extended key after its fixed path, per parsed key
const baseNodes = new WeakMap<DescriptorKey, BIP32Interface>();

function baseNode(key: DescriptorKey, encoded: string, keyNetwork: Network): BIP32Interface {
  const cached = baseNodes.get(key);
  if (cached) return cached;

  let node = bip32.fromBase58(encoded, keyNetwork);
  for (const step of key.path) {
    node = node.derive(step.index);
  }
  baseNodes.set(key, node);
  return node;
}

interface ResolvedKey {
  pubkey: Buffer;
  hint?: KeyDerivationHint;
}

function resolveKey(key: DescriptorKey, index: number | undefined, network: Network): ResolvedKey {
  const material = key.material;

  if (material.kind === 'pubkey') {
    const pubkey = Buffer.from(material.hex, 'hex');
    return {
      pubkey,
      hint: key.origin
        ? {
          pubkey,
          masterFingerprint: Buffer.from(key.origin.fingerprint, 'hex'),
          path: formatPath(key.origin.path),
        }
        : undefined,
    };
  }

  const wantsTest = material.network === 'testnet';
  if (wantsTest !== isTestNetwork(network)) {
    throw new NetworkMismatchError(networkLabel(network), material.network);
  }

  const node = baseNode(key, material.encoded, network);
  const child = key.wildcard && index !== undefined ? node.derive(index) : node;

  const suffix: PathStep[] = [...key.path];
  if (key.wildcard && index !== undefined) {
    suffix.push({ index, hardened: false });
  }

  const masterFingerprint = key.origin
    ? Buffer.from(key.origin.fingerprint, 'hex')
    : Buffer.from(bip32.fromBase58(material.encoded, network).fingerprint);
  const originPath = key.origin ? key.origin.path : [];

  return {
    pubkey: Buffer.from(child.publicKey),
    hint: {
      pubkey: Buffer.from(child.publicKey),
      masterFingerprint,
      path: formatPath([...originPath, ...suffix]),
    },
  };
}

function requireScript(payment: Payment, what: string): { output: Buffer; address: string } {
  if (!payment.output || !payment.address) {
    throw new ValidationError(`Could not build ${what} output`);
  }
  return { output: payment.output, address: payment.address };
}

function multisigPayment(descriptor: Descriptor, pubkeys: Buffer[], network: Network): Payment {
  if (!descriptor.multisig) {
    throw new ValidationError(`Descriptor ${descriptor.id} has no multisig policy`);
  }
  const ordered = descriptor.multisig.sorted ? [...pubkeys].sort(Buffer.compare) : pubkeys;
  return bitcoin.payments.p2ms({ m: descriptor.multisig.threshold, pubkeys: ordered, network });
}

/**
 * Derive the script at `index`; fixed descriptors take no index
 */
export function deriveScript(
  descriptor: Descriptor,
  index: number | undefined,
  network: Network,
): DerivedScript {
  if (!descriptor.isRange && index !== undefined) {
    throw new NotARangeDescriptorError(descriptor.id);
  }
  if (descriptor.isRange) {
    if (index === undefined) {
      throw new ValidationError(`Range descriptor ${descriptor.id} needs a child index`);
    }
    if (!Number.isInteger(index) || index < 0 || index > MAX_CHILD_INDEX) {
      throw new ValidationError(`Child index ${index} is outside 0..${MAX_CHILD_INDEX}`);
    }
  }

  const resolved = descriptor.keys.map((key) => resolveKey(key, index, network));
  const pubkeys = resolved.map((key) => key.pubkey);
  const hints = resolved.flatMap((key) => (key.hint ? [key.hint] : []));

  const base = { descriptorId: descriptor.id, index, scriptType: descriptor.scriptType, hints };

  switch (descriptor.scriptType) {
    case 'pkh': {
      const { output, address } = requireScript(
        bitcoin.payments.p2pkh({ pubkey: pubkeys[0], network }),
        'p2pkh',
      );
      return { ...base, script: output, address };
    }
    case 'wpkh': {
      const { output, address } = requireScript(
        bitcoin.payments.p2wpkh({ pubkey: pubkeys[0], network }),
        'p2wpkh',
      );
      return { ...base, script: output, address };
    }
    case 'sh-wpkh': {
      const redeem = bitcoin.payments.p2wpkh({ pubkey: pubkeys[0], network });
      const { output, address } = requireScript(bitcoin.payments.p2sh({ redeem, network }), 'p2sh-p2wpkh');
      return { ...base, script: output, address, redeemScript: redeem.output };
    }
    case 'wsh-multi': {
      const multisig = multisigPayment(descriptor, pubkeys, network);
      const { output, address } = requireScript(
        bitcoin.payments.p2wsh({ redeem: multisig, network }),
        'p2wsh',
      );
      return { ...base, script: output, address, witnessScript: multisig.output };
    }
    case 'sh-wsh-multi': {
      const multisig = multisigPayment(descriptor, pubkeys, network);
      const wsh = bitcoin.payments.p2wsh({ redeem: multisig, network });
      const { output, address } = requireScript(
        bitcoin.payments.p2sh({ redeem: wsh, network }),
        'p2sh-p2wsh',
      );
      return { ...base, script: output, address, redeemScript: wsh.output, witnessScript: multisig.output };
    }
    case 'sh-multi': {
      const multisig = multisigPayment(descriptor, pubkeys, network);
      const { output, address } = requireScript(
        bitcoin.payments.p2sh({ redeem: multisig, network }),
        'p2sh',
      );
      return { ...base, script: output, address, redeemScript: multisig.output };
    }
  }
}

export function deriveFixed(descriptor: Descriptor, network: Network): DerivedScript {
  return deriveScript(descriptor, undefined, network);
}

/**
 * Descriptor text with the wildcard replaced by `index`, re-checksummed
 */
export function specialiseDescriptor(descriptor: Descriptor, index: number): string {
  if (!descriptor.isRange) {
    throw new NotARangeDescriptorError(descriptor.id);
  }
  if (!Number.isInteger(index) || index < 0 || index > MAX_CHILD_INDEX) {
    throw new ValidationError(`Child index ${index} is outside 0..${MAX_CHILD_INDEX}`);
  }
  return addChecksum(descriptor.body.replaceAll('/*', `/${index}`));
}

/**
 * Fingerprint identifying the signer behind a key
 */
export function keyFingerprint(key: DescriptorKey): string {
  if (key.origin) return key.origin.fingerprint;
  if (key.material.kind === 'xpub') {
    const network = key.material.network === 'mainnet' ? bitcoin.networks.bitcoin : bitcoin.networks.testnet;
    return Buffer.from(bip32.fromBase58(key.material.encoded, network).fingerprint).toString('hex');
  }
  return bitcoin.crypto.hash160(Buffer.from(key.material.hex, 'hex')).subarray(0, 4).toString('hex');
}

/**
 * Receive and change descriptors must describe the same wallet
 */
export function assertDescriptorPair(external: Descriptor, internal: Descriptor): void {
  if (external.scriptType !== internal.scriptType) {
    throw new DescriptorMismatchError(
      `script types differ (${external.scriptType} vs ${internal.scriptType})`,
    );
  }
  if (external.isRange !== internal.isRange) {
    throw new DescriptorMismatchError('one descriptor is ranged and the other is not');
  }
  if (external.multisig?.threshold !== internal.multisig?.threshold) {
    throw new DescriptorMismatchError('multisig thresholds differ');
  }

  const sorted = external.multisig?.sorted === true;
  const left = external.keys.map(keyFingerprint);
  const right = internal.keys.map(keyFingerprint);
  if (sorted) {
    left.sort();
    right.sort();
  }
  if (left.length !== right.length || left.some((fp, i) => fp !== right[i])) {
    throw new DescriptorMismatchError(
      `key origins differ ([${left.join(', ')}] vs [${right.join(', ')}])`,
    );
  }
}
