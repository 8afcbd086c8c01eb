/**
 * Output Script Descriptor Types
 */

import type { Buffer } from 'node:buffer';

/**
 * Spending policy of a descriptor, named after its script nesting
 */
export type DescriptorScriptType =
  | 'pkh'
  | 'wpkh'
  | 'sh-wpkh'
  | 'sh-multi'
  | 'wsh-multi'
  | 'sh-wsh-multi';

/**
 * Branch a range descriptor belongs to, read from the step before its wildcard
 */
export type DescriptorRole = 'external' | 'internal';

export interface PathStep {
  index: number;
  hardened: boolean;
}

export interface KeyOrigin {
  /** Master key fingerprint, 8 lowercase hex characters */
  fingerprint: string;
  path: readonly PathStep[];
}

export type KeyNetwork = 'mainnet' | 'testnet';

export type KeyMaterial =
  | { kind: 'pubkey'; hex: string; compressed: boolean }
  | { kind: 'xpub'; encoded: string; network: KeyNetwork };

export interface DescriptorKey {
  origin?: KeyOrigin;
  material: KeyMaterial;
  /** Unhardened steps applied after the extended key, wildcard excluded */
  path: readonly PathStep[];
  wildcard: boolean;
}

export interface MultisigPolicy {
  threshold: number;
  sorted: boolean;
}

export interface Descriptor {
  /** Descriptor text without the checksum */
  readonly body: string;
  readonly checksum: string;
  /** `body#checksum`; stable identity of the descriptor */
  readonly id: string;
  readonly scriptType: DescriptorScriptType;
  readonly keys: readonly DescriptorKey[];
  readonly multisig?: MultisigPolicy;
  readonly isRange: boolean;
  readonly role?: DescriptorRole;
}

export interface DescriptorParseOptions {
  /** Reject descriptors without a `#checksum` suffix (default true) */
  requireChecksum?: boolean;
}

/**
 * BIP32 origin of one key in a derived script, as written to PSBT fields
 */
export interface KeyDerivationHint {
  pubkey: Buffer;
  masterFingerprint: Buffer;
  /** `m/84'/1'/0'/0/5` notation */
  path: string;
}

export interface DerivedScript {
  descriptorId: string;
  /** Child index, absent for fixed descriptors */
  index?: number;
  scriptType: DescriptorScriptType;
  script: Buffer;
  address: string;
  redeemScript?: Buffer;
  witnessScript?: Buffer;
  hints: KeyDerivationHint[];
}
