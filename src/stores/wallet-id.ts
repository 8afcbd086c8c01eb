import * as bitcoin from 'bitcoinjs-lib';
import { Buffer } from 'node:buffer';

import type { Descriptor } from '../interfaces/descriptor.interface.ts';

/**
 * Stable storage key for a descriptor pair: first 16 hex chars of sha256
 * over the descriptor ids
 */
export function walletIdFor(descriptor: Descriptor, changeDescriptor?: Descriptor): string {
  const material = changeDescriptor ? `${descriptor.id}|${changeDescriptor.id}` : descriptor.id;
  return bitcoin.crypto.sha256(Buffer.from(material, 'utf8')).toString('hex').slice(0, 16);
}
