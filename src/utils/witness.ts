/**
 * BIP-141 witness stack serialization
 */

import { Buffer } from 'node:buffer';

export function varIntLength(n: number): number {
  if (n < 0xfd) return 1;
  if (n <= 0xffff) return 3;
  if (n <= 0xffffffff) return 5;
  return 9;
}

function encodeVarInt(n: number): Buffer {
  if (n < 0xfd) {
    return Buffer.from([n]);
  }
  if (n <= 0xffff) {
    const buf = Buffer.alloc(3);
    buf[0] = 0xfd;
    buf.writeUInt16LE(n, 1);
    return buf;
  }
  if (n <= 0xffffffff) {
    const buf = Buffer.alloc(5);
    buf[0] = 0xfe;
    buf.writeUInt32LE(n, 1);
    return buf;
  }
  const buf = Buffer.alloc(9);
  buf[0] = 0xff;
  buf.writeBigUInt64LE(BigInt(n), 1);
  return buf;
}

/**
 * Serialize a witness stack into the finalScriptWitness field format
 */
export function witnessStackToScriptWitness(witness: Buffer[]): Buffer {
  const parts: Buffer[] = [encodeVarInt(witness.length)];
  for (const item of witness) {
    parts.push(encodeVarInt(item.length), item);
  }
  return Buffer.concat(parts);
}
