/**
 * Descriptor Checksum
 *
 * BCH code over the descriptor body, eight characters from the bech32
 * alphabet. A single substituted character always changes the checksum.
 */

import { InvalidChecksumError } from '../errors/index.ts';

const INPUT_CHARSET =
  "0123456789()[],'/*abcdefgh@:$%{}IJKLMNOPQRSTUVWXYZ&+-.;<=>?!^_|~ijklmnopqrstuvwxyzABCDEFGH`#\"\\ ";

const CHECKSUM_CHARSET = 'qpzry9x8gf2tvdw0s3jn54khce6mua7l';

const GENERATOR = [0xf5dee51989n, 0xa9fdca3312n, 0x1bab10e32dn, 0x3706b1677an, 0x644d626ffdn];

export const CHECKSUM_LENGTH = 8;

function polymod(symbols: number[]): bigint {
  let chk = 1n;
  for (const value of symbols) {
    const top = chk >> 35n;
    chk = ((chk & 0x7ffffffffn) << 5n) ^ BigInt(value);
    for (let i = 0; i < GENERATOR.length; i++) {
      if ((top >> BigInt(i)) & 1n) {
        chk ^= GENERATOR[i];
      }
    }
  }
  return chk;
}

/**
 * Map each character to its low five bits, and every group of three
 * characters to one extra symbol built from their high bits
 */
function expand(body: string): number[] {
  const symbols: number[] = [];
  const groups: number[] = [];

  for (const ch of body) {
    const position = INPUT_CHARSET.indexOf(ch);
    if (position === -1) {
      throw new InvalidChecksumError(`character ${JSON.stringify(ch)} is not allowed in a descriptor`);
    }
    symbols.push(position & 31);
    groups.push(position >> 5);
    if (groups.length === 3) {
      symbols.push(groups[0] * 9 + groups[1] * 3 + groups[2]);
      groups.length = 0;
    }
  }

  if (groups.length === 1) {
    symbols.push(groups[0]);
  } else if (groups.length === 2) {
    symbols.push(groups[0] * 3 + groups[1]);
  }

  return symbols;
}

/**
 * Checksum of a descriptor body (the text before `#`)
 */
export function descriptorChecksum(body: string): string {
  const symbols = expand(body);
  for (let i = 0; i < CHECKSUM_LENGTH; i++) symbols.push(0);

  const value = polymod(symbols) ^ 1n;
  let checksum = '';
  for (let i = 0; i < CHECKSUM_LENGTH; i++) {
    checksum += CHECKSUM_CHARSET[Number((value >> BigInt(5 * (CHECKSUM_LENGTH - 1 - i))) & 31n)];
  }
  return checksum;
}

export function addChecksum(body: string): string {
  return `${body}#${descriptorChecksum(body)}`;
}

/**
 * Split `body#checksum` and verify it; returns the body and the checksum in use
 */
export function verifyChecksum(
  text: string,
  requireChecksum = true,
): { body: string; checksum: string } {
  const hash = text.indexOf('#');

  if (hash === -1) {
    if (requireChecksum) {
      throw new InvalidChecksumError('missing checksum');
    }
    return { body: text, checksum: descriptorChecksum(text) };
  }

  const body = text.slice(0, hash);
  const actual = text.slice(hash + 1);

  if (actual.length === 0) {
    throw new InvalidChecksumError('empty checksum after #');
  }
  if (actual.length !== CHECKSUM_LENGTH) {
    throw new InvalidChecksumError(
      `expected ${CHECKSUM_LENGTH} characters, got ${actual.length}`,
      undefined,
      actual,
    );
  }

  const expected = descriptorChecksum(body);
  if (expected !== actual) {
    throw new InvalidChecksumError(`expected ${expected}, got ${actual}`, expected, actual);
  }

  return { body, checksum: actual };
}
