/**
 * Descriptor Parser
 *
 * Reads pkh, wpkh, sh(wpkh), wsh(multi), sh(wsh(multi)) and sh(multi)
 * descriptors, with `sortedmulti` accepted wherever `multi` is. Keys are raw
 * hex public keys or xpub/tpub extended keys, each with an optional
 * `[fingerprint/path]` origin and an unhardened `/path/*` suffix.
 */

import { Buffer } from 'node:buffer';

import * as bitcoin from 'bitcoinjs-lib';

import { MalformedDescriptorError } from '../errors/index.ts';
import type {
  Descriptor,
  DescriptorKey,
  DescriptorParseOptions,
  DescriptorRole,
  DescriptorScriptType,
  KeyMaterial,
  KeyOrigin,
  MultisigPolicy,
  PathStep,
} from '../interfaces/descriptor.interface.ts';
import { bip32, ecc } from '../utils/ecc.ts';
import { verifyChecksum } from './checksum.ts';

const HARDENED_OFFSET = 0x80000000;

/** P2SH redeem scripts are capped at 520 bytes, which fits 15 compressed keys */
const MAX_P2SH_MULTISIG_KEYS = 15;
const MAX_MULTISIG_KEYS = 16;

interface ParsedBody {
  scriptType: DescriptorScriptType;
  keys: DescriptorKey[];
  multisig?: MultisigPolicy;
}

/**
 * Cursor over a descriptor body
 */
class DescriptorReader {
  private pos = 0;

  constructor(private readonly body: string) {}

  read(): ParsedBody {
    const parsed = this.readScript();
    if (this.pos !== this.body.length) {
      this.fail(`unexpected trailing text "${this.body.slice(this.pos)}"`);
    }
    return parsed;
  }

  private readScript(): ParsedBody {
    if (this.consume('pkh(')) {
      const key = this.readKey(false);
      this.expect(')');
      return { scriptType: 'pkh', keys: [key] };
    }

    if (this.consume('wpkh(')) {
      const key = this.readKey(true);
      this.expect(')');
      return { scriptType: 'wpkh', keys: [key] };
    }

    if (this.consume('wsh(')) {
      const { keys, multisig } = this.readMulti(true, MAX_MULTISIG_KEYS);
      this.expect(')');
      return { scriptType: 'wsh-multi', keys, multisig };
    }

    if (this.consume('sh(')) {
      if (this.consume('wpkh(')) {
        const key = this.readKey(true);
        this.expect('))');
        return { scriptType: 'sh-wpkh', keys: [key] };
      }
      if (this.consume('wsh(')) {
        const { keys, multisig } = this.readMulti(true, MAX_MULTISIG_KEYS);
        this.expect('))');
        return { scriptType: 'sh-wsh-multi', keys, multisig };
      }
      const { keys, multisig } = this.readMulti(false, MAX_P2SH_MULTISIG_KEYS);
      this.expect(')');
      return { scriptType: 'sh-multi', keys, multisig };
    }

    const open = this.body.indexOf('(', this.pos);
    const name = open === -1 ? this.body.slice(this.pos) : this.body.slice(this.pos, open);
    return this.fail(`unsupported script type "${name}"`);
  }

  private readMulti(witness: boolean, maxKeys: number): { keys: DescriptorKey[]; multisig: MultisigPolicy } {
    let sorted: boolean;
    if (this.consume('multi(')) {
      sorted = false;
    } else if (this.consume('sortedmulti(')) {
      sorted = true;
    } else {
      return this.fail('expected multi( or sortedmulti(');
    }

    const threshold = this.readNumber('multisig threshold');
    const keys: DescriptorKey[] = [];
    while (this.consume(',')) {
      keys.push(this.readKey(witness));
    }
    this.expect(')');

    if (keys.length === 0) {
      this.fail('multisig needs at least one key');
    }
    if (keys.length > maxKeys) {
      this.fail(`multisig supports at most ${maxKeys} keys here, got ${keys.length}`);
    }
    if (threshold < 1 || threshold > keys.length) {
      this.fail(`multisig threshold ${threshold} is outside 1..${keys.length}`);
    }

    return { keys, multisig: { threshold, sorted } };
  }

  private readKey(witness: boolean): DescriptorKey {
    const origin = this.peek() === '[' ? this.readOrigin() : undefined;
    const material = this.readKeyMaterial(witness);

    const path: PathStep[] = [];
    let wildcard = false;

    while (this.consume('/')) {
      if (material.kind === 'pubkey') {
        this.fail('derivation steps need an extended public key');
      }
      if (wildcard) {
        this.fail('the wildcard must be the last derivation step');
      }
      if (this.consume('*')) {
        if (this.peek() === "'" || this.peek() === 'h') {
          this.fail('hardened wildcard cannot be derived from a public key');
        }
        wildcard = true;
        continue;
      }
      const step = this.readStep();
      if (step.hardened) {
        this.fail('hardened derivation step after an extended public key');
      }
      path.push(step);
    }

    return { origin, material, path, wildcard };
  }

  private readOrigin(): KeyOrigin {
    this.expect('[');
    const fingerprint = this.body.slice(this.pos, this.pos + 8);
    if (!/^[0-9a-fA-F]{8}$/.test(fingerprint)) {
      this.fail('key origin fingerprint must be 8 hex characters');
    }
    this.pos += 8;

    const path: PathStep[] = [];
    while (this.consume('/')) {
      path.push(this.readStep());
    }
    this.expect(']');

    return { fingerprint: fingerprint.toLowerCase(), path };
  }

  private readKeyMaterial(witness: boolean): KeyMaterial {
    const start = this.pos;
    while (this.pos < this.body.length && !',)/'.includes(this.body[this.pos])) {
      this.pos++;
    }
    const token = this.body.slice(start, this.pos);

    if (/^0[23][0-9a-fA-F]{64}$/.test(token) || /^04[0-9a-fA-F]{128}$/.test(token)) {
      const compressed = token.length === 66;
      if (!compressed && witness) {
        this.fail('uncompressed keys are not allowed in segwit scripts', start);
      }
      if (!ecc.isPoint(Buffer.from(token, 'hex'))) {
        this.fail('public key is not a valid curve point', start);
      }
      return { kind: 'pubkey', hex: token.toLowerCase(), compressed };
    }

    if (token.startsWith('xpub') || token.startsWith('tpub')) {
      const network = token.startsWith('xpub') ? 'mainnet' : 'testnet';
      try {
        bip32.fromBase58(token, network === 'mainnet' ? bitcoin.networks.bitcoin : bitcoin.networks.testnet);
      } catch (error) {
        this.fail(
          `invalid extended public key: ${error instanceof Error ? error.message : String(error)}`,
          start,
        );
      }
      return { kind: 'xpub', encoded: token, network };
    }

    return this.fail(token.length === 0 ? 'missing key' : `unrecognised key "${token}"`, start);
  }

  private readStep(): PathStep {
    const index = this.readNumber('derivation index');
    if (index >= HARDENED_OFFSET) {
      this.fail(`derivation index ${index} is out of range`);
    }
    const hardened = this.consume("'") || this.consume('h');
    return { index, hardened };
  }

  private readNumber(what: string): number {
    const match = /^\d+/.exec(this.body.slice(this.pos));
    if (!match) {
      const next = this.peek();
      if (next === "'" || next === 'h') {
        return this.fail('hardened marker must follow a number');
      }
      return this.fail(`expected ${what}`);
    }
    this.pos += match[0].length;
    const value = Number(match[0]);
    if (!Number.isSafeInteger(value)) {
      this.fail(`${what} is too large`);
    }
    return value;
  }

  private peek(): string | undefined {
    return this.body[this.pos];
  }

  private consume(token: string): boolean {
    if (this.body.startsWith(token, this.pos)) {
      this.pos += token.length;
      return true;
    }
    return false;
  }

  private expect(token: string): void {
    if (!this.consume(token)) {
      this.fail(`expected "${token}"`);
    }
  }

  private fail(message: string, at = this.pos): never {
    throw new MalformedDescriptorError(`${message} at position ${at}`, this.body);
  }
}

function roleOf(keys: DescriptorKey[]): DescriptorRole | undefined {
  const roles = keys.map((key): DescriptorRole | undefined => {
    const last = key.path[key.path.length - 1];
    if (!key.wildcard || !last) return undefined;
    if (last.index === 0) return 'external';
    if (last.index === 1) return 'internal';
    return undefined;
  });
  const first = roles[0];
  return roles.every((role) => role === first) ? first : undefined;
}

/**
 * Parse and checksum-verify a descriptor string
 */
export function parseDescriptor(text: string, options: DescriptorParseOptions = {}): Descriptor {
  const { body, checksum } = verifyChecksum(text.trim(), options.requireChecksum ?? true);
  const parsed = new DescriptorReader(body).read();

  const ranges = parsed.keys.filter((key) => key.wildcard).length;
  if (ranges !== 0 && ranges !== parsed.keys.length) {
    throw new MalformedDescriptorError('cannot mix ranged and fixed keys', body);
  }

  const keys = parsed.keys.map((key) =>
    Object.freeze({
      ...key,
      origin: key.origin ? Object.freeze({ ...key.origin }) : undefined,
    })
  );

  return Object.freeze({
    body,
    checksum,
    id: `${body}#${checksum}`,
    scriptType: parsed.scriptType,
    keys: Object.freeze(keys),
    multisig: parsed.multisig ? Object.freeze({ ...parsed.multisig }) : undefined,
    isRange: ranges > 0,
    role: roleOf(parsed.keys),
  });
}

export function formatPath(steps: readonly PathStep[]): string {
  return ['m', ...steps.map((step) => `${step.index}${step.hardened ? "'" : ''}`)].join('/');
}
