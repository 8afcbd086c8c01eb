/**
 * State Store Tests
 */

import { promises as fs } from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { parseDescriptor } from '../../../src/descriptors/descriptor-parser.ts';
import { ParseError } from '../../../src/errors/index.ts';
import type { LedgerSnapshot } from '../../../src/interfaces/ledger.interface.ts';
import type { WalletUTXO } from '../../../src/interfaces/utxo.interface.ts';
import {
  createStateStore,
  decodeSnapshot,
  encodeSnapshot,
  FileStateStore,
  MemoryStateStore,
  walletIdFor,
} from '../../../src/stores/index.ts';
import { singleKeyWallet } from '../../fixtures/wallet-fixtures.ts';

const utxo: WalletUTXO = {
  txid: 'ab'.repeat(32),
  vout: 1,
  value: 15000,
  script: '0014' + '11'.repeat(20),
  address: 'tb1qzyg3zyg3zyg3zyg3zyg3zyg3zyg3zyg3d2pwkv',
  branch: 'external',
  index: 3,
  height: 90,
  confirmations: 11,
};

function makeSnapshot(): LedgerSnapshot {
  return {
    descriptorId: 'wpkh(a)#aaaaaaaa',
    changeDescriptorId: 'wpkh(b)#bbbbbbbb',
    utxos: new Map([[`${utxo.txid}:${utxo.vout}`, utxo]]),
    branches: {
      external: { branch: 'external', lastUsedIndex: 3, scannedThrough: 23, nextUnusedIndex: 4, usedIndices: [0, 3] },
      internal: { branch: 'internal', lastUsedIndex: -1, scannedThrough: 19, nextUnusedIndex: 0, usedIndices: [] },
    },
    tipHeight: 100,
    syncedAt: 1_700_000_000_000,
  };
}

describe('MemoryStateStore', () => {
  it('should return what was saved', async () => {
    const store = new MemoryStateStore();
    const snapshot = makeSnapshot();

    expect(await store.load('wallet')).toBeUndefined();
    await store.save('wallet', snapshot);
    expect(await store.load('wallet')).toBe(snapshot);

    store.clear();
    expect(await store.load('wallet')).toBeUndefined();
  });
});

describe('FileStateStore', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'watch-wallet-'));
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  it('should persist snapshots as JSON and read them back', async () => {
    const store = new FileStateStore(directory);
    const snapshot = makeSnapshot();

    await store.save('0123456789abcdef', snapshot);
    const loaded = await store.load('0123456789abcdef');

    expect(loaded).toEqual(snapshot);
    const files = await fs.readdir(directory);
    expect(files).toEqual(['0123456789abcdef.json']);
  });

  it('should create the directory on first save', async () => {
    const nested = path.join(directory, 'state', 'wallets');
    await new FileStateStore(nested).save('w1', makeSnapshot());
    expect(await fs.readdir(nested)).toEqual(['w1.json']);
  });

  it('should return undefined for an unknown wallet', async () => {
    expect(await new FileStateStore(directory).load('missing')).toBeUndefined();
  });

  it('should reject corrupted files', async () => {
    await fs.writeFile(path.join(directory, 'broken.json'), '{ not json', 'utf-8');
    await expect(new FileStateStore(directory).load('broken')).rejects.toThrow(ParseError);
  });

  it('should refuse wallet ids that are not plain names', () => {
    expect(() => new FileStateStore(directory).filePath('../escape')).toThrow('Invalid wallet id "../escape"');
  });
});

describe('snapshot encoding', () => {
  it('should flatten the UTXO map and tag the format version', () => {
    const encoded = encodeSnapshot(makeSnapshot());
    expect(encoded.version).toBe(1);
    expect(encoded.utxos).toEqual([utxo]);
  });

  it('should decode what it encoded', () => {
    const snapshot = makeSnapshot();
    const decoded = decodeSnapshot(JSON.parse(JSON.stringify(encodeSnapshot(snapshot))));
    expect(decoded).toEqual(snapshot);
    expect(Object.isFrozen(decoded)).toBe(true);
  });

  it('should name the first invalid field', () => {
    const encoded = encodeSnapshot(makeSnapshot());
    expect(() => decodeSnapshot({ ...encoded, version: 2 })).toThrow('Stored snapshot is invalid: unsupported version 2');
    expect(() => decodeSnapshot({ ...encoded, tipHeight: -1 })).toThrow('Stored snapshot is invalid: tipHeight');
    expect(() => decodeSnapshot({ ...encoded, utxos: [{ ...utxo, txid: 'xyz' }] }))
      .toThrow('Stored snapshot is invalid: utxo entry');
    expect(() => decodeSnapshot('snapshot')).toThrow('Stored snapshot is invalid: not an object');
  });
});

describe('createStateStore', () => {
  it('should build the configured store', () => {
    expect(createStateStore({ type: 'memory' })).toBeInstanceOf(MemoryStateStore);
    expect(createStateStore({ type: 'file', path: '/tmp/state' })).toBeInstanceOf(FileStateStore);
  });
});

describe('walletIdFor', () => {
  const wallet = singleKeyWallet('wpkh');
  const descriptor = parseDescriptor(wallet.external);
  const change = parseDescriptor(wallet.internal);

  it('should give 16 hex characters that depend on the change descriptor', () => {
    const single = walletIdFor(descriptor);
    const pair = walletIdFor(descriptor, change);

    expect(single).toMatch(/^[0-9a-f]{16}$/);
    expect(pair).toMatch(/^[0-9a-f]{16}$/);
    expect(pair).not.toBe(single);
    expect(walletIdFor(parseDescriptor(wallet.external), parseDescriptor(wallet.internal))).toBe(pair);
  });
});
