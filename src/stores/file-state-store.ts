/**
 * File State Store
 * One JSON document per wallet id, replaced atomically on every save
 */

import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import process from 'node:process';

import { ParseError } from '../errors/index.ts';
import type { BranchScan, LedgerSnapshot } from '../interfaces/ledger.interface.ts';
import type { StateStore } from '../interfaces/state-store.interface.ts';
import type { Branch, WalletUTXO } from '../interfaces/utxo.interface.ts';
import { outpointKey } from '../interfaces/utxo.interface.ts';
import { isNonNegativeInteger, isRecord, isTxid } from '../utils/type-guards.ts';

const FORMAT_VERSION = 1;

export interface StoredSnapshot {
  version: number;
  descriptorId: string;
  changeDescriptorId?: string;
  utxos: WalletUTXO[];
  branches: { external: BranchScan; internal?: BranchScan };
  tipHeight: number;
  syncedAt: number;
}

export class FileStateStore implements StateStore {
  constructor(private readonly directory: string) {}

  filePath(walletId: string): string {
    if (!/^[0-9a-zA-Z_-]+$/.test(walletId)) {
      throw new ParseError(`Invalid wallet id "${walletId}"`);
    }
    return path.join(this.directory, `${walletId}.json`);
  }

  async load(walletId: string): Promise<LedgerSnapshot | undefined> {
    const file = this.filePath(walletId);
    let content: string;
    try {
      content = await fs.readFile(file, 'utf-8');
    } catch (error) {
      if (isRecord(error) && error.code === 'ENOENT') return undefined;
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new ParseError(`Stored snapshot ${file} is not valid JSON: ${String(error)}`);
    }
    return decodeSnapshot(parsed, file);
  }

  async save(walletId: string, snapshot: LedgerSnapshot): Promise<void> {
    const file = this.filePath(walletId);
    await fs.mkdir(this.directory, { recursive: true });

    const temp = `${file}.${process.pid}.tmp`;
    await fs.writeFile(temp, JSON.stringify(encodeSnapshot(snapshot), null, 2), 'utf-8');
    await fs.rename(temp, file);
  }
}

export function encodeSnapshot(snapshot: LedgerSnapshot): StoredSnapshot {
  return {
    version: FORMAT_VERSION,
    descriptorId: snapshot.descriptorId,
    changeDescriptorId: snapshot.changeDescriptorId,
    utxos: [...snapshot.utxos.values()],
    branches: snapshot.branches,
    tipHeight: snapshot.tipHeight,
    syncedAt: snapshot.syncedAt,
  };
}

export function decodeSnapshot(value: unknown, source = 'snapshot'): LedgerSnapshot {
  const fail = (what: string): never => {
    throw new ParseError(`Stored ${source} is invalid: ${what}`);
  };

  if (!isRecord(value)) return fail('not an object');
  if (value.version !== FORMAT_VERSION) return fail(`unsupported version ${String(value.version)}`);
  if (typeof value.descriptorId !== 'string') return fail('descriptorId');
  if (value.changeDescriptorId !== undefined && typeof value.changeDescriptorId !== 'string') {
    return fail('changeDescriptorId');
  }
  if (!isNonNegativeInteger(value.tipHeight)) return fail('tipHeight');
  if (!isNonNegativeInteger(value.syncedAt)) return fail('syncedAt');
  if (!Array.isArray(value.utxos)) return fail('utxos');
  if (!isRecord(value.branches)) return fail('branches');

  const utxos = new Map<string, WalletUTXO>();
  for (const entry of value.utxos) {
    const utxo = decodeUtxo(entry) ?? fail('utxo entry');
    utxos.set(outpointKey(utxo), Object.freeze(utxo));
  }

  const external = decodeBranch(value.branches.external) ?? fail('external branch');
  const internal = value.branches.internal === undefined
    ? undefined
    : decodeBranch(value.branches.internal) ?? fail('internal branch');

  return Object.freeze({
    descriptorId: value.descriptorId,
    changeDescriptorId: value.changeDescriptorId,
    utxos,
    branches: Object.freeze({ external, internal }),
    tipHeight: value.tipHeight,
    syncedAt: value.syncedAt,
  });
}

function isBranch(value: unknown): value is Branch {
  return value === 'external' || value === 'internal';
}

function decodeUtxo(value: unknown): WalletUTXO | undefined {
  if (!isRecord(value)) return undefined;
  const { txid, vout, value: amount, script, address, branch, index, height, confirmations } = value;
  if (
    !isTxid(txid) ||
    !isNonNegativeInteger(vout) ||
    !isNonNegativeInteger(amount) ||
    typeof script !== 'string' ||
    typeof address !== 'string' ||
    !isBranch(branch) ||
    (index !== undefined && !isNonNegativeInteger(index)) ||
    !isNonNegativeInteger(height) ||
    !isNonNegativeInteger(confirmations)
  ) {
    return undefined;
  }
  return { txid, vout, value: amount, script, address, branch, index, height, confirmations };
}

function decodeBranch(value: unknown): BranchScan | undefined {
  if (!isRecord(value)) return undefined;
  const { branch, lastUsedIndex, scannedThrough, nextUnusedIndex, usedIndices } = value;
  if (
    !isBranch(branch) ||
    typeof lastUsedIndex !== 'number' ||
    !Number.isInteger(lastUsedIndex) ||
    lastUsedIndex < -1 ||
    !isNonNegativeInteger(scannedThrough) ||
    !isNonNegativeInteger(nextUnusedIndex) ||
    !Array.isArray(usedIndices)
  ) {
    return undefined;
  }
  const indices: number[] = [];
  for (const used of usedIndices) {
    if (!isNonNegativeInteger(used)) return undefined;
    indices.push(used);
  }
  return { branch, lastUsedIndex, scannedThrough, nextUnusedIndex, usedIndices: indices };
}
