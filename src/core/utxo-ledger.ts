/**
 * UTXO Ledger
 *
 * Scans the receive and change branches of a descriptor pair with a gap
 * limit and keeps the last complete result as an immutable snapshot. Sync
 * passes are serialized; a pass that fails leaves the previous snapshot in
 * place.
 */

import type { Buffer } from 'node:buffer';

import type { Network } from 'bitcoinjs-lib';

import { ValidationError } from '../errors/index.ts';
import { assertDescriptorPair, deriveScript } from '../descriptors/descriptor-deriver.ts';
import type { ChainSource, ScriptActivity } from '../interfaces/chain-source.interface.ts';
import type { DerivedScript, Descriptor } from '../interfaces/descriptor.interface.ts';
import type { BranchScan, LedgerOptions, LedgerSnapshot } from '../interfaces/ledger.interface.ts';
import type { StateStore } from '../interfaces/state-store.interface.ts';
import type { BalanceDetails, Branch, WalletUTXO } from '../interfaces/utxo.interface.ts';
import { outpointKey } from '../interfaces/utxo.interface.ts';
import { walletIdFor } from '../stores/wallet-id.ts';
import type { Logger } from '../utils/logger.ts';
import { noopLogger } from '../utils/logger.ts';

export const DEFAULT_GAP_LIMIT = 20;

export interface UTXOLedgerOptions extends LedgerOptions {
  network: Network;
  store?: StateStore;
  logger?: Logger;
}

interface BranchResult {
  scan: BranchScan;
  utxos: WalletUTXO[];
}

interface FoundOutput {
  derived: DerivedScript;
  activity: ScriptActivity;
}

export class UTXOLedger {
  private readonly network: Network;
  private readonly gapLimit: number;
  private readonly batchSize: number;
  private readonly store?: StateStore;
  private readonly walletId?: string;
  private readonly logger: Logger;

  private committed?: LedgerSnapshot;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private readonly chain: ChainSource, options: UTXOLedgerOptions) {
    this.network = options.network;
    this.gapLimit = options.gapLimit ?? DEFAULT_GAP_LIMIT;
    this.batchSize = options.batchSize ?? this.gapLimit;
    this.store = options.store;
    this.walletId = options.walletId;
    this.logger = options.logger ?? noopLogger;

    if (!Number.isInteger(this.gapLimit) || this.gapLimit < 1) {
      throw new ValidationError(`Gap limit must be a positive integer, got ${this.gapLimit}`);
    }
    if (!Number.isInteger(this.batchSize) || this.batchSize < 1) {
      throw new ValidationError(`Batch size must be a positive integer, got ${this.batchSize}`);
    }
  }

  /**
   * Last committed snapshot, if any pass has completed
   */
  current(): LedgerSnapshot | undefined {
    return this.committed;
  }

  /**
   * Run one sync pass; passes queue behind each other
   */
  sync(descriptor: Descriptor, changeDescriptor?: Descriptor): Promise<LedgerSnapshot> {
    const pass = this.queue.then(() => this.runSync(descriptor, changeDescriptor));
    // A failed pass must not block the ones queued after it; the caller sees the failure through `pass`
    this.queue = pass.catch((error: unknown) => {
      this.logger.debug?.('Sync pass failed', { error });
    });
    return pass;
  }

  /**
   * Adopt the stored snapshot for this descriptor pair when nothing is committed yet
   */
  async restore(descriptor: Descriptor, changeDescriptor?: Descriptor): Promise<LedgerSnapshot | undefined> {
    if (!this.store) return this.committed;
    if (this.committed) return this.committed;

    const stored = await this.store.load(this.walletId ?? walletIdFor(descriptor, changeDescriptor));
    if (
      stored &&
      stored.descriptorId === descriptor.id &&
      stored.changeDescriptorId === changeDescriptor?.id
    ) {
      this.committed = stored;
      this.logger.info('Restored ledger snapshot', {
        utxos: stored.utxos.size,
        syncedAt: stored.syncedAt,
      });
    }
    return this.committed;
  }

  balance(snapshot: LedgerSnapshot | undefined = this.committed): number {
    if (!snapshot) return 0;
    let total = 0;
    for (const utxo of snapshot.utxos.values()) {
      total += utxo.value;
    }
    return total;
  }

  balanceDetails(snapshot: LedgerSnapshot | undefined = this.committed): BalanceDetails {
    let confirmed = 0;
    let unconfirmed = 0;
    for (const utxo of snapshot?.utxos.values() ?? []) {
      if (utxo.height > 0) {
        confirmed += utxo.value;
      } else {
        unconfirmed += utxo.value;
      }
    }
    return { confirmed, unconfirmed, total: confirmed + unconfirmed };
  }

  /**
   * Unspent outputs ordered by txid, then vout
   */
  listUnspent(snapshot: LedgerSnapshot | undefined = this.committed): WalletUTXO[] {
    if (!snapshot) return [];
    return [...snapshot.utxos.values()].sort((a, b) => {
      if (a.txid !== b.txid) return a.txid < b.txid ? -1 : 1;
      return a.vout - b.vout;
    });
  }

  private async runSync(descriptor: Descriptor, changeDescriptor?: Descriptor): Promise<LedgerSnapshot> {
    if (changeDescriptor) {
      assertDescriptorPair(descriptor, changeDescriptor);
    }

    const tipHeight = await this.chain.getTipHeight();
    const [external, internal] = await Promise.all([
      this.scanBranch(descriptor, 'external', tipHeight),
      changeDescriptor ? this.scanBranch(changeDescriptor, 'internal', tipHeight) : undefined,
    ]);

    const utxos = new Map<string, WalletUTXO>();
    for (const utxo of [...external.utxos, ...(internal?.utxos ?? [])]) {
      utxos.set(outpointKey(utxo), Object.freeze(utxo));
    }

    const snapshot: LedgerSnapshot = Object.freeze({
      descriptorId: descriptor.id,
      changeDescriptorId: changeDescriptor?.id,
      utxos,
      branches: Object.freeze({ external: external.scan, internal: internal?.scan }),
      tipHeight,
      syncedAt: Date.now(),
    });

    if (this.store) {
      await this.store.save(this.walletId ?? walletIdFor(descriptor, changeDescriptor), snapshot);
    }

    const previous = this.committed;
    this.committed = snapshot;

    const added = [...utxos.keys()].filter((key) => !previous?.utxos.has(key)).length;
    const removed = previous ? [...previous.utxos.keys()].filter((key) => !utxos.has(key)).length : 0;
    this.logger.info('Ledger synced', {
      utxos: utxos.size,
      added,
      removed,
      balance: this.balance(snapshot),
      tipHeight,
    });

    return snapshot;
  }

  private async scanBranch(descriptor: Descriptor, branch: Branch, tipHeight: number): Promise<BranchResult> {
    if (!descriptor.isRange) {
      const derived = deriveScript(descriptor, undefined, this.network);
      const activity = await this.chain.fetch([derived.script]);
      const found = this.lookup(activity, derived);
      const used = found !== undefined && isUsed(found.activity);
      return {
        scan: {
          branch,
          lastUsedIndex: used ? 0 : -1,
          scannedThrough: 0,
          nextUnusedIndex: 0,
          usedIndices: used ? [0] : [],
        },
        utxos: found ? this.toWalletUTXOs(found, branch, tipHeight) : [],
      };
    }

    let lastUsed = -1;
    let next = 0;
    const usedIndices: number[] = [];
    const utxos: WalletUTXO[] = [];

    // The window end moves with every used index found
    while (next <= lastUsed + this.gapLimit) {
      const end = Math.min(next + this.batchSize - 1, lastUsed + this.gapLimit);
      const batch: DerivedScript[] = [];
      for (let index = next; index <= end; index++) {
        batch.push(deriveScript(descriptor, index, this.network));
      }

      this.logger.debug?.('Scanning branch batch', { branch, from: next, to: end });
      const activity = await this.chain.fetch(batch.map((derived) => derived.script));

      for (const derived of batch) {
        const found = this.lookup(activity, derived);
        if (!found || !isUsed(found.activity)) continue;

        const index = derived.index ?? 0;
        usedIndices.push(index);
        lastUsed = Math.max(lastUsed, index);
        utxos.push(...this.toWalletUTXOs(found, branch, tipHeight));
      }

      next = end + 1;
    }

    return {
      scan: {
        branch,
        lastUsedIndex: lastUsed,
        scannedThrough: next - 1,
        nextUnusedIndex: lastUsed + 1,
        usedIndices,
      },
      utxos,
    };
  }

  private lookup(activity: Map<string, ScriptActivity>, derived: DerivedScript): FoundOutput | undefined {
    const entry = activity.get(scriptKey(derived.script));
    return entry ? { derived, activity: entry } : undefined;
  }

  private toWalletUTXOs(found: FoundOutput, branch: Branch, tipHeight: number): WalletUTXO[] {
    return found.activity.utxos.map((unspent) => ({
      txid: unspent.txid,
      vout: unspent.vout,
      value: unspent.value,
      script: scriptKey(found.derived.script),
      address: found.derived.address,
      branch,
      index: found.derived.index,
      height: unspent.height,
      confirmations: unspent.height > 0 ? Math.max(0, tipHeight - unspent.height + 1) : 0,
    }));
  }
}

function isUsed(activity: ScriptActivity): boolean {
  return activity.used || activity.utxos.length > 0;
}

function scriptKey(script: Buffer): string {
  return script.toString('hex');
}
