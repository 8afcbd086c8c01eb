/**
 * Watch-only Wallet
 *
 * Serves the four wallet commands on top of the ledger, builder, codec and
 * finalizer. Each command parses its descriptors before any I/O and runs a
 * fresh sync; nothing carries over between invocations except what the
 * configured state store keeps.
 */

import { Transaction } from 'bitcoinjs-lib';
import type { Network, Psbt } from 'bitcoinjs-lib';

import type { WalletConfig } from '../config/wallet-config.ts';
import {
  assertDescriptorPair,
  deriveFixed,
  deriveScript,
  keyFingerprint,
  MAX_CHILD_INDEX,
  specialiseDescriptor,
} from '../descriptors/descriptor-deriver.ts';
import { parseDescriptor } from '../descriptors/descriptor-parser.ts';
import { ValidationError } from '../errors/index.ts';
import type { ChainSource } from '../interfaces/chain-source.interface.ts';
import type {
  BalanceCommand,
  BalanceResult,
  BroadcastCommand,
  BroadcastResult,
  ReceiveCommand,
  ReceiveResult,
  SendCommand,
  SendResult,
  WalletCommand,
  WalletCommandResult,
} from '../interfaces/command.interface.ts';
import type { Descriptor, DescriptorParseOptions } from '../interfaces/descriptor.interface.ts';
import type { LedgerSnapshot } from '../interfaces/ledger.interface.ts';
import type { SelectorAlgorithm } from '../interfaces/selector.interface.ts';
import type { StateStore } from '../interfaces/state-store.interface.ts';
import { ElectrumChainSource } from '../providers/electrum-chain-source.ts';
import { createSelector } from '../selectors/selector-factory.ts';
import { createStateStore } from '../stores/index.ts';
import type { Logger } from '../utils/logger.ts';
import { noopLogger } from '../utils/logger.ts';
import { toBitcoinNetwork } from '../utils/networks.ts';
import { fromBase64, isFinalizedInput, toBase64 } from './psbt-codec.ts';
import { PSBTFinalizer } from './psbt-finalizer.ts';
import { TransactionBuilder } from './transaction-builder.ts';
import { UTXOLedger } from './utxo-ledger.ts';

/** Confirmation target used when a send gives no fee rate */
export const DEFAULT_FEE_TARGET_BLOCKS = 6;

export interface WatchOnlyWalletOptions {
  network: Network;
  chain: ChainSource;
  store?: StateStore;
  gapLimit?: number;
  batchSize?: number;
  selector?: SelectorAlgorithm;
  enableRbf?: boolean;
  descriptorOptions?: DescriptorParseOptions;
  logger?: Logger;
}

export class WatchOnlyWallet {
  private readonly network: Network;
  private readonly chain: ChainSource;
  private readonly options: WatchOnlyWalletOptions;
  private readonly finalizer: PSBTFinalizer;
  private readonly logger: Logger;

  constructor(options: WatchOnlyWalletOptions) {
    this.options = options;
    this.network = options.network;
    this.chain = options.chain;
    this.logger = options.logger ?? noopLogger;
    this.finalizer = new PSBTFinalizer({ logger: this.logger });
  }

  /**
   * Wallet wired from configuration: Electrum chain source and the configured store
   */
  static fromConfig(config: WalletConfig, overrides: { chain?: ChainSource; logger?: Logger } = {}): WatchOnlyWallet {
    const network = toBitcoinNetwork(config.network);
    const logger = overrides.logger ?? noopLogger;
    const chain = overrides.chain ?? new ElectrumChainSource({
      network,
      endpoint: config.electrum,
      timeout: config.requestTimeout,
      retries: config.retries,
      retryDelay: config.retryDelay,
      maxRetryDelay: config.maxRetryDelay,
      logger,
    });

    return new WatchOnlyWallet({
      network,
      chain,
      store: createStateStore(config.store),
      gapLimit: config.gapLimit,
      batchSize: config.batchSize,
      selector: config.selector,
      enableRbf: config.enableRbf,
      logger,
    });
  }

  async balance(command: Omit<BalanceCommand, 'kind'>): Promise<BalanceResult> {
    const { descriptor, changeDescriptor } = this.parsePair(command.descriptor, command.changeDescriptor);
    const ledger = this.createLedger();
    const snapshot = await ledger.sync(descriptor, changeDescriptor);

    return {
      kind: 'balance',
      balance: ledger.balanceDetails(snapshot),
      utxos: ledger.listUnspent(snapshot),
    };
  }

  /**
   * Address at `index`; pure derivation, no chain access
   */
  receive(command: Omit<ReceiveCommand, 'kind'>): ReceiveResult {
    const descriptor = this.parse(command.descriptor);
    const derivedDescriptor = specialiseDescriptor(descriptor, command.index);
    const derived = deriveScript(descriptor, command.index, this.network);

    return {
      kind: 'receive',
      descriptor: descriptor.id,
      derivedDescriptor,
      index: command.index,
      address: derived.address,
    };
  }

  async send(command: Omit<SendCommand, 'kind'>): Promise<SendResult> {
    const { descriptor, changeDescriptor } = this.parsePair(command.descriptor, command.changeDescriptor);
    const snapshot = await this.createLedger().sync(descriptor, changeDescriptor);
    const feeRate = command.feeRate ?? await this.estimateFeeRate();

    const builder = new TransactionBuilder({
      network: this.network,
      chain: this.chain,
      selector: createSelector(this.options.selector),
      logger: this.logger,
    });
    const result = await builder.build({
      snapshot,
      descriptor,
      changeDescriptor,
      recipients: command.recipients,
      feeRate,
      enableRbf: command.enableRbf ?? this.options.enableRbf,
    });

    return {
      kind: 'send',
      psbt: toBase64(result.psbt),
      unsignedTxid: result.unsignedTxid,
      sent: command.recipients.reduce((sum, recipient) => sum + recipient.value, 0),
      fee: result.fee,
      feeRate,
      vsize: result.vsize,
      change: result.change,
    };
  }

  async broadcast(command: Omit<BroadcastCommand, 'kind'>): Promise<BroadcastResult> {
    const { descriptor, changeDescriptor } = this.parsePair(command.descriptor, command.changeDescriptor);
    const psbt = fromBase64(command.psbt, this.network);

    await this.assertOwnership(psbt, descriptor, changeDescriptor);

    const finalized = this.finalizer.finalize(psbt);
    const transaction = this.finalizer.extract(finalized);
    const txid = await this.chain.submit(transaction.hex);

    if (txid !== transaction.txid) {
      this.logger.warn('Chain source reported a different txid', { expected: transaction.txid, reported: txid });
    }
    return { kind: 'broadcast', txid, transaction };
  }

  /**
   * Last snapshot the store holds for a descriptor pair, without syncing
   */
  async storedSnapshot(descriptorText: string, changeText?: string): Promise<LedgerSnapshot | undefined> {
    const { descriptor, changeDescriptor } = this.parsePair(descriptorText, changeText);
    return this.createLedger().restore(descriptor, changeDescriptor);
  }

  close(): Promise<void> {
    return this.chain.close();
  }

  /**
   * Every non-final input must spend a script one of the descriptors derives.
   * Fixed descriptors are checked directly, ranged ones at the index their
   * BIP32 hint names; inputs left unresolved are matched against a fresh sync.
   */
  private async assertOwnership(psbt: Psbt, descriptor: Descriptor, changeDescriptor?: Descriptor): Promise<void> {
    const descriptors = changeDescriptor ? [descriptor, changeDescriptor] : [descriptor];
    const unresolved: Array<{ index: number; script?: string }> = [];

    psbt.data.inputs.forEach((input, index) => {
      if (isFinalizedInput(input)) return;
      const script = previousOutputScript(psbt, index);
      if (script === undefined) {
        unresolved.push({ index });
        return;
      }
      const owned = descriptors.some((candidate) =>
        candidateScripts(candidate, hintedIndices(candidate, input.bip32Derivation ?? []), this.network)
          .includes(script)
      );
      if (!owned) unresolved.push({ index, script });
    });

    if (unresolved.length === 0) return;

    let ledgerScripts = new Set<string>();
    if (descriptors.some((candidate) => candidate.isRange)) {
      this.logger.debug?.('Resolving PSBT inputs through a sync', { inputs: unresolved.map((entry) => entry.index) });
      const ledger = this.createLedger();
      const snapshot = await ledger.sync(descriptor, changeDescriptor);
      ledgerScripts = new Set(ledger.listUnspent(snapshot).map((utxo) => utxo.script));
    }

    const foreign = unresolved.find((entry) => entry.script === undefined || !ledgerScripts.has(entry.script));
    if (foreign) {
      throw new ValidationError(`PSBT input ${foreign.index} does not belong to descriptor ${descriptor.id}`);
    }
  }

  private async estimateFeeRate(): Promise<number> {
    const rate = await this.chain.estimateFeeRate?.(DEFAULT_FEE_TARGET_BLOCKS);
    if (rate === undefined) {
      throw new ValidationError('No fee rate given and the chain source has no estimate');
    }
    this.logger.info('Using estimated fee rate', { feeRate: rate, targetBlocks: DEFAULT_FEE_TARGET_BLOCKS });
    return rate;
  }

  private createLedger(): UTXOLedger {
    return new UTXOLedger(this.chain, {
      network: this.network,
      gapLimit: this.options.gapLimit,
      batchSize: this.options.batchSize,
      store: this.options.store,
      logger: this.logger,
    });
  }

  private parse(text: string): Descriptor {
    return parseDescriptor(text, this.options.descriptorOptions);
  }

  private parsePair(text: string, changeText?: string): { descriptor: Descriptor; changeDescriptor?: Descriptor } {
    const descriptor = this.parse(text);
    const changeDescriptor = changeText === undefined ? undefined : this.parse(changeText);
    if (changeDescriptor) {
      assertDescriptorPair(descriptor, changeDescriptor);
    }
    return { descriptor, changeDescriptor };
  }
}

type Bip32Entry = NonNullable<Psbt['data']['inputs'][number]['bip32Derivation']>[number];

/**
 * scriptPubKey hex of the output an input spends
 */
function previousOutputScript(psbt: Psbt, index: number): string | undefined {
  const input = psbt.data.inputs[index];
  if (input.witnessUtxo) {
    return input.witnessUtxo.script.toString('hex');
  }
  if (input.nonWitnessUtxo) {
    const previous = Transaction.fromBuffer(input.nonWitnessUtxo);
    return previous.outs[psbt.txInputs[index].index]?.script.toString('hex');
  }
  return undefined;
}

/**
 * Child indices named by hints whose fingerprint belongs to the descriptor
 */
function hintedIndices(descriptor: Descriptor, entries: Bip32Entry[]): number[] {
  if (!descriptor.isRange) return [];
  const fingerprints = new Set(descriptor.keys.map(keyFingerprint));
  const indices = new Set<number>();
  for (const entry of entries) {
    if (!fingerprints.has(entry.masterFingerprint.toString('hex'))) continue;
    const last = entry.path.split('/').pop() ?? '';
    if (!/^\d+$/.test(last)) continue;
    const index = Number(last);
    if (index <= MAX_CHILD_INDEX) indices.add(index);
  }
  return [...indices];
}

function candidateScripts(descriptor: Descriptor, indices: number[], network: Network): string[] {
  if (!descriptor.isRange) {
    return [deriveFixed(descriptor, network).script.toString('hex')];
  }
  return indices.map((index) => deriveScript(descriptor, index, network).script.toString('hex'));
}

function assertNever(value: never): never {
  throw new ValidationError(`Unhandled command: ${JSON.stringify(value)}`);
}

/**
 * Single entry point for every wallet command
 */
export async function dispatch(wallet: WatchOnlyWallet, command: WalletCommand): Promise<WalletCommandResult> {
  switch (command.kind) {
    case 'balance':
      return wallet.balance(command);
    case 'receive':
      return wallet.receive(command);
    case 'send':
      return wallet.send(command);
    case 'broadcast':
      return wallet.broadcast(command);
    default:
      return assertNever(command);
  }
}
