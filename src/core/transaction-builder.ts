/**
 * Transaction Builder
 * Turns a ledger snapshot and a payment request into an unsigned PSBT that
 * carries everything an offline signer needs.
 */

import type { Buffer } from 'node:buffer';

import * as bitcoin from 'bitcoinjs-lib';
import type { Network, Psbt } from 'bitcoinjs-lib';

import { assertDescriptorPair, deriveScript } from '../descriptors/descriptor-deriver.ts';
import {
  InvalidDestinationError,
  NoRecipientsError,
  ValidationError,
} from '../errors/index.ts';
import type { ChainSource } from '../interfaces/chain-source.interface.ts';
import type { DerivedScript, Descriptor } from '../interfaces/descriptor.interface.ts';
import type { FeeModel, IUTXOSelector } from '../interfaces/selector.interface.ts';
import type { BuildRequest, BuildResult, ChangeOutput, Recipient } from '../interfaces/transaction.interface.ts';
import type { WalletUTXO } from '../interfaces/utxo.interface.ts';
import { createSelector, selectCoins } from '../selectors/selector-factory.ts';
import { DustCalculator } from '../utils/dust-calculator.ts';
import type { Logger } from '../utils/logger.ts';
import { noopLogger } from '../utils/logger.ts';
import { networkLabel } from '../utils/networks.ts';
import { SizeEstimator } from './size-estimator.ts';

export const SEQUENCE_RBF = 0xfffffffd;
export const SEQUENCE_FINAL_LOCKTIME = 0xfffffffe;
export const TX_VERSION = 2;

const WITNESS_SCRIPT_TYPES = new Set(['wpkh', 'sh-wpkh', 'wsh-multi', 'sh-wsh-multi']);

export interface TransactionBuilderOptions {
  network: Network;
  /** Source of the previous transactions every input embeds */
  chain: Pick<ChainSource, 'getTransaction'>;
  selector?: IUTXOSelector;
  dustCalculator?: DustCalculator;
  logger?: Logger;
}

interface ResolvedRecipient extends Recipient {
  script: Buffer;
}

/**
 * Builds unsigned PSBTs from a committed ledger snapshot
 *
 * @example
 * ```typescript
 * const builder = new TransactionBuilder({ network, chain });
 * const { psbt, fee } = await builder.build({
 *   snapshot,
 *   descriptor,
 *   changeDescriptor,
 *   recipients: [{ address: 'tb1q...', value: 40_000 }],
 *   feeRate: 2,
 * });
 * ```
 */
export class TransactionBuilder {
  private readonly network: Network;
  private readonly chain: Pick<ChainSource, 'getTransaction'>;
  private readonly selector: IUTXOSelector;
  private readonly dustCalculator: DustCalculator;
  private readonly logger: Logger;

  constructor(options: TransactionBuilderOptions) {
    this.network = options.network;
    this.chain = options.chain;
    this.selector = options.selector ?? createSelector('largest-first');
    this.dustCalculator = options.dustCalculator ?? new DustCalculator();
    this.logger = options.logger ?? noopLogger;
  }

  async build(request: BuildRequest): Promise<BuildResult> {
    const { snapshot, descriptor, changeDescriptor } = request;

    if (!Number.isFinite(request.feeRate) || request.feeRate <= 0) {
      throw new ValidationError(`Fee rate must be positive, got ${request.feeRate}`);
    }
    if (changeDescriptor) {
      assertDescriptorPair(descriptor, changeDescriptor);
    }
    if (snapshot.descriptorId !== descriptor.id || snapshot.changeDescriptorId !== changeDescriptor?.id) {
      throw new ValidationError('Ledger snapshot was synced for a different descriptor');
    }

    const recipients = this.resolveRecipients(request.recipients);
    const change = this.nextChangeScript(request);
    const profile = SizeEstimator.profileFor(descriptor);
    const outputLengths = recipients.map((recipient) => recipient.script.length);
    const changeDust = this.dustCalculator.thresholdForScript(change.script);

    const feeModel: FeeModel = {
      feeFor: (inputs, withChange) => {
        const lengths = withChange ? [...outputLengths, change.script.length] : outputLengths;
        const { vsize } = SizeEstimator.estimate(inputs.map(() => profile), lengths);
        return SizeEstimator.fee(vsize, request.feeRate);
      },
    };

    const targetValue = recipients.reduce((sum, recipient) => sum + recipient.value, 0);
    const plan = selectCoins(this.selector, [...snapshot.utxos.values()], {
      targetValue,
      feeRate: request.feeRate,
      feeModel,
      dustThreshold: changeDust,
      minConfirmations: request.minConfirmations,
    });

    this.logger.info('Coin selection complete', {
      algorithm: plan.algorithm,
      inputs: plan.inputs.length,
      target: plan.target,
      fee: plan.fee,
      change: plan.change,
    });

    const psbt = new bitcoin.Psbt({ network: this.network });
    psbt.setVersion(TX_VERSION);
    psbt.setLocktime(request.locktime ?? 0);

    const sequence = request.enableRbf === false ? SEQUENCE_FINAL_LOCKTIME : SEQUENCE_RBF;
    const previous = await this.fetchPrevious(plan.inputs);

    for (const utxo of plan.inputs) {
      const owner = this.ownerOf(utxo, descriptor, changeDescriptor);
      const derived = deriveScript(owner, owner.isRange ? utxo.index : undefined, this.network);
      if (derived.script.toString('hex') !== utxo.script) {
        throw new ValidationError(`UTXO ${utxo.txid}:${utxo.vout} does not belong to descriptor ${owner.id}`);
      }

      const nonWitnessUtxo = previous.get(utxo.txid);
      if (!nonWitnessUtxo) {
        throw new ValidationError(`Previous transaction ${utxo.txid} was not fetched`);
      }

      psbt.addInput({
        hash: utxo.txid,
        index: utxo.vout,
        sequence,
        nonWitnessUtxo,
        ...(WITNESS_SCRIPT_TYPES.has(derived.scriptType)
          ? { witnessUtxo: { script: derived.script, value: utxo.value } }
          : {}),
        ...this.scriptFields(derived),
      });
    }

    for (const recipient of recipients) {
      psbt.addOutput({ script: recipient.script, value: recipient.value });
    }

    let changeOutput: ChangeOutput | undefined;
    if (plan.hasChange) {
      psbt.addOutput({ script: change.script, value: plan.change, ...this.scriptFields(change) });
      changeOutput = {
        address: change.address,
        value: plan.change,
        index: change.index,
        outputIndex: recipients.length,
      };
    }

    const lengths = plan.hasChange ? [...outputLengths, change.script.length] : outputLengths;
    const { vsize } = SizeEstimator.estimate(plan.inputs.map(() => profile), lengths);
    const unsignedTxid = unsignedTransactionId(psbt);

    this.logger.debug?.('Unsigned PSBT built', { unsignedTxid, vsize, outputs: lengths.length });

    return { psbt, plan, fee: plan.fee, vsize, change: changeOutput, unsignedTxid };
  }

  private resolveRecipients(recipients: Recipient[]): ResolvedRecipient[] {
    if (recipients.length === 0) {
      throw new NoRecipientsError();
    }

    return recipients.map((recipient) => {
      const script = this.toOutputScript(recipient.address);

      if (!Number.isSafeInteger(recipient.value) || recipient.value <= 0) {
        throw new InvalidDestinationError(recipient.address, `amount ${recipient.value} must be a positive integer`);
      }
      const threshold = this.dustCalculator.thresholdForScript(script);
      if (recipient.value < threshold) {
        throw new InvalidDestinationError(
          recipient.address,
          `amount ${recipient.value} is below the dust threshold ${threshold}`,
        );
      }

      return { ...recipient, script };
    });
  }

  private toOutputScript(address: string): Buffer {
    try {
      return bitcoin.address.toOutputScript(address, this.network);
    } catch (error) {
      const other = [bitcoin.networks.bitcoin, bitcoin.networks.testnet, bitcoin.networks.regtest]
        .filter((network) => network !== this.network)
        .find((network) => {
          try {
            bitcoin.address.toOutputScript(address, network);
            return true;
          } catch {
            return false;
          }
        });

      if (other) {
        throw new InvalidDestinationError(
          address,
          `address is for ${networkLabel(other)}, wallet is on ${networkLabel(this.network)}`,
        );
      }
      throw new InvalidDestinationError(address, error instanceof Error ? error.message : 'unrecognised address');
    }
  }

  /**
   * Change goes to the first unused index of the change branch, or of the
   * receive branch when no change descriptor is given
   */
  private nextChangeScript(request: BuildRequest): DerivedScript {
    const owner = request.changeDescriptor ?? request.descriptor;
    if (!owner.isRange) {
      return deriveScript(owner, undefined, this.network);
    }

    const scan = request.changeDescriptor
      ? request.snapshot.branches.internal
      : request.snapshot.branches.external;
    if (!scan) {
      throw new ValidationError('Ledger snapshot has no change branch; sync with the change descriptor');
    }
    return deriveScript(owner, scan.nextUnusedIndex, this.network);
  }

  private ownerOf(utxo: WalletUTXO, descriptor: Descriptor, changeDescriptor?: Descriptor): Descriptor {
    if (utxo.branch === 'external') return descriptor;
    if (!changeDescriptor) {
      throw new ValidationError(`UTXO ${utxo.txid}:${utxo.vout} is on the change branch but no change descriptor was given`);
    }
    return changeDescriptor;
  }

  /**
   * Previous transactions by txid, each checked against the outpoints spending it
   */
  private async fetchPrevious(inputs: WalletUTXO[]): Promise<Map<string, Buffer>> {
    const txids = [...new Set(inputs.map((utxo) => utxo.txid))];
    const raws = await Promise.all(txids.map((txid) => this.chain.getTransaction(txid)));

    const byTxid = new Map<string, Buffer>();
    txids.forEach((txid, i) => byTxid.set(txid, raws[i]));

    for (const utxo of inputs) {
      const raw = byTxid.get(utxo.txid);
      if (!raw) continue;

      const tx = bitcoin.Transaction.fromBuffer(raw);
      if (tx.getId() !== utxo.txid) {
        throw new ValidationError(`Chain source returned transaction ${tx.getId()} for ${utxo.txid}`);
      }
      const output = tx.outs[utxo.vout];
      if (!output || output.value !== utxo.value || output.script.toString('hex') !== utxo.script) {
        throw new ValidationError(`Output ${utxo.txid}:${utxo.vout} does not match the ledger`);
      }
    }

    return byTxid;
  }

  private scriptFields(derived: DerivedScript): {
    redeemScript?: Buffer;
    witnessScript?: Buffer;
    bip32Derivation?: Array<{ masterFingerprint: Buffer; pubkey: Buffer; path: string }>;
  } {
    return {
      ...(derived.redeemScript ? { redeemScript: derived.redeemScript } : {}),
      ...(derived.witnessScript ? { witnessScript: derived.witnessScript } : {}),
      ...(derived.hints.length > 0
        ? {
          bip32Derivation: derived.hints.map((hint) => ({
            masterFingerprint: hint.masterFingerprint,
            pubkey: hint.pubkey,
            path: hint.path,
          })),
        }
        : {}),
    };
  }
}

/**
 * Txid of the transaction a PSBT will produce; signatures do not change it
 * for inputs without a scriptSig
 */
export function unsignedTransactionId(psbt: Psbt): string {
  const tx = new bitcoin.Transaction();
  tx.version = psbt.version;
  tx.locktime = psbt.locktime;
  for (const input of psbt.txInputs) {
    tx.addInput(input.hash, input.index, input.sequence);
  }
  for (const output of psbt.txOutputs) {
    tx.addOutput(output.script, output.value);
  }
  return tx.getId();
}
