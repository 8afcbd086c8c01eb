/**
 * Electrum Chain Source
 * Script activity, transactions and broadcast through the Electrum protocol
 */

import { Buffer } from 'node:buffer';

import * as bitcoin from 'bitcoinjs-lib';

import type { ElectrumEndpoint } from '../config/wallet-config.ts';
import { BroadcastError, NetworkError, ValidationError, WalletError, errorMessage } from '../errors/index.ts';
import type { ChainSourceOptions, ScriptActivity, ScriptUnspent } from '../interfaces/chain-source.interface.ts';
import type { Logger } from '../utils/logger.ts';
import { isHex, isNonNegativeInteger, isRecord, isTxid } from '../utils/type-guards.ts';
import { BaseChainSource } from './base-chain-source.ts';
import { type ElectrumRpc, ElectrumServerError, ElectrumTCPClient } from './electrum-client.ts';

export interface ElectrumChainSourceOptions extends ChainSourceOptions {
  endpoint: ElectrumEndpoint;
  /** Transport override; a TCP/TLS client is created when absent */
  client?: ElectrumRpc;
  logger?: Logger;
}

/**
 * Electrum indexes scripts by the byte-reversed sha256 of the scriptPubKey
 */
export function toScripthash(script: Buffer): string {
  return Buffer.from(bitcoin.crypto.sha256(script)).reverse().toString('hex');
}

export class ElectrumChainSource extends BaseChainSource {
  private readonly endpoint: ElectrumEndpoint;
  private readonly client: ElectrumRpc;
  private connecting: Promise<void> | null = null;

  constructor(options: ElectrumChainSourceOptions) {
    super(options);
    this.endpoint = options.endpoint;
    this.client = options.client ??
      new ElectrumTCPClient({ timeout: this.timeout, keepAlive: true, logger: this.logger });
  }

  async fetch(scripts: Buffer[]): Promise<Map<string, ScriptActivity>> {
    const unique = new Map<string, Buffer>();
    for (const script of scripts) {
      unique.set(script.toString('hex'), script);
    }

    const entries = await Promise.all(
      [...unique].map(async ([hex, script]): Promise<[string, ScriptActivity]> => {
        const scripthash = toScripthash(script);
        const history = await this.call('blockchain.scripthash.get_history', [scripthash]);
        if (!Array.isArray(history)) {
          throw this.unexpected('blockchain.scripthash.get_history', history);
        }
        if (history.length === 0) {
          return [hex, { used: false, utxos: [] }];
        }

        const unspent = await this.call('blockchain.scripthash.listunspent', [scripthash]);
        return [hex, { used: true, utxos: this.readUnspent(unspent) }];
      }),
    );

    return new Map(entries);
  }

  async getTransaction(txid: string): Promise<Buffer> {
    if (!this.isValidTxid(txid)) {
      throw new ValidationError(`Invalid txid: ${txid}`);
    }

    const result = await this.call('blockchain.transaction.get', [txid]);
    if (!isHex(result) || result.length === 0) {
      throw this.unexpected('blockchain.transaction.get', result);
    }
    return Buffer.from(result, 'hex');
  }

  /**
   * A retried broadcast may be refused because an earlier attempt went
   * through; the server is then asked for the transaction before failing.
   */
  async submit(rawTxHex: string): Promise<string> {
    const method = 'blockchain.transaction.broadcast';
    let attempts = 0;
    let result: unknown;
    try {
      result = await this.executeWithRetry(method, async () => {
        attempts++;
        await this.ensureConnected();
        return this.client.request(method, [rawTxHex]);
      });
    } catch (error) {
      if (attempts > 1 && error instanceof ElectrumServerError) {
        const txid = await this.acceptedEarlier(rawTxHex);
        if (txid) {
          this.logger.info('Transaction accepted by an earlier broadcast attempt', { txid, attempts });
          return txid;
        }
      }
      throw new BroadcastError(errorMessage(error), {
        cause: error,
        retryable: error instanceof WalletError ? error.retryable : true,
        attempts: error instanceof NetworkError ? Math.max(error.attempts, attempts) : attempts,
      });
    }

    if (!isTxid(result)) {
      throw new BroadcastError(`server returned ${JSON.stringify(result)} instead of a txid`);
    }
    this.logger.info('Transaction broadcast', { txid: result });
    return result;
  }

  async getTipHeight(): Promise<number> {
    const header = await this.call('blockchain.headers.subscribe', []);
    if (!isRecord(header) || !isNonNegativeInteger(header.height)) {
      throw this.unexpected('blockchain.headers.subscribe', header);
    }
    return header.height;
  }

  /**
   * Server estimate in sat/vB; undefined when the server has none (-1)
   */
  async estimateFeeRate(targetBlocks: number): Promise<number | undefined> {
    const result = await this.call('blockchain.estimatefee', [targetBlocks]);
    if (typeof result !== 'number') {
      throw this.unexpected('blockchain.estimatefee', result);
    }
    if (result <= 0) return undefined;
    // BTC/kvB to sat/vB
    return this.btcToSatoshis(result) / 1000;
  }

  close(): Promise<void> {
    this.client.disconnect();
    this.connecting = null;
    return Promise.resolve();
  }

  private async acceptedEarlier(rawTxHex: string): Promise<string | undefined> {
    try {
      const txid = bitcoin.Transaction.fromHex(rawTxHex).getId();
      const known = await this.call('blockchain.transaction.get', [txid]);
      return isHex(known) && known.length > 0 ? txid : undefined;
    } catch (error) {
      this.logger.warn('Could not look up an earlier broadcast', { error: errorMessage(error) });
      return undefined;
    }
  }

  private call(method: string, params: unknown[]): Promise<unknown> {
    return this.executeWithRetry(method, async () => {
      await this.ensureConnected();
      return this.client.request(method, params);
    });
  }

  private async ensureConnected(): Promise<void> {
    if (this.client.isConnected()) return;

    if (!this.connecting) {
      this.logger.debug?.('Connecting to Electrum server', {
        host: this.endpoint.host,
        port: this.endpoint.port,
        protocol: this.endpoint.protocol,
      });
      this.connecting = this.client.connect(this.endpoint).finally(() => {
        this.connecting = null;
      });
    }
    await this.connecting;
  }

  private readUnspent(value: unknown): ScriptUnspent[] {
    if (!Array.isArray(value)) {
      throw this.unexpected('blockchain.scripthash.listunspent', value);
    }

    return value.map((entry: unknown) => {
      if (
        !isRecord(entry) ||
        !isTxid(entry.tx_hash) ||
        !isNonNegativeInteger(entry.tx_pos) ||
        !isNonNegativeInteger(entry.value) ||
        typeof entry.height !== 'number'
      ) {
        throw this.unexpected('blockchain.scripthash.listunspent', entry);
      }
      return {
        txid: entry.tx_hash,
        vout: entry.tx_pos,
        value: entry.value,
        // Electrum reports -1 for unconfirmed parents; both count as unconfirmed
        height: Math.max(0, entry.height),
      };
    });
  }

  private unexpected(method: string, value: unknown): NetworkError {
    return new NetworkError(`Unexpected response to ${method}: ${JSON.stringify(value)}`, { retryable: false });
  }
}
