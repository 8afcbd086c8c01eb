/**
 * Base Chain Source
 * Retry, backoff and timeout shared by every chain source implementation
 */

import type { Buffer } from 'node:buffer';

import type { Network } from 'bitcoinjs-lib';

import { NetworkError, WalletError, errorMessage } from '../errors/index.ts';
import type {
  ChainSource,
  ChainSourceOptions,
  ScriptActivity,
} from '../interfaces/chain-source.interface.ts';
import type { Logger } from '../utils/logger.ts';
import { noopLogger } from '../utils/logger.ts';

export abstract class BaseChainSource implements ChainSource {
  protected network: Network;
  protected timeout: number;
  protected retries: number;
  protected retryDelay: number;
  protected maxRetryDelay: number;
  protected logger: Logger;

  constructor(options: ChainSourceOptions & { logger?: Logger }) {
    this.network = options.network;
    this.timeout = options.timeout ?? 30000;
    this.retries = options.retries ?? 3;
    this.retryDelay = options.retryDelay ?? 1000;
    this.maxRetryDelay = options.maxRetryDelay ?? 10000;
    this.logger = options.logger ?? noopLogger;
  }

  abstract fetch(scripts: Buffer[]): Promise<Map<string, ScriptActivity>>;
  abstract getTransaction(txid: string): Promise<Buffer>;
  abstract submit(rawTxHex: string): Promise<string>;
  abstract getTipHeight(): Promise<number>;
  abstract close(): Promise<void>;

  getNetwork(): Network {
    return this.network;
  }

  /**
   * Execute request with retry logic
   *
   * Wallet errors that are not retryable (server rejections, parse failures)
   * are rethrown at once; anything else is retried with exponential backoff
   * and finally wrapped in a NetworkError carrying the last cause.
   */
  protected async executeWithRetry<T>(
    label: string,
    fn: () => Promise<T>,
    retries = this.retries,
  ): Promise<T> {
    let lastError: unknown;
    let delay = this.retryDelay;

    for (let attempt = 0; attempt <= retries; attempt++) {
      try {
        return await this.executeWithTimeout(label, fn);
      } catch (error) {
        if (error instanceof WalletError && !error.retryable) {
          throw error;
        }
        lastError = error;

        if (attempt < retries) {
          this.logger.warn(`${label} failed, retrying in ${delay}ms`, {
            attempt: attempt + 1,
            error: errorMessage(error),
          });
          await this.sleep(delay);
          delay = Math.min(delay * 2, this.maxRetryDelay);
        }
      }
    }

    throw new NetworkError(`${label} failed after ${retries + 1} attempts: ${errorMessage(lastError)}`, {
      cause: lastError,
      attempts: retries + 1,
    });
  }

  /**
   * Execute request with timeout
   */
  protected executeWithTimeout<T>(
    label: string,
    fn: () => Promise<T>,
    timeout = this.timeout,
  ): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new NetworkError(`${label} timed out after ${timeout}ms`)), timeout);
    });

    return Promise.race([fn(), deadline]).finally(() => clearTimeout(timer));
  }

  protected sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  protected isValidTxid(txid: string): boolean {
    return /^[a-fA-F0-9]{64}$/.test(txid);
  }

  protected btcToSatoshis(btc: number): number {
    return Math.round(btc * 100000000);
  }
}
