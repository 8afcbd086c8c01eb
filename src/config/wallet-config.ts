/**
 * Wallet configuration: shape, defaults and validation
 */

import type { StateStoreType } from '../interfaces/state-store.interface.ts';
import type { SelectorAlgorithm } from '../interfaces/selector.interface.ts';
import { isSelectorAlgorithm } from '../selectors/selector-factory.ts';
import type { WalletNetwork } from '../utils/networks.ts';
import { isWalletNetwork } from '../utils/networks.ts';

export type ElectrumProtocol = 'tcp' | 'ssl';

export interface ElectrumEndpoint {
  host: string;
  port: number;
  protocol: ElectrumProtocol;
}

export interface StoreConfig {
  type: StateStoreType;
  /** Directory for the `file` store */
  path?: string;
}

export interface WalletConfig {
  network: WalletNetwork;
  electrum: ElectrumEndpoint;
  gapLimit: number;
  batchSize: number;
  requestTimeout: number; // ms
  retries: number;
  retryDelay: number; // ms
  maxRetryDelay: number; // ms
  enableRbf: boolean;
  selector: SelectorAlgorithm;
  store: StoreConfig;
}

export const DEFAULT_ELECTRUM_ENDPOINTS: Record<WalletNetwork, ElectrumEndpoint> = {
  mainnet: { host: 'electrum.blockstream.info', port: 50002, protocol: 'ssl' },
  testnet: { host: 'electrum.blockstream.info', port: 60002, protocol: 'ssl' },
  regtest: { host: '127.0.0.1', port: 50001, protocol: 'tcp' },
  signet: { host: '127.0.0.1', port: 60601, protocol: 'tcp' },
};

export const DEFAULT_WALLET_CONFIG: Omit<WalletConfig, 'electrum'> = {
  network: 'mainnet',
  gapLimit: 20,
  batchSize: 20,
  requestTimeout: 30000,
  retries: 3,
  retryDelay: 1000,
  maxRetryDelay: 10000,
  enableRbf: true,
  selector: 'largest-first',
  store: { type: 'memory' },
};

export function createWalletConfig(network: WalletNetwork = DEFAULT_WALLET_CONFIG.network): WalletConfig {
  return {
    ...DEFAULT_WALLET_CONFIG,
    store: { ...DEFAULT_WALLET_CONFIG.store },
    network,
    electrum: { ...DEFAULT_ELECTRUM_ENDPOINTS[network] },
  };
}

/**
 * Parse `ssl://host:port` or `tcp://host:port`
 */
export function parseElectrumUrl(url: string): ElectrumEndpoint | undefined {
  const match = /^(tcp|ssl):\/\/([^:/\s]+):(\d{1,5})\/?$/.exec(url.trim());
  if (!match) return undefined;

  const [, protocol, host, port] = match;
  if (protocol !== 'tcp' && protocol !== 'ssl') return undefined;
  return { protocol, host, port: Number(port) };
}

export function formatElectrumUrl(endpoint: ElectrumEndpoint): string {
  return `${endpoint.protocol}://${endpoint.host}:${endpoint.port}`;
}

/**
 * Validate endpoint configuration
 */
export function validateEndpoint(endpoint: ElectrumEndpoint): string[] {
  const errors: string[] = [];

  if (!endpoint.host) {
    errors.push('Electrum host is required');
  }
  if (!Number.isInteger(endpoint.port) || endpoint.port < 1 || endpoint.port > 65535) {
    errors.push('Electrum port must be between 1 and 65535');
  }
  if (endpoint.protocol !== 'tcp' && endpoint.protocol !== 'ssl') {
    errors.push('Electrum protocol must be one of: tcp, ssl');
  }

  return errors;
}

/**
 * Validate configuration
 */
export function validateConfig(config: WalletConfig): string[] {
  const errors: string[] = [];

  if (!isWalletNetwork(config.network)) {
    errors.push(`Network must be one of: mainnet, testnet, regtest, signet`);
  }

  errors.push(...validateEndpoint(config.electrum));

  if (!Number.isInteger(config.gapLimit) || config.gapLimit < 1) {
    errors.push('Gap limit must be a positive integer');
  }
  if (!Number.isInteger(config.batchSize) || config.batchSize < 1) {
    errors.push('Batch size must be a positive integer');
  }
  if (!Number.isFinite(config.requestTimeout) || config.requestTimeout < 1000) {
    errors.push('Request timeout must be at least 1000ms');
  }
  if (!Number.isInteger(config.retries) || config.retries < 0) {
    errors.push('Retries cannot be negative');
  }
  if (!Number.isFinite(config.retryDelay) || config.retryDelay < 0) {
    errors.push('Retry delay cannot be negative');
  }
  if (config.maxRetryDelay < config.retryDelay) {
    errors.push('Max retry delay must not be below the retry delay');
  }
  if (!isSelectorAlgorithm(config.selector)) {
    errors.push('Selector must be one of: largest-first, branch-and-bound');
  }
  if (config.store.type !== 'memory' && config.store.type !== 'file') {
    errors.push('Store type must be one of: memory, file');
  }
  if (config.store.type === 'file' && !config.store.path) {
    errors.push('File store needs a path');
  }

  return errors;
}

/**
 * Get configuration documentation with environment variable examples
 */
export function getWalletConfigDocumentation(): string {
  return `
Wallet Configuration

Environment Variables:
  WATCH_WALLET_NETWORK=testnet                              # mainnet, testnet, regtest, signet
  WATCH_WALLET_ELECTRUM=ssl://electrum.blockstream.info:60002
  WATCH_WALLET_GAP_LIMIT=20                                 # unused indices that end a scan
  WATCH_WALLET_BATCH_SIZE=20                                # scripts per request
  WATCH_WALLET_TIMEOUT=30000                                # request timeout in ms
  WATCH_WALLET_RETRIES=3                                    # retries for transport failures
  WATCH_WALLET_SELECTOR=largest-first                       # or branch-and-bound
  WATCH_WALLET_STORE=file                                   # memory or file
  WATCH_WALLET_STORE_PATH=.watch-wallet                     # directory for the file store
  WATCH_WALLET_RBF=true                                     # signal replace-by-fee

Configuration File:
  .watch-wallet.json or watch-wallet.config.json in the working directory:
  {
    "network": "testnet",
    "electrum": "ssl://electrum.blockstream.info:60002",
    "gapLimit": 20,
    "store": { "type": "file", "path": ".watch-wallet" }
  }

Configuration Priority Order:
1. Runtime options (highest)
2. Environment variables
3. Configuration file
4. Defaults for the selected network (lowest)
`;
}
