/**
 * Configuration Loader for watch-wallet
 * Loads configuration with priority:
 * 1. Runtime options (passed to loadConfig)
 * 2. Environment variables
 * 3. Config file (.watch-wallet.json or watch-wallet.config.json)
 * 4. Default values
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import process from 'node:process';

import { ConfigurationError } from '../errors/index.ts';
import { isSelectorAlgorithm } from '../selectors/selector-factory.ts';
import { isWalletNetwork } from '../utils/networks.ts';
import { isRecord, parseInteger } from '../utils/type-guards.ts';
import {
  createWalletConfig,
  DEFAULT_WALLET_CONFIG,
  type ElectrumEndpoint,
  getWalletConfigDocumentation,
  parseElectrumUrl,
  type StoreConfig,
  validateConfig,
  type WalletConfig,
} from './wallet-config.ts';

export const CONFIG_FILE_NAMES = ['.watch-wallet.json', 'watch-wallet.config.json'];

export type WalletConfigOverrides = Partial<WalletConfig>;

export interface ConfigLoaderOptions {
  env?: Record<string, string | undefined>;
  cwd?: string;
}

export interface ConfigLayer {
  values: WalletConfigOverrides;
  problems: string[];
}

export class ConfigLoader {
  private readonly env: Record<string, string | undefined>;
  private readonly cwd: string;

  constructor(options: ConfigLoaderOptions = {}) {
    this.env = options.env ?? process.env;
    this.cwd = options.cwd ?? process.cwd();
  }

  static loadConfig(overrides?: WalletConfigOverrides): WalletConfig {
    return new ConfigLoader().load(overrides);
  }

  load(overrides: WalletConfigOverrides = {}): WalletConfig {
    const file = this.loadConfigFile();
    const env = this.loadConfigFromEnvironment();

    const merged: WalletConfigOverrides = { ...file.values, ...env.values, ...overrides };
    const network = merged.network ?? DEFAULT_WALLET_CONFIG.network;

    // Defaults follow whichever network the layers settled on
    const config: WalletConfig = { ...createWalletConfig(network), ...merged, network };

    const problems = [...file.problems, ...env.problems, ...validateConfig(config)];
    if (problems.length > 0) {
      throw new ConfigurationError(problems);
    }

    return config;
  }

  private loadConfigFromEnvironment(): ConfigLayer {
    const values: WalletConfigOverrides = {};
    const problems: string[] = [];
    const env = this.env;

    const network = env.WATCH_WALLET_NETWORK;
    if (network !== undefined) {
      if (isWalletNetwork(network)) {
        values.network = network;
      } else {
        problems.push(`WATCH_WALLET_NETWORK: unknown network "${network}"`);
      }
    }

    const electrum = env.WATCH_WALLET_ELECTRUM;
    if (electrum !== undefined) {
      const endpoint = parseElectrumUrl(electrum);
      if (endpoint) {
        values.electrum = endpoint;
      } else {
        problems.push(`WATCH_WALLET_ELECTRUM: expected ssl://host:port or tcp://host:port, got "${electrum}"`);
      }
    }

    const integers: Array<[string, 'gapLimit' | 'batchSize' | 'requestTimeout' | 'retries']> = [
      ['WATCH_WALLET_GAP_LIMIT', 'gapLimit'],
      ['WATCH_WALLET_BATCH_SIZE', 'batchSize'],
      ['WATCH_WALLET_TIMEOUT', 'requestTimeout'],
      ['WATCH_WALLET_RETRIES', 'retries'],
    ];
    for (const [name, key] of integers) {
      const raw = env[name];
      if (raw === undefined) continue;
      const parsed = parseInteger(raw);
      if (parsed === undefined) {
        problems.push(`${name}: expected a non-negative integer, got "${raw}"`);
      } else {
        values[key] = parsed;
      }
    }

    const selector = env.WATCH_WALLET_SELECTOR;
    if (selector !== undefined) {
      if (isSelectorAlgorithm(selector)) {
        values.selector = selector;
      } else {
        problems.push(`WATCH_WALLET_SELECTOR: unknown selector "${selector}"`);
      }
    }

    const storeType = env.WATCH_WALLET_STORE;
    const storePath = env.WATCH_WALLET_STORE_PATH;
    if (storeType !== undefined) {
      if (storeType === 'memory' || storeType === 'file') {
        values.store = { type: storeType, path: storePath };
      } else {
        problems.push(`WATCH_WALLET_STORE: expected memory or file, got "${storeType}"`);
      }
    } else if (storePath !== undefined) {
      values.store = { type: 'file', path: storePath };
    }

    const rbf = env.WATCH_WALLET_RBF;
    if (rbf !== undefined) {
      const flag = parseFlag(rbf);
      if (flag === undefined) {
        problems.push(`WATCH_WALLET_RBF: expected true or false, got "${rbf}"`);
      } else {
        values.enableRbf = flag;
      }
    }

    return { values, problems };
  }

  private loadConfigFile(): ConfigLayer {
    for (const name of CONFIG_FILE_NAMES) {
      const configPath = path.join(this.cwd, name);
      if (!fs.existsSync(configPath)) continue;

      let parsed: unknown;
      try {
        parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
      } catch (error) {
        return { values: {}, problems: [`${name}: ${error instanceof Error ? error.message : String(error)}`] };
      }
      return readConfigObject(parsed, name);
    }

    return { values: {}, problems: [] };
  }

  /**
   * Get configuration documentation
   */
  static getConfigDocumentation(): string {
    return getWalletConfigDocumentation();
  }
}

function parseFlag(value: string): boolean | undefined {
  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      return undefined;
  }
}

/**
 * Pick the known settings out of a parsed config file
 */
export function readConfigObject(value: unknown, source: string): ConfigLayer {
  const values: WalletConfigOverrides = {};
  const problems: string[] = [];

  if (!isRecord(value)) {
    return { values, problems: [`${source}: expected a JSON object`] };
  }

  if (value.network !== undefined) {
    if (isWalletNetwork(value.network)) values.network = value.network;
    else problems.push(`${source}: unknown network ${JSON.stringify(value.network)}`);
  }

  if (value.electrum !== undefined) {
    const endpoint = readEndpoint(value.electrum);
    if (endpoint) values.electrum = endpoint;
    else problems.push(`${source}: electrum must be "ssl://host:port" or { host, port, protocol }`);
  }

  for (const key of ['gapLimit', 'batchSize', 'requestTimeout', 'retries', 'retryDelay', 'maxRetryDelay'] as const) {
    const entry = value[key];
    if (entry === undefined) continue;
    if (typeof entry === 'number') values[key] = entry;
    else problems.push(`${source}: ${key} must be a number`);
  }

  if (value.enableRbf !== undefined) {
    if (typeof value.enableRbf === 'boolean') values.enableRbf = value.enableRbf;
    else problems.push(`${source}: enableRbf must be a boolean`);
  }

  if (value.selector !== undefined) {
    if (typeof value.selector === 'string' && isSelectorAlgorithm(value.selector)) values.selector = value.selector;
    else problems.push(`${source}: unknown selector ${JSON.stringify(value.selector)}`);
  }

  if (value.store !== undefined) {
    const store = readStore(value.store);
    if (store) values.store = store;
    else problems.push(`${source}: store must be { "type": "memory" | "file", "path"?: string }`);
  }

  return { values, problems };
}

function readEndpoint(value: unknown): ElectrumEndpoint | undefined {
  if (typeof value === 'string') return parseElectrumUrl(value);
  if (!isRecord(value)) return undefined;

  const { host, port, protocol } = value;
  if (typeof host !== 'string' || typeof port !== 'number') return undefined;
  if (protocol !== 'tcp' && protocol !== 'ssl') return undefined;
  return { host, port, protocol };
}

function readStore(value: unknown): StoreConfig | undefined {
  if (!isRecord(value)) return undefined;
  const { type, path: storePath } = value;
  if (type !== 'memory' && type !== 'file') return undefined;
  if (storePath !== undefined && typeof storePath !== 'string') return undefined;
  return { type, path: storePath };
}
