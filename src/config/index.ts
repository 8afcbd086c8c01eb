/**
 * Configuration module exports
 */

export {
  createWalletConfig,
  DEFAULT_ELECTRUM_ENDPOINTS,
  DEFAULT_WALLET_CONFIG,
  type ElectrumEndpoint,
  type ElectrumProtocol,
  formatElectrumUrl,
  getWalletConfigDocumentation,
  parseElectrumUrl,
  type StoreConfig,
  validateConfig,
  validateEndpoint,
  type WalletConfig,
} from './wallet-config.ts';

export {
  CONFIG_FILE_NAMES,
  type ConfigLayer,
  ConfigLoader,
  type ConfigLoaderOptions,
  readConfigObject,
  type WalletConfigOverrides,
} from './config-loader.ts';
