/**
 * @module Providers
 * @description Chain sources the wallet reads from and broadcasts through.
 */

export { BaseChainSource } from './base-chain-source.ts';
export { ElectrumChainSource, type ElectrumChainSourceOptions, toScripthash } from './electrum-chain-source.ts';
export { type ElectrumRpc, ElectrumServerError, ElectrumTCPClient, type TCPClientOptions } from './electrum-client.ts';

