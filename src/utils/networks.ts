/**
 * Named networks and their bitcoinjs-lib parameters
 */

import * as bitcoin from 'bitcoinjs-lib';
import type { Network } from 'bitcoinjs-lib';

export type WalletNetwork = 'mainnet' | 'testnet' | 'regtest' | 'signet';

export const WALLET_NETWORKS: readonly WalletNetwork[] = ['mainnet', 'testnet', 'regtest', 'signet'];

export function isWalletNetwork(value: unknown): value is WalletNetwork {
  return WALLET_NETWORKS.some((name) => name === value);
}

/**
 * Signet shares testnet's address and extended key prefixes
 */
export function toBitcoinNetwork(name: WalletNetwork): Network {
  switch (name) {
    case 'mainnet':
      return bitcoin.networks.bitcoin;
    case 'testnet':
    case 'signet':
      return bitcoin.networks.testnet;
    case 'regtest':
      return bitcoin.networks.regtest;
  }
}

export function networkLabel(network: Network): string {
  if (network.bech32 === bitcoin.networks.bitcoin.bech32) return 'mainnet';
  if (network.bech32 === bitcoin.networks.regtest.bech32) return 'regtest';
  return 'testnet';
}

/**
 * Extended public keys only carry a mainnet or a test-network version
 */
export function isTestNetwork(network: Network): boolean {
  return network.bip32.public === bitcoin.networks.testnet.bip32.public;
}
