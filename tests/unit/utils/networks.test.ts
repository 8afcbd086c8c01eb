import * as bitcoin from 'bitcoinjs-lib';
import { describe, expect, it } from 'vitest';

import { isTestNetwork, isWalletNetwork, networkLabel, toBitcoinNetwork } from '../../../src/utils/networks.ts';

describe('networks', () => {
  it('should accept the four wallet networks', () => {
    expect(isWalletNetwork('mainnet')).toBe(true);
    expect(isWalletNetwork('signet')).toBe(true);
    expect(isWalletNetwork('bitcoin')).toBe(false);
    expect(isWalletNetwork(1)).toBe(false);
  });

  it('should map names onto bitcoinjs-lib parameters', () => {
    expect(toBitcoinNetwork('mainnet')).toBe(bitcoin.networks.bitcoin);
    expect(toBitcoinNetwork('testnet')).toBe(bitcoin.networks.testnet);
    expect(toBitcoinNetwork('signet')).toBe(bitcoin.networks.testnet);
    expect(toBitcoinNetwork('regtest')).toBe(bitcoin.networks.regtest);
  });

  it('should label networks by their address prefix', () => {
    expect(networkLabel(bitcoin.networks.bitcoin)).toBe('mainnet');
    expect(networkLabel(bitcoin.networks.testnet)).toBe('testnet');
    expect(networkLabel(bitcoin.networks.regtest)).toBe('regtest');
  });

  it('should group regtest with testnet for extended keys', () => {
    expect(isTestNetwork(bitcoin.networks.regtest)).toBe(true);
    expect(isTestNetwork(bitcoin.networks.testnet)).toBe(true);
    expect(isTestNetwork(bitcoin.networks.bitcoin)).toBe(false);
  });
});
