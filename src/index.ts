/**
 * @module watch-wallet
 *
 * Descriptor-based watch-only Bitcoin wallet engine: derives addresses from
 * output script descriptors, tracks the wallet's UTXOs with gap-limit scans,
 * selects coins, builds unsigned PSBTs for an offline signer, then finalizes
 * and broadcasts what comes back.
 *
 * @example Balance and a send PSBT
 * ```typescript
 * import { ConfigLoader, WatchOnlyWallet } from 'watch-wallet';
 *
 * const wallet = WatchOnlyWallet.fromConfig(ConfigLoader.loadConfig({ network: 'testnet' }));
 * const { balance } = await wallet.balance({ descriptor, changeDescriptor });
 * const { psbt } = await wallet.send({
 *   descriptor,
 *   changeDescriptor,
 *   recipients: [{ address: 'tb1q...', value: 40_000 }],
 *   feeRate: 2,
 * });
 * await wallet.close();
 * ```
 */

export * from './errors/index.ts';
export * from './interfaces/index.ts';
export * from './descriptors/index.ts';
export * from './selectors/index.ts';
export * from './core/index.ts';
export * from './providers/index.ts';
export * from './stores/index.ts';
export * from './config/index.ts';
export * from './utils/index.ts';
export { formatResult, parseCliArgs, runCli, type CliInvocation, type CliIO } from './cli/run-cli.ts';
