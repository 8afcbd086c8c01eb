/**
 * @module Core
 * @description Ledger sync, transaction building, PSBT handling and the wallet facade.
 *
 * @example Building an unsigned PSBT from a synced ledger
 * ```typescript
 * import { TransactionBuilder, UTXOLedger, toBase64 } from 'watch-wallet';
 *
 * const ledger = new UTXOLedger(chain, { network });
 * const snapshot = await ledger.sync(descriptor, changeDescriptor);
 *
 * const builder = new TransactionBuilder({ network, chain });
 * const { psbt } = await builder.build({
 *   snapshot,
 *   descriptor,
 *   changeDescriptor,
 *   recipients: [{ address: 'tb1q...', value: 40_000 }],
 *   feeRate: 2,
 * });
 * console.log(toBase64(psbt));
 * ```
 */

export * from './size-estimator.ts';
export * from './utxo-ledger.ts';
export * from './transaction-builder.ts';
export * from './psbt-codec.ts';
export * from './psbt-finalizer.ts';
export * from './watch-only-wallet.ts';
