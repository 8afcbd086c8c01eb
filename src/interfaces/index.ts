/**
 * Public types of the wallet engine
 */

export type * from './chain-source.interface.ts';
export type * from './command.interface.ts';
export type * from './descriptor.interface.ts';
export type * from './fee.interface.ts';
export type * from './ledger.interface.ts';
export type * from './selector.interface.ts';
export type * from './state-store.interface.ts';
export type * from './transaction.interface.ts';
export type * from './utxo.interface.ts';

export {
  type SelectionFailure,
  SelectionFailureReason,
  type SelectionResult,
  type SelectionSuccess,
} from './selector-result.interface.ts';
export { outpointKey } from './utxo.interface.ts';
