/**
 * @module Utils
 */

export * from './dust-calculator.ts';
export * from './logger.ts';
export * from './networks.ts';
export * from './type-guards.ts';
export * from './witness.ts';
