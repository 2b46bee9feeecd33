/**
 * Staking Module
 *
 * Timelock staking ledger, reward arithmetic and the stake token.
 */

export * from './errors';
export * from './rewards';
export * from './token';
export * from './ledger';
