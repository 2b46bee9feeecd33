/**
 * Staking Errors
 *
 * Every rejection raised by the ledger or the token carries a code.
 * The category decides how callers (and the HTTP layer) treat it.
 */

// ============ Types ============

export type StakingErrorCode =
  | 'InvalidAmount'
  | 'InvalidRate'
  | 'InvalidDuration'
  | 'InvalidAccount'
  | 'AlreadyStaked'
  | 'NoActiveStake'
  | 'InsufficientExcess'
  | 'LockNotElapsed'
  | 'Unauthorized'
  | 'TransferFailed'
  | 'ReentrantCall';

export type StakingErrorCategory =
  | 'validation'
  | 'state_conflict'
  | 'timing'
  | 'authorization'
  | 'collaborator';

export const ERROR_CATEGORY: Record<StakingErrorCode, StakingErrorCategory> = {
  InvalidAmount: 'validation',
  InvalidRate: 'validation',
  InvalidDuration: 'validation',
  InvalidAccount: 'validation',
  AlreadyStaked: 'state_conflict',
  NoActiveStake: 'state_conflict',
  InsufficientExcess: 'state_conflict',
  LockNotElapsed: 'timing',
  Unauthorized: 'authorization',
  TransferFailed: 'collaborator',
  ReentrantCall: 'collaborator',
};

const CATEGORY_STATUS = {
  validation: 400,
  state_conflict: 409,
  timing: 425,
  authorization: 403,
  collaborator: 422,
} as const satisfies Record<StakingErrorCategory, number>;

export type StakingErrorStatus = (typeof CATEGORY_STATUS)[StakingErrorCategory];

// ============ Error Class ============

export class StakingError extends Error {
  readonly code: StakingErrorCode;
  readonly category: StakingErrorCategory;
  readonly details?: Record<string, unknown>;

  constructor(code: StakingErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'StakingError';
    this.code = code;
    this.category = ERROR_CATEGORY[code];
    this.details = details;
  }
}

export function isStakingError(error: unknown): error is StakingError {
  return error instanceof StakingError;
}

export function httpStatusFor(error: StakingError): StakingErrorStatus {
  return CATEGORY_STATUS[error.category];
}
