/**
 * Reward Arithmetic
 *
 * Simple interest, annualized in basis points:
 *   reward = amount * rateBps * elapsed / (10_000 * 31_536_000)
 *
 * Integer math on bigint with floor division; multiply before dividing.
 */

// ============ Constants ============

export const SECONDS_PER_YEAR = 31_536_000n; // 365 days
export const BPS_DENOMINATOR = 10_000n;
export const MAX_REWARD_RATE_BPS = 10_000;

// ============ Validation ============

export function isValidRewardRate(rateBps: number): boolean {
  return Number.isInteger(rateBps) && rateBps > 0 && rateBps <= MAX_REWARD_RATE_BPS;
}

export function isValidLockDuration(seconds: number): boolean {
  return Number.isInteger(seconds) && seconds > 0;
}

// ============ Accrual ============

export function calculateAccruedReward(
  amount: bigint,
  rateBps: number,
  elapsedSeconds: number
): bigint {
  if (amount <= 0n || elapsedSeconds <= 0) return 0n;
  return (amount * BigInt(rateBps) * BigInt(Math.floor(elapsedSeconds))) /
    (BPS_DENOMINATOR * SECONDS_PER_YEAR);
}

/**
 * Limit a reward payout to the surplus held above staked principal.
 * `balance` is the custody balance once the withdrawn principal is set aside,
 * `totalStaked` the principal still owed to the remaining stakers.
 */
export function capRewardBySolvency(
  reward: bigint,
  balance: bigint,
  totalStaked: bigint
): bigint {
  if (balance >= totalStaked + reward) return reward;
  const surplus = balance - totalStaked;
  return surplus > 0n ? surplus : 0n;
}
