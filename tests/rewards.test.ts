import { describe, it, expect } from 'vitest';
import {
  calculateAccruedReward,
  capRewardBySolvency,
  isValidLockDuration,
  isValidRewardRate,
  SECONDS_PER_YEAR,
} from '../src/staking';

const YEAR = Number(SECONDS_PER_YEAR);

describe('calculateAccruedReward', () => {
  it('should pay the annual rate over one full year', () => {
    const amount = 1000n * 10n ** 18n;
    expect(calculateAccruedReward(amount, 1000, YEAR)).toBe(100n * 10n ** 18n);
  });

  it('should scale linearly with elapsed time', () => {
    expect(calculateAccruedReward(1000n, 1000, YEAR / 2)).toBe(50n);
    expect(calculateAccruedReward(10n ** 12n, 1000, 7 * 86_400)).toBe(1_917_808_219n);
  });

  it('should floor fractional rewards', () => {
    expect(calculateAccruedReward(1_000_000_000n, 1000, 86_400)).toBe(273_972n);
    expect(calculateAccruedReward(1000n, 1000, 86_400)).toBe(0n);
  });

  it('should return 0 with no elapsed time', () => {
    expect(calculateAccruedReward(10n ** 12n, 10_000, 0)).toBe(0n);
    expect(calculateAccruedReward(10n ** 12n, 10_000, -30)).toBe(0n);
  });

  it('should keep growing past one year', () => {
    expect(calculateAccruedReward(1000n, 10_000, YEAR * 3)).toBe(3000n);
  });
});

describe('capRewardBySolvency', () => {
  it('should pay the full reward when the pool covers it', () => {
    expect(capRewardBySolvency(100n, 1000n, 800n)).toBe(100n);
    expect(capRewardBySolvency(100n, 900n, 800n)).toBe(100n);
  });

  it('should cap the reward at the surplus', () => {
    expect(capRewardBySolvency(100n, 850n, 800n)).toBe(50n);
  });

  it('should pay nothing rather than dip into principal', () => {
    expect(capRewardBySolvency(100n, 800n, 800n)).toBe(0n);
    expect(capRewardBySolvency(100n, 700n, 800n)).toBe(0n);
  });
});

describe('parameter validation', () => {
  it('should accept rates in (0, 10000]', () => {
    expect(isValidRewardRate(1)).toBe(true);
    expect(isValidRewardRate(10_000)).toBe(true);
    expect(isValidRewardRate(0)).toBe(false);
    expect(isValidRewardRate(10_001)).toBe(false);
    expect(isValidRewardRate(12.5)).toBe(false);
  });

  it('should accept positive whole-second durations', () => {
    expect(isValidLockDuration(1)).toBe(true);
    expect(isValidLockDuration(0)).toBe(false);
    expect(isValidLockDuration(-60)).toBe(false);
    expect(isValidLockDuration(0.5)).toBe(false);
  });
});
