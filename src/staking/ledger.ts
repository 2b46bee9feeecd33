/**
 * Staking Ledger
 *
 * One live stake per wallet. Stakes accrue simple interest from their start
 * time and unlock after `lockDuration` seconds; emergency withdrawal returns
 * principal at any time and forfeits the reward.
 *
 * Lifecycle per wallet:
 *   NoStake -> Staked -> (Withdrawn | EmergencyWithdrawn) -> NoStake
 *
 * Mutations are serialized by one mutex covering the stake map and
 * `totalStaked`. Bookkeeping is committed before tokens leave custody and
 * restored if the transfer fails. Calls that re-enter the ledger from inside
 * a token call are rejected.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { EventEmitter } from 'node:events';
import { Mutex } from 'async-mutex';
import { StakingError } from './errors';
import {
  calculateAccruedReward,
  capRewardBySolvency,
  isValidLockDuration,
  isValidRewardRate,
} from './rewards';
import type { TokenCollaborator } from './token';
import { moduleLogger } from '../utils/logger';
import { generateWallet, isValidWallet } from '../utils/wallet';

// ============ Types ============

export interface StakeRecord {
  amount: bigint;
  startTime: number;       // Unix seconds
  rewardDebt: bigint;      // Reserved, always 0n
  exists: boolean;
}

export interface StakeInfo {
  wallet: string;
  exists: boolean;
  amount: bigint;
  startTime: number;
  unlockTime: number;
  reward: bigint;
  canWithdraw: boolean;
}

export interface WithdrawResult {
  principal: bigint;
  reward: bigint;
}

export interface LedgerConfig {
  token: TokenCollaborator;
  owner: string;
  lockDuration: number;    // Seconds
  rewardRateBps: number;   // 1..10_000 per 365-day year
  custody?: string;        // Ledger's own token account, generated if omitted
}

export interface LedgerStats {
  totalStaked: bigint;
  stakerCount: number;
  rewardRateBps: number;
  lockDuration: number;
  rewardPool: bigint;
}

export interface LedgerEvents {
  Staked: { wallet: string; amount: bigint; startTime: number };
  Withdrawn: { wallet: string; principal: bigint; reward: bigint; rewardShortfall: bigint };
  EmergencyWithdrawn: { wallet: string; principal: bigint; forfeitedReward: bigint };
  RewardRateUpdated: { previous: number; current: number };
  LockDurationUpdated: { previous: number; current: number };
  RewardsFunded: { from: string; amount: bigint };
  ExcessWithdrawn: { to: string; amount: bigint };
  OwnershipTransferred: { previous: string; current: string };
}

export type LedgerEventName = keyof LedgerEvents;

export function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

// ============ Ledger ============

export class StakingLedger {
  readonly custody: string;

  private stakes: Map<string, StakeRecord> = new Map();
  private staked = 0n;
  private lockSeconds: number;
  private rateBps: number;
  private currentOwner: string;

  private readonly token: TokenCollaborator;
  private readonly mutex = new Mutex();
  private readonly inside = new AsyncLocalStorage<string>();
  private readonly emitter = new EventEmitter();
  private log = moduleLogger('ledger');

  constructor(config: LedgerConfig) {
    if (!isValidLockDuration(config.lockDuration)) {
      throw new StakingError('InvalidDuration', 'Lock duration must be a positive whole number of seconds', {
        lockDuration: config.lockDuration,
      });
    }
    if (!isValidRewardRate(config.rewardRateBps)) {
      throw new StakingError('InvalidRate', 'Reward rate must be between 1 and 10000 bps', {
        rewardRateBps: config.rewardRateBps,
      });
    }
    assertWallet(config.owner);

    this.token = config.token;
    this.currentOwner = config.owner;
    this.lockSeconds = config.lockDuration;
    this.rateBps = config.rewardRateBps;
    this.custody = config.custody ?? generateWallet();
    assertWallet(this.custody);
  }

  // ============ Read Side ============

  get totalStaked(): bigint {
    return this.staked;
  }

  get lockDuration(): number {
    return this.lockSeconds;
  }

  get rewardRateBps(): number {
    return this.rateBps;
  }

  get owner(): string {
    return this.currentOwner;
  }

  get stakerCount(): number {
    return this.stakes.size;
  }

  getStake(wallet: string): StakeRecord | undefined {
    const record = this.stakes.get(wallet);
    return record ? { ...record } : undefined;
  }

  calculateReward(wallet: string): bigint {
    const record = this.stakes.get(wallet);
    if (!record) return 0n;
    return calculateAccruedReward(record.amount, this.rateBps, nowSeconds() - record.startTime);
  }

  getStakeInfo(wallet: string): StakeInfo {
    const record = this.stakes.get(wallet);
    if (!record) {
      return {
        wallet,
        exists: false,
        amount: 0n,
        startTime: 0,
        unlockTime: 0,
        reward: 0n,
        canWithdraw: false,
      };
    }

    const elapsed = nowSeconds() - record.startTime;
    return {
      wallet,
      exists: true,
      amount: record.amount,
      startTime: record.startTime,
      unlockTime: record.startTime + this.lockSeconds,
      reward: calculateAccruedReward(record.amount, this.rateBps, elapsed),
      canWithdraw: elapsed >= this.lockSeconds,
    };
  }

  /**
   * Tokens held in custody above the principal owed to stakers.
   */
  async getRewardPoolBalance(): Promise<bigint> {
    const balance = await this.token.balanceOf(this.custody);
    const surplus = balance - this.staked;
    return surplus > 0n ? surplus : 0n;
  }

  async getStats(): Promise<LedgerStats> {
    return {
      totalStaked: this.staked,
      stakerCount: this.stakerCount,
      rewardRateBps: this.rateBps,
      lockDuration: this.lockSeconds,
      rewardPool: await this.getRewardPoolBalance(),
    };
  }

  /**
   * Subscribe to ledger events. Listeners run after the operation has
   * committed; a listener that throws (or rejects) is logged and does not
   * fail the operation or stop other listeners.
   */
  on<E extends LedgerEventName>(event: E, listener: (payload: LedgerEvents[E]) => void): () => void {
    const isolated = (payload: LedgerEvents[E]) => {
      try {
        const result: unknown = listener(payload);
        if (result instanceof Promise) {
          void result.catch((error: unknown) => this.listenerFailed(event, error));
        }
      } catch (error) {
        this.listenerFailed(event, error);
      }
    };
    this.emitter.on(event, isolated);
    return () => {
      this.emitter.off(event, isolated);
    };
  }

  // ============ Staker Operations ============

  async deposit(wallet: string, amount: bigint): Promise<StakeRecord> {
    return this.exclusive('deposit', async () => {
      assertWallet(wallet);
      if (amount <= 0n) {
        throw new StakingError('InvalidAmount', 'Stake amount must be greater than zero');
      }
      if (this.stakes.has(wallet)) {
        throw new StakingError('AlreadyStaked', 'Wallet already has an active stake', { wallet });
      }

      await this.pull(wallet, amount);

      const record: StakeRecord = {
        amount,
        startTime: nowSeconds(),
        rewardDebt: 0n,
        exists: true,
      };
      this.stakes.set(wallet, record);
      this.staked += amount;

      this.emit('Staked', { wallet, amount, startTime: record.startTime });
      return { ...record };
    });
  }

  async withdraw(wallet: string): Promise<WithdrawResult> {
    return this.exclusive('withdraw', async () => {
      const record = this.requireStake(wallet);
      const elapsed = nowSeconds() - record.startTime;
      if (elapsed < this.lockSeconds) {
        throw new StakingError('LockNotElapsed', 'Stake is still locked', {
          wallet,
          unlockTime: record.startTime + this.lockSeconds,
        });
      }

      const accrued = calculateAccruedReward(record.amount, this.rateBps, elapsed);
      const reward = await this.release(wallet, record, async () => {
        const balance = await this.token.balanceOf(this.custody);
        return capRewardBySolvency(accrued, balance - record.amount, this.staked);
      });

      const shortfall = accrued - reward;
      if (shortfall > 0n) {
        this.log.warn('Reward pool underfunded, reward capped', { wallet, accrued, paid: reward });
      }
      this.emit('Withdrawn', { wallet, principal: record.amount, reward, rewardShortfall: shortfall });
      return { principal: record.amount, reward };
    });
  }

  async emergencyWithdraw(wallet: string): Promise<bigint> {
    return this.exclusive('emergencyWithdraw', async () => {
      const record = this.requireStake(wallet);
      const forfeited = calculateAccruedReward(record.amount, this.rateBps, nowSeconds() - record.startTime);

      await this.release(wallet, record, async () => 0n);

      this.emit('EmergencyWithdrawn', { wallet, principal: record.amount, forfeitedReward: forfeited });
      return record.amount;
    });
  }

  // ============ Owner Operations ============

  async setRewardRate(caller: string, rateBps: number): Promise<void> {
    return this.exclusive('setRewardRate', async () => {
      this.requireOwner(caller);
      if (!isValidRewardRate(rateBps)) {
        throw new StakingError('InvalidRate', 'Reward rate must be between 1 and 10000 bps', { rateBps });
      }
      const previous = this.rateBps;
      this.rateBps = rateBps;
      this.emit('RewardRateUpdated', { previous, current: rateBps });
    });
  }

  async setLockDuration(caller: string, seconds: number): Promise<void> {
    return this.exclusive('setLockDuration', async () => {
      this.requireOwner(caller);
      if (!isValidLockDuration(seconds)) {
        throw new StakingError('InvalidDuration', 'Lock duration must be a positive whole number of seconds', {
          seconds,
        });
      }
      const previous = this.lockSeconds;
      this.lockSeconds = seconds;
      this.emit('LockDurationUpdated', { previous, current: seconds });
    });
  }

  async fundRewards(caller: string, amount: bigint): Promise<void> {
    return this.exclusive('fundRewards', async () => {
      this.requireOwner(caller);
      if (amount <= 0n) {
        throw new StakingError('InvalidAmount', 'Funding amount must be greater than zero');
      }
      await this.pull(caller, amount);
      this.emit('RewardsFunded', { from: caller, amount });
    });
  }

  async withdrawExcess(caller: string, amount: bigint): Promise<void> {
    return this.exclusive('withdrawExcess', async () => {
      this.requireOwner(caller);
      if (amount <= 0n) {
        throw new StakingError('InvalidAmount', 'Withdrawal amount must be greater than zero');
      }
      const balance = await this.token.balanceOf(this.custody);
      const excess = balance - this.staked;
      if (excess < amount) {
        throw new StakingError('InsufficientExcess', 'Amount exceeds the reward pool surplus', {
          requested: amount.toString(),
          available: (excess > 0n ? excess : 0n).toString(),
        });
      }
      const ok = await this.token.transfer(this.custody, caller, amount);
      if (!ok) {
        throw new StakingError('TransferFailed', 'Token transfer to owner was rejected');
      }
      this.emit('ExcessWithdrawn', { to: caller, amount });
    });
  }

  async transferOwnership(caller: string, newOwner: string): Promise<void> {
    return this.exclusive('transferOwnership', async () => {
      this.requireOwner(caller);
      assertWallet(newOwner);
      const previous = this.currentOwner;
      this.currentOwner = newOwner;
      this.emit('OwnershipTransferred', { previous, current: newOwner });
    });
  }

  // ============ Internals ============

  private async exclusive<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const active = this.inside.getStore();
    if (active) {
      throw new StakingError('ReentrantCall', `${operation} called during ${active}`);
    }
    return this.mutex.runExclusive(() => this.inside.run(operation, fn));
  }

  private requireStake(wallet: string): StakeRecord {
    const record = this.stakes.get(wallet);
    if (!record) {
      throw new StakingError('NoActiveStake', 'Wallet has no active stake', { wallet });
    }
    return record;
  }

  private requireOwner(caller: string): void {
    if (caller !== this.currentOwner) {
      throw new StakingError('Unauthorized', 'Caller is not the ledger owner', { caller });
    }
  }

  private async pull(from: string, amount: bigint): Promise<void> {
    const ok = await this.token.transferFrom(this.custody, from, this.custody, amount);
    if (!ok) {
      throw new StakingError('TransferFailed', 'Token transfer into custody was rejected', {
        from,
        amount: amount.toString(),
      });
    }
  }

  /**
   * Close a stake and pay out principal plus whatever `rewardFor` settles on.
   * The record is gone before any token call is made; it comes back if the
   * payout does not go through.
   */
  private async release(
    wallet: string,
    record: StakeRecord,
    rewardFor: () => Promise<bigint>
  ): Promise<bigint> {
    this.stakes.delete(wallet);
    this.staked -= record.amount;

    try {
      const reward = await rewardFor();
      const ok = await this.token.transfer(this.custody, wallet, record.amount + reward);
      if (!ok) {
        throw new StakingError('TransferFailed', 'Token transfer out of custody was rejected', {
          wallet,
          amount: (record.amount + reward).toString(),
        });
      }
      return reward;
    } catch (error) {
      this.stakes.set(wallet, record);
      this.staked += record.amount;
      throw error;
    }
  }

  private emit<E extends LedgerEventName>(event: E, payload: LedgerEvents[E]): void {
    this.log.info(event, payload);
    this.emitter.emit(event, payload);
  }

  private listenerFailed(event: LedgerEventName, error: unknown): void {
    this.log.error(`${event} listener failed`, { error: error instanceof Error ? error.message : String(error) });
  }
}

function assertWallet(address: string): void {
  if (!isValidWallet(address)) {
    throw new StakingError('InvalidAccount', 'Not a valid wallet address', { address });
  }
}
