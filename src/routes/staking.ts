/**
 * Staking API Routes
 *
 * Endpoints for staking, withdrawal and owner administration.
 */

import { Hono } from 'hono';
import { z } from 'zod';
import type { StakeInfo, StakingLedger } from '../staking/ledger';
import type { InMemoryToken } from '../staking/token';
import { requireSignature, type AuthEnv } from './auth';
import { amountSchema, errorResponse, parseBody, walletSchema } from './utils';

function serializeStakeInfo(info: StakeInfo) {
  return {
    wallet: info.wallet,
    exists: info.exists,
    amount: info.amount.toString(),
    startTime: info.startTime,
    unlockTime: info.unlockTime,
    reward: info.reward.toString(),
    canWithdraw: info.canWithdraw,
  };
}

export function createStakingRoutes(ledger: StakingLedger, token: InMemoryToken): Hono<AuthEnv> {
  const staking = new Hono<AuthEnv>();

  // ============ Ledger Info ============

  staking.get('/config', (c) => {
    return c.json({
      success: true,
      config: {
        owner: ledger.owner,
        custody: ledger.custody,
        lockDuration: ledger.lockDuration,
        rewardRateBps: ledger.rewardRateBps,
        token: token.metadata,
      },
    });
  });

  staking.get('/stats', async (c) => {
    try {
      const stats = await ledger.getStats();
      return c.json({
        success: true,
        overview: {
          totalStaked: stats.totalStaked.toString(),
          totalStakers: stats.stakerCount,
          rewardPool: stats.rewardPool.toString(),
          rewardRateBps: stats.rewardRateBps,
          lockDuration: stats.lockDuration,
        },
      });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  staking.get('/position/:wallet', (c) => {
    const parsed = walletSchema.safeParse(c.req.param('wallet'));
    if (!parsed.success) {
      return c.json({ success: false, error: 'Invalid wallet address' }, 400);
    }

    const info = ledger.getStakeInfo(parsed.data);
    if (!info.exists) {
      return c.json({
        success: true,
        position: null,
        message: 'No active staking position',
      });
    }

    return c.json({
      success: true,
      position: serializeStakeInfo(info),
    });
  });

  staking.get('/reward/:wallet', (c) => {
    const parsed = walletSchema.safeParse(c.req.param('wallet'));
    if (!parsed.success) {
      return c.json({ success: false, error: 'Invalid wallet address' }, 400);
    }

    return c.json({
      success: true,
      wallet: parsed.data,
      reward: ledger.calculateReward(parsed.data).toString(),
    });
  });

  // ============ Staker Operations ============
  // POST routes act for the wallet that signed the request

  staking.post('/stake', requireSignature, async (c) => {
    const parsed = await parseBody(c, z.object({ amount: amountSchema }));
    if (!parsed.ok) return parsed.response;

    const wallet = c.get('signer');
    const { amount } = parsed.data;

    try {
      await ledger.deposit(wallet, amount);
      return c.json({
        success: true,
        message: `Staked ${amount} ${token.metadata.symbol} for ${ledger.lockDuration} seconds`,
        position: serializeStakeInfo(ledger.getStakeInfo(wallet)),
      });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  staking.post('/withdraw', requireSignature, async (c) => {
    try {
      const result = await ledger.withdraw(c.get('signer'));
      return c.json({
        success: true,
        message: 'Withdrawn with reward',
        principal: result.principal.toString(),
        reward: result.reward.toString(),
      });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  staking.post('/emergency-withdraw', requireSignature, async (c) => {
    try {
      const principal = await ledger.emergencyWithdraw(c.get('signer'));
      return c.json({
        success: true,
        message: 'Emergency withdrawal complete, reward forfeited',
        principal: principal.toString(),
      });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  // ============ Owner Operations ============

  staking.post('/admin/reward-rate', requireSignature, async (c) => {
    const parsed = await parseBody(c, z.object({ rateBps: z.number() }));
    if (!parsed.ok) return parsed.response;

    try {
      await ledger.setRewardRate(c.get('signer'), parsed.data.rateBps);
      return c.json({ success: true, rewardRateBps: ledger.rewardRateBps });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  staking.post('/admin/lock-duration', requireSignature, async (c) => {
    const parsed = await parseBody(c, z.object({ seconds: z.number() }));
    if (!parsed.ok) return parsed.response;

    try {
      await ledger.setLockDuration(c.get('signer'), parsed.data.seconds);
      return c.json({ success: true, lockDuration: ledger.lockDuration });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  staking.post('/admin/fund', requireSignature, async (c) => {
    const parsed = await parseBody(c, z.object({ amount: amountSchema }));
    if (!parsed.ok) return parsed.response;

    try {
      await ledger.fundRewards(c.get('signer'), parsed.data.amount);
      return c.json({
        success: true,
        rewardPool: (await ledger.getRewardPoolBalance()).toString(),
      });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  staking.post('/admin/withdraw-excess', requireSignature, async (c) => {
    const parsed = await parseBody(c, z.object({ amount: amountSchema }));
    if (!parsed.ok) return parsed.response;

    try {
      await ledger.withdrawExcess(c.get('signer'), parsed.data.amount);
      return c.json({
        success: true,
        rewardPool: (await ledger.getRewardPoolBalance()).toString(),
      });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  staking.post('/admin/transfer-ownership', requireSignature, async (c) => {
    const parsed = await parseBody(c, z.object({ newOwner: walletSchema }));
    if (!parsed.ok) return parsed.response;

    try {
      await ledger.transferOwnership(c.get('signer'), parsed.data.newOwner);
      return c.json({ success: true, owner: ledger.owner });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  return staking;
}
