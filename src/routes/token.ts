/**
 * Token API Routes
 */

import { Hono } from 'hono';
import { z } from 'zod';
import type { InMemoryToken } from '../staking/token';
import { requireSignature, type AuthEnv } from './auth';
import { amountSchema, errorResponse, parseBody, walletSchema } from './utils';

export function createTokenRoutes(token: InMemoryToken, custody: string): Hono<AuthEnv> {
  const tokenRoutes = new Hono<AuthEnv>();

  tokenRoutes.get('/info', (c) => {
    const info = token.getInfo();
    return c.json({
      success: true,
      token: {
        ...info,
        totalSupply: info.totalSupply.toString(),
      },
    });
  });

  tokenRoutes.get('/balance/:wallet', async (c) => {
    const parsed = walletSchema.safeParse(c.req.param('wallet'));
    if (!parsed.success) {
      return c.json({ success: false, error: 'Invalid wallet address' }, 400);
    }

    const balance = await token.balanceOf(parsed.data);
    return c.json({
      success: true,
      wallet: parsed.data,
      balance: balance.toString(),
      allowance: token.allowance(parsed.data, custody).toString(),
    });
  });

  // The signer grants the staking ledger's custody account an allowance
  tokenRoutes.post('/approve', requireSignature, async (c) => {
    const parsed = await parseBody(c, z.object({ amount: amountSchema }));
    if (!parsed.ok) return parsed.response;

    const wallet = c.get('signer');

    try {
      token.approve(wallet, custody, parsed.data.amount);
      return c.json({
        success: true,
        spender: custody,
        allowance: token.allowance(wallet, custody).toString(),
      });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  tokenRoutes.post('/mint', requireSignature, async (c) => {
    const parsed = await parseBody(c, z.object({
      to: walletSchema,
      amount: amountSchema,
    }));
    if (!parsed.ok) return parsed.response;

    const { to, amount } = parsed.data;

    try {
      token.mint(c.get('signer'), to, amount);
      return c.json({
        success: true,
        message: `Minted ${amount} ${token.metadata.symbol}`,
        balance: (await token.balanceOf(to)).toString(),
      });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  return tokenRoutes;
}
