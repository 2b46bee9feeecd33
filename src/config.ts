/**
 * Service Configuration
 *
 * Read once from the environment (and `.env`, if present).
 */

import 'dotenv/config';
import { z } from 'zod';
import { isValidLockDuration, isValidRewardRate } from './staking/rewards';
import { isValidWallet } from './utils/wallet';

const wallet = z.string().refine(isValidWallet, { message: 'Invalid wallet address' });

export const configSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),
  STAKING_OWNER: wallet,
  STAKING_CUSTODY: wallet.optional(),
  STAKING_LOCK_DURATION: z.coerce
    .number()
    .refine(isValidLockDuration, { message: 'Lock duration must be a positive whole number of seconds' })
    .default(7 * 24 * 60 * 60),
  STAKING_REWARD_RATE_BPS: z.coerce
    .number()
    .refine(isValidRewardRate, { message: 'Reward rate must be between 1 and 10000 bps' })
    .default(1000),
  TOKEN_NAME: z.string().min(1).default('Stake Token'),
  TOKEN_SYMBOL: z.string().min(1).max(10).default('STK'),
  TOKEN_DECIMALS: z.coerce.number().int().min(0).max(18).default(9),
});

export type Config = z.infer<typeof configSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.flatten().fieldErrors;
    throw new Error(`Invalid configuration: ${JSON.stringify(issues)}`);
  }
  return parsed.data;
}
