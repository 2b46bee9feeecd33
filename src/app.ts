import { Hono } from 'hono';
import type { Config } from './config';
import { StakingLedger } from './staking/ledger';
import { InMemoryToken } from './staking/token';
import { createStakingRoutes } from './routes/staking';
import { createTokenRoutes } from './routes/token';
import { errorResponse } from './routes/utils';
import { logger } from './utils/logger';

export interface AppContext {
  ledger: StakingLedger;
  token: InMemoryToken;
}

export function createContext(config: Config): AppContext {
  logger.level = config.LOG_LEVEL;

  const token = new InMemoryToken(
    {
      name: config.TOKEN_NAME,
      symbol: config.TOKEN_SYMBOL,
      decimals: config.TOKEN_DECIMALS,
    },
    config.STAKING_OWNER
  );

  const ledger = new StakingLedger({
    token,
    owner: config.STAKING_OWNER,
    custody: config.STAKING_CUSTODY,
    lockDuration: config.STAKING_LOCK_DURATION,
    rewardRateBps: config.STAKING_REWARD_RATE_BPS,
  });

  return { ledger, token };
}

export function createApp({ ledger, token }: AppContext): Hono {
  const app = new Hono();

  app.get('/health', (c) => c.json({ success: true, status: 'ok' }));
  app.route('/staking', createStakingRoutes(ledger, token));
  app.route('/token', createTokenRoutes(token, ledger.custody));

  app.notFound((c) => c.json({ success: false, error: 'Not found' }, 404));
  app.onError((error, c) => errorResponse(c, error));

  return app;
}
