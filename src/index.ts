/**
 * Staking service entry point.
 */

import { serve } from '@hono/node-server';
import { loadConfig } from './config';
import { createApp, createContext } from './app';
import { logger } from './utils/logger';

const config = loadConfig();
const context = createContext(config);
const app = createApp(context);

serve({ fetch: app.fetch, port: config.PORT }, (info) => {
  logger.info(`Staking service listening on port ${info.port}`, {
    owner: context.ledger.owner,
    custody: context.ledger.custody,
    lockDuration: context.ledger.lockDuration,
    rewardRateBps: context.ledger.rewardRateBps,
  });
});
