import { serve } from '@hono/node-server';
import { createApp } from './app';
import { loadConfig } from './config';
import { StakingEngine } from './staking';
import logger from './utils/logger';
import { AllowlistAuthorizer } from './vault/authorizer';
import { InMemoryTokenVault } from './vault/memory-vault';
import { LoggingEventSink } from './vault/sinks';

const config = loadConfig();
logger.setLevel(config.logLevel);

const vault = new InMemoryTokenVault(config.custodyAccount);
const engine = new StakingEngine({
  vault,
  authorizer: new AllowlistAuthorizer(config.adminWallets),
  sink: new LoggingEventSink(),
  custodyAccount: config.custodyAccount,
  feeRecipient: config.feeRecipient,
  policy: config.policy,
  initialRewardRate: config.initialRewardRate,
});

serve({ fetch: createApp(engine).fetch, port: config.port }, (info) => {
  logger.info(`[SERVER] staking ledger listening on :${info.port}`);
  logger.info(
    `[SERVER] rate ${config.initialRewardRate}/s, target ${config.policy.targetSustainabilityDays} days, ${config.adminWallets.length} admin(s)`,
  );
});
