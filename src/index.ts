export * from './staking';
export * from './errors';
export * from './types';
export * from './math/uint';
export { createApp } from './app';
export { createStakingRoutes } from './routes/staking';
export { loadConfig, type AppConfig } from './config';
export { InMemoryTokenVault } from './vault/memory-vault';
export { AllowlistAuthorizer } from './vault/authorizer';
export { LoggingEventSink, MemoryEventSink, FanoutEventSink } from './vault/sinks';
export { isWalletAddress } from './utils/wallet';
export { SerialQueue } from './utils/queue';
