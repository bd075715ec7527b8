import { z } from 'zod';
import { StakingError } from './errors';
import { resolvePolicy, type Policy } from './staking/policy';
import { walletAddress } from './utils/wallet';

const uintString = z
  .string()
  .regex(/^\d+$/, 'must be a non-negative integer')
  .transform((v) => BigInt(v));

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65_535).default(3000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  CUSTODY_ACCOUNT: z.string().min(1).default('custody'),
  FEE_RECIPIENT: z.string().min(1).default('fee-recipient'),
  ADMIN_WALLETS: z
    .string()
    .default('')
    .transform((v) => v.split(',').map((s) => s.trim()).filter(Boolean))
    .pipe(z.array(walletAddress)),
  INITIAL_REWARD_RATE: uintString.optional(),
  MIN_REWARD_RATE: uintString.optional(),
  RATE_ADJUSTMENT_PERIOD: uintString.optional(),
  MAX_APR_BPS: uintString.optional(),
  TARGET_SUSTAINABILITY_DAYS: uintString.optional(),
  MINIMUM_STAKE: uintString.optional(),
});

export interface AppConfig {
  port: number;
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  custodyAccount: string;
  feeRecipient: string;
  adminWallets: string[];
  initialRewardRate: bigint;
  policy: Policy;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new StakingError(
      'InvalidConfiguration',
      `${issue?.path.join('.') ?? 'env'}: ${issue?.message ?? 'invalid'}`,
    );
  }
  const e = parsed.data;

  const overrides: Partial<Policy> = {};
  if (e.MIN_REWARD_RATE !== undefined) overrides.minRewardRate = e.MIN_REWARD_RATE;
  if (e.RATE_ADJUSTMENT_PERIOD !== undefined) overrides.rateAdjustmentPeriod = e.RATE_ADJUSTMENT_PERIOD;
  if (e.MAX_APR_BPS !== undefined) overrides.maxAPR = e.MAX_APR_BPS;
  if (e.TARGET_SUSTAINABILITY_DAYS !== undefined) {
    overrides.targetSustainabilityDays = e.TARGET_SUSTAINABILITY_DAYS;
  }
  if (e.MINIMUM_STAKE !== undefined) overrides.minimumStake = e.MINIMUM_STAKE;
  const policy = resolvePolicy(overrides);

  return {
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    custodyAccount: e.CUSTODY_ACCOUNT,
    feeRecipient: e.FEE_RECIPIENT,
    adminWallets: e.ADMIN_WALLETS,
    initialRewardRate: e.INITIAL_REWARD_RATE ?? policy.minRewardRate,
    policy,
  };
}
