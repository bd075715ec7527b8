/**
 * Staking API Routes
 *
 * Endpoints for staking, withdrawals, rewards, fee tiers and the rate
 * controller. Amounts travel as decimal strings; wallets as base58 keys.
 */

import { Hono, type Context } from 'hono';
import { z } from 'zod';
import { isStakingError, type StakingErrorCode } from '../errors';
import {
  POOL_SHARE_PERCENT,
  POLICY_FIELDS,
  RECIPIENT_SHARE_PERCENT,
  STAKE_FEE_BPS,
  type StakingEngine,
} from '../staking';
import { SECONDS_PER_DAY, type PolicyField } from '../types';
import { toJson } from '../utils/json';
import logger from '../utils/logger';
import { SerialQueue } from '../utils/queue';
import { walletAddress } from '../utils/wallet';

// ============ Schemas ============

const amount = z
  .string()
  .regex(/^\d+$/, 'Amount must be a non-negative integer string')
  .transform((v) => BigInt(v));

const walletBody = z.object({ wallet: walletAddress });

const amountBody = z.object({ wallet: walletAddress, amount });

const rateBody = z.object({ caller: walletAddress, rate: amount });

const policyFieldSchema = z.custom<PolicyField>(
  (v) => typeof v === 'string' && POLICY_FIELDS.some((f) => f === v),
  'Unknown configuration field',
);

const configBody = z.object({
  caller: walletAddress,
  field: policyFieldSchema,
  value: amount,
});

// ============ Helpers ============

function statusFor(code: StakingErrorCode): 400 | 403 | 409 | 502 {
  switch (code) {
    case 'Unauthorized':
      return 403;
    case 'ReentrantCall':
      return 409;
    case 'TransferFailed':
      return 502;
    default:
      return 400;
  }
}

function fail(c: Context, error: unknown) {
  if (isStakingError(error)) {
    return c.json({ success: false, error: error.message, code: error.code }, statusFor(error.code));
  }
  const message = error instanceof Error ? error.message : String(error);
  logger.error(`[API] unexpected error: ${message}`);
  return c.json({ success: false, error: 'Internal error' }, 500);
}

async function readBody(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    return null;
  }
}

function invalid(c: Context, error: z.ZodError) {
  return c.json({ success: false, error: 'Invalid request', details: error.flatten() }, 400);
}

// ============ Routes ============

/**
 * Mutations from concurrent requests wait their turn in `queue`; the engine
 * itself rejects anything that overlaps an operation in flight.
 */
export function createStakingRoutes(engine: StakingEngine, queue = new SerialQueue()) {
  const staking = new Hono();

  // ============ Fee Info ============

  staking.get('/fees', (c) => {
    return c.json({
      success: true,
      stakeFeeBps: STAKE_FEE_BPS.toString(),
      poolSharePercent: POOL_SHARE_PERCENT.toString(),
      recipientSharePercent: RECIPIENT_SHARE_PERCENT.toString(),
      exitTiers: engine.fees.tiers.map((tier) => ({
        minDuration: tier.minDuration.toString(),
        minDays: (tier.minDuration / SECONDS_PER_DAY).toString(),
        feeBps: tier.feeBps.toString(),
      })),
    });
  });

  // ============ Queries ============

  staking.get('/stats', async (c) => {
    try {
      const [availableRewards, sustainabilityDays] = await Promise.all([
        engine.availableRewards(),
        engine.sustainabilityDays(),
      ]);
      return c.json({
        success: true,
        stats: toJson({ ...engine.stats(), availableRewards, sustainabilityDays }),
      });
    } catch (error) {
      return fail(c, error);
    }
  });

  staking.get('/position/:wallet', (c) => {
    const parsed = walletAddress.safeParse(c.req.param('wallet'));
    if (!parsed.success) {
      return invalid(c, parsed.error);
    }
    const info = engine.stakeInfo(parsed.data);
    return c.json({
      success: true,
      position: toJson({ ...info, durationDays: info.duration / SECONDS_PER_DAY }),
    });
  });

  staking.get('/controller', async (c) => {
    try {
      const proposal = await engine.checkAdjustment();
      const stats = engine.stats();
      return c.json({
        success: true,
        controller: toJson({
          rewardRate: stats.rewardRate,
          minRewardRate: stats.minRewardRate,
          maxAPR: stats.maxAPR,
          currentAPR: stats.currentAPR,
          targetSustainabilityDays: stats.targetSustainabilityDays,
          rateAdjustmentPeriod: stats.rateAdjustmentPeriod,
          lastRateAdjustmentTime: stats.lastRateAdjustmentTime,
          lastAdjustmentReason: stats.lastAdjustmentReason,
          proposal,
        }),
      });
    } catch (error) {
      return fail(c, error);
    }
  });

  // ============ Staking Operations ============

  staking.post('/stake', async (c) => {
    const parsed = amountBody.safeParse(await readBody(c));
    if (!parsed.success) {
      return invalid(c, parsed.error);
    }
    const { wallet, amount } = parsed.data;

    try {
      const receipt = await queue.run(() => engine.stake(wallet, amount));
      return c.json({
        success: true,
        message: `Staked ${receipt.netAmount} after a ${receipt.fee} entry fee`,
        receipt: toJson(receipt),
        position: toJson(engine.stakeInfo(wallet)),
      });
    } catch (error) {
      return fail(c, error);
    }
  });

  staking.post('/withdraw', async (c) => {
    const parsed = amountBody.safeParse(await readBody(c));
    if (!parsed.success) {
      return invalid(c, parsed.error);
    }
    const { wallet, amount } = parsed.data;

    try {
      const receipt = await queue.run(() => engine.withdraw(wallet, amount));
      return c.json({
        success: true,
        message: `Withdrew ${receipt.netAmount} after a ${receipt.feeBps} bp exit fee`,
        receipt: toJson(receipt),
        position: toJson(engine.stakeInfo(wallet)),
      });
    } catch (error) {
      return fail(c, error);
    }
  });

  staking.post('/claim', async (c) => {
    const parsed = walletBody.safeParse(await readBody(c));
    if (!parsed.success) {
      return invalid(c, parsed.error);
    }

    try {
      const reward = await queue.run(() => engine.claim(parsed.data.wallet));
      return c.json({ success: true, reward: reward.toString() });
    } catch (error) {
      return fail(c, error);
    }
  });

  staking.post('/exit', async (c) => {
    const parsed = walletBody.safeParse(await readBody(c));
    if (!parsed.success) {
      return invalid(c, parsed.error);
    }

    try {
      const receipt = await queue.run(() => engine.exit(parsed.data.wallet));
      return c.json({ success: true, receipt: toJson(receipt) });
    } catch (error) {
      return fail(c, error);
    }
  });

  staking.post('/rewards', async (c) => {
    const parsed = amountBody.safeParse(await readBody(c));
    if (!parsed.success) {
      return invalid(c, parsed.error);
    }

    try {
      await queue.run(() => engine.addRewards(parsed.data.wallet, parsed.data.amount));
      return c.json({
        success: true,
        availableRewards: (await engine.availableRewards()).toString(),
      });
    } catch (error) {
      return fail(c, error);
    }
  });

  // ============ Admin ============

  staking.post('/admin/reward-rate', async (c) => {
    const parsed = rateBody.safeParse(await readBody(c));
    if (!parsed.success) {
      return invalid(c, parsed.error);
    }

    try {
      await queue.run(() => engine.setRewardRate(parsed.data.caller, parsed.data.rate));
      return c.json({ success: true, rewardRate: engine.stats().rewardRate.toString() });
    } catch (error) {
      return fail(c, error);
    }
  });

  staking.post('/admin/config', async (c) => {
    const parsed = configBody.safeParse(await readBody(c));
    if (!parsed.success) {
      return invalid(c, parsed.error);
    }
    const { caller, field, value } = parsed.data;

    try {
      await queue.run(() => engine.updatePolicy(caller, field, value));
      return c.json({ success: true, field, value: engine.stats()[field].toString() });
    } catch (error) {
      return fail(c, error);
    }
  });

  return staking;
}
