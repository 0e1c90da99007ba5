import { IDistributorStore } from '../persistence/interfaces';
import { DistributorError, ErrorCodes } from '../errors';
import { PoolState } from '../types';
import { AccrualEngine } from './accrualEngine';
import { Authorization } from './authorization';
import { requirePool } from './poolAccess';

export interface RewardNotification {
  amount: bigint;
  /** Unemitted reward of the running period folded into the new rate */
  leftover: bigint;
  rewardRate: bigint;
  periodFinish: number;
}

/**
 * New emission rate after injecting `amount` at `now`.
 *
 * Outside a period the amount is spread over `duration`. Inside one, what the
 * old rate would still have emitted is added first. Integer division drops
 * up to duration - 1 units.
 */
export function computeRewardRate(
  pool: Pick<PoolState, 'rewardRate' | 'periodFinish' | 'duration'>,
  amount: bigint,
  now: number
): { rewardRate: bigint; leftover: bigint } {
  const duration = BigInt(pool.duration);

  if (now >= pool.periodFinish) {
    return { rewardRate: amount / duration, leftover: 0n };
  }

  const remaining = BigInt(pool.periodFinish - now);
  const leftover = remaining * pool.rewardRate;
  return { rewardRate: (amount + leftover) / duration, leftover };
}

export class RewardScheduler {
  constructor(
    private readonly store: IDistributorStore,
    private readonly engine: AccrualEngine,
    private readonly auth: Authorization
  ) {}

  notifyRewardAmount(caller: string, amount: bigint, now: number): RewardNotification {
    this.auth.requireRewardDistribution(caller);
    if (amount < 0n) {
      throw new DistributorError(ErrorCodes.INVALID_AMOUNT, `Negative reward amount: ${amount}`);
    }

    return this.engine.withCheckpoint(null, now, () => {
      const pool = requirePool(this.store);
      const { rewardRate, leftover } = computeRewardRate(pool, amount, now);

      pool.rewardRate = rewardRate;
      pool.lastUpdateTime = now;
      pool.periodFinish = now + pool.duration;
      this.store.putPool(pool);

      return { amount, leftover, rewardRate, periodFinish: pool.periodFinish };
    });
  }
}
