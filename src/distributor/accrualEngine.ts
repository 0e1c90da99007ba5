/**
 * Reward-per-token accrual.
 *
 * The pool keeps one accumulator, rewardPerTokenStored: the reward a single
 * staked unit has earned since genesis, scaled by SCALE. A participant keeps
 * the accumulator value at their last checkpoint (rewardPerTokenPaid) and the
 * reward owed up to then (rewards). Their entitlement at any instant is
 *
 *   rewards + stakedAmount * (rewardPerToken() - rewardPerTokenPaid) / SCALE
 *
 * so a reward injection costs O(1) no matter how many participants exist.
 * While nobody is staked the accumulator does not move and the emission for
 * that interval stays undistributed.
 */

import { IDistributorStore } from '../persistence/interfaces';
import { SCALE, checkedSub, mulDiv } from '../fixedPoint';
import { Participant, PoolState } from '../types';
import { BalanceLedger } from './balanceLedger';
import { requirePool } from './poolAccess';

/**
 * min(now, periodFinish)
 */
export function lastTimeRewardApplicable(pool: PoolState, now: number): number {
  return Math.min(now, pool.periodFinish);
}

export function rewardPerToken(pool: PoolState, now: number): bigint {
  if (pool.totalStaked === 0n) {
    return pool.rewardPerTokenStored;
  }

  const applicable = lastTimeRewardApplicable(pool, now);
  if (applicable < pool.lastUpdateTime) {
    throw new Error(
      `Clock moved backwards: last update ${pool.lastUpdateTime}, now ${now}`
    );
  }

  const elapsed = BigInt(applicable - pool.lastUpdateTime);
  return pool.rewardPerTokenStored + mulDiv(elapsed * pool.rewardRate, SCALE, pool.totalStaked);
}

export function earned(pool: PoolState, participant: Participant, now: number): bigint {
  const delta = checkedSub(
    rewardPerToken(pool, now),
    participant.rewardPerTokenPaid,
    `rewardPerToken for ${participant.account}`
  );
  return mulDiv(participant.stakedAmount, delta, SCALE) + participant.rewards;
}

export class AccrualEngine {
  constructor(
    private readonly store: IDistributorStore,
    private readonly ledger: BalanceLedger
  ) {}

  lastTimeRewardApplicable(now: number): number {
    return lastTimeRewardApplicable(requirePool(this.store), now);
  }

  rewardPerToken(now: number): bigint {
    return rewardPerToken(requirePool(this.store), now);
  }

  earned(account: string, now: number): bigint {
    return earned(requirePool(this.store), this.ledger.getParticipant(account), now);
  }

  /**
   * Advance the accumulator to `now`, then, for a concrete account, move its
   * accrued reward into `rewards` and reset its paid marker.
   *
   * `null` checkpoints the pool only (used before a reward injection).
   */
  checkpoint(account: string | null, now: number): Participant | undefined {
    const pool = requirePool(this.store);
    const stored = rewardPerToken(pool, now);

    pool.rewardPerTokenStored = stored;
    pool.lastUpdateTime = lastTimeRewardApplicable(pool, now);
    this.store.putPool(pool);

    if (account === null) {
      return undefined;
    }

    const participant = this.ledger.getParticipant(account);
    participant.rewards = earned(pool, participant, now);
    participant.rewardPerTokenPaid = stored;
    this.store.putParticipant(participant);
    return participant;
  }

  /**
   * Every mutating entry point goes through here: checkpoint first, then the
   * mutation, never the other way round.
   */
  withCheckpoint<T>(account: string | null, now: number, body: () => T): T {
    this.checkpoint(account, now);
    return body();
  }
}
