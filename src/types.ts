/**
 * Core types for the staking reward distributor.
 *
 * Amounts are bigint base units (see fixedPoint.ts). Times are unix seconds.
 */

/** Null identity. A transfer from it is a mint, a transfer to it is a burn. */
export const ZERO_ADDRESS = '0x0000000000000000000000000000000000000000';

/** Default reward period: 14 days */
export const DEFAULT_REWARD_DURATION_SECS = 14 * 24 * 3600;

// ---------------------------------------------------------------------------
// Ledger state
// ---------------------------------------------------------------------------

export interface Participant {
  account: string;
  stakedAmount: bigint;
  /** Accumulator value at this participant's last checkpoint */
  rewardPerTokenPaid: bigint;
  /** Reward accrued up to the last checkpoint and not yet paid */
  rewards: bigint;
}

export interface PoolState {
  totalStaked: bigint;
  /** Cumulative reward per staked unit, scaled by SCALE. Never decreases. */
  rewardPerTokenStored: bigint;
  lastUpdateTime: number;
  /** Reward units emitted per second during the current period */
  rewardRate: bigint;
  periodFinish: number;
  /** Period length in seconds, fixed at initialization */
  duration: number;
}

export interface AuthorityState {
  owner: string;
  /** The only account allowed to call notifyRewardAmount */
  rewardDistribution: string;
}

export function createEmptyParticipant(account: string): Participant {
  return {
    account,
    stakedAmount: 0n,
    rewardPerTokenPaid: 0n,
    rewards: 0n,
  };
}

export function createInitialPool(duration: number): PoolState {
  return {
    totalStaked: 0n,
    rewardPerTokenStored: 0n,
    lastUpdateTime: 0,
    rewardRate: 0n,
    periodFinish: 0,
    duration,
  };
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface DistributorConfig {
  /** Identity the distributor uses when calling the allocation ledger */
  distributorAccount: string;
  owner: string;
  rewardDistribution?: string;
  duration?: number;
}

// ---------------------------------------------------------------------------
// Identity helpers
// ---------------------------------------------------------------------------

/**
 * Hex addresses compare case-insensitively; other identifiers are kept as-is.
 */
export function normalizeAccount(account: string): string {
  const trimmed = account.trim();
  return /^0x[0-9a-fA-F]+$/.test(trimmed) ? trimmed.toLowerCase() : trimmed;
}

export function isZeroAddress(account: string): boolean {
  return normalizeAccount(account) === ZERO_ADDRESS;
}
