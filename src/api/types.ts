import { ErrorCode } from '../errors';
import { DistributorEvent } from '../persistence/eventTypes';
import { Participant } from '../types';
import { ParticipantView, PoolView } from '../distributor/tokenDistributor';

// ============================================================================
// Wire types: every bigint travels as a decimal string of base units
// ============================================================================

export interface ErrorResponse {
  success: false;
  error: string;
  code: ErrorCode;
}

export interface PoolJson {
  totalStaked: string;
  rewardPerTokenStored: string;
  rewardPerToken: string;
  lastUpdateTime: number;
  lastTimeRewardApplicable: number;
  rewardRate: string;
  periodFinish: number;
  duration: number;
  now: number;
}

export interface ParticipantJson {
  account: string;
  stakedAmount: string;
  rewardPerTokenPaid: string;
  rewards: string;
  earned?: string;
}

export interface PoolResponse {
  success: true;
  pool: PoolJson;
  owner: string;
  rewardDistribution: string;
}

export interface ParticipantResponse {
  success: true;
  participant: ParticipantJson;
}

export interface EventsResponse {
  success: true;
  events: DistributorEvent[];
}

export interface AmountRequest {
  account?: string;
  amount?: string;
}

export interface TransferHookRequest {
  from?: string;
  to?: string;
  amount?: string;
}

export interface AccountRequest {
  account?: string;
}

export function poolToJson(pool: PoolView): PoolJson {
  return {
    totalStaked: pool.totalStaked.toString(),
    rewardPerTokenStored: pool.rewardPerTokenStored.toString(),
    rewardPerToken: pool.rewardPerToken.toString(),
    lastUpdateTime: pool.lastUpdateTime,
    lastTimeRewardApplicable: pool.lastTimeRewardApplicable,
    rewardRate: pool.rewardRate.toString(),
    periodFinish: pool.periodFinish,
    duration: pool.duration,
    now: pool.now,
  };
}

export function participantToJson(participant: Participant | ParticipantView): ParticipantJson {
  const json: ParticipantJson = {
    account: participant.account,
    stakedAmount: participant.stakedAmount.toString(),
    rewardPerTokenPaid: participant.rewardPerTokenPaid.toString(),
    rewards: participant.rewards.toString(),
  };
  if ('earned' in participant) {
    json.earned = participant.earned.toString();
  }
  return json;
}
