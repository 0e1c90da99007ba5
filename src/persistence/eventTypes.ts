export interface DistributorEvent {
  eventId: string;
  sequenceNumber: number;
  timestamp: string; // ISO string, excluded from hash
  /** Clock time (unix seconds) of the operation that produced the event */
  blockTime: number;
  eventType: DistributorEventType;
  account?: string;
  payload: Record<string, string>;
  prevEventHash: string;
  eventHash: string;
}

export type DistributorEventType =
  | 'REWARD_ADDED'
  | 'STAKED'
  | 'WITHDRAWN'
  | 'REWARD_PAID'
  | 'REWARD_DISTRIBUTION_SET'
  | 'OWNERSHIP_TRANSFERRED';

export const DISTRIBUTOR_EVENT_TYPES: readonly DistributorEventType[] = [
  'REWARD_ADDED',
  'STAKED',
  'WITHDRAWN',
  'REWARD_PAID',
  'REWARD_DISTRIBUTION_SET',
  'OWNERSHIP_TRANSFERRED',
];

export function isDistributorEventType(value: string): value is DistributorEventType {
  return DISTRIBUTOR_EVENT_TYPES.some(t => t === value);
}

export const GENESIS_HASH = 'GENESIS';
