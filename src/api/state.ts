import { IAllocationLedgerReader } from '../allocation/interfaces';
import { DISTRIBUTOR_ROLE, InMemoryAllocationLedger } from '../allocation/inMemoryAllocationLedger';
import { AppConfig } from '../config';
import { Clock } from '../distributor/clock';
import { TokenDistributor } from '../distributor/tokenDistributor';
import { DistributorEvent } from '../persistence/eventTypes';
import { IDistributorStore } from '../persistence/interfaces';

/**
 * API state container for the HTTP server
 */
export interface ApiState {
  distributor: TokenDistributor;
  allocation: IAllocationLedgerReader;
  adminKey: string;
  /** Account the admin API acts as when calling gated operations */
  operatorAccount: string;
  storeBackend: AppConfig['storeBackend'];
}

/**
 * Build the distributor and its in-process allocation ledger.
 *
 * The ledger is owned by the configured owner, grants the distributor
 * account DISTRIBUTOR_ROLE and assigns it the whole allocation budget.
 * Payouts already recorded in the store are then replayed into it, so a
 * restart over a durable store does not hand out the budget twice.
 */
export function createApiState(
  config: AppConfig,
  store: IDistributorStore,
  clock: Clock
): ApiState {
  const allocation = new InMemoryAllocationLedger(config.allocationBudget, config.owner);
  allocation.grantRole(config.owner, DISTRIBUTOR_ROLE, config.distributorAccount);
  if (config.allocationBudget > 0n) {
    allocation.assign(config.owner, config.distributorAccount, config.allocationBudget);
  }

  const distributor = new TokenDistributor(store, allocation, clock, {
    distributorAccount: config.distributorAccount,
    owner: config.owner,
    rewardDistribution: config.rewardDistribution,
    duration: config.rewardDurationSecs,
  });

  const replayed = restoreAllocations(
    allocation,
    config.distributorAccount,
    distributor.getEvents({ eventType: 'REWARD_PAID' })
  );
  if (replayed > 0) {
    console.log(`Distributor: replayed ${replayed} reward payouts into the allocation ledger`);
  }

  return {
    distributor,
    allocation,
    adminKey: config.adminKey,
    operatorAccount: config.operatorAccount,
    storeBackend: config.storeBackend,
  };
}

/**
 * Re-apply stored REWARD_PAID events to a fresh allocation ledger.
 * Returns the number of payouts applied. Throws INSUFFICIENT_ASSIGNED if the
 * configured budget no longer covers what was already paid.
 */
export function restoreAllocations(
  allocation: InMemoryAllocationLedger,
  distributorAccount: string,
  events: DistributorEvent[]
): number {
  let applied = 0;
  for (const event of events) {
    if (event.eventType !== 'REWARD_PAID' || !event.account) continue;
    allocation.allocate(distributorAccount, event.account, BigInt(event.payload.amount));
    applied++;
  }
  return applied;
}
