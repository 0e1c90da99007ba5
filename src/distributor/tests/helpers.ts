/**
 * Shared fixtures for distributor tests.
 */

import { DISTRIBUTOR_ROLE, InMemoryAllocationLedger } from '../../allocation/inMemoryAllocationLedger';
import { isDistributorError } from '../../errors';
import { InMemoryDistributorStore } from '../../persistence/inMemoryStores';
import { IDistributorStore } from '../../persistence/interfaces';
import { ManualClock } from '../clock';
import { TokenDistributor } from '../tokenDistributor';

export const OWNER = '0x00000000000000000000000000000000000000a1';
export const DISTRIBUTOR = '0x00000000000000000000000000000000000000d1';
export const START_TIME = 1_000;
export const DURATION = 100;

export interface Fixture {
  clock: ManualClock;
  store: IDistributorStore;
  allocation: InMemoryAllocationLedger;
  distributor: TokenDistributor;
}

/**
 * Distributor at START_TIME with OWNER as owner and reward distribution,
 * and an allocation ledger that assigns `budget` to DISTRIBUTOR.
 */
export function makeFixture(
  options: { budget?: bigint; duration?: number; grantRole?: boolean; store?: IDistributorStore } = {}
): Fixture {
  const budget = options.budget ?? 1_000_000n;
  const clock = new ManualClock(START_TIME);
  const store = options.store ?? new InMemoryDistributorStore();
  const allocation = new InMemoryAllocationLedger(budget, OWNER);

  if (options.grantRole ?? true) {
    allocation.grantRole(OWNER, DISTRIBUTOR_ROLE, DISTRIBUTOR);
    if (budget > 0n) {
      allocation.assign(OWNER, DISTRIBUTOR, budget);
    }
  }

  const distributor = new TokenDistributor(store, allocation, clock, {
    distributorAccount: DISTRIBUTOR,
    owner: OWNER,
    rewardDistribution: OWNER,
    duration: options.duration ?? DURATION,
  });

  return { clock, store, allocation, distributor };
}

/**
 * Run fn and return the DistributorError code it throws (undefined if none).
 */
export function errorCodeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (isDistributorError(err)) return err.code;
    throw err;
  }
  return undefined;
}

export function sumStaked(distributor: TokenDistributor): bigint {
  return distributor.listParticipants().reduce((sum, p) => sum + p.stakedAmount, 0n);
}
