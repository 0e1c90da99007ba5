/**
 * Test helpers: an app over the in-memory store with a manual clock.
 */

import { createApp } from '../app';
import { ApiState, createApiState } from '../state';
import { loadConfig } from '../../config';
import { ManualClock } from '../../distributor/clock';
import { InMemoryDistributorStore } from '../../persistence/inMemoryStores';

export const ADMIN_KEY = 'test-admin-key';
export const OPERATOR = '0x00000000000000000000000000000000000000a1';
export const START_TIME = 1_000;

export interface TestApp {
  app: ReturnType<typeof createApp>;
  state: ApiState;
  clock: ManualClock;
}

export function makeTestApp(env: NodeJS.ProcessEnv = {}): TestApp {
  const config = loadConfig({
    STORE_BACKEND: 'memory',
    ADMIN_KEY,
    ALLOCATION_BUDGET: '1000',
    REWARD_DURATION_SECS: '100',
    ...env,
  });
  const clock = new ManualClock(START_TIME);
  const state = createApiState(config, new InMemoryDistributorStore(), clock);
  return { app: createApp(state), state, clock };
}
