import { parseTokens } from './fixedPoint';
import { DEFAULT_REWARD_DURATION_SECS, normalizeAccount } from './types';

export type StoreBackend = 'memory' | 'sqlite';

export interface AppConfig {
  port: number;
  storeBackend: StoreBackend;
  /** SQLite file; defaults to ./data/distributor.db */
  dbPath?: string;
  adminKey: string;
  rewardDurationSecs: number;
  owner: string;
  rewardDistribution: string;
  /** Identity the distributor presents to the allocation ledger */
  distributorAccount: string;
  /** Account the admin API acts as */
  operatorAccount: string;
  /** Tokens assigned to the distributor in the in-process allocation ledger */
  allocationBudget: bigint;
}

const DEFAULT_OWNER = '0x00000000000000000000000000000000000000a1';
const DEFAULT_DISTRIBUTOR = '0x00000000000000000000000000000000000000d1';

function parseIntEnv(value: string | undefined, fallback: number, name: string): number {
  if (value === undefined || value === '') return fallback;
  const parsed = /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Read configuration from environment variables.
 *
 * PORT, STORE_BACKEND (memory|sqlite), DB_PATH, ADMIN_KEY,
 * REWARD_DURATION_SECS, OWNER_ADDRESS, REWARD_DISTRIBUTION_ADDRESS,
 * DISTRIBUTOR_ADDRESS, OPERATOR_ADDRESS, ALLOCATION_BUDGET (whole tokens)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const backend = env.STORE_BACKEND ?? 'sqlite';
  if (backend !== 'memory' && backend !== 'sqlite') {
    throw new Error(`STORE_BACKEND must be "memory" or "sqlite", got "${backend}"`);
  }

  const owner = normalizeAccount(env.OWNER_ADDRESS || DEFAULT_OWNER);
  const operatorAccount = normalizeAccount(env.OPERATOR_ADDRESS || owner);

  return {
    port: parseIntEnv(env.PORT, 3000, 'PORT'),
    storeBackend: backend,
    dbPath: env.DB_PATH || undefined,
    adminKey: env.ADMIN_KEY || 'test-admin-key',
    rewardDurationSecs: parseIntEnv(env.REWARD_DURATION_SECS, DEFAULT_REWARD_DURATION_SECS, 'REWARD_DURATION_SECS'),
    owner,
    rewardDistribution: normalizeAccount(env.REWARD_DISTRIBUTION_ADDRESS || operatorAccount),
    distributorAccount: normalizeAccount(env.DISTRIBUTOR_ADDRESS || DEFAULT_DISTRIBUTOR),
    operatorAccount,
    allocationBudget: parseTokens(env.ALLOCATION_BUDGET || '0'),
  };
}
