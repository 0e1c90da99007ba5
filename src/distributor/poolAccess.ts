import { IDistributorStore } from '../persistence/interfaces';
import { DistributorError, ErrorCodes } from '../errors';
import { AuthorityState, PoolState } from '../types';

export function requirePool(store: IDistributorStore): PoolState {
  const pool = store.getPool();
  if (!pool) {
    throw new DistributorError(ErrorCodes.NOT_INITIALIZED, 'Distributor pool is not initialized');
  }
  return pool;
}

export function requireAuthority(store: IDistributorStore): AuthorityState {
  const authority = store.getAuthority();
  if (!authority) {
    throw new DistributorError(ErrorCodes.NOT_INITIALIZED, 'Distributor authority is not initialized');
  }
  return authority;
}
