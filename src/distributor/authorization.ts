import { IDistributorStore } from '../persistence/interfaces';
import { DistributorError, ErrorCodes } from '../errors';
import { AuthorityState, isZeroAddress, normalizeAccount } from '../types';
import { requireAuthority } from './poolAccess';

/**
 * Owner and reward-distribution checks. The owner picks which account may
 * inject rewards; nothing else is gated.
 */
export class Authorization {
  constructor(private readonly store: IDistributorStore) {}

  getAuthority(): AuthorityState {
    return requireAuthority(this.store);
  }

  isOwner(caller: string): boolean {
    return normalizeAccount(caller) === this.getAuthority().owner;
  }

  isRewardDistribution(caller: string): boolean {
    return normalizeAccount(caller) === this.getAuthority().rewardDistribution;
  }

  requireOwner(caller: string): void {
    if (!this.isOwner(caller)) {
      throw new DistributorError(ErrorCodes.NOT_OWNER, 'Ownable: caller is not the owner');
    }
  }

  requireRewardDistribution(caller: string): void {
    if (!this.isRewardDistribution(caller)) {
      throw new DistributorError(
        ErrorCodes.NOT_REWARD_DISTRIBUTION,
        'Caller is not reward distribution'
      );
    }
  }

  setRewardDistribution(caller: string, account: string): AuthorityState {
    this.requireOwner(caller);
    const authority = this.getAuthority();
    authority.rewardDistribution = normalizeAccount(account);
    this.store.putAuthority(authority);
    return authority;
  }

  transferOwnership(caller: string, newOwner: string): { previous: string; next: string } {
    this.requireOwner(caller);
    if (newOwner.trim() === '' || isZeroAddress(newOwner)) {
      throw new DistributorError(ErrorCodes.INVALID_ACCOUNT, 'Ownable: new owner is the zero address');
    }

    const authority = this.getAuthority();
    const previous = authority.owner;
    authority.owner = normalizeAccount(newOwner);
    this.store.putAuthority(authority);
    return { previous, next: authority.owner };
  }
}
