/**
 * Wrapped reward token.
 *
 * Only one counter-party, the staker, ever holds it. The owner mints to the
 * staker; when the staker "transfers" to a recipient, the tokens are burned
 * and the same amount is allocated to the recipient in the allocation ledger,
 * where vesting applies. Nothing else can move.
 */

import { IAllocationLedger } from '../allocation/interfaces';
import { DistributorError, ErrorCodes } from '../errors';
import { TypedEmitter } from '../events/typedEmitter';
import { ZERO_ADDRESS, isZeroAddress, normalizeAccount } from '../types';

export interface RewardTokenConfig {
  owner: string;
  /** The only account that may receive mints and send transfers */
  staker: string;
  /** Identity used as the distributor when calling the allocation ledger */
  tokenAccount: string;
  name?: string;
  symbol?: string;
}

interface RewardTokenEvents {
  Transfer: [from: string, to: string, amount: bigint];
  RewardPaid: [account: string, amount: bigint];
}

export class RewardToken extends TypedEmitter<RewardTokenEvents> {
  readonly name: string;
  readonly symbol: string;
  readonly decimals = 18;
  readonly owner: string;
  readonly staker: string;
  readonly tokenAccount: string;
  private supply = 0n;

  constructor(
    private readonly allocationLedger: IAllocationLedger,
    config: RewardTokenConfig
  ) {
    super();
    this.owner = normalizeAccount(config.owner);
    this.staker = normalizeAccount(config.staker);
    this.tokenAccount = normalizeAccount(config.tokenAccount);
    this.name = config.name ?? 'Staker Reward Token';
    this.symbol = config.symbol ?? 'SRT';
  }

  totalSupply(): bigint {
    return this.supply;
  }

  /** Everything minted and not yet forwarded belongs to the staker. */
  balanceOf(account: string): bigint {
    return normalizeAccount(account) === this.staker ? this.supply : 0n;
  }

  mint(caller: string, to: string, amount: bigint): void {
    if (normalizeAccount(caller) !== this.owner) {
      throw new DistributorError(ErrorCodes.NOT_OWNER, 'Ownable: caller is not the owner');
    }
    if (normalizeAccount(to) !== this.staker) {
      throw new DistributorError(ErrorCodes.ONLY_TO_STAKER, 'RewardToken:ONLY_TO_STAKER');
    }
    requirePositive(amount);

    this.supply += amount;
    this.emitEvent('Transfer', ZERO_ADDRESS, this.staker, amount);
  }

  /**
   * Forward `amount` from the staker to `to` through the allocation ledger.
   * If the ledger rejects the allocation, supply is left untouched.
   */
  transfer(caller: string, to: string, amount: bigint): void {
    if (normalizeAccount(caller) !== this.staker) {
      throw new DistributorError(ErrorCodes.ONLY_STAKER, 'RewardToken:ONLY_STAKER');
    }
    if (to.trim() === '' || isZeroAddress(to)) {
      throw new DistributorError(ErrorCodes.INVALID_ACCOUNT, 'RewardToken: transfer to the zero address');
    }
    requirePositive(amount);
    if (amount > this.supply) {
      throw new DistributorError(
        ErrorCodes.INSUFFICIENT_BALANCE,
        `RewardToken: transfer amount ${amount} exceeds balance ${this.supply}`
      );
    }

    const recipient = normalizeAccount(to);
    this.allocationLedger.allocate(this.tokenAccount, recipient, amount);
    this.supply -= amount;

    this.emitEvent('Transfer', this.staker, recipient, amount);
    this.emitEvent('RewardPaid', recipient, amount);
  }
}

function requirePositive(amount: bigint): void {
  if (amount <= 0n) {
    throw new DistributorError(ErrorCodes.INVALID_AMOUNT, `Amount must be positive: ${amount}`);
  }
}
