import { IDistributorStore } from '../persistence/interfaces';
import { DistributorError, ErrorCodes } from '../errors';
import { Participant, createEmptyParticipant } from '../types';
import { requirePool } from './poolAccess';

/**
 * Staked balances per participant plus the aggregate.
 *
 * totalStaked is updated in the same write as the participant it belongs to
 * and is never recomputed by summing. Callers must checkpoint the participant
 * (AccrualEngine.checkpoint) before stake or withdraw.
 */
export class BalanceLedger {
  constructor(private readonly store: IDistributorStore) {}

  /** Participant record, or a zeroed one if the account has never staked */
  getParticipant(account: string): Participant {
    return this.store.getParticipant(account) ?? createEmptyParticipant(account);
  }

  balanceOf(account: string): bigint {
    return this.getParticipant(account).stakedAmount;
  }

  totalSupply(): bigint {
    return requirePool(this.store).totalStaked;
  }

  stake(account: string, amount: bigint): Participant {
    if (amount < 0n) {
      throw new DistributorError(ErrorCodes.INVALID_AMOUNT, `Negative stake amount: ${amount}`);
    }
    if (amount === 0n) {
      throw new DistributorError(ErrorCodes.CANNOT_STAKE_ZERO, 'Cannot stake 0');
    }

    const pool = requirePool(this.store);
    const participant = this.getParticipant(account);

    participant.stakedAmount += amount;
    pool.totalStaked += amount;

    this.store.putParticipant(participant);
    this.store.putPool(pool);
    return participant;
  }

  withdraw(account: string, amount: bigint): Participant {
    if (amount < 0n) {
      throw new DistributorError(ErrorCodes.INVALID_AMOUNT, `Negative withdraw amount: ${amount}`);
    }
    if (amount === 0n) {
      throw new DistributorError(ErrorCodes.CANNOT_WITHDRAW_ZERO, 'Cannot withdraw 0');
    }

    const pool = requirePool(this.store);
    const participant = this.getParticipant(account);

    if (participant.stakedAmount < amount) {
      throw new DistributorError(
        ErrorCodes.INSUFFICIENT_STAKE,
        `Withdraw amount ${amount} exceeds staked balance ${participant.stakedAmount} for ${account}`
      );
    }
    if (pool.totalStaked < amount) {
      throw new Error(`Pool total ${pool.totalStaked} below withdraw amount ${amount}`);
    }

    participant.stakedAmount -= amount;
    pool.totalStaked -= amount;

    this.store.putParticipant(participant);
    this.store.putPool(pool);
    return participant;
  }
}
