import { DistributorError, ErrorCodes } from '../errors';
import { isZeroAddress } from '../types';

/**
 * Staking operations the hook drives. Each one checkpoints the account
 * before touching its balance.
 */
export interface StakeActions {
  stake(account: string, amount: bigint): void;
  withdraw(account: string, amount: bigint): void;
  /** Pay out everything earned so far. Returns the amount paid (0 if none). */
  payReward(account: string): bigint;
  balanceOf(account: string): bigint;
}

export type TransferKind = 'mint' | 'burn' | 'transfer';

export interface TransferOutcome {
  kind: TransferKind;
  /** Reward paid to `from` when a burn emptied its stake */
  rewardPaid: bigint;
}

export function classifyTransfer(from: string, to: string): TransferKind {
  const fromZero = isZeroAddress(from);
  const toZero = isZeroAddress(to);

  if (fromZero && toZero) {
    throw new DistributorError(ErrorCodes.INVALID_ACCOUNT, 'Transfer from and to the zero address');
  }
  if (fromZero) return 'mint';
  if (toZero) return 'burn';
  return 'transfer';
}

/**
 * Mirrors a hooked token's balances into the staking pool:
 *
 * - mint (from = zero): stake for `to`
 * - burn (to = zero): withdraw from `from`; if that empties it, pay out
 * - transfer: withdraw from `from`, then stake for `to`
 */
export class TransferHook {
  constructor(private readonly actions: StakeActions) {}

  onTransfer(from: string, to: string, amount: bigint): TransferOutcome {
    const kind = classifyTransfer(from, to);

    switch (kind) {
      case 'mint':
        this.actions.stake(to, amount);
        return { kind, rewardPaid: 0n };

      case 'burn': {
        this.actions.withdraw(from, amount);
        const rewardPaid = this.actions.balanceOf(from) === 0n ? this.actions.payReward(from) : 0n;
        return { kind, rewardPaid };
      }

      case 'transfer':
        this.actions.withdraw(from, amount);
        this.actions.stake(to, amount);
        return { kind, rewardPaid: 0n };
    }
  }
}
