/**
 * Allocation ledger: the vesting collaborator that custodies reward tokens.
 * Paying a reward means recording an allocation here, never moving tokens
 * directly.
 */

export interface AllocationBalance {
  /** Tokens allocated to the account (for a distributor: its remaining budget) */
  allocatedTokens: bigint;
}

export interface AllocationRecord {
  distributor: string;
  recipient: string;
  amount: bigint;
}

export interface IAllocationLedger {
  /**
   * Move `amount` of `distributor`'s assigned budget to `recipient`.
   *
   * @throws DistributorError ONLY_DISTRIBUTOR_ROLE if the distributor lacks the role
   * @throws DistributorError INSUFFICIENT_ASSIGNED if its budget is below amount
   */
  allocate(distributor: string, recipient: string, amount: bigint): void;
}

export interface IAllocationLedgerReader {
  hasRole(role: string, account: string): boolean;
  balances(account: string): AllocationBalance;
}
